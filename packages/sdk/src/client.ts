import {
  AuthTokenProvider,
  AxiosHttpClient,
  ClientConfig,
  HttpClient,
  loadClientConfig,
  scopedLogger,
} from '@circles/core';
import { InterestApi, ProfileRepository, SelectionMachine, TaxonomyStore } from '@circles/interests';
import { MatchingClient } from '@circles/matching';
import {
  FeedbackDispatcher,
  InMemorySettingsStore,
  RecommendationApi,
  RecommendationSessionManager,
  SettingsStore,
} from '@circles/recommendations';

export interface CirclesClient {
  config: ClientConfig;
  http: HttpClient;
  taxonomy: TaxonomyStore;
  profiles: ProfileRepository;
  picker: SelectionMachine;
  matching: MatchingClient;
  feedback: FeedbackDispatcher;
  recommendations: RecommendationSessionManager;
  /** Wait for outstanding feedback deliveries. */
  shutdown(): Promise<void>;
}

export interface CirclesClientOptions {
  config?: ClientConfig;
  /** Replaces the axios client, e.g. with an in-process fake. */
  http?: HttpClient;
  settingsStore?: SettingsStore;
}

/**
 * Build one instance of every manager, wired to a shared HTTP client.
 * Call once at start-up and pass the pieces down.
 */
export function createCirclesClient(auth: AuthTokenProvider, options: CirclesClientOptions = {}): CirclesClient {
  const config = options.config ?? loadClientConfig();
  const http = options.http ?? new AxiosHttpClient(config, auth);

  const taxonomy = new TaxonomyStore(new InterestApi(http, scopedLogger(config.logger, 'Taxonomy')), config);
  const profiles = new ProfileRepository(new InterestApi(http, scopedLogger(config.logger, 'Profiles')), config);
  const picker = new SelectionMachine(taxonomy, profiles, config);

  const recommendationApi = new RecommendationApi(http, scopedLogger(config.logger, 'Recommendations'));
  const feedback = new FeedbackDispatcher(recommendationApi, config);
  const recommendations = new RecommendationSessionManager(
    recommendationApi,
    feedback,
    options.settingsStore ?? new InMemorySettingsStore(),
    config,
  );

  config.logger.info(`[Circles] Client ready for ${config.apiBaseUrl} (${config.locale})`);

  return {
    config,
    http,
    taxonomy,
    profiles,
    picker,
    matching: new MatchingClient(http, config),
    feedback,
    recommendations,
    shutdown: () => feedback.flush(),
  };
}
