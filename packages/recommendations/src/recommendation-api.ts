import { HttpClient, Logger } from '@circles/core';
import {
  RecommendationFeedback,
  RecommendationSession,
  UserPreferences,
  decodeSession,
  decodeUserPreferences,
  encodeFeedback,
} from './models';
import { RecommendationSettings } from './settings';

export const RECOMMENDATION_PATHS = {
  circles: '/v2/recommendations/circles/',
  feedback: '/v2/recommendations/feedback/',
  userPreferences: '/v2/recommendations/user-preferences/',
} as const;

export class RecommendationApi {
  constructor(
    private http: HttpClient,
    private logger: Logger,
  ) {}

  async fetchRecommendations(settings: RecommendationSettings): Promise<RecommendationSession> {
    const raw = await this.http.get(RECOMMENDATION_PATHS.circles, {
      params: {
        algorithm: settings.algorithm,
        limit: settings.limit,
        diversity_factor: settings.diversityFactor,
        include_new_circles: settings.includeNewCircles,
        exclude_categories: settings.excludedCategories,
      },
    });
    return decodeSession(raw, this.logger);
  }

  async sendFeedback(feedback: RecommendationFeedback): Promise<void> {
    await this.http.post(RECOMMENDATION_PATHS.feedback, encodeFeedback(feedback));
  }

  async fetchUserPreferences(): Promise<UserPreferences> {
    const raw = await this.http.get(RECOMMENDATION_PATHS.userPreferences);
    return decodeUserPreferences(raw);
  }
}
