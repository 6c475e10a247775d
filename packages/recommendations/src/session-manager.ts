/**
 * @fileoverview Recommendation Session Manager
 * @description Owns the current recommendation batch, its local removals and
 * per-session interaction sets; forwards interactions to the feedback dispatcher
 */

import {
  ClientConfig,
  Locale,
  Logger,
  SerialQueue,
  StateStore,
  describeError,
  scopedLogger,
  toApiError,
} from '@circles/core';
import { FeedbackDispatcher } from './feedback-dispatcher';
import { FeedbackType, NextGenRecommendation, RecommendationSession, UserPreferences } from './models';
import { RecommendationApi } from './recommendation-api';
import {
  DEFAULT_RECOMMENDATION_SETTINGS,
  RecommendationSettings,
  SettingsInput,
  SettingsStore,
  normalizeSettings,
} from './settings';

export interface RecommendationState {
  session: RecommendationSession | null;
  /** The session's list minus local dismissals. */
  recommendations: NextGenRecommendation[];
  settings: RecommendationSettings;
  preferences: UserPreferences | null;
  loading: boolean;
  /** Localized, user-visible. */
  error: string | null;
  viewed: ReadonlySet<string>;
  clicked: ReadonlySet<string>;
  dismissed: ReadonlySet<string>;
}

export interface SessionStats {
  viewed: number;
  clicked: number;
  dismissed: number;
}

type InteractionSet = 'viewed' | 'clicked' | 'dismissed';

export class RecommendationSessionManager {
  readonly state = new StateStore<RecommendationState>({
    session: null,
    recommendations: [],
    settings: DEFAULT_RECOMMENDATION_SETTINGS,
    preferences: null,
    loading: false,
    error: null,
    viewed: new Set(),
    clicked: new Set(),
    dismissed: new Set(),
  });

  private fetchSeq = 0;
  private settingsQueue = new SerialQueue();
  private log: Logger;
  private locale: Locale;

  constructor(
    private api: RecommendationApi,
    private feedback: FeedbackDispatcher,
    private settingsStore: SettingsStore,
    config: Pick<ClientConfig, 'logger' | 'locale'>,
  ) {
    this.log = scopedLogger(config.logger, 'Recommendations');
    this.locale = config.locale;
  }

  getState(): RecommendationState {
    return this.state.getState();
  }

  // ─── Fetch ────────────────────────────────────────────────────────────────

  /**
   * Fetch a new batch, replacing the current one. Options left out come from
   * the saved settings; out-of-range values are clamped. When calls overlap the
   * newest one wins. On failure the last good session stays in place.
   */
  async fetch(options: SettingsInput = {}): Promise<RecommendationSession | null> {
    const seq = ++this.fetchSeq;
    const settings = normalizeSettings(options, this.getState().settings);
    this.state.setState({ loading: true, error: null });
    this.log.info(`Fetching: algorithm=${settings.algorithm} limit=${settings.limit}`);

    try {
      const session = await this.api.fetchRecommendations(settings);
      if (seq !== this.fetchSeq) return session;

      this.state.setState({
        session,
        recommendations: session.recommendations,
        loading: false,
        error: null,
      });
      this.log.info(
        `${session.recommendations.length} recommendations via ${session.algorithmUsed} in ${session.computationTimeMs}ms`,
      );
      return session;
    } catch (err) {
      const error = toApiError(err);
      this.log.error(`Fetch failed: ${error.message}`);
      if (seq === this.fetchSeq) {
        this.state.setState({ loading: false, error: describeError(error, this.locale) });
      }
      return null;
    }
  }

  async loadUserPreferences(): Promise<UserPreferences | null> {
    try {
      const preferences = await this.api.fetchUserPreferences();
      this.state.setState({ preferences });
      return preferences;
    } catch (err) {
      const error = toApiError(err);
      this.log.error(`Loading user preferences failed: ${error.message}`);
      this.state.setState({ error: describeError(error, this.locale) });
      return null;
    }
  }

  // ─── Local removals ───────────────────────────────────────────────────────

  /** Hide locally and report; a later fetch may return the circle again. */
  dismiss(circleId: string): boolean {
    return this.removeWithFeedback(circleId, 'dismiss', 'dismissed');
  }

  markNotInterested(circleId: string): boolean {
    return this.removeWithFeedback(circleId, 'not_interested', null);
  }

  // ─── Interaction tracking ─────────────────────────────────────────────────

  trackView(circleId: string): boolean {
    return this.record(circleId, 'view', 'viewed');
  }

  trackClick(circleId: string): boolean {
    return this.record(circleId, 'click', 'clicked');
  }

  trackJoinRequest(circleId: string): boolean {
    return this.record(circleId, 'join_request', null);
  }

  trackJoinSuccess(circleId: string): boolean {
    return this.record(circleId, 'join_success', null);
  }

  trackBookmark(circleId: string): boolean {
    return this.record(circleId, 'bookmark', null);
  }

  trackShare(circleId: string): boolean {
    return this.record(circleId, 'share', null);
  }

  isViewed(circleId: string): boolean {
    return this.getState().viewed.has(circleId);
  }

  isClicked(circleId: string): boolean {
    return this.getState().clicked.has(circleId);
  }

  isDismissed(circleId: string): boolean {
    return this.getState().dismissed.has(circleId);
  }

  /** Null until a session exists. */
  getSessionStats(): SessionStats | null {
    const s = this.getState();
    if (!s.session) return null;
    return { viewed: s.viewed.size, clicked: s.clicked.size, dismissed: s.dismissed.size };
  }

  /** Drop the session and every interaction set; in-flight fetches are ignored. */
  reset(): void {
    this.fetchSeq += 1;
    this.state.setState({
      session: null,
      recommendations: [],
      loading: false,
      error: null,
      viewed: new Set(),
      clicked: new Set(),
      dismissed: new Set(),
    });
  }

  // ─── Settings ─────────────────────────────────────────────────────────────

  loadSettings(): Promise<RecommendationSettings> {
    return this.settingsQueue.run(async () => {
      const saved = await this.settingsStore.load();
      const settings = normalizeSettings(saved ?? {});
      this.state.setState({ settings });
      return settings;
    });
  }

  updateSettings(patch: SettingsInput): Promise<RecommendationSettings> {
    return this.settingsQueue.run(async () => {
      const settings = normalizeSettings(patch, this.getState().settings);
      await this.settingsStore.save(settings);
      this.state.setState({ settings });
      return settings;
    });
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private find(circleId: string): { recommendation: NextGenRecommendation; session: RecommendationSession } | null {
    const { session, recommendations } = this.getState();
    const recommendation = recommendations.find((r) => r.circle.id === circleId);
    return session && recommendation ? { recommendation, session } : null;
  }

  private record(circleId: string, type: FeedbackType, set: InteractionSet | null): boolean {
    const found = this.find(circleId);
    if (!found) return false;
    if (set) this.addTo(set, circleId);
    this.feedback.track(type, found.recommendation.circle, found.session);
    return true;
  }

  private removeWithFeedback(circleId: string, type: FeedbackType, set: InteractionSet | null): boolean {
    const found = this.find(circleId);
    if (!found) return false;
    if (set) this.addTo(set, circleId);
    this.state.setState((s) => ({
      ...s,
      recommendations: s.recommendations.filter((r) => r.circle.id !== circleId),
    }));
    this.feedback.track(type, found.recommendation.circle, found.session);
    return true;
  }

  private addTo(set: InteractionSet, circleId: string): void {
    const next = new Set(this.getState()[set]).add(circleId);
    if (set === 'viewed') this.state.setState({ viewed: next });
    else if (set === 'clicked') this.state.setState({ clicked: next });
    else this.state.setState({ dismissed: next });
  }
}
