import { silentLogger } from '@circles/core';
import { Deferred, FakeHttpClient, deferred, flushPromises } from '../../core/__tests__/support/fake-http';
import { FeedbackDispatcher } from '../src/feedback-dispatcher';
import { RECOMMENDATION_PATHS, RecommendationApi } from '../src/recommendation-api';
import { RecommendationSessionManager } from '../src/session-manager';
import { InMemorySettingsStore, RecommendationSettings } from '../src/settings';
import { INTEREST_REASON, sessionWire } from './support/wire';

function setup(store = new InMemorySettingsStore()) {
  const http = new FakeHttpClient();
  const api = new RecommendationApi(http, silentLogger);
  const feedback = new FeedbackDispatcher(api, { logger: silentLogger });
  const manager = new RecommendationSessionManager(api, feedback, store, { logger: silentLogger, locale: 'en' });
  http.reply('POST', RECOMMENDATION_PATHS.feedback, { status: 'ok' });
  return { http, feedback, manager, store };
}

const FIRST = sessionWire('s-1', 'smart', [
  { circleId: 'c-1', score: 0.82, reasons: [INTEREST_REASON] },
  { circleId: 'c-2', score: 0.64 },
  { circleId: 'c-3', score: 0.41 },
]);

const ids = (manager: RecommendationSessionManager) => manager.getState().recommendations.map((r) => r.circle.id);

describe('RecommendationSessionManager', () => {
  describe('fetch', () => {
    it('replaces the session and sends normalized query params', async () => {
      const { http, manager } = setup();
      http.reply('GET', RECOMMENDATION_PATHS.circles, FIRST);

      const session = await manager.fetch({
        algorithm: 'content',
        limit: 99,
        diversityFactor: -1,
        excludedCategories: ['sports', 'sports'],
      });

      expect(session?.sessionId).toBe('s-1');
      expect(http.calls[0].options.params).toEqual({
        algorithm: 'content',
        limit: 30,
        diversity_factor: 0,
        include_new_circles: true,
        exclude_categories: ['sports'],
      });
      expect(ids(manager)).toEqual(['c-1', 'c-2', 'c-3']);
      expect(manager.getState().loading).toBe(false);
    });

    it('keeps only the newest of overlapping fetches', async () => {
      const { http, manager } = setup();
      const responses: Array<Deferred<unknown>> = [deferred(), deferred()];
      let call = 0;
      http.on('GET', RECOMMENDATION_PATHS.circles, () => responses[call++].promise);

      const older = manager.fetch();
      const newer = manager.fetch({ algorithm: 'behavioral' });
      responses[1].resolve(sessionWire('s-new', 'behavioral', [{ circleId: 'c-9', score: 0.5 }]));
      await newer;
      responses[0].resolve(FIRST);
      await older;

      expect(manager.getState().session?.sessionId).toBe('s-new');
      expect(ids(manager)).toEqual(['c-9']);
    });

    it('keeps the last good session and shows a message on failure', async () => {
      const { http, manager } = setup();
      http.reply('GET', RECOMMENDATION_PATHS.circles, FIRST);
      await manager.fetch();
      http.fail('GET', RECOMMENDATION_PATHS.circles, 503);

      const result = await manager.fetch();

      expect(result).toBeNull();
      const state = manager.getState();
      expect(state.session?.sessionId).toBe('s-1');
      expect(state.recommendations).toHaveLength(3);
      expect(state.error).toBe('The server ran into a problem. Please try again in a moment.');
    });
  });

  describe('local removals', () => {
    it('dismisses locally and reports the score and algorithm the user saw', async () => {
      const { http, manager } = setup();
      http.reply('GET', RECOMMENDATION_PATHS.circles, FIRST);
      await manager.fetch();

      expect(manager.dismiss('c-1')).toBe(true);
      http.reply('GET', RECOMMENDATION_PATHS.circles, sessionWire('s-2', 'content', [{ circleId: 'c-1', score: 0.3 }]));
      await manager.fetch({ algorithm: 'content' });

      expect(http.callsTo('POST', RECOMMENDATION_PATHS.feedback)[0].body).toEqual({
        circle_id: 'c-1',
        feedback_type: 'dismiss',
        session_id: 's-1',
        recommendation_score: 0.82,
        recommendation_algorithm: 'smart',
        recommendation_reasons: [{ type: 'interest_match', detail: 'Python', weight: 0.7 }],
      });
      expect(manager.isDismissed('c-1')).toBe(true);
      expect(ids(manager)).toEqual(['c-1']);
    });

    it('removes without touching the dismissed set for not-interested', async () => {
      const { http, manager } = setup();
      http.reply('GET', RECOMMENDATION_PATHS.circles, FIRST);
      await manager.fetch();

      manager.markNotInterested('c-2');

      expect(ids(manager)).toEqual(['c-1', 'c-3']);
      expect(manager.isDismissed('c-2')).toBe(false);
      expect(http.callsTo('POST', RECOMMENDATION_PATHS.feedback)[0].body).toMatchObject({
        circle_id: 'c-2',
        feedback_type: 'not_interested',
      });
    });
  });

  describe('tracking', () => {
    it('tracks only circles in the current list', async () => {
      const { http, manager } = setup();

      expect(manager.trackView('c-1')).toBe(false);
      http.reply('GET', RECOMMENDATION_PATHS.circles, FIRST);
      await manager.fetch();

      expect(manager.trackView('c-1')).toBe(true);
      expect(manager.trackClick('c-1')).toBe(true);
      expect(manager.trackBookmark('c-2')).toBe(true);
      expect(manager.trackShare('c-404')).toBe(false);

      const sent = http.callsTo('POST', RECOMMENDATION_PATHS.feedback).map((c) => c.body);
      expect(sent).toEqual([
        expect.objectContaining({ circle_id: 'c-1', feedback_type: 'view' }),
        expect.objectContaining({ circle_id: 'c-1', feedback_type: 'click' }),
        expect.objectContaining({ circle_id: 'c-2', feedback_type: 'bookmark' }),
      ]);
      expect(manager.isViewed('c-1')).toBe(true);
      expect(manager.isClicked('c-1')).toBe(true);
    });

    it('counts interactions per session and clears them on reset', async () => {
      const { http, manager } = setup();
      expect(manager.getSessionStats()).toBeNull();
      http.reply('GET', RECOMMENDATION_PATHS.circles, FIRST);
      await manager.fetch();

      manager.trackView('c-1');
      manager.trackView('c-2');
      manager.trackView('c-2');
      manager.trackClick('c-2');
      manager.dismiss('c-3');

      expect(manager.getSessionStats()).toEqual({ viewed: 2, clicked: 1, dismissed: 1 });

      manager.reset();
      expect(manager.getSessionStats()).toBeNull();
      expect(manager.isViewed('c-1')).toBe(false);
    });

    it('ignores a fetch that lands after reset', async () => {
      const { http, manager } = setup();
      const gate = deferred<unknown>();
      http.on('GET', RECOMMENDATION_PATHS.circles, () => gate.promise);

      const pending = manager.fetch();
      manager.reset();
      gate.resolve(FIRST);
      await pending;

      expect(manager.getState().session).toBeNull();
      expect(manager.getState().recommendations).toEqual([]);
    });
  });

  describe('settings', () => {
    it('persists updates and uses them for the next fetch', async () => {
      const { http, manager, store } = setup();
      http.reply('GET', RECOMMENDATION_PATHS.circles, FIRST);

      await manager.updateSettings({ limit: 3, algorithm: 'collaborative' });
      await manager.fetch();

      expect(await store.load()).toMatchObject({ limit: 5, algorithm: 'collaborative' });
      expect(http.calls[0].options.params).toMatchObject({ limit: 5, algorithm: 'collaborative' });
    });

    it('loads saved settings and normalizes them', async () => {
      const { manager } = setup(new InMemorySettingsStore({ diversityFactor: 0.9, excludedCategories: ['music'] }));

      const settings = await manager.loadSettings();

      expect(settings).toEqual({
        algorithm: 'smart',
        limit: 10,
        diversityFactor: 0.9,
        excludedCategories: ['music'],
        includeNewCircles: true,
      });
      expect(manager.getState().settings).toEqual(settings);
    });

    it('does not load until a pending save has finished', async () => {
      const gate = deferred<void>();
      class GatedStore extends InMemorySettingsStore {
        async save(settings: RecommendationSettings): Promise<void> {
          await gate.promise;
          await super.save(settings);
        }
      }
      const { manager } = setup(new GatedStore());

      const update = manager.updateSettings({ limit: 20 });
      const load = manager.loadSettings();
      await flushPromises();

      expect(manager.getState().settings.limit).toBe(10);

      gate.resolve(undefined);
      await update;

      expect((await load).limit).toBe(20);
      expect(manager.getState().settings.limit).toBe(20);
    });
  });

  it('loads user preferences', async () => {
    const { http, manager } = setup();
    http.reply('GET', RECOMMENDATION_PATHS.userPreferences, {
      user_profile: { is_new_user: true, is_active_user: false, recent_activity: 2 },
      algorithm_weights: { hierarchical: 0.6, collaborative: 0.1, behavioral: 0.1, diversity: 0.2 },
      preferred_categories: ['tech'],
      learning_patterns: { evening_activity: 0.8, ignored: 'n/a' },
    });

    const preferences = await manager.loadUserPreferences();

    expect(preferences).toEqual({
      userProfile: { isNewUser: true, isActiveUser: false, recentActivity: 2 },
      algorithmWeights: { hierarchical: 0.6, collaborative: 0.1, behavioral: 0.1, diversity: 0.2 },
      preferredCategories: ['tech'],
      learningPatterns: { evening_activity: 0.8 },
    });
  });
});
