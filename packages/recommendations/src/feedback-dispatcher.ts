/**
 * @fileoverview Feedback Dispatcher
 * @description Best-effort delivery of recommendation feedback for offline attribution
 */

import { ClientConfig, Logger, scopedLogger, toApiError } from '@circles/core';
import { CircleRef } from '@circles/matching';
import { FeedbackType, RecommendationFeedback, RecommendationSession } from './models';
import { RecommendationApi } from './recommendation-api';

export class FeedbackDispatcher {
  private inFlight = new Set<Promise<void>>();
  private log: Logger;

  constructor(
    private api: RecommendationApi,
    config: Pick<ClientConfig, 'logger'>,
  ) {
    this.log = scopedLogger(config.logger, 'Feedback');
  }

  /**
   * Snapshot the recommendation's score, algorithm and reasons from `session`
   * now, then post without blocking the caller. Delivery failures are logged only.
   */
  track(feedbackType: FeedbackType, circle: CircleRef, session: RecommendationSession): RecommendationFeedback {
    const feedback = buildFeedback(feedbackType, circle, session);

    const delivery = this.api.sendFeedback(feedback).then(
      () => this.log.debug(`Sent ${feedbackType} for ${circle.id}`),
      (err: unknown) => this.log.error(`Failed to send ${feedbackType} for ${circle.id}: ${toApiError(err).message}`),
    );
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));

    return feedback;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Wait for every delivery started so far, e.g. before shutdown. */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }
}

export function buildFeedback(
  feedbackType: FeedbackType,
  circle: CircleRef,
  session: RecommendationSession,
): RecommendationFeedback {
  const recommendation = session.recommendations.find((r) => r.circle.id === circle.id);
  return {
    circleId: circle.id,
    feedbackType,
    sessionId: session.sessionId,
    recommendationScore: recommendation?.score,
    recommendationAlgorithm: session.algorithmUsed,
    recommendationReasons: recommendation ? recommendation.reasons.map((r) => ({ ...r })) : undefined,
  };
}
