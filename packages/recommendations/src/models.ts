import { z } from 'zod';
import {
  Logger,
  booleanOr,
  decodeEach,
  numberOr,
  optionalString,
  parseWire,
  stringList,
  wireId,
  wireTimestamp,
} from '@circles/core';
import { CircleRef, circleRefSchema } from '@circles/matching';

export const RECOMMENDATION_ALGORITHMS = ['smart', 'content', 'collaborative', 'behavioral'] as const;
export type RecommendationAlgorithm = (typeof RECOMMENDATION_ALGORITHMS)[number];

export const FEEDBACK_TYPES = [
  'view',
  'click',
  'join_request',
  'join_success',
  'dismiss',
  'not_interested',
  'bookmark',
  'share',
] as const;
export type FeedbackType = (typeof FEEDBACK_TYPES)[number];

export interface RecommendationReason {
  /** e.g. `interest_match`, `similar_users`, `activity_pattern` */
  type: string;
  detail: string;
  weight: number;
}

/** Identity for list purposes is `circle.id`. */
export interface NextGenRecommendation {
  circle: CircleRef;
  score: number;
  confidence: number;
  reasons: RecommendationReason[];
  sessionId: string;
}

export interface AlgorithmWeights {
  hierarchical: number;
  collaborative: number;
  behavioral: number;
  diversity: number;
}

/** One fetched batch; replaced wholesale by the next fetch. */
export interface RecommendationSession {
  recommendations: NextGenRecommendation[];
  algorithmUsed: string;
  algorithmWeights: AlgorithmWeights;
  totalCandidates: number;
  computationTimeMs: number;
  sessionId: string;
  generatedAt: Date;
}

export interface RecommendationFeedback {
  circleId: string;
  feedbackType: FeedbackType;
  sessionId: string;
  recommendationScore?: number;
  recommendationAlgorithm?: string;
  recommendationReasons?: RecommendationReason[];
}

export interface UserProfileSummary {
  isNewUser: boolean;
  isActiveUser: boolean;
  recentActivity: number;
}

/** Numeric signals the backend has learned for this user, keyed by name. */
export type LearningPatterns = Record<string, number>;

export interface UserPreferences {
  userProfile: UserProfileSummary;
  algorithmWeights: AlgorithmWeights;
  preferredCategories: string[];
  learningPatterns: LearningPatterns;
}

// ─── Decoders ───────────────────────────────────────────────────────────────

const reasonSchema = z
  .object({
    type: z.string(),
    detail: optionalString,
    weight: numberOr(0),
  })
  .transform(
    (wire): RecommendationReason => ({
      type: wire.type,
      detail: wire.detail ?? '',
      weight: wire.weight,
    }),
  );

const NO_WEIGHTS: AlgorithmWeights = { hierarchical: 0, collaborative: 0, behavioral: 0, diversity: 0 };

const weightsObject = z.object({
  hierarchical: numberOr(0),
  collaborative: numberOr(0),
  behavioral: numberOr(0),
  diversity: numberOr(0),
});

/** Missing or malformed weights read as all zero. */
export const algorithmWeightsSchema = z
  .unknown()
  .transform((raw): AlgorithmWeights => {
    const parsed = weightsObject.safeParse(raw);
    return parsed.success ? parsed.data : { ...NO_WEIGHTS };
  });

/** Recommendations inherit the response's session id when they carry none. */
export function recommendationSchema(fallbackSessionId: string, logger: Logger) {
  return z
    .object({
      circle: circleRefSchema,
      score: z.number().finite(),
      confidence: numberOr(0),
      reasons: z.array(z.unknown()).nullish(),
      session_id: optionalString,
    })
    .transform(
      (wire): NextGenRecommendation => ({
        circle: wire.circle,
        score: wire.score,
        confidence: wire.confidence,
        reasons: decodeEach(wire.reasons ?? [], 'reasons', reasonSchema, logger),
        sessionId: wire.session_id ?? fallbackSessionId,
      }),
    );
}

const sessionEnvelopeSchema = z.object({
  session_id: wireId,
  algorithm_used: z.string(),
  algorithm_weights: algorithmWeightsSchema,
  total_candidates: numberOr(0),
  computation_time_ms: numberOr(0),
  generated_at: wireTimestamp,
  recommendations: z.array(z.unknown()),
});

export function decodeRecommendation(raw: unknown, fallbackSessionId: string, logger: Logger): NextGenRecommendation {
  return parseWire(recommendationSchema(fallbackSessionId, logger), raw, 'recommendation');
}

export function decodeSession(raw: unknown, logger: Logger): RecommendationSession {
  const wire = parseWire(sessionEnvelopeSchema, raw, 'recommendation response');
  return {
    recommendations: decodeEach(
      wire.recommendations,
      'recommendations',
      recommendationSchema(wire.session_id, logger),
      logger,
    ),
    algorithmUsed: wire.algorithm_used,
    algorithmWeights: wire.algorithm_weights,
    totalCandidates: wire.total_candidates,
    computationTimeMs: wire.computation_time_ms,
    sessionId: wire.session_id,
    generatedAt: wire.generated_at,
  };
}

const userProfileSchema = z.object({
  is_new_user: booleanOr(false),
  is_active_user: booleanOr(false),
  recent_activity: numberOr(0),
});

/** Only finite numeric signals are kept. */
const learningPatternsSchema = z
  .record(z.unknown())
  .nullish()
  .transform((raw): LearningPatterns => {
    const patterns: LearningPatterns = {};
    for (const [name, value] of Object.entries(raw ?? {})) {
      if (typeof value === 'number' && Number.isFinite(value)) patterns[name] = value;
    }
    return patterns;
  });

export const userPreferencesSchema = z
  .object({
    user_profile: userProfileSchema.nullish(),
    algorithm_weights: algorithmWeightsSchema,
    preferred_categories: stringList,
    learning_patterns: learningPatternsSchema,
  })
  .transform(
    (wire): UserPreferences => ({
      userProfile: {
        isNewUser: wire.user_profile?.is_new_user ?? false,
        isActiveUser: wire.user_profile?.is_active_user ?? false,
        recentActivity: wire.user_profile?.recent_activity ?? 0,
      },
      algorithmWeights: wire.algorithm_weights,
      preferredCategories: wire.preferred_categories,
      learningPatterns: wire.learning_patterns,
    }),
  );

export function decodeUserPreferences(raw: unknown): UserPreferences {
  return parseWire(userPreferencesSchema, raw, 'user preferences');
}

export function encodeFeedback(feedback: RecommendationFeedback): Record<string, unknown> {
  const body: Record<string, unknown> = {
    circle_id: feedback.circleId,
    feedback_type: feedback.feedbackType,
    session_id: feedback.sessionId,
  };
  if (feedback.recommendationScore !== undefined) body.recommendation_score = feedback.recommendationScore;
  if (feedback.recommendationAlgorithm !== undefined) body.recommendation_algorithm = feedback.recommendationAlgorithm;
  if (feedback.recommendationReasons !== undefined) {
    body.recommendation_reasons = feedback.recommendationReasons.map((r) => ({
      type: r.type,
      detail: r.detail,
      weight: r.weight,
    }));
  }
  return body;
}
