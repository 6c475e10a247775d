import { z } from 'zod';
import { Logger, decodeEach, numberOr, optionalString, parseWire, stringList, wireId } from '@circles/core';

/** Breakdown of shared interests by taxonomy depth. */
export interface HierarchicalMatchDetails {
  /** Shared tags. */
  exactMatches: number;
  /** Shared subcategories without a shared tag beneath them. */
  subcategoryMatches: number;
  /** Shared categories only. */
  categoryMatches: number;
  weightedScore: number;
  maxPossibleScore: number;
}

/** All scores are normalized to [0, 1]. */
export interface MatchingScore {
  totalScore: number;
  interestScore: number;
  locationScore: number;
  ageScore: number;
  commonInterests: string[];
  hierarchicalDetails: HierarchicalMatchDetails | null;
}

export type QualityTier = 'high' | 'good' | 'low';

export interface CircleRef {
  id: string;
  name: string;
  description: string;
  memberCount: number;
  iconUrl: string | null;
  tags: string[];
}

export interface MatchedUser {
  id: string;
  username: string;
  displayName: string | null;
  avatarUrl: string | null;
}

export interface UserMatch {
  id: string;
  user: MatchedUser;
  score: MatchingScore;
  matchReason: string;
}

export interface CircleMatch {
  id: string;
  circle: CircleRef;
  score: MatchingScore;
  memberCount: number;
  matchReason: string;
}

// ─── Decoders ───────────────────────────────────────────────────────────────

export const hierarchicalDetailsSchema = z
  .object({
    exact_matches: numberOr(0),
    subcategory_matches: numberOr(0),
    category_matches: numberOr(0),
    weighted_score: numberOr(0),
    max_possible_score: numberOr(0),
  })
  .transform(
    (wire): HierarchicalMatchDetails => ({
      exactMatches: wire.exact_matches,
      subcategoryMatches: wire.subcategory_matches,
      categoryMatches: wire.category_matches,
      weightedScore: wire.weighted_score,
      maxPossibleScore: wire.max_possible_score,
    }),
  );

export const matchingScoreSchema = z
  .object({
    total_score: z.number().finite(),
    interest_score: numberOr(0),
    location_score: numberOr(0),
    age_score: numberOr(0),
    common_interests: stringList,
    hierarchical_details: hierarchicalDetailsSchema.nullish(),
  })
  .transform(
    (wire): MatchingScore => ({
      totalScore: wire.total_score,
      interestScore: wire.interest_score,
      locationScore: wire.location_score,
      ageScore: wire.age_score,
      commonInterests: wire.common_interests,
      hierarchicalDetails: wire.hierarchical_details ?? null,
    }),
  );

export const circleRefSchema = z
  .object({
    id: wireId,
    name: z.string(),
    description: optionalString,
    member_count: numberOr(0),
    icon_url: optionalString,
    tags: stringList,
  })
  .transform(
    (wire): CircleRef => ({
      id: wire.id,
      name: wire.name,
      description: wire.description ?? '',
      memberCount: wire.member_count,
      iconUrl: wire.icon_url,
      tags: wire.tags,
    }),
  );

const matchedUserSchema = z
  .object({
    id: wireId,
    username: z.string(),
    display_name: optionalString,
    avatar_url: optionalString,
  })
  .transform(
    (wire): MatchedUser => ({
      id: wire.id,
      username: wire.username,
      displayName: wire.display_name,
      avatarUrl: wire.avatar_url,
    }),
  );

export const userMatchSchema = z
  .object({
    id: wireId,
    user: matchedUserSchema,
    score: matchingScoreSchema,
    match_reason: optionalString,
  })
  .transform(
    (wire): UserMatch => ({
      id: wire.id,
      user: wire.user,
      score: wire.score,
      matchReason: wire.match_reason ?? '',
    }),
  );

export const circleMatchSchema = z
  .object({
    id: wireId,
    circle: circleRefSchema,
    score: matchingScoreSchema,
    member_count: z.number().finite().nullish(),
    match_reason: optionalString,
  })
  .transform(
    (wire): CircleMatch => ({
      id: wire.id,
      circle: wire.circle,
      score: wire.score,
      memberCount: wire.member_count ?? wire.circle.memberCount,
      matchReason: wire.match_reason ?? '',
    }),
  );

export function decodeMatchingScore(raw: unknown): MatchingScore {
  return parseWire(matchingScoreSchema, raw, 'score');
}

export function decodeUserMatches(raw: unknown, logger: Logger): UserMatch[] {
  return decodeEach(raw, 'user matches', userMatchSchema, logger);
}

export function decodeCircleMatches(raw: unknown, logger: Logger): CircleMatch[] {
  return decodeEach(raw, 'circle matches', circleMatchSchema, logger);
}
