import { RECOMMENDATION_ALGORITHMS, RecommendationAlgorithm } from './models';

export interface RecommendationSettings {
  algorithm: RecommendationAlgorithm;
  limit: number;
  diversityFactor: number;
  excludedCategories: string[];
  includeNewCircles: boolean;
}

export const DEFAULT_RECOMMENDATION_SETTINGS: RecommendationSettings = {
  algorithm: 'smart',
  limit: 10,
  diversityFactor: 0.3,
  excludedCategories: [],
  includeNewCircles: true,
};

/** Caller-supplied overrides; the algorithm may be any string and is normalized. */
export type SettingsInput = Omit<Partial<RecommendationSettings>, 'algorithm'> & { algorithm?: string };

export const LIMIT_MIN = 5;
export const LIMIT_MAX = 30;

/** Persistence for the user's recommendation settings (device storage, a file, ...). */
export interface SettingsStore {
  load(): Promise<Partial<RecommendationSettings> | null>;
  save(settings: RecommendationSettings): Promise<void>;
}

export class InMemorySettingsStore implements SettingsStore {
  private saved: RecommendationSettings | null = null;

  constructor(initial?: Partial<RecommendationSettings>) {
    if (initial) this.saved = normalizeSettings(initial);
  }

  async load(): Promise<Partial<RecommendationSettings> | null> {
    return this.saved ? { ...this.saved, excludedCategories: [...this.saved.excludedCategories] } : null;
  }

  async save(settings: RecommendationSettings): Promise<void> {
    this.saved = { ...settings, excludedCategories: [...settings.excludedCategories] };
  }
}

export function isRecommendationAlgorithm(value: string): value is RecommendationAlgorithm {
  return RECOMMENDATION_ALGORITHMS.some((algorithm) => algorithm === value);
}

/** Unknown names fall back to `smart`. */
export function normalizeAlgorithm(value: string | undefined): RecommendationAlgorithm {
  return value !== undefined && isRecommendationAlgorithm(value) ? value : DEFAULT_RECOMMENDATION_SETTINGS.algorithm;
}

export function clampLimit(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_RECOMMENDATION_SETTINGS.limit;
  return Math.min(LIMIT_MAX, Math.max(LIMIT_MIN, Math.round(value)));
}

export function clampDiversity(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_RECOMMENDATION_SETTINGS.diversityFactor;
  return Math.min(1, Math.max(0, value));
}

/** Fill gaps from the defaults and pull every field into its allowed range. */
export function normalizeSettings(
  input: SettingsInput = {},
  base: RecommendationSettings = DEFAULT_RECOMMENDATION_SETTINGS,
): RecommendationSettings {
  const merged = { ...base, ...input };
  return {
    algorithm: normalizeAlgorithm(merged.algorithm),
    limit: clampLimit(merged.limit),
    diversityFactor: clampDiversity(merged.diversityFactor),
    excludedCategories: [...new Set(merged.excludedCategories)],
    includeNewCircles: merged.includeNewCircles,
  };
}
