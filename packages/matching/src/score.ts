import { Locale } from '@circles/core';
import { HierarchicalMatchDetails, QualityTier } from './models';

export const HIGH_QUALITY_RATIO = 0.7;
export const GOOD_QUALITY_RATIO = 0.4;

const SUMMARY_SEPARATOR = ' • ';

const LABELS: Record<
  Locale,
  {
    exact: (n: number) => string;
    subcategory: (n: number) => string;
    category: (n: number) => string;
    none: string;
    tiers: Record<QualityTier, string>;
  }
> = {
  en: {
    exact: (n) => `Exact matches: ${n}`,
    subcategory: (n) => `Subcategory matches: ${n}`,
    category: (n) => `Category matches: ${n}`,
    none: 'No common interests',
    tiers: { high: 'High match', good: 'Good match', low: 'Basic match' },
  },
  ja: {
    exact: (n) => `完全一致: ${n}件`,
    subcategory: (n) => `カテゴリ一致: ${n}件`,
    category: (n) => `分野一致: ${n}件`,
    none: '共通の興味関心なし',
    tiers: { high: '高い適合度', good: '良い適合度', low: '基本的な適合度' },
  },
};

/** exactMatches / maxPossibleScore, or 0 when nothing was possible. */
export function matchRatio(details: HierarchicalMatchDetails): number {
  if (details.maxPossibleScore <= 0) return 0;
  return details.exactMatches / details.maxPossibleScore;
}

export function qualityTier(details: HierarchicalMatchDetails): QualityTier {
  const ratio = matchRatio(details);
  if (ratio >= HIGH_QUALITY_RATIO) return 'high';
  if (ratio >= GOOD_QUALITY_RATIO) return 'good';
  return 'low';
}

export function qualityLabel(tier: QualityTier, locale: Locale = 'en'): string {
  return LABELS[locale].tiers[tier];
}

/** Non-zero buckets in the order exact, subcategory, category. */
export function matchSummary(details: HierarchicalMatchDetails, locale: Locale = 'en'): string {
  const labels = LABELS[locale];
  const parts: string[] = [];
  if (details.exactMatches > 0) parts.push(labels.exact(details.exactMatches));
  if (details.subcategoryMatches > 0) parts.push(labels.subcategory(details.subcategoryMatches));
  if (details.categoryMatches > 0) parts.push(labels.category(details.categoryMatches));
  return parts.length === 0 ? labels.none : parts.join(SUMMARY_SEPARATOR);
}

export function normalizeScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** 0.824 → 82 */
export function scorePercent(value: number): number {
  return Math.round(normalizeScore(value) * 100);
}
