import { HierarchicalMatchDetails } from '../src/models';
import { matchRatio, matchSummary, qualityLabel, qualityTier, scorePercent } from '../src/score';

function details(overrides: Partial<HierarchicalMatchDetails> = {}): HierarchicalMatchDetails {
  return {
    exactMatches: 0,
    subcategoryMatches: 0,
    categoryMatches: 0,
    weightedScore: 0,
    maxPossibleScore: 10,
    ...overrides,
  };
}

describe('qualityTier', () => {
  test.each([
    [7, 10, 'high'],
    [4, 10, 'good'],
    [1, 10, 'low'],
    [0, 0, 'low'],
  ])('%i exact of %i possible is %s', (exactMatches, maxPossibleScore, tier) => {
    expect(qualityTier(details({ exactMatches, maxPossibleScore }))).toBe(tier);
  });

  it('defines the ratio as zero when nothing was possible', () => {
    expect(matchRatio(details({ exactMatches: 3, maxPossibleScore: 0 }))).toBe(0);
  });

  it('labels tiers per locale', () => {
    expect(qualityLabel('high')).toBe('High match');
    expect(qualityLabel('low', 'ja')).toBe('基本的な適合度');
  });
});

describe('matchSummary', () => {
  it('lists non-zero buckets in fixed order', () => {
    const summary = matchSummary(details({ exactMatches: 2, categoryMatches: 1 }));

    expect(summary).toBe('Exact matches: 2 • Category matches: 1');
  });

  it('uses the Japanese labels', () => {
    const summary = matchSummary(details({ exactMatches: 1, subcategoryMatches: 3, categoryMatches: 2 }), 'ja');

    expect(summary).toBe('完全一致: 1件 • カテゴリ一致: 3件 • 分野一致: 2件');
  });

  it('returns the sentinel when nothing matches', () => {
    expect(matchSummary(details())).toBe('No common interests');
    expect(matchSummary(details(), 'ja')).toBe('共通の興味関心なし');
  });
});

describe('scorePercent', () => {
  it('rounds and clamps', () => {
    expect(scorePercent(0.824)).toBe(82);
    expect(scorePercent(1.3)).toBe(100);
    expect(scorePercent(-0.2)).toBe(0);
  });
});
