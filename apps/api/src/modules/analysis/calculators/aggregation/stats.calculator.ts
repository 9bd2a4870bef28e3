/**
 * Stats Aggregation Calculator - Core statistical functions
 *
 * Small numeric and ranking helpers shared by the cross-match folds.
 *
 * @module analysis/calculators/aggregation/stats
 */

// =============================================================================
// RATE & RATIO CALCULATIONS
// =============================================================================

/**
 * Calculate a rate safely (returns 0 on a zero denominator)
 */
export function safeRate(
  numerator: number,
  denominator: number,
  scale = 1,
): number {
  if (denominator === 0) return 0;
  return (numerator / denominator) * scale;
}

/**
 * Calculate percentage safely
 */
export function safePercentage(numerator: number, denominator: number): number {
  return safeRate(numerator, denominator, 100);
}

/**
 * K/D ratio, two decimals; 0 without deaths
 */
export function kdRatio(kills: number, deaths: number): number {
  return round2(safeRate(kills, deaths));
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// =============================================================================
// RANKING
// =============================================================================

/**
 * Highest `limit` items by a score, ties kept in input order
 */
export function topBy<T>(
  items: readonly T[],
  score: (item: T) => number,
  limit: number,
): T[] {
  return [...items].sort((a, b) => score(b) - score(a)).slice(0, limit);
}

/**
 * Most frequent key of a count table; the first key seen wins ties
 */
export function mostFrequent(
  counts: Readonly<Record<string, number>>,
): { readonly name: string; readonly count: number } | null {
  let best: { name: string; count: number } | null = null;
  for (const [name, count] of Object.entries(counts)) {
    if (!best || count > best.count) best = { name, count };
  }
  return best;
}

/**
 * Count table with one more occurrence of `key`
 */
export function increment(
  counts: Readonly<Record<string, number>>,
  key: string,
  by = 1,
): Record<string, number> {
  return { ...counts, [key]: (counts[key] ?? 0) + by };
}
