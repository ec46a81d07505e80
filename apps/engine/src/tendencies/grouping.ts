/**
 * Shared aggregation helpers for the offense and defense aggregators
 */

import { EnrichedPlay, Indicator } from '../plays/types';

type IndicatorKey = {
  [K in keyof EnrichedPlay]: EnrichedPlay[K] extends Indicator ? K : never;
}[keyof EnrichedPlay];

/**
 * count / denominator × 100; 0 when the denominator is 0
 */
export function pct(count: number, denominator: number): number {
  return denominator > 0 ? (count / denominator) * 100 : 0;
}

export function countWhere(plays: readonly EnrichedPlay[], key: IndicatorKey): number {
  let total = 0;
  for (const play of plays) {
    total += play[key];
  }
  return total;
}

/**
 * Group plays by a key, dropping plays whose key is null. Groups keep the
 * order in which their key first appears.
 */
export function groupBy<K>(
  plays: readonly EnrichedPlay[],
  keyOf: (play: EnrichedPlay) => K | null
): Map<K, EnrichedPlay[]> {
  const groups = new Map<K, EnrichedPlay[]>();
  for (const play of plays) {
    const key = keyOf(play);
    if (key === null) continue;

    const group = groups.get(key);
    if (group) {
      group.push(play);
    } else {
      groups.set(key, [play]);
    }
  }
  return groups;
}

/**
 * Up to `limit` most frequent non-null values rendered as "NAME (xx.x%)",
 * percent taken against `denominator`. Equal counts keep first-seen order.
 */
export function topValues(values: ReadonlyArray<string | null>, limit: number, denominator: number): string[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([value, count]) => `${value} (${pct(count, denominator).toFixed(1)}%)`);
}

export interface CategoryRowBase {
  category: string;
  plays: number;
  usagePct: number;
}

/**
 * Usage descending; equal usage falls back to category ascending
 */
export function byUsage(a: CategoryRowBase, b: CategoryRowBase): number {
  if (b.usagePct !== a.usagePct) return b.usagePct - a.usagePct;
  return a.category < b.category ? -1 : a.category > b.category ? 1 : 0;
}
