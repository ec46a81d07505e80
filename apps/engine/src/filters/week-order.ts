/**
 * Week label ordering: regular-season weeks ascending, then playoff rounds
 * in bracket order.
 */

export const PLAYOFF_ROUNDS = ['WC', 'DP', 'CC', 'SB'] as const;

export type PlayoffRound = (typeof PLAYOFF_ROUNDS)[number];

const NUMERIC_WEEK = /^\d+$/;
const PLAYOFF_SET: ReadonlySet<string> = new Set(PLAYOFF_ROUNDS);

export function isPlayoffRound(week: string): week is PlayoffRound {
  return PLAYOFF_SET.has(week);
}

/**
 * Distinct week labels in display order. Labels that are neither numeric nor
 * a known playoff round are dropped.
 */
export function sortWeeks(weeks: Iterable<string>): string[] {
  const numeric = new Set<number>();
  const playoff = new Set<string>();

  for (const week of weeks) {
    if (NUMERIC_WEEK.test(week)) {
      numeric.add(parseInt(week, 10));
    } else {
      playoff.add(week);
    }
  }

  const numericSorted = [...numeric].sort((a, b) => a - b).map(String);
  const playoffSorted = PLAYOFF_ROUNDS.filter(round => playoff.has(round));

  return [...numericSorted, ...playoffSorted];
}
