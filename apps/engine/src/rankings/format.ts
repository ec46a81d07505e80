/**
 * Display formatting for percentages and league ranks
 */

import { NO_RANK } from './league-rankings';

export function ordinal(n: number): string {
  const lastTwo = n % 100;
  if (lastTwo >= 11 && lastTwo <= 13) return `${n}th`;

  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

export function formatPct(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * "45.2% (12th)", "45.2% (t-3rd)", or "45.2%" when unranked
 */
export function formatPercentageWithRank(value: number | null, rank: string): string {
  if (value === null || !Number.isFinite(value)) return NO_RANK;
  if (rank === NO_RANK) return formatPct(value);

  const tied = rank.startsWith('t-');
  const position = parseInt(tied ? rank.slice(2) : rank, 10);
  if (Number.isNaN(position)) return formatPct(value);

  return `${formatPct(value)} (${tied ? 't-' : ''}${ordinal(position)})`;
}
