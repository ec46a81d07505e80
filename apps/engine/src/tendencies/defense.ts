/**
 * Defense Aggregator
 *
 * Coverage and pressure tendencies. Blitz, man and MOFO rates are measured
 * against pass plays in scope; disguise only against pass plays where both
 * the shown and played MOFO looks were charted.
 */

import { EnrichedPlay } from '../plays/types';
import { byUsage, CategoryRowBase, countWhere, groupBy, pct, topValues } from './grouping';
import { DEFAULT_TOP_N } from './offense';

export interface DefenseRates {
  blitzPct: number;
  manPct: number;
  mofoPct: number;
  disguisePct: number;
}

export interface DefenseOverall extends DefenseRates {
  totalPlays: number;
  passPlays: number;
  topCoverages: string[];
}

export interface DefenseCategoryRow extends CategoryRowBase, DefenseRates {
  /** Newline-delimited "COVERAGE (xx.x%)" entries */
  topCoverages: string;
}

export type DefenseCategory = 'defPackage' | 'personnel';

export const DEFENSE_CATEGORY_KEYS: Record<DefenseCategory, (play: EnrichedPlay) => string | null> = {
  defPackage: play => play.defPackage,
  personnel: play => play.personnel,
};

export function passPlaysOf(plays: readonly EnrichedPlay[]): EnrichedPlay[] {
  return plays.filter(play => play.runPass === 'P');
}

/**
 * Rates over an already pass-only play set
 */
export function defenseRates(passPlays: readonly EnrichedPlay[]): DefenseRates {
  const total = passPlays.length;
  if (total === 0) {
    return { blitzPct: 0, manPct: 0, mofoPct: 0, disguisePct: 0 };
  }

  const charted = passPlays.filter(play => play.hasMofoData === 1);

  return {
    blitzPct: pct(countWhere(passPlays, 'isBlitz'), total),
    manPct: pct(countWhere(passPlays, 'isManCoverage'), total),
    mofoPct: pct(countWhere(passPlays, 'isMofo'), total),
    disguisePct: pct(countWhere(charted, 'isDisguise'), charted.length),
  };
}

export function topCoverages(passPlays: readonly EnrichedPlay[], limit: number = DEFAULT_TOP_N): string[] {
  if (passPlays.length === 0) return [];
  return topValues(passPlays.map(play => play.coverageNorm), limit, passPlays.length);
}

export function defenseOverall(plays: readonly EnrichedPlay[], limit: number = DEFAULT_TOP_N): DefenseOverall {
  const passPlays = passPlaysOf(plays);

  return {
    totalPlays: plays.length,
    passPlays: passPlays.length,
    ...defenseRates(passPlays),
    topCoverages: topCoverages(passPlays, limit),
  };
}

/**
 * One row per distinct non-null category value, sorted by usage. Usage is
 * category plays over all input plays, run plays included.
 */
export function defenseByCategory(
  plays: readonly EnrichedPlay[],
  category: DefenseCategory,
  limit: number = DEFAULT_TOP_N
): DefenseCategoryRow[] {
  if (plays.length === 0) return [];

  const totalPlays = plays.length;
  const groups = groupBy(plays, DEFENSE_CATEGORY_KEYS[category]);
  const rows: DefenseCategoryRow[] = [];

  for (const [value, group] of groups) {
    const passPlays = passPlaysOf(group);
    rows.push({
      category: value,
      plays: group.length,
      usagePct: pct(group.length, totalPlays),
      ...defenseRates(passPlays),
      topCoverages: topCoverages(passPlays, limit).join('\n'),
    });
  }

  return rows.sort(byUsage);
}
