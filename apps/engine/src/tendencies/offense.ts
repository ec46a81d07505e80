/**
 * Offense Aggregator
 *
 * Overall and per-category offensive tendencies (run, play action, standard
 * dropback, motion) for a filtered play set. Usage is measured against the
 * whole input set; every other rate against the plays in scope.
 */

import { qbAlignment } from '../plays/indicators';
import { EnrichedPlay } from '../plays/types';
import { byUsage, CategoryRowBase, countWhere, groupBy, pct, topValues } from './grouping';

export const DEFAULT_TOP_N = 3;

export interface OffenseOverall {
  totalPlays: number;
  runPct: number;
  paPct: number;
  dbPct: number;
  motionPct: number;
  topRunConcepts: string[];
}

export interface OffenseCategoryRow extends CategoryRowBase {
  runPct: number;
  paPct: number;
  dbPct: number;
  motionPct: number;
  /** Newline-delimited "NAME (xx.x%)" entries */
  topRunConcepts: string;
}

export type OffenseCategory = 'personnel' | 'formation' | 'qbAlignment';

export const OFFENSE_CATEGORY_KEYS: Record<OffenseCategory, (play: EnrichedPlay) => string | null> = {
  personnel: play => play.personnel,
  formation: play => play.formationGroupNorm,
  qbAlignment: play => qbAlignment(play),
};

/**
 * Most frequent run concepts among run plays, percent of run plays
 */
export function topRunConcepts(plays: readonly EnrichedPlay[], limit: number = DEFAULT_TOP_N): string[] {
  const runPlays = plays.filter(play => play.isRun === 1);
  if (runPlays.length === 0) return [];
  return topValues(runPlays.map(play => play.runConcept), limit, runPlays.length);
}

export function offenseOverall(plays: readonly EnrichedPlay[], limit: number = DEFAULT_TOP_N): OffenseOverall {
  const totalPlays = plays.length;

  if (totalPlays === 0) {
    return {
      totalPlays: 0,
      runPct: 0,
      paPct: 0,
      dbPct: 0,
      motionPct: 0,
      topRunConcepts: [],
    };
  }

  return {
    totalPlays,
    runPct: pct(countWhere(plays, 'isRun'), totalPlays),
    paPct: pct(countWhere(plays, 'isPlayAction'), totalPlays),
    dbPct: pct(countWhere(plays, 'isStandardDropback'), totalPlays),
    motionPct: pct(countWhere(plays, 'hasMotion'), totalPlays),
    topRunConcepts: topRunConcepts(plays, limit),
  };
}

/**
 * One row per distinct non-null category value, sorted by usage
 */
export function offenseByCategory(
  plays: readonly EnrichedPlay[],
  category: OffenseCategory,
  limit: number = DEFAULT_TOP_N
): OffenseCategoryRow[] {
  if (plays.length === 0) return [];

  const totalPlays = plays.length;
  const groups = groupBy(plays, OFFENSE_CATEGORY_KEYS[category]);
  const rows: OffenseCategoryRow[] = [];

  for (const [value, group] of groups) {
    const overall = offenseOverall(group, limit);
    rows.push({
      category: value,
      plays: group.length,
      usagePct: pct(group.length, totalPlays),
      runPct: overall.runPct,
      paPct: overall.paPct,
      dbPct: overall.dbPct,
      motionPct: overall.motionPct,
      topRunConcepts: overall.topRunConcepts.join('\n'),
    });
  }

  return rows.sort(byUsage);
}
