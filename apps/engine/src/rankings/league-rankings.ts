/**
 * League Ranking Engine
 *
 * Computes every team's overall tendencies under the same situational
 * filters and ranks one team's value against the league (1 = highest).
 *
 * Ranking is by exact value position: the probe must be the same number
 * stored in the table (use rankTeamMetric to look it up from the table).
 * A value not present in the table ranks as "-".
 */

import { filterPlays, FilterSpec, teamOf, withoutTeam } from '../filters/situational-filter';
import { EnrichedPlay, TeamAxis } from '../plays/types';
import { defenseRates, passPlaysOf } from '../tendencies/defense';
import { groupBy } from '../tendencies/grouping';
import { offenseOverall } from '../tendencies/offense';

export interface OffenseTeamRow {
  team: string;
  totalPlays: number;
  runPct: number;
  paPct: number;
  dbPct: number;
  motionPct: number;
}

export interface DefenseTeamRow {
  team: string;
  totalPlays: number;
  blitzPct: number;
  manPct: number;
  mofoPct: number;
  disguisePct: number;
}

export type OffenseMetric = 'runPct' | 'paPct' | 'dbPct' | 'motionPct';
export type DefenseMetric = 'blitzPct' | 'manPct' | 'mofoPct' | 'disguisePct';

export const OFFENSE_METRICS: readonly OffenseMetric[] = ['runPct', 'paPct', 'dbPct', 'motionPct'];
export const DEFENSE_METRICS: readonly DefenseMetric[] = ['blitzPct', 'manPct', 'mofoPct', 'disguisePct'];

export const NO_RANK = '-';

function teamGroups(plays: readonly EnrichedPlay[], filters: FilterSpec, axis: TeamAxis): Map<string, EnrichedPlay[]> {
  const situational = filterPlays(plays, withoutTeam(filters), axis);
  return groupBy(situational, play => teamOf(play, axis));
}

/**
 * Offensive overall metrics for every offense, team criterion ignored
 */
export function allTeamsOffense(plays: readonly EnrichedPlay[], filters: FilterSpec = {}): OffenseTeamRow[] {
  const rows: OffenseTeamRow[] = [];

  for (const [team, teamPlays] of teamGroups(plays, filters, 'offense')) {
    const overall = offenseOverall(teamPlays);
    rows.push({
      team,
      totalPlays: overall.totalPlays,
      runPct: overall.runPct,
      paPct: overall.paPct,
      dbPct: overall.dbPct,
      motionPct: overall.motionPct,
    });
  }

  return rows;
}

/**
 * Defensive overall metrics for every defense with at least one pass play
 * in scope, team criterion ignored
 */
export function allTeamsDefense(plays: readonly EnrichedPlay[], filters: FilterSpec = {}): DefenseTeamRow[] {
  const rows: DefenseTeamRow[] = [];

  for (const [team, teamPlays] of teamGroups(plays, filters, 'defense')) {
    const passPlays = passPlaysOf(teamPlays);
    if (passPlays.length === 0) continue;

    rows.push({
      team,
      totalPlays: teamPlays.length,
      ...defenseRates(passPlays),
    });
  }

  return rows;
}

export function allTeamsOverall(plays: readonly EnrichedPlay[], filters: FilterSpec, axis: 'offense'): OffenseTeamRow[];
export function allTeamsOverall(plays: readonly EnrichedPlay[], filters: FilterSpec, axis: 'defense'): DefenseTeamRow[];
export function allTeamsOverall(
  plays: readonly EnrichedPlay[],
  filters: FilterSpec,
  axis: TeamAxis
): OffenseTeamRow[] | DefenseTeamRow[] {
  return axis === 'offense' ? allTeamsOffense(plays, filters) : allTeamsDefense(plays, filters);
}

/**
 * Rank a value among the table's values for one metric, descending.
 * Returns "t-N" when several teams share the value, "-" when no team has it.
 */
export function rank<K extends string>(
  value: number,
  metric: K,
  table: ReadonlyArray<Readonly<Record<K, number>>>
): string {
  const sorted = table.map(row => row[metric]).sort((a, b) => b - a);

  const position = sorted.indexOf(value);
  if (position === -1) return NO_RANK;

  const tied = sorted.filter(v => v === value).length;
  return tied > 1 ? `t-${position + 1}` : String(position + 1);
}

/**
 * Rank a team's own stored value for a metric
 */
export function rankTeamMetric<K extends string>(
  team: string,
  metric: K,
  table: ReadonlyArray<Readonly<{ team: string } & Record<K, number>>>
): string {
  const row = table.find(r => r.team === team);
  if (!row) return NO_RANK;
  return rank(row[metric], metric, table);
}

export type RankedRow<Row, K extends string> = Row & { ranks: Partial<Record<K, string>> };

/**
 * Attach a rank per metric to each row, ranked against the league table
 */
export function addRankings<K extends string, Row extends Readonly<Record<K, number>>>(
  rows: readonly Row[],
  table: ReadonlyArray<Readonly<Record<K, number>>>,
  metrics: readonly K[]
): Array<RankedRow<Row, K>> {
  return rows.map(row => {
    const ranks: Partial<Record<K, string>> = {};
    for (const metric of metrics) {
      ranks[metric] = rank(row[metric], metric, table);
    }
    return { ...row, ranks };
  });
}
