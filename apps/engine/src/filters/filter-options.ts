/**
 * Filter Options
 *
 * Distinct values and bounds a presentation layer offers for the situational
 * filters, computed from the full enriched play set.
 */

import { EnrichedPlay } from '../plays/types';
import { FilterSpec, Range } from './situational-filter';
import { sortWeeks } from './week-order';

export interface FilterOptions {
  teams: string[];
  weeks: string[];
  quarters: number[];
  downs: number[];
  timeRange: Range;
  distanceRange: Range;
  yardlineRange: Range;
  offensivePersonnel: string[];
}

function distinct<T>(values: Iterable<T | null>): T[] {
  const seen = new Set<T>();
  for (const value of values) {
    if (value !== null) seen.add(value);
  }
  return [...seen];
}

function bounds(values: Array<number | null>): Range {
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value === null) continue;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return min === Infinity ? [0, 0] : [min, max];
}

const byText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export function getFilterOptions(plays: readonly EnrichedPlay[]): FilterOptions {
  return {
    teams: distinct(plays.map(p => p.offenseTeam)).sort(byText),
    weeks: sortWeeks(distinct(plays.map(p => p.week))),
    quarters: distinct(plays.map(p => p.quarter)).sort((a, b) => a - b),
    downs: distinct(plays.map(p => p.down)).sort((a, b) => a - b),
    timeRange: bounds(plays.map(p => p.minutesRemaining)),
    distanceRange: bounds(plays.map(p => p.distance)),
    yardlineRange: bounds(plays.map(p => p.yardsToGoal)),
    offensivePersonnel: distinct(plays.map(p => p.personnel)).sort(byText),
  };
}

/**
 * Filter selecting every option, i.e. the "reset filters" state
 */
export function defaultFilterSpec(options: FilterOptions, team: string | null = null): FilterSpec {
  return {
    team,
    weeks: options.weeks,
    quarters: options.quarters,
    timeRange: options.timeRange,
    downs: options.downs,
    distanceRange: options.distanceRange,
    yardlineRange: options.yardlineRange,
  };
}
