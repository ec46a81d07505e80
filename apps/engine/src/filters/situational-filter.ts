/**
 * Situational Filter
 *
 * Applies a multi-criteria filter (team, weeks, quarters, minutes remaining,
 * downs, distance, yardline) to an enriched play set. Criteria AND together;
 * an absent or empty criterion imposes no constraint. A null field never
 * satisfies an active criterion.
 */

import { EnrichedPlay, TeamAxis } from '../plays/types';

/** Inclusive [min, max] */
export type Range = readonly [number, number];

export interface FilterSpec {
  /** Team code; null, undefined or empty means every team */
  team?: string | null;
  weeks?: readonly string[];
  quarters?: readonly number[];
  timeRange?: Range | null;
  downs?: readonly number[];
  distanceRange?: Range | null;
  yardlineRange?: Range | null;
}

export type SituationalFilter = Omit<FilterSpec, 'team'>;

function inSet<T>(value: T | null, allowed: readonly T[] | undefined): boolean {
  if (!allowed || allowed.length === 0) return true;
  return value !== null && allowed.includes(value);
}

function inRange(value: number | null, range: Range | null | undefined): boolean {
  if (!range) return true;
  const [min, max] = range;
  return value !== null && value >= min && value <= max;
}

export function teamOf(play: EnrichedPlay, axis: TeamAxis): string | null {
  return axis === 'offense' ? play.offenseTeam : play.defenseTeam;
}

export function matchesFilter(play: EnrichedPlay, spec: FilterSpec, axis: TeamAxis = 'offense'): boolean {
  if (spec.team && teamOf(play, axis) !== spec.team) {
    return false;
  }

  return (
    inSet(play.week, spec.weeks) &&
    inSet(play.quarter, spec.quarters) &&
    inRange(play.minutesRemaining, spec.timeRange) &&
    inSet(play.down, spec.downs) &&
    inRange(play.distance, spec.distanceRange) &&
    inRange(play.yardsToGoal, spec.yardlineRange)
  );
}

/**
 * Order-preserving subset of plays matching the spec. The team criterion
 * applies to the offense or defense team depending on axis.
 */
export function filterPlays(
  plays: readonly EnrichedPlay[],
  spec: FilterSpec,
  axis: TeamAxis = 'offense'
): EnrichedPlay[] {
  return plays.filter(play => matchesFilter(play, spec, axis));
}

/**
 * Situational part of a spec, for league-wide tables
 */
export function withoutTeam(spec: FilterSpec): SituationalFilter {
  const { team: _team, ...situational } = spec;
  return situational;
}

/**
 * Plays a defense faced against one offensive personnel group
 */
export function playsAgainstPersonnel(plays: readonly EnrichedPlay[], personnel: string): EnrichedPlay[] {
  return plays.filter(play => play.personnel === personnel);
}
