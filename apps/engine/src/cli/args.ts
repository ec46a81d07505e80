/**
 * CLI option parsing for the tendency report
 */

import { Range, SituationalFilter } from '../filters/situational-filter';

export type ReportSide = 'offense' | 'defense' | 'both';

export interface ReportArgs {
  team: string;
  side: ReportSide;
  filters: SituationalFilter;
  versusPersonnel?: string;
  dataPath?: string;
}

/**
 * "1,2, 3" -> ["1", "2", "3"]
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function parseIntList(value: string, label: string): number[] {
  return parseList(value).map(item => {
    const n = parseInt(item, 10);
    if (Number.isNaN(n) || String(n) !== item) {
      throw new Error(`Invalid ${label} "${item}": expected an integer`);
    }
    return n;
  });
}

/**
 * "0-5" -> [0, 5]; a single number "3" -> [3, 3]
 */
export function parseRange(value: string, label: string): Range {
  const match = /^\s*(\d+)\s*(?:-\s*(\d+)\s*)?$/.exec(value);
  if (!match) {
    throw new Error(`Invalid ${label} range "${value}": expected MIN-MAX`);
  }
  const min = parseInt(match[1], 10);
  const max = match[2] === undefined ? min : parseInt(match[2], 10);
  if (min > max) {
    throw new Error(`Invalid ${label} range "${value}": min is greater than max`);
  }
  return [min, max];
}

function optionalString(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function isReportSide(value: string): value is ReportSide {
  return value === 'offense' || value === 'defense' || value === 'both';
}

/**
 * Turn parsed commander options into report arguments
 */
export function toReportArgs(options: Record<string, unknown>): ReportArgs {
  const team = optionalString(options, 'team');
  if (!team) {
    throw new Error('--team is required');
  }

  const side = optionalString(options, 'side') ?? 'both';
  if (!isReportSide(side)) {
    throw new Error(`Invalid --side "${side}": expected offense, defense or both`);
  }

  const filters: SituationalFilter = {};
  const weeks = optionalString(options, 'weeks');
  const quarters = optionalString(options, 'quarters');
  const downs = optionalString(options, 'downs');
  const time = optionalString(options, 'time');
  const distance = optionalString(options, 'distance');
  const yardline = optionalString(options, 'yardline');

  if (weeks) filters.weeks = parseList(weeks).map(w => w.toUpperCase());
  if (quarters) filters.quarters = parseIntList(quarters, 'quarter');
  if (downs) filters.downs = parseIntList(downs, 'down');
  if (time) filters.timeRange = parseRange(time, 'time');
  if (distance) filters.distanceRange = parseRange(distance, 'distance');
  if (yardline) filters.yardlineRange = parseRange(yardline, 'yardline');

  return {
    team: team.toUpperCase(),
    side,
    filters,
    versusPersonnel: optionalString(options, 'vsPersonnel'),
    dataPath: optionalString(options, 'data'),
  };
}
