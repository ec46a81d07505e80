/**
 * Field Parsers
 *
 * Pure functions turning the irregular string fields of the play feed into
 * typed values. Malformed input never throws; each parser has a fixed
 * fallback value.
 */

/**
 * Cell values the feed uses for "no value"
 */
const NA_TOKENS = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-NaN',
  '-nan',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;
const INTEGRAL_CELL_PATTERN = /^\s*[+-]?\d+(\.0*)?\s*$/;

const MAN_COVERAGES = new Set(['COVER 0', 'COVER 1', 'COVER 1 DOUBLE', 'COVER 2 MAN']);

// Cover 3 variants reported as plain Cover 3
const COVER_3_VARIANTS = new Set(['COVER 3 CLOUD', 'COVER 3 DBL CLOUD', 'COVER 3 SEAM']);

/**
 * Read a raw CSV cell, mapping NA tokens to null
 */
export function readCell(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return NA_TOKENS.has(value) ? null : value;
}

/**
 * Strict integer parse: whole-string decimal with optional sign.
 * "14abc" and "3.5" are failures; "1.0" reads as 1.
 */
export function parseInteger(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (!INTEGRAL_CELL_PATTERN.test(value)) return null;
  return parseInt(value.trim(), 10);
}

/**
 * Minutes remaining in the quarter from an "MM:SS" clock.
 * Null or unparsable clocks read as 0.
 */
export function parseClockToMinutes(clock: string | null | undefined): number {
  if (clock === null || clock === undefined) return 0;

  const [minutePart] = clock.split(':');
  if (!INTEGER_PATTERN.test(minutePart)) return 0;

  const minutes = parseInt(minutePart.trim(), 10);
  return minutes >= 0 ? minutes : 0;
}

/**
 * Number of pass rushers from "4; PHI 53 (LILB); PHI 90 (NRT); ..."
 */
export function parsePassRushers(field: string | null | undefined): number {
  if (field === null || field === undefined) return 0;

  const [countPart] = field.split(';');
  if (!INTEGER_PATTERN.test(countPart)) return 0;

  return parseInt(countPart.trim(), 10);
}

/**
 * Canonical formation orientation, larger side first: 1x3 -> 3x1, 2x2 -> 2x2.
 * Anything not shaped like "AxB" comes back unchanged.
 */
export function normalizeFormationGroup(formation: string | null): string | null {
  if (formation === null) return null;
  if (!formation.includes('x')) return formation;

  const parts = formation.split('x');
  if (parts.length !== 2) return formation;

  const [left, right] = parts;
  if (!INTEGER_PATTERN.test(left) || !INTEGER_PATTERN.test(right)) return formation;

  const a = parseInt(left.trim(), 10);
  const b = parseInt(right.trim(), 10);
  return `${Math.max(a, b)}x${Math.min(a, b)}`;
}

/**
 * Upper-cased, trimmed coverage with Cover 3 variant families collapsed
 */
export function normalizeCoverage(coverage: string | null): string | null {
  if (coverage === null) return null;

  const normalized = coverage.trim().toUpperCase();
  if (COVER_3_VARIANTS.has(normalized)) {
    return 'COVER 3';
  }
  return normalized;
}

export function isManCoverage(coverage: string | null | undefined): boolean {
  if (coverage === null || coverage === undefined) return false;
  return MAN_COVERAGES.has(coverage.trim().toUpperCase());
}
