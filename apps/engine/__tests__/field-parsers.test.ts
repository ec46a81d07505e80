/**
 * Field Parser Tests
 *
 * Clock, pass-rusher, formation and coverage parsing, including the fixed
 * fallback value for each malformed input.
 */

import {
  isManCoverage,
  normalizeCoverage,
  normalizeFormationGroup,
  parseClockToMinutes,
  parseInteger,
  parsePassRushers,
  readCell,
} from '../src/plays/field-parsers';

describe('Field Parsers', () => {
  describe('parseClockToMinutes', () => {
    test('returns the minute component of MM:SS', () => {
      expect(parseClockToMinutes('14:53')).toBe(14);
      expect(parseClockToMinutes('00:42')).toBe(0);
      expect(parseClockToMinutes('7:05')).toBe(7);
      expect(parseClockToMinutes('15:00')).toBe(15);
    });

    test('returns 0 for null, empty and unparsable clocks', () => {
      expect(parseClockToMinutes(null)).toBe(0);
      expect(parseClockToMinutes(undefined)).toBe(0);
      expect(parseClockToMinutes('')).toBe(0);
      expect(parseClockToMinutes('ab:cd')).toBe(0);
      expect(parseClockToMinutes('12abc:00')).toBe(0);
    });

    test('reads a bare minute value without seconds', () => {
      expect(parseClockToMinutes('9')).toBe(9);
    });
  });

  describe('parsePassRushers', () => {
    test('reads the leading count', () => {
      expect(parsePassRushers('4; PHI 53 (LILB); PHI 90 (NRT); PHI 94 (RE); PHI 97 (DLT)')).toBe(4);
      expect(parsePassRushers(' 5 ;x')).toBe(5);
      expect(parsePassRushers('6')).toBe(6);
    });

    test('returns 0 for null or unparsable input', () => {
      expect(parsePassRushers(null)).toBe(0);
      expect(parsePassRushers('')).toBe(0);
      expect(parsePassRushers('four; PHI 53')).toBe(0);
    });
  });

  describe('normalizeFormationGroup', () => {
    test('puts the larger side first', () => {
      expect(normalizeFormationGroup('1x3')).toBe('3x1');
      expect(normalizeFormationGroup('1x2')).toBe('2x1');
      expect(normalizeFormationGroup('3x1')).toBe('3x1');
      expect(normalizeFormationGroup('2x2')).toBe('2x2');
    });

    test('returns non-AxB input unchanged', () => {
      expect(normalizeFormationGroup('EMPTY')).toBe('EMPTY');
      expect(normalizeFormationGroup('1x2x3')).toBe('1x2x3');
      expect(normalizeFormationGroup('Ax2')).toBe('Ax2');
      expect(normalizeFormationGroup('box')).toBe('box');
    });

    test('passes null through', () => {
      expect(normalizeFormationGroup(null)).toBeNull();
    });
  });

  describe('normalizeCoverage', () => {
    test('collapses Cover 3 variants', () => {
      expect(normalizeCoverage('Cover 3 Seam')).toBe('COVER 3');
      expect(normalizeCoverage('COVER 3 CLOUD')).toBe('COVER 3');
      expect(normalizeCoverage(' cover 3 dbl cloud ')).toBe('COVER 3');
    });

    test('upper-cases and trims everything else', () => {
      expect(normalizeCoverage('Cover 2')).toBe('COVER 2');
      expect(normalizeCoverage('  Cover 6 ')).toBe('COVER 6');
    });

    test('passes null through', () => {
      expect(normalizeCoverage(null)).toBeNull();
    });
  });

  describe('isManCoverage', () => {
    test('true for the man family, case- and whitespace-insensitive', () => {
      expect(isManCoverage('COVER 0')).toBe(true);
      expect(isManCoverage('cover 1')).toBe(true);
      expect(isManCoverage(' Cover 1 Double ')).toBe(true);
      expect(isManCoverage('Cover 2 Man')).toBe(true);
    });

    test('false for zone coverages and null', () => {
      expect(isManCoverage('COVER 2')).toBe(false);
      expect(isManCoverage('COVER 3')).toBe(false);
      expect(isManCoverage('COVER 1 ROBBER')).toBe(false);
      expect(isManCoverage(null)).toBe(false);
    });
  });

  describe('CSV cells', () => {
    test('NA tokens read as null', () => {
      expect(readCell('')).toBeNull();
      expect(readCell('NA')).toBeNull();
      expect(readCell('NaN')).toBeNull();
      expect(readCell('null')).toBeNull();
      expect(readCell(undefined)).toBeNull();
      expect(readCell('S')).toBe('S');
    });

    test('integers parse strictly', () => {
      expect(parseInteger('3')).toBe(3);
      expect(parseInteger(' 12 ')).toBe(12);
      expect(parseInteger('1.0')).toBe(1);
      expect(parseInteger('-2')).toBe(-2);
      expect(parseInteger('3.5')).toBeNull();
      expect(parseInteger('14abc')).toBeNull();
      expect(parseInteger(null)).toBeNull();
    });
  });
});
