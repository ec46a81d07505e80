// Unit tests for tendency report option parsing

import { parseIntList, parseList, parseRange, toReportArgs } from '../src/cli/args';

describe('Report CLI arguments', () => {
  test('parseList trims and drops empty items', () => {
    expect(parseList('1, 2,,3 ')).toEqual(['1', '2', '3']);
  });

  test('parseIntList rejects non-integers', () => {
    expect(parseIntList('1,3', 'down')).toEqual([1, 3]);
    expect(() => parseIntList('1,x', 'down')).toThrow('Invalid down "x": expected an integer');
    expect(() => parseIntList('2.5', 'quarter')).toThrow('Invalid quarter "2.5": expected an integer');
  });

  describe('parseRange', () => {
    test('MIN-MAX and single values', () => {
      expect(parseRange('0-5', 'time')).toEqual([0, 5]);
      expect(parseRange(' 3 - 10 ', 'distance')).toEqual([3, 10]);
      expect(parseRange('3', 'distance')).toEqual([3, 3]);
    });

    test('rejects malformed or inverted ranges', () => {
      expect(() => parseRange('a-b', 'time')).toThrow('Invalid time range "a-b": expected MIN-MAX');
      expect(() => parseRange('9-2', 'yardline')).toThrow('Invalid yardline range "9-2": min is greater than max');
    });
  });

  describe('toReportArgs', () => {
    test('minimal options', () => {
      expect(toReportArgs({ team: 'phi' })).toEqual({
        team: 'PHI',
        side: 'both',
        filters: {},
        versusPersonnel: undefined,
        dataPath: undefined,
      });
    });

    test('every filter option', () => {
      const args = toReportArgs({
        team: 'DAL',
        side: 'defense',
        weeks: '1,2,wc',
        quarters: '3,4',
        downs: '3',
        time: '0-5',
        distance: '1-3',
        yardline: '0-20',
        vsPersonnel: '12',
        data: 'feeds/plays.csv',
      });

      expect(args).toEqual({
        team: 'DAL',
        side: 'defense',
        filters: {
          weeks: ['1', '2', 'WC'],
          quarters: [3, 4],
          downs: [3],
          timeRange: [0, 5],
          distanceRange: [1, 3],
          yardlineRange: [0, 20],
        },
        versusPersonnel: '12',
        dataPath: 'feeds/plays.csv',
      });
    });

    test('requires a team and a known side', () => {
      expect(() => toReportArgs({})).toThrow('--team is required');
      expect(() => toReportArgs({ team: 'PHI', side: 'special' })).toThrow('Invalid --side "special"');
    });
  });
});
