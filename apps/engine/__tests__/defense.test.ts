// Unit tests for defensive tendencies

import { defenseByCategory, defenseOverall, defenseRates, topCoverages } from '../src/tendencies/defense';
import { enriched, repeat } from './fixtures/play-factory';

describe('Defense Aggregator', () => {
  // 10 plays: 2 runs, 8 passes (2 blitzes, 3 man, 2 MOFO played, 4 of 7 charted disguised)
  const plays = [
    enriched({ runPass: 'R', defPackage: 'BASE', blitzDog: 1 }),
    enriched({ runPass: 'R', defPackage: 'BASE' }),
    ...repeat(2, { runPass: 'P', defPackage: 'NICKEL', blitzDog: 1, coverageBasic: 'Cover 1', mofoShown: 'C', mofoPlayed: 'O' }),
    ...repeat(3, { runPass: 'P', defPackage: 'NICKEL', coverageBasic: 'Cover 3 Seam', mofoShown: 'C', mofoPlayed: 'C' }),
    ...repeat(2, { runPass: 'P', defPackage: 'DIME', coverageBasic: 'Cover 2', mofoShown: 'O', mofoPlayed: 'C' }),
    enriched({ runPass: 'P', defPackage: 'DIME', coverageBasic: 'Cover 0' }),
  ];

  describe('defenseOverall', () => {
    test('rates are measured against pass plays', () => {
      const overall = defenseOverall(plays);

      expect(overall.totalPlays).toBe(10);
      expect(overall.passPlays).toBe(8);
      expect(overall.blitzPct).toBe(25);
      expect(overall.manPct).toBe(37.5);
      expect(overall.mofoPct).toBe(25);
    });

    test('disguise is measured against charted pass plays', () => {
      expect(defenseOverall(plays).disguisePct).toBeCloseTo(57.143, 3);
    });

    test('top coverages use normalized names', () => {
      expect(defenseOverall(plays).topCoverages).toEqual(['COVER 3 (37.5%)', 'COVER 1 (25.0%)', 'COVER 2 (25.0%)']);
    });

    test('no pass plays gives zero rates', () => {
      const runsOnly = repeat(3, { runPass: 'R', blitzDog: 1, coverageBasic: 'Cover 1' });

      expect(defenseOverall(runsOnly)).toEqual({
        totalPlays: 3,
        passPlays: 0,
        blitzPct: 0,
        manPct: 0,
        mofoPct: 0,
        disguisePct: 0,
        topCoverages: [],
      });
    });
  });

  test('disguise is 0 when no pass play has both looks charted', () => {
    const passes = repeat(2, { runPass: 'P', mofoShown: 'O', mofoPlayed: null });
    expect(defenseRates(passes).disguisePct).toBe(0);
  });

  test('top coverages skip uncharted plays', () => {
    const passes = [
      enriched({ runPass: 'P', coverageBasic: 'Cover 6' }),
      enriched({ runPass: 'P', coverageBasic: null }),
    ];
    expect(topCoverages(passes)).toEqual(['COVER 6 (50.0%)']);
  });

  describe('defenseByCategory', () => {
    test('package rows sorted by usage over all plays', () => {
      const rows = defenseByCategory(plays, 'defPackage');

      expect(rows.map(r => [r.category, r.plays])).toEqual([
        ['NICKEL', 5],
        ['DIME', 3],
        ['BASE', 2],
      ]);
      expect(rows[0].usagePct).toBe(50);
      expect(rows[2].usagePct).toBe(20);
    });

    test('per-package rates and coverages', () => {
      const [nickel, dime] = defenseByCategory(plays, 'defPackage');

      expect(nickel.blitzPct).toBe(40);
      expect(nickel.manPct).toBe(40);
      expect(nickel.mofoPct).toBe(40);
      expect(nickel.disguisePct).toBe(40);
      expect(nickel.topCoverages).toBe('COVER 3 (60.0%)\nCOVER 1 (40.0%)');

      expect(dime.blitzPct).toBe(0);
      expect(dime.manPct).toBeCloseTo(33.333, 3);
      expect(dime.disguisePct).toBe(100);
      expect(dime.topCoverages).toBe('COVER 2 (66.7%)\nCOVER 0 (33.3%)');
    });

    test('a package seen only on runs has zero rates', () => {
      const base = defenseByCategory(plays, 'defPackage')[2];

      expect(base.category).toBe('BASE');
      expect(base.blitzPct).toBe(0);
      expect(base.manPct).toBe(0);
      expect(base.topCoverages).toBe('');
    });

    test('grouping by offensive personnel', () => {
      const rows = defenseByCategory(
        [enriched({ personnel: '11' }), enriched({ personnel: '12' }), enriched({ personnel: '11' })],
        'personnel'
      );
      expect(rows.map(r => r.category)).toEqual(['11', '12']);
    });

    test('empty input gives no rows', () => {
      expect(defenseByCategory([], 'defPackage')).toEqual([]);
    });
  });
});
