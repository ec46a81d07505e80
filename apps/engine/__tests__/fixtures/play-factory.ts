// Builders for hand-made test plays

import { derivePlay } from '../../src/plays/indicators';
import { CleanPlay, EnrichedPlay } from '../../src/plays/types';

export function makePlay(overrides: Partial<CleanPlay> = {}): CleanPlay {
  return {
    offenseTeam: 'PHI',
    defenseTeam: 'DAL',
    week: '1',
    quarter: 1,
    down: 1,
    distance: 10,
    yardsToGoal: 75,
    clock: '15:00',
    runPass: 'P',
    runConcept: null,
    dropbackType: null,
    playAction: 0,
    personnel: '11',
    formationGroup: '3x1',
    shotgun: 'S',
    shiftMotion: null,
    defPackage: 'NICKEL',
    blitzDog: 0,
    passRushPlayers: null,
    coverageBasic: null,
    mofoShown: null,
    mofoPlayed: null,
    ...overrides,
  };
}

export function enriched(overrides: Partial<CleanPlay> = {}): EnrichedPlay {
  return derivePlay(makePlay(overrides));
}

export function repeat(count: number, overrides: Partial<CleanPlay> = {}): EnrichedPlay[] {
  return Array.from({ length: count }, () => enriched(overrides));
}
