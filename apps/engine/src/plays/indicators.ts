/**
 * Indicator Deriver
 *
 * Adds the per-play indicator columns every aggregation reads. Derivation
 * only looks at raw fields, so deriving an already-enriched play gives the
 * same result. Output plays are frozen.
 */

import {
  isManCoverage,
  normalizeCoverage,
  normalizeFormationGroup,
  parseClockToMinutes,
  parsePassRushers,
} from './field-parsers';
import { CleanPlay, EnrichedPlay, Indicator, QbAlignment } from './types';

const STANDARD_DROPBACKS = new Set(['SD', 'SR', 'SL']);

const flag = (condition: boolean): Indicator => (condition ? 1 : 0);

export function derivePlay(play: CleanPlay): EnrichedPlay {
  const hasMofoData = play.mofoShown !== null && play.mofoPlayed !== null;

  return Object.freeze({
    ...play,
    minutesRemaining: parseClockToMinutes(play.clock),
    formationGroupNorm: normalizeFormationGroup(play.formationGroup),
    coverageNorm: normalizeCoverage(play.coverageBasic),
    numPassRushers: parsePassRushers(play.passRushPlayers),
    isRun: flag(play.runPass === 'R'),
    hasMotion: flag(play.shiftMotion !== null),
    isPlayAction: flag((play.playAction ?? 0) !== 0),
    // Pass plays only; a missing play-action flag is not "no play action"
    isStandardDropback: flag(
      play.runPass === 'P' &&
        play.dropbackType !== null &&
        STANDARD_DROPBACKS.has(play.dropbackType) &&
        play.playAction === 0
    ),
    isBlitz: flag(play.blitzDog === 1),
    isManCoverage: flag(isManCoverage(play.coverageBasic)),
    isMofo: flag(play.mofoPlayed === 'O'),
    isDisguise: flag(hasMofoData && play.mofoShown !== play.mofoPlayed),
    hasMofoData: flag(hasMofoData),
  });
}

export function derivePlays(plays: readonly CleanPlay[]): EnrichedPlay[] {
  return plays.map(derivePlay);
}

export function qbAlignment(play: Pick<CleanPlay, 'shotgun'>): QbAlignment {
  return play.shotgun === 'S' ? 'Shotgun' : 'Under Center';
}
