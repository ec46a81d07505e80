/**
 * Play Record Types
 *
 * One row per offensive snap. Raw fields keep the nullability of the source
 * feed; derived indicators are added once by the indicator deriver.
 */

export type RunPass = 'R' | 'P';

export type TeamAxis = 'offense' | 'defense';

export interface PlayRecord {
  // Identity / context
  offenseTeam: string | null;
  defenseTeam: string | null;
  week: string | null; // "1".."18" or WC/DP/CC/SB
  quarter: number | null;
  down: number | null;
  distance: number | null; // yards to go
  yardsToGoal: number | null;
  clock: string | null; // MM:SS

  // Play classification
  runPass: string | null;
  runConcept: string | null;
  dropbackType: string | null;
  playAction: number | null;

  // Formation / personnel
  personnel: string | null;
  formationGroup: string | null; // "AxB"
  shotgun: string | null;
  shiftMotion: string | null;

  // Defensive descriptors
  defPackage: string | null;
  blitzDog: number | null;
  passRushPlayers: string | null; // "<n>; player list"
  coverageBasic: string | null;
  mofoShown: string | null;
  mofoPlayed: string | null;
}

export interface CleanPlay extends PlayRecord {
  runPass: RunPass;
}

/** 0/1 flag, summed to count plays */
export type Indicator = 0 | 1;

export interface EnrichedPlay extends CleanPlay {
  readonly minutesRemaining: number;
  readonly formationGroupNorm: string | null;
  readonly coverageNorm: string | null;
  readonly numPassRushers: number;
  readonly isRun: Indicator;
  readonly hasMotion: Indicator;
  readonly isPlayAction: Indicator;
  readonly isStandardDropback: Indicator;
  readonly isBlitz: Indicator;
  readonly isManCoverage: Indicator;
  readonly isMofo: Indicator;
  readonly isDisguise: Indicator;
  readonly hasMofoData: Indicator;
}

export type QbAlignment = 'Shotgun' | 'Under Center';

/**
 * Semantic column roles. The external header for each role comes from the
 * engine config.
 */
export type ColumnRole = keyof PlayRecord;

export const STRING_ROLES = [
  'offenseTeam',
  'defenseTeam',
  'week',
  'clock',
  'runPass',
  'runConcept',
  'dropbackType',
  'personnel',
  'formationGroup',
  'shotgun',
  'shiftMotion',
  'defPackage',
  'passRushPlayers',
  'coverageBasic',
  'mofoShown',
  'mofoPlayed',
] as const satisfies readonly ColumnRole[];

export const INTEGER_ROLES = [
  'quarter',
  'down',
  'distance',
  'yardsToGoal',
  'playAction',
  'blitzDog',
] as const satisfies readonly ColumnRole[];

export type StringRole = (typeof STRING_ROLES)[number];
export type IntegerRole = (typeof INTEGER_ROLES)[number];

export const COLUMN_ROLES: readonly ColumnRole[] = [...STRING_ROLES, ...INTEGER_ROLES];
