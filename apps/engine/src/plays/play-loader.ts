/**
 * Play Feed Loader
 *
 * Reads the play-by-play CSV into typed PlayRecords and drops everything
 * that is not a run or pass snap.
 *
 * Usage:
 *   const raw = loadPlays('Data/plays.csv', config.columns);
 *   const plays = cleanPlays(raw);
 */

import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { ColumnMap } from '../config/engine-config';
import { createLogger } from '../lib/logger';
import { parseInteger, readCell } from './field-parsers';
import {
  CleanPlay,
  COLUMN_ROLES,
  ColumnRole,
  IntegerRole,
  PlayRecord,
  StringRole,
} from './types';

const log = createLogger('PlayLoader');

const errMsg = (e: unknown): string => (e instanceof Error ? e.message : String(e));

function toStringRows(parsed: unknown, source: string): string[][] {
  if (!Array.isArray(parsed)) {
    throw new Error(`Play feed ${source} did not parse into rows`);
  }
  return parsed.map((row: unknown, index) => {
    if (!Array.isArray(row)) {
      throw new Error(`Play feed ${source} has a malformed row at line ${index + 1}`);
    }
    return row.map((cell: unknown) => (typeof cell === 'string' ? cell : ''));
  });
}

type ColumnIndex = Map<ColumnRole, number>;

function buildColumnIndex(header: string[], columns: ColumnMap, source: string): ColumnIndex {
  const positions = new Map<string, number>();
  header.forEach((name, i) => {
    if (!positions.has(name.trim())) positions.set(name.trim(), i);
  });

  const missing: string[] = [];
  const index: ColumnIndex = new Map();
  for (const role of COLUMN_ROLES) {
    const position = positions.get(columns[role]);
    if (position === undefined) {
      missing.push(`${columns[role]} (${role})`);
    } else {
      index.set(role, position);
    }
  }

  if (missing.length > 0) {
    throw new Error(`Play feed ${source} is missing required column(s): ${missing.join(', ')}`);
  }

  return index;
}

function toPlayRecord(row: string[], index: ColumnIndex): PlayRecord {
  const cell = (role: ColumnRole): string | null => {
    const position = index.get(role);
    return position === undefined ? null : readCell(row[position]);
  };
  const str = (role: StringRole): string | null => {
    const value = cell(role);
    return value === null || value.trim() === '' ? null : value.trim();
  };
  const int = (role: IntegerRole): number | null => parseInteger(cell(role));

  return {
    offenseTeam: str('offenseTeam'),
    defenseTeam: str('defenseTeam'),
    week: str('week'),
    quarter: int('quarter'),
    down: int('down'),
    distance: int('distance'),
    yardsToGoal: int('yardsToGoal'),
    clock: str('clock'),
    runPass: str('runPass'),
    runConcept: str('runConcept'),
    dropbackType: str('dropbackType'),
    playAction: int('playAction'),
    personnel: str('personnel'),
    formationGroup: str('formationGroup'),
    shotgun: str('shotgun'),
    shiftMotion: str('shiftMotion'),
    defPackage: str('defPackage'),
    blitzDog: int('blitzDog'),
    passRushPlayers: str('passRushPlayers'),
    coverageBasic: str('coverageBasic'),
    mofoShown: str('mofoShown'),
    mofoPlayed: str('mofoPlayed'),
  };
}

/**
 * Parse CSV text into raw play records
 */
export function parsePlaysCsv(content: string, columns: ColumnMap, source = '<inline>'): PlayRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw new Error(`Malformed play feed ${source}: ${errMsg(error)}`);
  }

  const rows = toStringRows(parsed, source);
  const [header, ...body] = rows;
  if (!header) {
    throw new Error(`Play feed ${source} is empty`);
  }

  const index = buildColumnIndex(header, columns, source);
  return body.map(row => toPlayRecord(row, index));
}

/**
 * Load raw play records from a CSV file
 */
export function loadPlays(filePath: string, columns: ColumnMap): PlayRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Play feed not found: ${filePath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Could not read play feed ${filePath}: ${errMsg(error)}`);
  }

  const plays = parsePlaysCsv(content, columns, filePath);
  log.debug(`Read ${plays.length} rows from ${filePath}`);
  return plays;
}

export function isRunOrPass(play: PlayRecord): play is CleanPlay {
  return play.runPass === 'R' || play.runPass === 'P';
}

/**
 * Keep only run (R) and pass (P) plays. Special teams, kneels and spikes
 * carry other codes and are dropped.
 */
export function cleanPlays(plays: readonly PlayRecord[]): CleanPlay[] {
  const cleaned = plays.filter(isRunOrPass);
  log.debug(`Kept ${cleaned.length} of ${plays.length} plays as run/pass`);
  return cleaned;
}
