/**
 * Engine Configuration Loader
 *
 * Loads and provides type-safe access to engine configuration from
 * tendency-engine.yml
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { COLUMN_ROLES, ColumnRole } from '../plays/types';

export type ColumnMap = Record<ColumnRole, string>;

export interface EngineConfig {
  dataPath: string;
  topN: number;
  columns: ColumnMap;
}

export const DEFAULT_COLUMNS: ColumnMap = {
  offenseTeam: 'pff_OFFTEAM',
  defenseTeam: 'pff_DEFTEAM',
  week: 'pff_WEEK',
  quarter: 'pff_QUARTER',
  down: 'pff_DOWN',
  distance: 'pff_DISTANCE',
  yardsToGoal: 'pff_YARDS_TO_GOAL_LINE',
  clock: 'pff_CLOCK',
  runPass: 'pff_RUNPASS',
  runConcept: 'pff_RUNCONCEPTPRIMARY',
  dropbackType: 'pff_DROPBACKTYPE',
  playAction: 'pff_PLAYACTION',
  personnel: 'pff_OFF_PERSONNEL_GROUP',
  formationGroup: 'pff_OFFFORMATIONGROUP',
  shotgun: 'pff_SHOTGUN',
  shiftMotion: 'pff_SHIFTMOTION',
  defPackage: 'pff_DEF_PACKAGE',
  blitzDog: 'pff_BLITZDOG',
  passRushPlayers: 'pff_PASSRUSHPLAYERS',
  coverageBasic: 'pff_PASS_COVERAGE_BASIC',
  mofoShown: 'pff_MOFOCSHOWN',
  mofoPlayed: 'pff_MOFOCPLAYED',
};

export const DEFAULT_CONFIG: EngineConfig = {
  dataPath: 'Data/PFF_2025_FULL_Play_Feed.csv',
  topN: 3,
  columns: DEFAULT_COLUMNS,
};

const CONFIG_PATH = path.join(__dirname, '../../config/tendency-engine.yml');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const KNOWN_ROLES: ReadonlySet<string> = new Set(COLUMN_ROLES);

function isColumnRole(key: string): key is ColumnRole {
  return KNOWN_ROLES.has(key);
}

function parseColumns(raw: unknown): ColumnMap {
  const columns: ColumnMap = { ...DEFAULT_COLUMNS };
  if (raw === undefined || raw === null) return columns;

  if (!isRecord(raw)) {
    throw new Error('Engine config "columns" must be a mapping of column role to CSV header');
  }

  for (const [role, header] of Object.entries(raw)) {
    if (!isColumnRole(role)) {
      throw new Error(`Unknown column role "${role}" in engine config. Known roles: ${COLUMN_ROLES.join(', ')}`);
    }
    if (typeof header !== 'string' || header.trim() === '') {
      throw new Error(`Column role "${role}" must map to a non-empty header name`);
    }
    columns[role] = header.trim();
  }

  return columns;
}

/**
 * Parse YAML content and fill in defaults
 */
export function parseEngineConfig(content: string): EngineConfig {
  const parsed: unknown = yaml.load(content);
  if (parsed === undefined || parsed === null) {
    return { ...DEFAULT_CONFIG, columns: { ...DEFAULT_COLUMNS } };
  }
  if (!isRecord(parsed)) {
    throw new Error('Engine config must be a YAML mapping');
  }

  const dataPath = typeof parsed.data_path === 'string' && parsed.data_path.trim() !== ''
    ? parsed.data_path.trim()
    : DEFAULT_CONFIG.dataPath;

  let topN = DEFAULT_CONFIG.topN;
  if (parsed.top_n !== undefined) {
    if (typeof parsed.top_n !== 'number' || !Number.isInteger(parsed.top_n) || parsed.top_n < 1) {
      throw new Error(`Engine config "top_n" must be a positive integer, got ${String(parsed.top_n)}`);
    }
    topN = parsed.top_n;
  }

  return {
    dataPath,
    topN,
    columns: parseColumns(parsed.columns),
  };
}

let cachedConfig: EngineConfig | null = null;

/**
 * Load engine configuration from YAML file
 */
export function loadEngineConfig(configPath: string = CONFIG_PATH): EngineConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not read engine config at ${configPath}: ${reason}`);
  }

  cachedConfig = parseEngineConfig(content);
  return cachedConfig;
}

/**
 * Data path with the TENDENCY_DATA_PATH override applied, resolved
 * against the working directory
 */
export function resolveDataPath(config: EngineConfig, override?: string): string {
  const chosen = override || process.env.TENDENCY_DATA_PATH || config.dataPath;
  return path.resolve(process.cwd(), chosen);
}

/**
 * Clear the cached configuration (useful for testing)
 */
export function clearEngineConfigCache(): void {
  cachedConfig = null;
}
