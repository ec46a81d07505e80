/**
 * Play Dataset
 *
 * Load -> clean -> derive, done once per feed file. The resulting handle is
 * frozen and shared by every view; views never write back into it.
 *
 * Usage:
 *   const dataset = loadPlayDataset();               // path from config/env
 *   const engine = new TendencyEngine(dataset);
 */

import * as path from 'path';
import { ColumnMap, EngineConfig, loadEngineConfig, resolveDataPath } from './config/engine-config';
import { createLogger } from './lib/logger';
import { derivePlays } from './plays/indicators';
import { cleanPlays, loadPlays, parsePlaysCsv } from './plays/play-loader';
import { EnrichedPlay, PlayRecord } from './plays/types';

const log = createLogger('Dataset');

export interface PlayDataset {
  readonly source: string;
  readonly rawCount: number;
  readonly plays: readonly EnrichedPlay[];
  readonly topN: number;
}

function buildDataset(source: string, raw: readonly PlayRecord[], topN: number): PlayDataset {
  const plays = Object.freeze(derivePlays(cleanPlays(raw)));
  log.info(`Loaded ${plays.length} run/pass plays (${raw.length} rows) from ${source}`);

  return Object.freeze({
    source,
    rawCount: raw.length,
    plays,
    topN,
  });
}

const datasetCache = new Map<string, PlayDataset>();

export interface LoadDatasetOptions {
  /** Overrides config data_path and TENDENCY_DATA_PATH */
  dataPath?: string;
  config?: EngineConfig;
}

/**
 * Load the play feed once per resolved path. Later calls for the same path
 * return the cached handle.
 */
export function loadPlayDataset(options: LoadDatasetOptions = {}): PlayDataset {
  const config = options.config ?? loadEngineConfig();
  const filePath = resolveDataPath(config, options.dataPath);

  const cached = datasetCache.get(filePath);
  if (cached) {
    log.debug(`Reusing cached dataset for ${path.basename(filePath)}`);
    return cached;
  }

  const dataset = buildDataset(filePath, loadPlays(filePath, config.columns), config.topN);
  datasetCache.set(filePath, dataset);
  return dataset;
}

/**
 * Build a dataset from CSV text (no caching)
 */
export function datasetFromCsv(content: string, columns: ColumnMap, topN = 3, source = '<inline>'): PlayDataset {
  return buildDataset(source, parsePlaysCsv(content, columns, source), topN);
}

export function clearDatasetCache(): void {
  datasetCache.clear();
}
