/**
 * Rank Restaurants Job
 *
 * read validated dataset -> rank -> write topk_results.json -> optional remote sort check
 */

import path from 'path';
import type { AppConfig } from '../config/env.js';
import { componentLogger, logger as defaultLogger, type Logger } from '../lib/logger/structured-logger.js';
import type { RestaurantApiClient } from '../services/restaurants/client/restaurant-api.client.js';
import { readJsonFile, writeJsonFile } from '../services/restaurants/persistence/json-file.writer.js';
import { rankRestaurants, type RankingStats } from '../services/restaurants/pipeline/rank-restaurants.js';
import { runRemoteCheck, type RemoteCheckStatus } from './remote-check.js';
import type { ScoredRestaurant } from '../services/restaurants/types/restaurant.types.js';

export const TOP_K_RESULTS_FILE = 'topk_results.json';

export type RankRestaurantsConfig = Pick<AppConfig, 'inputFile' | 'resultsDir' | 'topK' | 'duplicatePolicy'>;

export interface RankRestaurantsDeps {
  /** Without a client the remote top-k sort check is skipped */
  client?: RestaurantApiClient | null;
  logger?: Logger;
}

export interface RankRestaurantsJobResult {
  top: ScoredRestaurant[];
  stats: RankingStats;
  outputFile: string;
  sortCheck: RemoteCheckStatus;
}

export class InputDatasetError extends Error {
  constructor(public readonly inputFile: string) {
    super(`Input dataset ${inputFile} must contain a JSON array of records`);
    this.name = 'InputDatasetError';
  }
}

export async function runRankRestaurants(
  config: RankRestaurantsConfig,
  deps: RankRestaurantsDeps = {}
): Promise<RankRestaurantsJobResult> {
  const parentLogger = deps.logger ?? defaultLogger;
  const log = componentLogger('RankRestaurants', parentLogger);

  const data = await readJsonFile(config.inputFile);
  if (!Array.isArray(data)) {
    throw new InputDatasetError(config.inputFile);
  }

  const { top, stats } = rankRestaurants(data, {
    k: config.topK,
    duplicates: config.duplicatePolicy,
    logger: parentLogger,
  });

  const outputFile = path.join(config.resultsDir, TOP_K_RESULTS_FILE);
  await writeJsonFile(outputFile, top);
  log.info({ event: 'topk_saved', outputFile, count: top.length }, `Top ${top.length} restaurants saved`);

  const client = deps.client;
  const sortCheck = await runRemoteCheck(
    'check-topk-sort',
    client ? () => client.checkTopKSort(top) : null,
    log
  );

  return { top, stats, outputFile, sortCheck };
}
