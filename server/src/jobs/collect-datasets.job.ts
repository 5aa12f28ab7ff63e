/**
 * Collect Datasets Job
 *
 * download all pages -> clean each file -> write the combined validated dataset
 */

import path from 'path';
import type { AppConfig } from '../config/env.js';
import { componentLogger, logger as defaultLogger, type Logger } from '../lib/logger/structured-logger.js';
import type { RestaurantApiClient } from '../services/restaurants/client/restaurant-api.client.js';
import { DatasetDownloader } from '../services/restaurants/ingestion/dataset-downloader.js';
import {
  VALIDATED_DATASET_FILE,
  cleanDatasetFiles,
  listDatasetFiles,
} from '../services/restaurants/ingestion/dataset-cleaner.js';
import { runRemoteCheck, type RemoteCheckStatus } from './remote-check.js';
import { writeJsonFile } from '../services/restaurants/persistence/json-file.writer.js';

export type CollectDatasetsConfig = Pick<
  AppConfig,
  'datasetsDir' | 'cleanDir' | 'validatedDir' | 'pageDelayMs' | 'checkDataValidation'
>;

export interface CollectDatasetsDeps {
  client: RestaurantApiClient;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface CollectDatasetsResult {
  pages: number;
  files: number;
  validatedRecords: number;
  outputFile: string;
  validationCheck: RemoteCheckStatus;
}

export async function runCollectDatasets(
  config: CollectDatasetsConfig,
  deps: CollectDatasetsDeps
): Promise<CollectDatasetsResult> {
  const parentLogger = deps.logger ?? defaultLogger;
  const log = componentLogger('CollectDatasets', parentLogger);

  log.info({ event: 'collect_started' }, 'Retrieving datasets from API');
  const downloader = new DatasetDownloader(deps.client, {
    datasetsDir: config.datasetsDir,
    pageDelayMs: config.pageDelayMs,
    sleep: deps.sleep,
    logger: parentLogger,
  });
  const pages = await downloader.downloadAll();

  const files = await listDatasetFiles(config.datasetsDir);
  log.info({ event: 'collect_cleaning', files: files.length }, 'Cleaning and combining datasets');
  const { records } = await cleanDatasetFiles(files, config.cleanDir, parentLogger);

  const outputFile = path.join(config.validatedDir, VALIDATED_DATASET_FILE);
  await writeJsonFile(outputFile, records);
  log.info({ event: 'collect_saved', outputFile, records: records.length }, 'Validated datasets saved');

  const client = deps.client;
  const validationCheck = await runRemoteCheck(
    'check-data-validation',
    config.checkDataValidation ? () => client.checkDataValidation(records) : null,
    log
  );

  return {
    pages: pages.length,
    files: files.length,
    validatedRecords: records.length,
    outputFile,
    validationCheck,
  };
}
