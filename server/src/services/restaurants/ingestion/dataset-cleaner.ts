/**
 * Dataset Cleaner
 *
 * Loads downloaded dataset files in file-name order, keeps the records that pass
 * validation, writes one cleaned file per input and returns the combined list.
 */

import { readdir } from 'fs/promises';
import path from 'path';
import { componentLogger, logger as defaultLogger, type Logger } from '../../../lib/logger/structured-logger.js';
import type { RestaurantRecord } from '../types/restaurant.types.js';
import { validateRestaurantRecord } from '../validation/restaurant-record.schema.js';
import { readJsonFile, writeJsonFile } from '../persistence/json-file.writer.js';

export const VALIDATED_DATASET_FILE = 'validated_dataset.json';

export interface CleanedFile {
  source: string;
  cleanedPath: string;
  received: number;
  kept: number;
  unreadable: boolean;
}

export interface CleanDatasetsResult {
  records: RestaurantRecord[];
  files: CleanedFile[];
}

/**
 * Regular files in `dir`, sorted by file name ascending.
 */
export async function listDatasetFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map(name => path.join(dir, name));
}

export async function cleanDatasetFiles(
  files: readonly string[],
  cleanDir: string,
  parentLogger: Logger = defaultLogger
): Promise<CleanDatasetsResult> {
  const log = componentLogger('DatasetCleaner', parentLogger);
  const records: RestaurantRecord[] = [];
  const cleaned: CleanedFile[] = [];

  for (const file of files) {
    log.info({ event: 'dataset_cleaning', file }, 'Cleaning file');

    const kept: RestaurantRecord[] = [];
    let received = 0;
    let unreadable = false;

    try {
      const data = await readJsonFile(file);
      if (!Array.isArray(data)) {
        throw new SyntaxError('dataset is not a JSON array');
      }
      received = data.length;
      for (const raw of data) {
        const validation = validateRestaurantRecord(raw);
        if (validation.valid) {
          kept.push(validation.record);
        }
      }
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      unreadable = true;
      log.error({ event: 'dataset_unreadable', file, error: err.message }, 'Error reading dataset file');
    }

    const cleanedPath = path.join(cleanDir, path.basename(file));
    await writeJsonFile(cleanedPath, kept);
    records.push(...kept);

    log.info({
      event: 'dataset_cleaned',
      file,
      cleanedPath,
      received,
      kept: kept.length,
      filtered: received - kept.length,
    }, 'Saved cleaned file');

    cleaned.push({ source: file, cleanedPath, received, kept: kept.length, unreadable });
  }

  return { records, files: cleaned };
}
