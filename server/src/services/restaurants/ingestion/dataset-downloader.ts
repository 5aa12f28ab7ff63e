/**
 * Dataset Downloader
 *
 * Walks the paginated download-dataset endpoint and stores every page's JSON file.
 * Pages are paced with a fixed delay to stay under the API rate limit.
 */

import path from 'path';
import { z } from 'zod';
import { componentLogger, logger as defaultLogger, type Logger } from '../../../lib/logger/structured-logger.js';
import { sleep as defaultSleep } from '../../../lib/reliability/timeout-guard.js';
import { RestaurantApiError, type RestaurantApiClient } from '../client/restaurant-api.client.js';
import { writeJsonFile } from '../persistence/json-file.writer.js';

const DownloadDatasetResponseSchema = z.object({
  data: z.object({
    dataset_url: z.string().url(),
    next_id: z.string().nullish(),
  }),
});

const DATASET_FILENAME_PATTERN = /([^/]+\.json)(?=\?)/;

export interface DatasetDownloaderOptions {
  datasetsDir: string;
  pageDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface DownloadedPage {
  pageId: string;
  fileName: string;
  filePath: string;
  recordCount: number;
  nextId: string | null;
}

/**
 * File name of a dataset URL: the `*.json` segment before the query string,
 * else the last path segment.
 */
export function datasetFileName(datasetUrl: string): string {
  const match = DATASET_FILENAME_PATTERN.exec(datasetUrl);
  if (match) return match[1];

  const lastSegment = path.posix.basename(new URL(datasetUrl).pathname);
  if (!lastSegment) {
    throw new RestaurantApiError(`Dataset URL has no file name: ${datasetUrl}`);
  }
  return lastSegment;
}

export class DatasetDownloader {
  private readonly datasetsDir: string;
  private readonly pageDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly client: RestaurantApiClient, options: DatasetDownloaderOptions) {
    this.datasetsDir = options.datasetsDir;
    this.pageDelayMs = options.pageDelayMs ?? 10_000;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = componentLogger('DatasetDownloader', options.logger ?? defaultLogger);
  }

  async downloadPage(pageId: string): Promise<DownloadedPage> {
    const body = await this.client.requestJson('POST', 'download-dataset', {
      body: { next_id: pageId },
    });
    const parsed = DownloadDatasetResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RestaurantApiError(`Malformed download-dataset response for page "${pageId}"`);
    }

    const datasetUrl = parsed.data.data.dataset_url;
    const fileName = datasetFileName(datasetUrl);
    const filePath = path.join(this.datasetsDir, fileName);

    const dataset = await this.client.requestJson('GET', datasetUrl);
    await writeJsonFile(filePath, dataset);

    const nextId = parsed.data.data.next_id || null;
    const recordCount = Array.isArray(dataset) ? dataset.length : 0;

    this.logger.info({
      event: 'dataset_page_downloaded',
      pageId,
      fileName,
      recordCount,
      nextId,
    }, `Saved ${fileName}`);

    return { pageId, fileName, filePath, recordCount, nextId };
  }

  /**
   * Download every page, starting from the empty page id.
   */
  async downloadAll(): Promise<DownloadedPage[]> {
    const pages: DownloadedPage[] = [];
    let pageId = '';

    while (true) {
      const page = await this.downloadPage(pageId);
      pages.push(page);

      if (!page.nextId) {
        this.logger.info({ event: 'dataset_pages_exhausted', pages: pages.length }, 'No more pages to fetch');
        return pages;
      }

      pageId = page.nextId;
      this.logger.info({
        event: 'dataset_page_delay',
        nextPageId: pageId,
        delayMs: this.pageDelayMs,
      }, 'Waiting before next page');
      await this.sleep(this.pageDelayMs);
    }
  }
}
