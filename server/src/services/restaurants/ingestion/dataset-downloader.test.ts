/**
 * Dataset Downloader Tests
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { DatasetDownloader, datasetFileName } from './dataset-downloader.js';
import { RestaurantApiClient, RestaurantApiError } from '../client/restaurant-api.client.js';
import { TEST_BASE_URL, createFakeDatasetApi, requestBody, requestUrl } from '../../../../tests/fixtures/fake-dataset-api.js';

const PAGE_ONE = [{ id: 1, restaurant_name: 'Alpha', rating: 5, distance_from_me: 20 }];
const PAGE_TWO = [
  { id: 2, restaurant_name: 'Beta', rating: 6, distance_from_me: 30 },
  { id: 3, restaurant_name: 'Gamma', rating: 7, distance_from_me: 40 },
];

const PAGES = [
  { pageId: '', datasetUrl: 'https://files.test/datasets/restaurants_1.json?X-Amz-Signature=abc', nextId: 'page-2', records: PAGE_ONE },
  { pageId: 'page-2', datasetUrl: 'https://files.test/datasets/restaurants_2.json?X-Amz-Signature=def', nextId: '', records: PAGE_TWO },
];

describe('datasetFileName', () => {
  it('should take the json segment before the query string', () => {
    assert.strictEqual(datasetFileName('https://files.test/a/b/page_7.json?sig=1&exp=2'), 'page_7.json');
  });

  it('should fall back to the last path segment without a query string', () => {
    assert.strictEqual(datasetFileName('https://files.test/a/b/page_8.json'), 'page_8.json');
  });

  it('should throw when the URL has no file name', () => {
    assert.throws(() => datasetFileName('https://files.test/'), RestaurantApiError);
  });
});

describe('DatasetDownloader', () => {
  let datasetsDir: string;

  beforeEach(async () => {
    datasetsDir = await mkdtemp(path.join(os.tmpdir(), 'datasets-'));
  });

  afterEach(async () => {
    await rm(datasetsDir, { recursive: true, force: true });
  });

  it('should save a page and report the next page id', async () => {
    const fetchImpl = createFakeDatasetApi({ pages: PAGES });
    const client = new RestaurantApiClient({ baseUrl: TEST_BASE_URL, fetchImpl });
    const downloader = new DatasetDownloader(client, { datasetsDir });

    const page = await downloader.downloadPage('');

    assert.deepStrictEqual(page, {
      pageId: '',
      fileName: 'restaurants_1.json',
      filePath: path.join(datasetsDir, 'restaurants_1.json'),
      recordCount: 1,
      nextId: 'page-2',
    });
    const saved = await readFile(page.filePath, 'utf8');
    assert.strictEqual(saved, JSON.stringify(PAGE_ONE, null, 4));
  });

  it('should follow next_id until it is empty, pausing between pages', async () => {
    const fetchImpl = createFakeDatasetApi({ pages: PAGES });
    const client = new RestaurantApiClient({ baseUrl: TEST_BASE_URL, fetchImpl });
    const sleep = mock.fn(async (_ms: number) => {});
    const downloader = new DatasetDownloader(client, { datasetsDir, pageDelayMs: 10_000, sleep });

    const pages = await downloader.downloadAll();

    assert.deepStrictEqual(pages.map(p => p.fileName), ['restaurants_1.json', 'restaurants_2.json']);
    assert.deepStrictEqual(pages.map(p => p.nextId), ['page-2', null]);
    assert.strictEqual(sleep.mock.callCount(), 1);
    assert.deepStrictEqual(sleep.mock.calls[0].arguments, [10_000]);

    const requested = fetchImpl.mock.calls
      .filter(call => requestUrl(call.arguments[0]).endsWith('/download-dataset'))
      .map(call => requestBody(call.arguments[1]));
    assert.deepStrictEqual(requested, [{ next_id: '' }, { next_id: 'page-2' }]);

    const second: unknown = JSON.parse(await readFile(path.join(datasetsDir, 'restaurants_2.json'), 'utf8'));
    assert.deepStrictEqual(second, PAGE_TWO);
  });

  it('should reject a malformed download-dataset response', async () => {
    const fetchImpl = createFakeDatasetApi({
      routes: {},
      pages: [{ pageId: '', datasetUrl: 'not a url', nextId: '', records: [] }],
    });
    const client = new RestaurantApiClient({ baseUrl: TEST_BASE_URL, fetchImpl });
    const downloader = new DatasetDownloader(client, { datasetsDir });

    await assert.rejects(downloader.downloadPage(''), RestaurantApiError);
  });
});
