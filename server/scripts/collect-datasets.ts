/**
 * Download every dataset page, clean it and write validated/validated_dataset.json
 */

import { getConfig } from '../src/config/env.js';
import { ConfigError, ConfigValidator } from '../src/lib/config/config-validator.js';
import { componentLogger } from '../src/lib/logger/structured-logger.js';
import { RestaurantApiClient } from '../src/services/restaurants/client/restaurant-api.client.js';
import { runCollectDatasets } from '../src/jobs/collect-datasets.job.js';

const logger = componentLogger('CollectDatasets');

async function main(): Promise<void> {
  new ConfigValidator().validateOrThrow('collect-datasets');
  const config = getConfig();
  if (!config.apiUrl) throw new ConfigError('API_URL is required');

  logger.info({ event: 'client_init' }, 'Initializing API client');
  const client = new RestaurantApiClient({
    baseUrl: config.apiUrl,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
  });

  const result = await runCollectDatasets(config, { client });
  logger.info({ event: 'collect_completed', ...result }, 'Completed all operations');
}

main().catch((err: unknown) => {
  logger.fatal({ event: 'collect_failed', err }, 'Job failed');
  process.exitCode = 1;
});
