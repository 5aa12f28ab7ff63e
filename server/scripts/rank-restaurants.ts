/**
 * Rank the validated dataset and write topk_results.json
 */

import { getConfig } from '../src/config/env.js';
import { ConfigValidator } from '../src/lib/config/config-validator.js';
import { componentLogger } from '../src/lib/logger/structured-logger.js';
import { RestaurantApiClient } from '../src/services/restaurants/client/restaurant-api.client.js';
import { runRankRestaurants } from '../src/jobs/rank-restaurants.job.js';

const logger = componentLogger('RankRestaurants');

async function main(): Promise<void> {
  new ConfigValidator().validateOrThrow('rank-restaurants');
  const config = getConfig();

  const client = config.apiUrl
    ? new RestaurantApiClient({
        baseUrl: config.apiUrl,
        timeoutMs: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
      })
    : null;

  const { stats, outputFile } = await runRankRestaurants(config, { client });
  logger.info({ event: 'rank_completed', outputFile, ...stats }, 'Completed');
}

main().catch((err: unknown) => {
  logger.fatal({ event: 'rank_failed', err }, 'Job failed');
  process.exitCode = 1;
});
