/**
 * Remote result checks run after a job has written its output.
 * An API failure is logged and reported; the job's files stay valid.
 */

import type { Logger } from '../lib/logger/structured-logger.js';
import { RestaurantApiError } from '../services/restaurants/client/restaurant-api.client.js';

export type RemoteCheckStatus = 'completed' | 'failed' | 'skipped';

export async function runRemoteCheck(
  endpoint: string,
  check: (() => Promise<unknown>) | null,
  log: Logger
): Promise<RemoteCheckStatus> {
  if (!check) {
    log.info({ event: 'remote_check_skipped', endpoint }, `Skipping ${endpoint}`);
    return 'skipped';
  }

  try {
    const response = await check();
    log.info({ event: 'remote_check_completed', endpoint, response }, `${endpoint} response`);
    return 'completed';
  } catch (err) {
    if (!(err instanceof RestaurantApiError)) throw err;
    log.error({
      event: 'remote_check_failed',
      endpoint,
      error: err.message,
      statusCode: err.statusCode,
    }, `${endpoint} failed`);
    return 'failed';
  }
}
