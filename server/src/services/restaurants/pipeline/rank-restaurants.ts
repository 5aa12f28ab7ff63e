/**
 * Ranking pipeline: raw records -> validator -> duplicate policy -> selector -> drain
 *
 * Single pass, synchronous. Filtered records are counted, never thrown.
 */

import { componentLogger, logger as defaultLogger, type Logger } from '../../../lib/logger/structured-logger.js';
import {
  DEFAULT_TOP_K,
  type DuplicatePolicy,
  type ScoredRestaurant,
} from '../types/restaurant.types.js';
import { validateRestaurantRecord } from '../validation/restaurant-record.schema.js';
import { TopRestaurantsSelector } from '../ranking/top-restaurants-selector.js';

export interface RankRestaurantsOptions {
  k?: number;
  duplicates?: DuplicatePolicy;
  logger?: Logger;
}

export interface RankingStats {
  received: number;
  accepted: number;
  filtered: number;
  duplicates: number;
}

export interface RankRestaurantsResult {
  top: ScoredRestaurant[];
  stats: RankingStats;
}

export function rankRestaurants(
  records: Iterable<unknown>,
  options: RankRestaurantsOptions = {}
): RankRestaurantsResult {
  const k = options.k ?? DEFAULT_TOP_K;
  const duplicates = options.duplicates ?? 'keep';
  const log = componentLogger('Ranking', options.logger ?? defaultLogger);

  const selector = new TopRestaurantsSelector(k);
  const seenIds = new Set<number>();
  const stats: RankingStats = { received: 0, accepted: 0, filtered: 0, duplicates: 0 };

  for (const raw of records) {
    stats.received++;

    const validation = validateRestaurantRecord(raw);
    if (!validation.valid) {
      stats.filtered++;
      log.debug({ event: 'record_filtered', issues: validation.issues }, 'Record filtered');
      continue;
    }

    const record = validation.record;
    if (duplicates === 'first-wins') {
      if (seenIds.has(record.id)) {
        stats.duplicates++;
        continue;
      }
      seenIds.add(record.id);
    }

    stats.accepted++;
    selector.add(record);
  }

  const top = selector.drain();

  log.info({
    event: 'ranking_completed',
    k,
    duplicatePolicy: duplicates,
    ...stats,
    returned: top.length,
  }, `Selected top ${top.length} restaurants`);

  return { top, stats };
}
