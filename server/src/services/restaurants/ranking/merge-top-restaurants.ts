import { DEFAULT_TOP_K, type ScoredRestaurant } from '../types/restaurant.types.js';
import { TopRestaurantsSelector } from './top-restaurants-selector.js';

/**
 * Combine independently drained shards into one top-K.
 *
 * Every shard record is re-offered to a single combining selector. Rescoring is
 * idempotent, so the result equals one selector run over all shard inputs.
 */
export function mergeTopRestaurants(
  shards: Iterable<readonly ScoredRestaurant[]>,
  k: number = DEFAULT_TOP_K
): ScoredRestaurant[] {
  const combined = new TopRestaurantsSelector(k);
  for (const shard of shards) {
    for (const record of shard) {
      combined.add(record);
    }
  }
  return combined.drain();
}
