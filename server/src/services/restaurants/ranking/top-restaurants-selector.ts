/**
 * Top-K Restaurants Selector
 *
 * Keeps the K best restaurants seen so far in a bounded min-heap whose root is
 * the worst kept entry. O(log K) per add, one O(K log K) sort on drain.
 *
 * States: EMPTY -> FILLING (size < K) -> FULL (size == K) -> DRAINED (terminal)
 */

import { DEFAULT_TOP_K, type RestaurantRecord, type ScoredRestaurant } from '../types/restaurant.types.js';
import { BoundedMinHeap, type OfferResult } from './bounded-min-heap.js';
import { compareRestaurants, ranksBelow } from './restaurant-comparator.js';
import { computeRestaurantScore } from './restaurant-score.js';
import { InvalidTopKError, SelectorDrainedError } from './ranking.errors.js';

export type SelectorState = 'EMPTY' | 'FILLING' | 'FULL' | 'DRAINED';

/**
 * - inserted: heap had room
 * - replaced: candidate evicted the worst kept entry
 * - discarded: candidate did not rank strictly above the worst kept entry
 */
export type AdmissionResult = OfferResult;

export class TopRestaurantsSelector {
  private readonly heap: BoundedMinHeap<ScoredRestaurant>;
  private drained = false;

  constructor(readonly k: number = DEFAULT_TOP_K) {
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidTopKError(k);
    }
    this.heap = new BoundedMinHeap<ScoredRestaurant>(k, ranksBelow);
  }

  get state(): SelectorState {
    if (this.drained) return 'DRAINED';
    const size = this.heap.size();
    if (size === 0) return 'EMPTY';
    return this.heap.isFull() ? 'FULL' : 'FILLING';
  }

  get size(): number {
    return this.heap.size();
  }

  /**
   * Score the record and offer it to the candidate set.
   * An exact tie with the current worst entry keeps the incumbent.
   */
  add(record: RestaurantRecord): AdmissionResult {
    if (this.drained) {
      throw new SelectorDrainedError('add');
    }

    const candidate: ScoredRestaurant = Object.freeze({
      ...record,
      score: computeRestaurantScore(record),
    });

    return this.heap.offer(candidate);
  }

  /**
   * Freeze the candidate set and return it best-first. Terminal.
   */
  drain(): ScoredRestaurant[] {
    if (this.drained) {
      throw new SelectorDrainedError('drain');
    }
    this.drained = true;

    const ranked = this.heap.toArray();
    ranked.sort(compareRestaurants);
    return ranked;
  }
}

/**
 * Convenience wrapper: run a fresh selector over `records` and drain it.
 */
export function selectTopRestaurants(
  records: Iterable<RestaurantRecord>,
  k: number = DEFAULT_TOP_K
): ScoredRestaurant[] {
  const selector = new TopRestaurantsSelector(k);
  for (const record of records) {
    selector.add(record);
  }
  return selector.drain();
}
