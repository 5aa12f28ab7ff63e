/**
 * Composite ranking order for scored restaurants.
 *
 * Array.sort semantics: negative means `a` ranks before (is better than) `b`.
 *   1. score     descending
 *   2. rating    descending
 *   3. distance  descending (farther wins among equal score/rating)
 *   4. name      ascending, by UTF-16 code unit (not locale)
 */

import type { ScoredRestaurant } from '../types/restaurant.types.js';

export type RankedFields = Pick<ScoredRestaurant, 'score' | 'rating' | 'distance_from_me' | 'restaurant_name'>;

export function compareRestaurants(a: RankedFields, b: RankedFields): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }

  // Tie-breaker 1: rating descending
  if (a.rating !== b.rating) {
    return b.rating - a.rating;
  }

  // Tie-breaker 2: distance descending
  if (a.distance_from_me !== b.distance_from_me) {
    return b.distance_from_me - a.distance_from_me;
  }

  // Final tie-breaker: name ascending
  if (a.restaurant_name < b.restaurant_name) return -1;
  if (a.restaurant_name > b.restaurant_name) return 1;
  return 0;
}

/**
 * True when `a` ranks strictly below `b`. Used as the min-heap order.
 */
export function ranksBelow(a: RankedFields, b: RankedFields): boolean {
  return compareRestaurants(a, b) > 0;
}
