/**
 * Restaurant Record Types
 *
 * Wire shapes shared by ingestion, ranking and persistence.
 */

/**
 * Restaurant record as it arrives from a dataset page.
 * Only the four ranking fields are typed; any other keys pass through untouched.
 */
export interface RestaurantRecord {
  id: number;
  restaurant_name: string;
  rating: number;
  distance_from_me: number;
  [key: string]: unknown;
}

/**
 * Record after admission to the selector. `score` is assigned once and the object is frozen.
 */
export type ScoredRestaurant = Readonly<RestaurantRecord & { score: number }>;

/**
 * What to do when a valid record repeats an `id` already offered in the same run.
 * - keep: offer every record (reference behavior)
 * - first-wins: offer only the first record seen for each id
 */
export type DuplicatePolicy = 'keep' | 'first-wins';

export const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = ['keep', 'first-wins'];

export const DEFAULT_TOP_K = 10;
