/**
 * Restaurant Score
 *
 * score = round2((rating * 10 - distance * 0.5 + sin(id) * 2) * 100 + 0.5) / 100)
 *
 * The +0.5 is part of the fixed formula, not a rounding idiom.
 * Rounding to 2 decimals is half-to-even on the exact binary value,
 * so exact ties (x.xx5 representable in binary) go to the even cent.
 */

import type { RestaurantRecord } from '../types/restaurant.types.js';
import { RankingContractError } from './ranking.errors.js';

type ScoreInput = Pick<RestaurantRecord, 'id' | 'rating' | 'distance_from_me'>;

const SCORE_FIELDS = ['id', 'rating', 'distance_from_me'] as const;

/**
 * Throws RankingContractError when a scoring field is missing or not finite.
 * The validator guarantees these upstream; reaching here without them is a bug.
 */
export function assertScorable(record: ScoreInput): void {
  for (const field of SCORE_FIELDS) {
    const value: unknown = record[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new RankingContractError(field, record.id);
    }
  }
}

export function computeRawScore(record: ScoreInput): number {
  return record.rating * 10 - record.distance_from_me * 0.5 + Math.sin(record.id) * 2;
}

export function computeRestaurantScore(record: ScoreInput): number {
  assertScorable(record);
  const raw = computeRawScore(record);
  return roundToCents((raw * 100 + 0.5) / 100);
}

/**
 * Round to 2 decimals, ties to even.
 */
export function roundToCents(value: number): number {
  // Only multiples of 1/8 with an odd numerator sit exactly on a .xx5 boundary
  const eighths = value * 8;
  if (Number.isInteger(eighths) && !Number.isInteger(value * 4)) {
    const lower = Math.floor(value * 100);
    const cents = lower % 2 === 0 ? lower : lower + 1;
    return cents / 100;
  }
  return Number(value.toFixed(2));
}
