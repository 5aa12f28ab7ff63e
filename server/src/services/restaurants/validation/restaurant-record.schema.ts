/**
 * Restaurant Record Schema
 *
 * Decides whether a raw dataset record belongs in the ranking domain.
 * A failed record is filtered, never an error.
 */

import { z } from 'zod';
import type { RestaurantRecord } from '../types/restaurant.types.js';

export const RESTAURANT_NAME_PATTERN = /^[A-Za-z ]+$/;

export const RATING_RANGE = { min: 1, max: 10 } as const;
export const DISTANCE_RANGE = { min: 10, max: 1000 } as const;

export const RestaurantRecordSchema = z.object({
  id: z.number().int(),
  restaurant_name: z.string()
    .refine(name => name.trim().length > 0, 'must not be blank')
    .refine(name => RESTAURANT_NAME_PATTERN.test(name), 'must contain only letters and spaces'),
  rating: z.number().min(RATING_RANGE.min).max(RATING_RANGE.max),
  distance_from_me: z.number().min(DISTANCE_RANGE.min).max(DISTANCE_RANGE.max),
}).passthrough();

export type RecordValidation =
  | { valid: true; record: RestaurantRecord }
  | { valid: false; issues: string[] };

/**
 * Validate a raw record and report which rules failed. Never throws.
 * The accepted record is a shallow copy that keeps every input key.
 */
export function validateRestaurantRecord(record: unknown): RecordValidation {
  try {
    const result = RestaurantRecordSchema.safeParse(record);
    if (!result.success) {
      return {
        valid: false,
        issues: result.error.issues.map(issue =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        ),
      };
    }
    return { valid: true, record: result.data };
  } catch (err) {
    // a throwing getter or proxy trap on a caller-built object
    return {
      valid: false,
      issues: [`record could not be read: ${err instanceof Error ? err.message : String(err)}`],
    };
  }
}

export function isValidRestaurantRecord(record: unknown): record is RestaurantRecord {
  return validateRestaurantRecord(record).valid;
}
