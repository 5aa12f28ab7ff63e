/**
 * Restaurant Record Schema Tests
 * Boundary values for every field rule
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isValidRestaurantRecord, validateRestaurantRecord } from './restaurant-record.schema.js';

const base = { id: 1, restaurant_name: 'Corner Bistro', rating: 8, distance_from_me: 50 };

describe('isValidRestaurantRecord', () => {
  it('should accept a record that satisfies every rule', () => {
    assert.strictEqual(isValidRestaurantRecord(base), true);
  });

  it('should accept rating at both inclusive bounds', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, rating: 1.0 }), true);
    assert.strictEqual(isValidRestaurantRecord({ ...base, rating: 10.0 }), true);
  });

  it('should reject rating just outside the bounds', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, rating: 0.999999 }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, rating: 10.000001 }), false);
  });

  it('should accept distance at both inclusive bounds', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, distance_from_me: 10.0 }), true);
    assert.strictEqual(isValidRestaurantRecord({ ...base, distance_from_me: 1000.0 }), true);
  });

  it('should reject distance just outside the bounds', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, distance_from_me: 9.999999 }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, distance_from_me: 1000.000001 }), false);
  });

  it('should accept single-letter and spaced names', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, restaurant_name: 'A' }), true);
    assert.strictEqual(isValidRestaurantRecord({ ...base, restaurant_name: ' The Curry Leaf ' }), true);
  });

  it('should reject names with digits, punctuation or non-ASCII letters', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, restaurant_name: 'A1' }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, restaurant_name: "Joe's Diner" }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, restaurant_name: 'Café Noir' }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, restaurant_name: 'Tab\tHouse' }), false);
  });

  it('should reject empty and whitespace-only names', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, restaurant_name: '' }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, restaurant_name: '   ' }), false);
  });

  it('should reject non-integer or non-numeric ids', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, id: 1.5 }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, id: '1' }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, id: true }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, id: null }), false);
  });

  it('should accept negative and zero ids', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, id: 0 }), true);
    assert.strictEqual(isValidRestaurantRecord({ ...base, id: -42 }), true);
  });

  it('should reject numeric fields given as strings or non-finite numbers', () => {
    assert.strictEqual(isValidRestaurantRecord({ ...base, rating: '8' }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, rating: Number.NaN }), false);
    assert.strictEqual(isValidRestaurantRecord({ ...base, distance_from_me: Number.POSITIVE_INFINITY }), false);
  });

  it('should reject records missing any field', () => {
    const { rating: _rating, ...withoutRating } = base;
    const { restaurant_name: _name, ...withoutName } = base;
    assert.strictEqual(isValidRestaurantRecord(withoutRating), false);
    assert.strictEqual(isValidRestaurantRecord(withoutName), false);
  });

  it('should return false instead of throwing for non-object input', () => {
    for (const input of [null, undefined, 42, 'restaurant', [], [base]]) {
      assert.strictEqual(isValidRestaurantRecord(input), false);
    }
  });
});

describe('validateRestaurantRecord', () => {
  it('should keep extra keys on the accepted record', () => {
    const result = validateRestaurantRecord({ ...base, cuisine: 'thai' });

    assert.strictEqual(result.valid, true);
    assert.ok(result.valid);
    assert.strictEqual(result.record.cuisine, 'thai');
    assert.strictEqual(result.record.restaurant_name, 'Corner Bistro');
  });

  it('should report the failing field', () => {
    const result = validateRestaurantRecord({ ...base, rating: 11 });

    assert.ok(!result.valid);
    assert.strictEqual(result.issues.length, 1);
    assert.ok(result.issues[0].startsWith('rating: '));
  });

  it('should report every failing rule', () => {
    const result = validateRestaurantRecord({ id: 2.5, restaurant_name: 'X9', rating: 5, distance_from_me: 5 });

    assert.ok(!result.valid);
    const fields = result.issues.map(issue => issue.split(':')[0]);
    assert.deepStrictEqual(fields.sort(), ['distance_from_me', 'id', 'restaurant_name']);
  });

  it('should reject a record whose getter throws instead of throwing itself', () => {
    const record = {
      id: 3,
      restaurant_name: 'Corner Bistro',
      get rating(): number {
        throw new Error('rating unavailable');
      },
      distance_from_me: 50,
    };

    assert.deepStrictEqual(validateRestaurantRecord(record), {
      valid: false,
      issues: ['record could not be read: rating unavailable'],
    });
    assert.strictEqual(isValidRestaurantRecord(record), false);
  });
});
