/**
 * Configuration parsing tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { getConfig } from './env.js';
import { getLoggingConfig } from './logging.config.js';
import { ConfigError, ConfigValidator } from '../lib/config/config-validator.js';

describe('getConfig', () => {
  it('should apply defaults for an empty environment', () => {
    assert.deepStrictEqual(getConfig({}), {
      apiUrl: undefined,
      datasetsDir: 'datasets/',
      cleanDir: 'clean/',
      validatedDir: 'validated/',
      inputFile: 'validated/validated_dataset.json',
      resultsDir: './',
      topK: 10,
      pageDelayMs: 10_000,
      requestTimeoutMs: 10_000,
      maxRetries: 2,
      duplicatePolicy: 'keep',
      checkDataValidation: false,
    });
  });

  it('should parse provided values', () => {
    const config = getConfig({
      API_URL: 'https://api.test/prod/',
      TOP_K: '5',
      PAGE_DELAY_MS: '0',
      DUPLICATE_POLICY: 'first-wins',
      CHECK_DATA_VALIDATION: 'true',
    });

    assert.strictEqual(config.apiUrl, 'https://api.test/prod/');
    assert.strictEqual(config.topK, 5);
    assert.strictEqual(config.pageDelayMs, 0);
    assert.strictEqual(config.duplicatePolicy, 'first-wins');
    assert.strictEqual(config.checkDataValidation, true);
  });

  it('should treat empty variables as unset', () => {
    assert.strictEqual(getConfig({ TOP_K: '', API_URL: '' }).topK, 10);
  });

  it('should throw ConfigError for invalid values', () => {
    assert.throws(() => getConfig({ TOP_K: '0' }), ConfigError);
    assert.throws(() => getConfig({ TOP_K: 'ten' }), ConfigError);
    assert.throws(() => getConfig({ API_URL: 'not a url' }), ConfigError);
    assert.throws(() => getConfig({ DUPLICATE_POLICY: 'last-wins' }), /DUPLICATE_POLICY/);
  });
});

describe('ConfigValidator', () => {
  it('should require API_URL for collect-datasets', () => {
    const result = new ConfigValidator({}).validate('collect-datasets');

    assert.strictEqual(result.valid, false);
    assert.deepStrictEqual(result.missing, ['API_URL']);
    assert.throws(() => new ConfigValidator({}).validateOrThrow('collect-datasets'), ConfigError);
  });

  it('should accept rank-restaurants without API_URL', () => {
    const result = new ConfigValidator({}).validate('rank-restaurants');

    assert.strictEqual(result.valid, true);
    assert.ok(result.warnings.includes('Optional config API_URL not set'));
  });
});

describe('getLoggingConfig', () => {
  it('should accept silent and fall back to info for unknown levels', () => {
    assert.strictEqual(getLoggingConfig({ LOG_LEVEL: 'silent' }).level, 'silent');
    assert.strictEqual(getLoggingConfig({ LOG_LEVEL: 'loud' }).level, 'info');
  });

  it('should keep file output and pretty printing off unless enabled', () => {
    const config = getLoggingConfig({});

    assert.strictEqual(config.toFile, false);
    assert.strictEqual(config.pretty, false);
    assert.strictEqual(config.console, true);
  });
});
