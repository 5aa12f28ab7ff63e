/**
 * Configuration Validator
 * Fail fast on misconfiguration
 *
 * Validates required environment variables before a job starts
 */

import { componentLogger } from '../logger/structured-logger.js';

const logger = componentLogger('ConfigValidator');

export type JobName = 'collect-datasets' | 'rank-restaurants';

export interface ConfigRequirements {
  required: string[];
  optional: string[];
}

/**
 * Configuration requirements per job
 */
export const CONFIG_REQUIREMENTS: Record<JobName, ConfigRequirements> = {
  'collect-datasets': {
    required: [
      'API_URL',  // dataset download + token registration
    ],
    optional: ['DATASETS_DIR', 'CLEAN_DIR', 'VALIDATED_DIR', 'PAGE_DELAY_MS', 'LOG_LEVEL'],
  },
  'rank-restaurants': {
    required: [],
    optional: [
      'API_URL',     // top-k sort check is skipped without it
      'INPUT_FILE',
      'RESULTS_DIR',
      'TOP_K',
      'DUPLICATE_POLICY',
      'LOG_LEVEL',
    ],
  },
};

export interface ValidationResult {
  valid: boolean;
  missing: string[];
  warnings: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConfigValidator {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  validate(job: JobName): ValidationResult {
    const requirements = CONFIG_REQUIREMENTS[job];
    const missing = requirements.required.filter(key => !this.env[key]);
    const warnings = requirements.optional
      .filter(key => !this.env[key])
      .map(key => `Optional config ${key} not set`);

    return {
      valid: missing.length === 0,
      missing,
      warnings
    };
  }

  /**
   * Validate configuration or throw ConfigError
   */
  validateOrThrow(job: JobName): void {
    const result = this.validate(job);

    if (!result.valid) {
      logger.error({
        job,
        missing: result.missing,
        required: CONFIG_REQUIREMENTS[job].required
      }, 'Configuration validation failed');

      throw new ConfigError(`Missing required configuration: ${result.missing.join(', ')}`);
    }

    if (result.warnings.length > 0) {
      logger.debug({ job, warnings: result.warnings }, 'Configuration warnings');
    }

    logger.info({
      job,
      logLevel: this.env.LOG_LEVEL || 'info',
      nodeEnv: this.env.NODE_ENV || 'development'
    }, 'Configuration validated');
  }
}
