import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../lib/config/config-validator.js';
import { DEFAULT_TOP_K, type DuplicatePolicy } from '../services/restaurants/types/restaurant.types.js';

dotenv.config();

const booleanFlag = z.enum(['true', 'false']).optional().transform(v => v === 'true');

const EnvSchema = z.object({
  API_URL: z.string().url().optional(),
  DATASETS_DIR: z.string().min(1).default('datasets/'),
  CLEAN_DIR: z.string().min(1).default('clean/'),
  VALIDATED_DIR: z.string().min(1).default('validated/'),
  INPUT_FILE: z.string().min(1).default('validated/validated_dataset.json'),
  RESULTS_DIR: z.string().min(1).default('./'),
  TOP_K: z.coerce.number().int().min(1).default(DEFAULT_TOP_K),
  PAGE_DELAY_MS: z.coerce.number().int().min(0).default(10_000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  DUPLICATE_POLICY: z.enum(['keep', 'first-wins']).default('keep'),
  CHECK_DATA_VALIDATION: booleanFlag,
});

export interface AppConfig {
  apiUrl: string | undefined;
  datasetsDir: string;
  cleanDir: string;
  validatedDir: string;
  inputFile: string;
  resultsDir: string;
  topK: number;
  pageDelayMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  duplicatePolicy: DuplicatePolicy;
  checkDataValidation: boolean;
}

/**
 * Parse job configuration from the environment.
 * Empty variables count as unset.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    apiUrl: e.API_URL,
    datasetsDir: e.DATASETS_DIR,
    cleanDir: e.CLEAN_DIR,
    validatedDir: e.VALIDATED_DIR,
    inputFile: e.INPUT_FILE,
    resultsDir: e.RESULTS_DIR,
    topK: e.TOP_K,
    pageDelayMs: e.PAGE_DELAY_MS,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    maxRetries: e.MAX_RETRIES,
    duplicatePolicy: e.DUPLICATE_POLICY,
    checkDataValidation: e.CHECK_DATA_VALIDATION,
  };
}
