import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import type { LevelWithSilent } from 'pino';
import { z } from 'zod';
import { resolveAdzunaConfig, type AdzunaConfig } from '@jobcompass/adzuna';
import { MAX_RESULTS, MIN_RESULTS } from '@jobcompass/listing-sdk';
import { ConfigError } from './errors.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

function blankAsMissing(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function optionalText() {
  return z.preprocess(blankAsMissing, z.string().trim().optional());
}

function text(fallback: string) {
  return z.preprocess(blankAsMissing, z.string().trim().default(fallback));
}

function positiveInt(fallback: number) {
  return z.preprocess(blankAsMissing, z.coerce.number().int().positive().default(fallback));
}

const envSchema = z.object({
  ADZUNA_APP_ID: optionalText(),
  ADZUNA_APP_KEY: optionalText(),
  ADZUNA_BASE_URL: z.preprocess(blankAsMissing, z.string().url().optional()),
  ADZUNA_COUNTRY: optionalText(),
  API_TIMEOUT_MS: positiveInt(30_000),
  API_MAX_RETRIES: positiveInt(3),
  API_RETRY_DELAY_MS: z.preprocess(blankAsMissing, z.coerce.number().int().min(0).default(2_000)),
  ANTHROPIC_API_KEY: optionalText(),
  ANTHROPIC_MODEL: text('claude-sonnet-4-5'),
  ANTHROPIC_MAX_TOKENS: positiveInt(4096),
  JOB_ROLE: text('Software Engineering Intern'),
  JOB_LOCATION: text('Los Angeles'),
  JOB_NUM_RESULTS: z.preprocess(
    blankAsMissing,
    z.coerce.number().int().min(MIN_RESULTS).max(MAX_RESULTS).default(5),
  ),
  OUTPUT_DIR: text('outputs'),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsMissing(value.trim().toLowerCase()) : value),
    z.enum(LOG_LEVELS).default('info'),
  ),
  LOG_SERVICE_NAME: text('jobcompass-advisor'),
});

export interface ModelSettings {
  apiKey?: string;
  name: string;
  maxTokens: number;
}

export interface SearchDefaults {
  role: string;
  location: string;
  numResults: number;
}

export interface AppConfig {
  adzuna: AdzunaConfig;
  model: ModelSettings;
  search: SearchDefaults;
  outputDir: string;
  logging: {
    level: LevelWithSilent;
    service: string;
  };
}

/**
 * Load `.env` then `.env.local` from `rootDir` into `process.env`, when present.
 */
export function loadEnvFiles(rootDir: string): void {
  const envPath = resolve(rootDir, '.env');
  const envLocalPath = resolve(rootDir, '.env.local');

  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    loadDotenv({ path: envLocalPath, override: true });
  }
}

/**
 * Build the process-wide configuration once, from environment variables.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;

  return {
    adzuna: resolveAdzunaConfig({
      appId: values.ADZUNA_APP_ID,
      appKey: values.ADZUNA_APP_KEY,
      baseUrl: values.ADZUNA_BASE_URL,
      country: values.ADZUNA_COUNTRY,
      timeoutMs: values.API_TIMEOUT_MS,
      maxAttempts: values.API_MAX_RETRIES,
      retryDelayMs: values.API_RETRY_DELAY_MS,
    }),
    model: {
      apiKey: values.ANTHROPIC_API_KEY,
      name: values.ANTHROPIC_MODEL,
      maxTokens: values.ANTHROPIC_MAX_TOKENS,
    },
    search: {
      role: values.JOB_ROLE,
      location: values.JOB_LOCATION,
      numResults: values.JOB_NUM_RESULTS,
    },
    outputDir: resolve(values.OUTPUT_DIR),
    logging: {
      level: values.LOG_LEVEL,
      service: values.LOG_SERVICE_NAME,
    },
  };
}

/**
 * Settings a full pipeline run cannot do without. Empty when ready.
 */
export function validateAppConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!config.model.apiKey) {
    errors.push('ANTHROPIC_API_KEY is not set. Please add it to your .env file.');
  }

  if (!config.adzuna.appId) {
    errors.push('ADZUNA_APP_ID is not set. Please add it to your .env file.');
  }

  if (!config.adzuna.appKey) {
    errors.push('ADZUNA_APP_KEY is not set. Please add it to your .env file.');
  }

  return errors;
}

function presence(value: string | undefined): string {
  return value ? 'set' : 'missing';
}

/**
 * Human-readable summary with secrets reduced to set/missing.
 */
export function describeAppConfig(config: AppConfig): string {
  return [
    'Job search:',
    `  Role: ${config.search.role}`,
    `  Location: ${config.search.location}`,
    `  Number of results: ${config.search.numResults}`,
    'Model:',
    `  Name: ${config.model.name}`,
    `  Max tokens: ${config.model.maxTokens}`,
    'Adzuna:',
    `  Endpoint: ${config.adzuna.baseUrl}/${config.adzuna.country}`,
    `  Attempts: ${config.adzuna.maxAttempts}, timeout ${config.adzuna.timeoutMs}ms, delay ${config.adzuna.retryDelayMs}ms`,
    'Credentials:',
    `  ANTHROPIC_API_KEY: ${presence(config.model.apiKey)}`,
    `  ADZUNA_APP_ID: ${presence(config.adzuna.appId)}`,
    `  ADZUNA_APP_KEY: ${presence(config.adzuna.appKey)}`,
    'Output:',
    `  Directory: ${config.outputDir}`,
  ].join('\n');
}
