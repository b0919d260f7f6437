/**
 * Environment Data Configuration
 *
 * Default configuration for the EnvironmentData manager plus environment
 * variable overrides. Resolution validates every field and guarantees the
 * downloads directory exists before any stage runs.
 *
 * Environment variables:
 * - OKAVANGO_DOWNLOADS_DIR
 * - OKAVANGO_TIMEOUT_MS
 * - OKAVANGO_MAX_RETRIES
 * - OKAVANGO_CONCURRENCY
 */

import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export interface EnvironmentConfig {
  /** Folder where every fetched artifact is written (absolute once resolved) */
  readonly downloadsDir: string;

  /** Per-request timeout in milliseconds */
  readonly timeoutMs: number;

  /** Retry attempts after the first request for retryable failures */
  readonly maxRetries: number;

  /** Maximum concurrent downloads (1 = sequential) */
  readonly concurrency: number;
}

export const DEFAULT_CONFIG: EnvironmentConfig = {
  downloadsDir: 'downloads',
  timeoutMs: 30_000,
  maxRetries: 2,
  concurrency: 1,
};

export const EnvironmentConfigSchema = z.object({
  downloadsDir: z.string().trim().min(1, 'downloadsDir cannot be empty'),
  timeoutMs: z.coerce.number().int().positive().max(600_000),
  maxRetries: z.coerce.number().int().min(0).max(10),
  concurrency: z.coerce.number().int().min(1).max(6),
});

type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Read overrides from environment variables
 */
export function configFromEnv(env: EnvSource = process.env): Partial<Record<keyof EnvironmentConfig, string>> {
  const overrides: Partial<Record<keyof EnvironmentConfig, string>> = {};
  if (env.OKAVANGO_DOWNLOADS_DIR) overrides.downloadsDir = env.OKAVANGO_DOWNLOADS_DIR;
  if (env.OKAVANGO_TIMEOUT_MS) overrides.timeoutMs = env.OKAVANGO_TIMEOUT_MS;
  if (env.OKAVANGO_MAX_RETRIES) overrides.maxRetries = env.OKAVANGO_MAX_RETRIES;
  if (env.OKAVANGO_CONCURRENCY) overrides.concurrency = env.OKAVANGO_CONCURRENCY;
  return overrides;
}

/**
 * Merge defaults, environment and explicit overrides, then validate
 *
 * Precedence: explicit overrides > environment > defaults. Overrides set
 * to `undefined` leave the lower layers in place.
 *
 * @throws {ConfigError} listing every invalid field
 */
export function createConfig(
  overrides: Partial<EnvironmentConfig> = {},
  env: EnvSource = process.env
): EnvironmentConfig {
  const result = EnvironmentConfigSchema.safeParse({
    ...DEFAULT_CONFIG,
    ...configFromEnv(env),
    ...definedEntries(overrides),
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return {
    ...result.data,
    downloadsDir: resolve(result.data.downloadsDir),
  };
}

function definedEntries(values: Partial<EnvironmentConfig>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Validate configuration and create the downloads directory if missing
 */
export async function resolveEnvironmentConfig(
  overrides: Partial<EnvironmentConfig> = {},
  env: EnvSource = process.env
): Promise<EnvironmentConfig> {
  const config = createConfig(overrides, env);
  await mkdir(config.downloadsDir, { recursive: true });
  return Object.freeze(config);
}
