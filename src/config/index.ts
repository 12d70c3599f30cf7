/**
 * Configuration Module
 *
 * Loads and validates environment variables once at start-up.
 * Uses Zod for runtime validation with sensible defaults; missing required
 * values fail fast with a ConfigError.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import * as path from 'node:path';
import { ConfigError } from './errors.js';

// ============================================================================
// Schema
// ============================================================================

const nonEmpty = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  PRIMARY_API_KEY: nonEmpty('PRIMARY_API_KEY'),
  SECONDARY_API_KEY: optionalString,
  STORE_CONNECTION_STRING: optionalString,
  PHOTO_CACHE_DIR: optionalString,
  INGEST_SETTINGS_PATH: optionalString,
});

// ============================================================================
// Types
// ============================================================================

/**
 * Validated process configuration
 */
export interface AppConfig {
  apiKeys: {
    primary: string;
    /** Absent: enrichment disabled */
    secondary?: string;
  };
  /** Absent only when the store is not required (dry run) */
  storeConnectionString?: string;
  photoCacheDir: string;
  settingsPath: string;
}

export interface LoadConfigOptions {
  /** Require STORE_CONNECTION_STRING (default: true) */
  requireStore?: boolean;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
}

/** Default run settings file, relative to the package root */
export const DEFAULT_SETTINGS_PATH = path.resolve(__dirname, '..', '..', 'config', 'ingest.json');

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate environment variables into an AppConfig.
 *
 * @param env - Environment (default: process.env)
 * @param options - Loading options
 * @throws ConfigError listing every problem found
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {}
): AppConfig {
  const requireStore = options.requireStore ?? true;
  const cwd = options.cwd ?? process.cwd();

  const parsed = envSchema.safeParse(env);
  const issues: string[] = parsed.success ? [] : parsed.error.issues.map((issue) => issue.message);
  if (requireStore && !env.STORE_CONNECTION_STRING?.trim()) {
    issues.push('STORE_CONNECTION_STRING is required');
  }
  if (!parsed.success || issues.length > 0) {
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;

  return {
    apiKeys: {
      primary: data.PRIMARY_API_KEY,
      secondary: data.SECONDARY_API_KEY,
    },
    storeConnectionString: data.STORE_CONNECTION_STRING,
    photoCacheDir: path.resolve(cwd, data.PHOTO_CACHE_DIR ?? 'photo-cache'),
    settingsPath: data.INGEST_SETTINGS_PATH
      ? path.resolve(cwd, data.INGEST_SETTINGS_PATH)
      : DEFAULT_SETTINGS_PATH,
  };
}

export { ConfigError };

// Re-export run settings
export * from './settings.js';
