/**
 * Run Settings
 *
 * Search area, category list, target count, pacing and the offer table.
 * Loaded once per run from a JSON file and validated with Zod.
 *
 * @module config/settings
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const RunSettingsSchema = z.object({
  center: z.object({
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
  }),
  radiusMeters: z.number().int().positive().max(50000),
  targetCount: z.number().int().positive(),
  categories: z.array(z.string().min(1)).min(1),
  pageTokenDelayMs: z.number().int().nonnegative().default(2000),
  rateLimits: z
    .object({
      primaryMs: z.number().int().nonnegative().default(200),
      secondaryMs: z.number().int().nonnegative().default(200),
    })
    .default({}),
  detailRetry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      delayMs: z.number().int().nonnegative().default(1000),
    })
    .default({}),
  offers: z.object({
    fallback: z.string().min(1),
    byCategory: z.record(z.string()).default({}),
  }),
});

export type RunSettings = z.infer<typeof RunSettingsSchema>;

/**
 * CLI-level overrides applied on top of the settings file
 */
export interface RunSettingsOverrides {
  targetCount?: number;
  radiusMeters?: number;
  categories?: string[];
}

/**
 * Validate a parsed settings object.
 *
 * @throws ConfigError with one entry per invalid field
 */
export function parseRunSettings(data: unknown, source = 'settings'): RunSettings {
  const parsed = RunSettingsSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid run settings in ${source}: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Read and validate the run settings file.
 *
 * @param filePath - Path to the JSON settings file
 * @throws ConfigError if the file is missing, not JSON or invalid
 */
export async function loadRunSettings(filePath: string): Promise<RunSettings> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Settings file not found: ${filePath}`);
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in settings file: ${filePath}`);
  }

  return parseRunSettings(data, filePath);
}

/**
 * Apply CLI overrides, revalidating the result.
 */
export function applyOverrides(settings: RunSettings, overrides: RunSettingsOverrides): RunSettings {
  return parseRunSettings(
    {
      ...settings,
      ...(overrides.targetCount !== undefined && { targetCount: overrides.targetCount }),
      ...(overrides.radiusMeters !== undefined && { radiusMeters: overrides.radiusMeters }),
      ...(overrides.categories !== undefined && { categories: overrides.categories }),
    },
    'command-line options'
  );
}
