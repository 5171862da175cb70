/**
 * Time Atlas Configuration
 *
 * Read from the environment once at startup. Every value has a default, so an
 * empty environment yields a working service over the bundled datasets.
 *
 * Environment variables:
 * - TIME_ATLAS_PATCH_FILE
 * - TIME_ATLAS_BOUNDARY_FILE, TIME_ATLAS_BOUNDARY_VERSION
 * - TIME_ATLAS_SETTLEMENT_FILE, TIME_ATLAS_SETTLEMENT_VERSION
 * - TIME_ATLAS_CACHE_SIZE (0 disables the cache)
 * - TIME_ATLAS_CACHE_PRECISION (decimal places, 0-6)
 * - TIME_ATLAS_FALLBACK_MAX_KM
 * - TIME_ATLAS_FOLD_POLICIES (`profile=policy,...`)
 * - LOG_LEVEL
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { InputInvalidError, formatIssues } from './errors.js';
import type { LogLevel } from './utils/logger.js';
import {
  parseFoldPolicyOverrides,
  type FoldPolicyOverrides,
} from '../resolution/parity-profiles.js';

const BUNDLED_DATA_DIR = new URL('../../data/', import.meta.url);

export const BUNDLED_DATASET_VERSION = 'bundled-2024a';

export const DEFAULT_PATCH_FILE = fileURLToPath(new URL('patches.json', BUNDLED_DATA_DIR));
export const DEFAULT_BOUNDARY_FILE = fileURLToPath(
  new URL('zone-boundaries.geojson', BUNDLED_DATA_DIR)
);
export const DEFAULT_SETTLEMENT_FILE = fileURLToPath(new URL('settlements.json', BUNDLED_DATA_DIR));

export interface TimeAtlasConfig {
  readonly patchFile: string;
  readonly boundaryFile: string;
  readonly boundaryVersion: string;
  readonly settlementFile: string;
  readonly settlementVersion: string;
  readonly cache: {
    readonly capacity: number;
    readonly precision: number;
  };
  readonly fallbackMaxDistanceKm: number;
  readonly foldPolicies: FoldPolicyOverrides;
  readonly logLevel: LogLevel;
}

const envSchema = z.object({
  TIME_ATLAS_PATCH_FILE: z.string().min(1).default(DEFAULT_PATCH_FILE),
  TIME_ATLAS_BOUNDARY_FILE: z.string().min(1).default(DEFAULT_BOUNDARY_FILE),
  TIME_ATLAS_BOUNDARY_VERSION: z.string().min(1).default(BUNDLED_DATASET_VERSION),
  TIME_ATLAS_SETTLEMENT_FILE: z.string().min(1).default(DEFAULT_SETTLEMENT_FILE),
  TIME_ATLAS_SETTLEMENT_VERSION: z.string().min(1).default(BUNDLED_DATASET_VERSION),
  TIME_ATLAS_CACHE_SIZE: z.coerce.number().int().min(0).default(1024),
  TIME_ATLAS_CACHE_PRECISION: z.coerce.number().int().min(0).max(6).default(3),
  TIME_ATLAS_FALLBACK_MAX_KM: z.coerce.number().positive().default(100),
  TIME_ATLAS_FOLD_POLICIES: z.string().default(''),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Build configuration from an environment map.
 *
 * Empty strings count as unset.
 *
 * @throws InputInvalidError naming the offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TimeAtlasConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    const first = parsed.error.issues[0];
    throw new InputInvalidError(
      `invalid configuration: ${issues.join('; ')}`,
      first ? String(first.path[0]) : undefined,
      issues
    );
  }

  const values = parsed.data;
  return {
    patchFile: values.TIME_ATLAS_PATCH_FILE,
    boundaryFile: values.TIME_ATLAS_BOUNDARY_FILE,
    boundaryVersion: values.TIME_ATLAS_BOUNDARY_VERSION,
    settlementFile: values.TIME_ATLAS_SETTLEMENT_FILE,
    settlementVersion: values.TIME_ATLAS_SETTLEMENT_VERSION,
    cache: {
      capacity: values.TIME_ATLAS_CACHE_SIZE,
      precision: values.TIME_ATLAS_CACHE_PRECISION,
    },
    fallbackMaxDistanceKm: values.TIME_ATLAS_FALLBACK_MAX_KM,
    foldPolicies: parseFoldPolicyOverrides(values.TIME_ATLAS_FOLD_POLICIES),
    logLevel: values.LOG_LEVEL,
  };
}
