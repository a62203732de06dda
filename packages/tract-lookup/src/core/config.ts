/**
 * Tract Lookup Service Configuration
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options (passed to createConfig as overrides)
 * 2. Environment variables (configFromEnv)
 * 3. DEFAULT_CONFIG
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

import { join } from 'node:path';
import { z } from 'zod';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Where the two catalog artifacts live
 */
export interface SourcesConfig {
  /** Polygon table (SQLite database file) */
  readonly geometryPath: string;
  /** Table holding one row per region */
  readonly table: string;
  /** Region identifier column */
  readonly idColumn: string;
  /** WKB geometry column */
  readonly geometryColumn: string;
  /** Score table (JSON object: identifier → number | null) */
  readonly scoresPath: string;
}

export interface ContainmentConfig {
  /**
   * Reject self-intersecting candidates at query time.
   * Costly on large rings; the result is memoized per polygon.
   */
  readonly validateTopology: boolean;
}

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly corsOrigins: readonly string[];
}

export interface LookupConfig {
  readonly sources: SourcesConfig;
  readonly containment: ContainmentConfig;
  readonly server: ServerConfig;
}

const DEFAULT_DATA_DIR = '/data';

export const DEFAULT_CONFIG: LookupConfig = {
  sources: {
    geometryPath: join(DEFAULT_DATA_DIR, 'tracts.sqlite'),
    table: 'tracts',
    idColumn: 'GEOID',
    geometryColumn: 'wkb',
    scoresPath: './tract_lookup.json',
  },
  containment: {
    validateTopology: false,
  },
  server: {
    port: 10000,
    host: '0.0.0.0',
    corsOrigins: ['*'],
  },
};

/**
 * Deep partial type for nested configuration objects
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

/**
 * Create custom configuration by merging with a base (defaults unless given)
 */
export function createConfig(
  overrides: DeepPartial<LookupConfig> = {},
  base: LookupConfig = DEFAULT_CONFIG
): LookupConfig {
  const sources: DeepPartial<SourcesConfig> = overrides.sources ?? {};
  const containment: DeepPartial<ContainmentConfig> = overrides.containment ?? {};
  const server: DeepPartial<ServerConfig> = overrides.server ?? {};

  return {
    sources: {
      geometryPath: sources.geometryPath ?? base.sources.geometryPath,
      table: sources.table ?? base.sources.table,
      idColumn: sources.idColumn ?? base.sources.idColumn,
      geometryColumn: sources.geometryColumn ?? base.sources.geometryColumn,
      scoresPath: sources.scoresPath ?? base.sources.scoresPath,
    },
    containment: {
      validateTopology: containment.validateTopology ?? base.containment.validateTopology,
    },
    server: {
      port: server.port ?? base.server.port,
      host: server.host ?? base.server.host,
      corsOrigins: server.corsOrigins ?? base.server.corsOrigins,
    },
  };
}

// ============================================================================
// Environment
// ============================================================================

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  DATA_DIR: optionalString,
  GEOMS_PATH: optionalString,
  GEOMS_TABLE: optionalString,
  GEOID_COLUMN: optionalString,
  WKB_COLUMN: optionalString,
  SCORES_PATH: optionalString,
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).optional()),
  HOST: optionalString,
  CORS_ORIGINS: optionalString,
  VALIDATE_TOPOLOGY: z.preprocess(
    blankToUndefined,
    z
      .enum(['true', 'false', '1', '0'])
      .transform((v) => v === 'true' || v === '1')
      .optional()
  ),
});

/**
 * Build configuration from environment variables
 *
 * Environment variables:
 * - DATA_DIR (default /data), GEOMS_PATH (default $DATA_DIR/tracts.sqlite)
 * - GEOMS_TABLE, GEOID_COLUMN, WKB_COLUMN
 * - SCORES_PATH (default ./tract_lookup.json)
 * - PORT, HOST, CORS_ORIGINS (comma separated)
 * - VALIDATE_TOPOLOGY (true/false)
 *
 * @throws ZodError when a variable is present but malformed
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): LookupConfig {
  const parsed = envSchema.parse(env);
  const dataDir = parsed.DATA_DIR ?? DEFAULT_DATA_DIR;

  return createConfig({
    sources: {
      geometryPath: parsed.GEOMS_PATH ?? join(dataDir, 'tracts.sqlite'),
      table: parsed.GEOMS_TABLE,
      idColumn: parsed.GEOID_COLUMN,
      geometryColumn: parsed.WKB_COLUMN,
      scoresPath: parsed.SCORES_PATH,
    },
    containment: {
      validateTopology: parsed.VALIDATE_TOPOLOGY,
    },
    server: {
      port: parsed.PORT,
      host: parsed.HOST,
      corsOrigins: parsed.CORS_ORIGINS?.split(',').map((o) => o.trim()).filter((o) => o.length > 0),
    },
  });
}
