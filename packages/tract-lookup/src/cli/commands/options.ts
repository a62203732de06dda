/**
 * Options shared by every command that builds a catalog
 */

import { configFromEnv, createConfig, type LookupConfig } from '../../core/config.js';

export interface SourceOptions {
  readonly geoms?: string;
  readonly scores?: string;
  readonly table?: string;
  readonly validateTopology?: boolean;
}

export interface ServerOptions {
  readonly port?: number;
  readonly host?: string;
}

/**
 * Command-line options over environment over defaults
 */
export function resolveConfig(
  options: SourceOptions & ServerOptions,
  env: NodeJS.ProcessEnv = process.env
): LookupConfig {
  return createConfig(
    {
      sources: {
        geometryPath: options.geoms,
        scoresPath: options.scores,
        table: options.table,
      },
      containment: {
        validateTopology: options.validateTopology,
      },
      server: {
        port: options.port,
        host: options.host,
      },
    },
    configFromEnv(env)
  );
}
