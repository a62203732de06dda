#!/usr/bin/env tsx
/**
 * Tract Lookup CLI Entry Point
 *
 * Usage:
 *   tract-lookup serve [--port <n>] [--host <addr>]
 *   tract-lookup locate -- <lat> <lon>
 *   tract-lookup check
 *
 * Artifact locations come from the environment (DATA_DIR, GEOMS_PATH,
 * SCORES_PATH, ...) unless overridden by --geoms / --scores / --table.
 *
 * @module tract-lookup-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { serveCommand } from '../src/cli/commands/serve/index.js';
import { locateCommand } from '../src/cli/commands/locate/index.js';
import { checkCommand } from '../src/cli/commands/check/index.js';
import type { SourceOptions } from '../src/cli/commands/options.js';
import { EXIT_CODES } from '../src/cli/exit-codes.js';
import { errorMessage } from '../src/core/errors.js';
import { logger } from '../src/core/utils/logger.js';

// ============================================================================
// CLI Setup
// ============================================================================

const packageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Not a finite number: ${value}`);
  }
  return parsed;
}

function parsePort(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new InvalidArgumentError(`Not a valid port: ${value}`);
  }
  return parsed;
}

function withSourceOptions(command: Command): Command {
  return command
    .option('--geoms <path>', 'SQLite file holding the polygon table')
    .option('--scores <path>', 'JSON file mapping region id to score')
    .option('--table <name>', 'Polygon table name')
    .option('--validate-topology', 'Skip self-intersecting polygons during lookup');
}

interface ServeCliOptions extends SourceOptions {
  readonly port?: number;
  readonly host?: string;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('tract-lookup')
    .description('Point-in-tract score lookup')
    .version(getVersion());

  withSourceOptions(
    program
      .command('serve')
      .description('Start the HTTP API')
      .option('-p, --port <n>', 'Listen port', parsePort)
      .option('--host <addr>', 'Bind address')
  ).action(async (options: ServeCliOptions) => {
    await serveCommand(options);
  });

  withSourceOptions(
    program
      .command('locate')
      .description('Resolve one point to its region and score')
      .argument('<lat>', 'Latitude (y)', parseNumber)
      .argument('<lon>', 'Longitude (x)', parseNumber)
  ).action(async (lat: number, lon: number, options: SourceOptions) => {
    const exitCode = await locateCommand(lat, lon, options);
    if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
  });

  withSourceOptions(
    program
      .command('check')
      .description('Build the catalog from the configured files and report on it')
  ).action(async (options: SourceOptions) => {
    const exitCode = await checkCommand(options);
    if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
  });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.error('Command failed', { error: errorMessage(error) });
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
