/**
 * Serve Command
 *
 * Start the HTTP API. The initial catalog load is best-effort: with missing
 * artifacts the server still comes up, not ready, and POST /v1/reload can be
 * retried once the files appear.
 */

import { createTractLookupAPI, type TractLookupAPI } from '../../../serving/index.js';
import { logger } from '../../../core/utils/logger.js';
import { resolveConfig, type ServerOptions, type SourceOptions } from '../options.js';

export type ServeOptions = SourceOptions & ServerOptions;

export async function serveCommand(options: ServeOptions): Promise<TractLookupAPI> {
  const config = resolveConfig(options);

  logger.info('Starting tract lookup API server...', {
    port: config.server.port,
    host: config.server.host,
    geometryPath: config.sources.geometryPath,
    scoresPath: config.sources.scoresPath,
  });

  const { api, service } = createTractLookupAPI(config);

  const loaded = await service.tryInitialLoad();
  if (!loaded) {
    logger.warn('Serving without a catalog; POST /v1/reload once the files are in place');
  }

  await api.start();

  const shutdown = (): void => {
    logger.info('Received shutdown signal, stopping server...');
    api
      .stop()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Shutdown failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  return api;
}
