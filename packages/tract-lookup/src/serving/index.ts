/**
 * Tract Lookup Serving Layer
 *
 * @example
 * ```typescript
 * import { createTractLookupAPI } from '@tract-score/tract-lookup/serving';
 *
 * const { api, service } = createTractLookupAPI(configFromEnv());
 * await service.tryInitialLoad();
 * await api.start();
 * ```
 */

import type { LookupConfig } from '../core/config.js';
import { TractLookupAPI } from './api.js';
import { TractLookupService } from './lookup-service.js';

export { TractLookupService } from './lookup-service.js';
export type { LookupServiceOptions } from './lookup-service.js';
export { TractLookupAPI } from './api.js';
export type { APIOptions, LookupBackend } from './api.js';
export { HealthMonitor } from './health.js';

export type {
  LookupState,
  LocateResult,
  LocateOutcome,
  ServiceStatus,
  HealthMetrics,
  QueryMetrics,
  ErrorMetrics,
  ErrorSample,
  APIResponse,
  ErrorCode,
  ScoreResponse,
  BulkItem,
} from './types.js';

/**
 * Wire a lookup service and its HTTP API from configuration
 */
export function createTractLookupAPI(config: LookupConfig): {
  readonly api: TractLookupAPI;
  readonly service: TractLookupService;
} {
  const service = new TractLookupService({
    sources: config.sources,
    containment: config.containment,
  });

  const api = new TractLookupAPI(service, {
    port: config.server.port,
    host: config.server.host,
    corsOrigins: config.server.corsOrigins,
  });

  return { api, service };
}
