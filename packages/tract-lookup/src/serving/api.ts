/**
 * Tract Lookup HTTP API
 *
 * Thin transport over TractLookupService:
 * - GET  /v1/healthz              liveness
 * - GET  /v1/readyz               readiness + configured source paths
 * - GET  /v1/health               query counters, error windows, uptime
 * - POST /v1/reload               rebuild and publish the catalog
 * - GET  /v1/score?lat=&lon=      single point
 * - POST /v1/score_bulk           { points: [[lat, lon], ...] }
 * - GET  /v1/metrics              Prometheus text
 *
 * Paths without a version prefix are served as the current version.
 * Responses use the APIResponse envelope; request parameters are validated
 * with Zod.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { InvalidPointError, NotReadyError, errorMessage, isLookupError } from '../core/errors.js';
import type { QueryPoint } from '../core/types.js';
import { logger } from '../core/utils/logger.js';
import { HealthMonitor } from './health.js';
import type { TractLookupService } from './lookup-service.js';
import type { APIResponse, BulkItem, ErrorCode, LocateOutcome, ScoreResponse } from './types.js';

/**
 * The service operations the transport depends on
 */
export type LookupBackend = Pick<TractLookupService, 'load' | 'locate' | 'locateMany' | 'status'>;

export interface APIOptions {
  readonly port?: number;
  readonly host?: string;
  readonly corsOrigins?: readonly string[];
  readonly version?: string;
  /** Maximum request body size in bytes */
  readonly maxBodyBytes?: number;
  /** Maximum points per bulk request */
  readonly maxBulkPoints?: number;
}

/**
 * Request validation schemas (Zod)
 */
const coordinateParam = z.string().trim().min(1).pipe(z.coerce.number().finite());

const scoreQuerySchema = z.object({
  lat: coordinateParam,
  lon: coordinateParam,
});

const pointTupleSchema = z.tuple([z.number().finite(), z.number().finite()]);

class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: ErrorCode,
    message: string
  ) {
    super(message);
  }
}

export class TractLookupAPI {
  private readonly server: Server;
  private readonly port: number;
  private readonly host: string;
  private readonly corsOrigins: readonly string[];
  private readonly version: string;
  private readonly maxBodyBytes: number;
  private readonly bulkSchema: z.ZodType<{ points: unknown[] }>;

  constructor(
    private readonly service: LookupBackend,
    options: APIOptions = {},
    private readonly healthMonitor: HealthMonitor = new HealthMonitor()
  ) {
    this.port = options.port ?? 10000;
    this.host = options.host ?? '0.0.0.0';
    this.corsOrigins = options.corsOrigins ?? ['*'];
    this.version = options.version ?? 'v1';
    this.maxBodyBytes = options.maxBodyBytes ?? 5 * 1024 * 1024;
    this.bulkSchema = z.object({
      points: z.array(z.unknown()).max(options.maxBulkPoints ?? 10_000),
    });

    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        logger.error('Unhandled API error', { error: errorMessage(error) });
      });
    });
  }

  /**
   * Start HTTP server
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        logger.info('Tract lookup API server started', {
          version: this.version,
          url: `http://${this.host}:${this.port}`,
        });
        resolve();
      });
    });
  }

  /**
   * Stop HTTP server
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('API server stopped');
        resolve();
      });
    });
  }

  /**
   * Handle one HTTP request
   */
  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestId = `req_${randomBytes(8).toString('hex')}`;
    const startTime = performance.now();
    const elapsed = (): number => performance.now() - startTime;

    this.setHeaders(res, requestId);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const versionMatch = url.pathname.match(/^\/(v\d+)(?=\/|$)/);
    const requestedVersion = versionMatch ? versionMatch[1] : this.version;
    const route = versionMatch ? url.pathname.slice(versionMatch[0].length) || '/' : url.pathname;

    try {
      if (requestedVersion !== this.version) {
        throw new HttpError(
          400,
          'UNSUPPORTED_VERSION',
          `API version ${requestedVersion} not supported. Current version: ${this.version}`
        );
      }

      const key = `${req.method ?? 'GET'} ${route}`;
      switch (key) {
        case 'GET /healthz':
          this.sendSuccess(res, { ok: true }, requestId, elapsed());
          return;
        case 'GET /readyz':
          this.sendSuccess(res, this.service.status(), requestId, elapsed());
          return;
        case 'GET /health':
          this.sendSuccess(res, this.healthMonitor.getMetrics(this.service.status()), requestId, elapsed());
          return;
        case 'POST /reload':
          await this.handleReload(res, requestId, elapsed);
          return;
        case 'GET /score':
          this.handleScore(url, res, requestId, elapsed);
          return;
        case 'POST /score_bulk':
          await this.handleBulk(req, res, requestId, elapsed);
          return;
        case 'GET /metrics':
          res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
          res.end(this.healthMonitor.exportPrometheus(this.service.status()));
          return;
        default:
          throw new HttpError(404, 'NOT_FOUND', `Endpoint not found: ${req.method} ${url.pathname}`);
      }
    } catch (error) {
      if (error instanceof HttpError) {
        this.sendError(res, error.status, error.code, error.message, requestId, elapsed());
        return;
      }
      logger.child({ requestId }).error('API request error', {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      this.sendError(res, 500, 'INTERNAL_ERROR', 'Internal server error', requestId, elapsed());
    }
  }

  private async handleReload(
    res: ServerResponse,
    requestId: string,
    elapsed: () => number
  ): Promise<void> {
    try {
      const summary = await this.service.load();
      this.sendSuccess(res, { ok: true, catalog: summary }, requestId, elapsed());
    } catch (error) {
      this.healthMonitor.recordError(`reload: ${errorMessage(error)}`);
      this.sendError(res, 500, 'RELOAD_FAILED', errorMessage(error), requestId, elapsed(), {
        name: error instanceof Error ? error.name : 'Error',
        code: isLookupError(error) ? error.code : undefined,
      });
    }
  }

  private handleScore(
    url: URL,
    res: ServerResponse,
    requestId: string,
    elapsed: () => number
  ): void {
    const validation = scoreQuerySchema.safeParse(Object.fromEntries(url.searchParams.entries()));
    if (!validation.success) {
      this.sendError(
        res,
        400,
        'INVALID_PARAMETERS',
        'Invalid request parameters',
        requestId,
        elapsed(),
        validation.error.flatten()
      );
      return;
    }

    const { lat, lon } = validation.data;
    const queryStart = performance.now();

    let result: ReturnType<LookupBackend['locate']>;
    try {
      result = this.service.locate(lat, lon);
    } catch (error) {
      this.healthMonitor.recordError(errorMessage(error), lat, lon);
      if (error instanceof NotReadyError) {
        this.sendError(res, 503, 'NOT_READY', error.message, requestId, elapsed());
      } else if (error instanceof InvalidPointError) {
        this.sendError(res, 400, 'INVALID_PARAMETERS', error.message, requestId, elapsed());
      } else {
        throw error;
      }
      return;
    }

    if (result.regionId === null) {
      this.healthMonitor.recordQuery('not_found', performance.now() - queryStart);
      this.sendError(res, 404, 'NOT_IN_REGION', 'Point not inside any tract', requestId, elapsed(), {
        lat,
        lon,
      });
      return;
    }

    this.healthMonitor.recordQuery('resolved', performance.now() - queryStart);
    const body: ScoreResponse = { geoid: result.regionId, score: result.score };
    this.sendSuccess(res, body, requestId, elapsed());
  }

  private async handleBulk(
    req: IncomingMessage,
    res: ServerResponse,
    requestId: string,
    elapsed: () => number
  ): Promise<void> {
    const body = await this.readJsonBody(req);
    const validation = this.bulkSchema.safeParse(body);
    if (!validation.success) {
      this.sendError(
        res,
        400,
        'INVALID_PARAMETERS',
        'Body must be { points: [[lat, lon], ...] }',
        requestId,
        elapsed(),
        validation.error.flatten()
      );
      return;
    }

    // Malformed entries are reported in place; the rest go to the service as one batch
    const entries = validation.data.points.map((entry) => pointTupleSchema.safeParse(entry));
    const valid: QueryPoint[] = [];
    for (const entry of entries) {
      if (entry.success) {
        valid.push({ lat: entry.data[0], lon: entry.data[1] });
      }
    }

    const queryStart = performance.now();
    const outcomes = this.service.locateMany(valid);
    const perPointMs = valid.length > 0 ? (performance.now() - queryStart) / valid.length : 0;

    let next = 0;
    const items = entries.map((entry): BulkItem => {
      if (!entry.success) {
        this.healthMonitor.recordError('invalid_point');
        return { lat: null, lon: null, geoid: null, score: null, ok: false, error: 'invalid_point' };
      }
      const outcome = outcomes[next++];
      this.recordOutcome(outcome, perPointMs);
      return toBulkItem(outcome);
    });

    this.sendSuccess(res, items, requestId, elapsed());
  }

  private recordOutcome(outcome: LocateOutcome, latencyMs: number): void {
    switch (outcome.status) {
      case 'resolved':
        this.healthMonitor.recordQuery('resolved', latencyMs);
        break;
      case 'not_found':
        this.healthMonitor.recordQuery('not_found', latencyMs);
        break;
      case 'error':
        this.healthMonitor.recordError(outcome.reason, outcome.lat, outcome.lon);
        break;
    }
  }

  private async readJsonBody(req: IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    let size = 0;

    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > this.maxBodyBytes) {
        throw new HttpError(400, 'INVALID_PARAMETERS', `Request body exceeds ${this.maxBodyBytes} bytes`);
      }
      chunks.push(buffer);
    }

    const text = Buffer.concat(chunks).toString('utf-8');
    if (text.trim() === '') {
      throw new HttpError(400, 'INVALID_PARAMETERS', 'Request body is empty');
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new HttpError(400, 'INVALID_PARAMETERS', 'Request body is not valid JSON');
    }
  }

  private setHeaders(res: ServerResponse, requestId: string): void {
    const origin = this.corsOrigins.includes('*') ? '*' : this.corsOrigins[0] ?? '';
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Access-Control-Expose-Headers', 'X-Request-ID');
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Cache-Control', 'no-store');
    res.setHeader('X-Request-ID', requestId);
    res.setHeader('X-API-Version', this.version);
  }

  private sendSuccess<T>(res: ServerResponse, data: T, requestId: string, latencyMs: number): void {
    const response: APIResponse<T> = {
      success: true,
      data,
      meta: this.meta(requestId, latencyMs),
    };

    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response, null, 2));
  }

  private sendError(
    res: ServerResponse,
    status: number,
    code: ErrorCode,
    message: string,
    requestId: string,
    latencyMs: number,
    details?: unknown
  ): void {
    const response: APIResponse<never> = {
      success: false,
      error: { code, message, details },
      meta: this.meta(requestId, latencyMs),
    };

    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response, null, 2));
  }

  private meta(requestId: string, latencyMs: number): APIResponse<never>['meta'] {
    return {
      requestId,
      latencyMs: Math.round(latencyMs * 100) / 100,
      version: this.version,
    };
  }
}

function toBulkItem(outcome: LocateOutcome): BulkItem {
  switch (outcome.status) {
    case 'resolved':
      return {
        lat: outcome.lat,
        lon: outcome.lon,
        geoid: outcome.regionId,
        score: outcome.score,
        ok: true,
        error: null,
      };
    case 'not_found':
      return {
        lat: outcome.lat,
        lon: outcome.lon,
        geoid: null,
        score: null,
        ok: false,
        error: 'not_in_region',
      };
    case 'error':
      return {
        lat: outcome.lat,
        lon: outcome.lon,
        geoid: null,
        score: null,
        ok: false,
        error: outcome.reason,
      };
  }
}
