/**
 * Serving Layer - Type Definitions
 */

import type { Score } from '../core/types.js';

export type LookupState = 'uninitialized' | 'loading' | 'ready' | 'failed';

/**
 * Single-point lookup result; both fields null outside every region
 */
export interface LocateResult {
  readonly regionId: string | null;
  readonly score: Score;
}

/**
 * Per-point batch outcome
 */
export type LocateOutcome =
  | {
      readonly status: 'resolved';
      readonly lat: number;
      readonly lon: number;
      readonly regionId: string;
      readonly score: Score;
    }
  | {
      readonly status: 'not_found';
      readonly lat: number;
      readonly lon: number;
    }
  | {
      readonly status: 'error';
      readonly lat: number;
      readonly lon: number;
      readonly reason: string;
    };

/**
 * Readiness payload
 */
export interface ServiceStatus {
  readonly ready: boolean;
  readonly state: LookupState;
  readonly geometryPath: string;
  readonly scoresPath: string;
  readonly generation: number | null;
  readonly polygonCount: number;
  readonly scoreCount: number;
  readonly loadedAt: string | null;
  readonly lastError: string | null;
}

/**
 * Query/error counters exported by the health monitor
 */
export interface HealthMetrics {
  readonly uptimeSeconds: number;
  readonly queries: QueryMetrics;
  readonly errors: ErrorMetrics;
  readonly catalog: ServiceStatus;
}

export interface QueryMetrics {
  readonly total: number;
  readonly resolved: number;
  readonly notFound: number;
  readonly failed: number;
  readonly latencyP50: number;
  readonly latencyP95: number;
  readonly latencyP99: number;
}

export interface ErrorMetrics {
  readonly last5m: number;
  readonly last1h: number;
  readonly recentErrors: readonly ErrorSample[];
}

export interface ErrorSample {
  readonly timestamp: number;
  readonly error: string;
  readonly lat?: number;
  readonly lon?: number;
}

/**
 * Standardized API response wrapper
 */
export interface APIResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: unknown;
  };
  readonly meta: {
    readonly requestId: string;
    readonly latencyMs: number;
    readonly version: string;
  };
}

export type ErrorCode =
  | 'INVALID_PARAMETERS'
  | 'NOT_IN_REGION'
  | 'NOT_READY'
  | 'RELOAD_FAILED'
  | 'UNSUPPORTED_VERSION'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

/**
 * Score endpoint payload
 */
export interface ScoreResponse {
  readonly geoid: string;
  readonly score: Score;
}

/**
 * Bulk endpoint item
 */
export interface BulkItem {
  readonly lat: number | null;
  readonly lon: number | null;
  readonly geoid: string | null;
  readonly score: Score;
  readonly ok: boolean;
  readonly error: string | null;
}
