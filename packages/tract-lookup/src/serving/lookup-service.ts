/**
 * Tract Lookup Service
 *
 * Owns the active RegionCatalog and the reload protocol.
 *
 * SNAPSHOT + ATOMIC PUBLISH:
 * - Lookups capture `this.active` once and run synchronously against it.
 * - load() builds a new catalog off to the side and publishes it with one
 *   assignment. A failed load leaves the previous catalog serving.
 *
 * Lifecycle:
 *   uninitialized → loading → ready
 *   ready → loading → ready            (reload)
 *   loading → failed                   (previous catalog, if any, keeps serving)
 *   failed → loading                   (retry)
 */

import type { SourcesConfig } from '../core/config.js';
import {
  InvalidPointError,
  MissingFileError,
  NotReadyError,
  SchemaError,
  errorMessage,
} from '../core/errors.js';
import { isFinitePoint, toPosition, type QueryPoint, type Score } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { artifactsExist, readPolygonTable, readScoreTable } from '../services/catalog-sources.js';
import { ContainmentResolver, type ContainmentResolverOptions } from '../services/containment-resolver.js';
import { buildCatalog, type CatalogSummary, type RegionCatalog } from '../services/region-catalog.js';
import type { LocateOutcome, LocateResult, LookupState, ServiceStatus } from './types.js';

const log = createLogger({ module: 'lookup-service' });

export interface LookupServiceOptions {
  readonly sources: SourcesConfig;
  readonly containment?: ContainmentResolverOptions;
}

export class TractLookupService {
  private active: RegionCatalog | null = null;
  private state: LookupState = 'uninitialized';
  private inFlight: Promise<CatalogSummary> | null = null;
  private generation = 0;
  private lastError: string | null = null;
  private readonly resolver: ContainmentResolver;
  private readonly sources: SourcesConfig;

  constructor(options: LookupServiceOptions) {
    this.sources = options.sources;
    this.resolver = new ContainmentResolver(options.containment);
  }

  // ==========================================================================
  // Reload
  // ==========================================================================

  /**
   * Read both artifacts, build a new catalog and publish it
   *
   * Calls made while a load is in flight join that load.
   *
   * @throws MissingFileError / SchemaError / DecodeError / UnsupportedGeometryError
   */
  load(): Promise<CatalogSummary> {
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.runLoad().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async runLoad(): Promise<CatalogSummary> {
    this.state = 'loading';
    const startTime = performance.now();
    const { geometryPath, scoresPath } = this.sources;
    const loadLog = log.child({ generation: this.generation + 1 });

    try {
      const records = readPolygonTable({
        path: geometryPath,
        table: this.sources.table,
        idColumn: this.sources.idColumn,
        geometryColumn: this.sources.geometryColumn,
      });
      const scores = await readScoreTable(scoresPath);

      if (scores.size === 0) {
        throw new SchemaError(`Scores file ${scoresPath} has no entries`, 'scores');
      }

      const catalog = buildCatalog(records, scores, {
        generation: this.generation + 1,
        geometryPath,
        scoresPath,
        loadedAt: new Date(),
      });

      // Publish
      this.generation = catalog.metadata.generation;
      this.active = catalog;
      this.state = 'ready';
      this.lastError = null;

      const summary = catalog.summary();
      loadLog.info('Catalog published', {
        ...summary,
        durationMs: Math.round(performance.now() - startTime),
      });
      return summary;
    } catch (error) {
      this.state = 'failed';
      this.lastError = errorMessage(error);
      loadLog.error('Catalog load failed', {
        error: this.lastError,
        geometryPath,
        scoresPath,
        servingGeneration: this.active?.metadata.generation ?? null,
      });
      throw error;
    }
  }

  /**
   * Best-effort startup load; never throws
   *
   * Missing artifacts leave the service uninitialized so load() can be
   * retried once they appear.
   */
  async tryInitialLoad(): Promise<boolean> {
    const { geometryPath, scoresPath } = this.sources;
    const exists = artifactsExist(geometryPath, scoresPath);

    if (!exists.geometry || !exists.scores) {
      log.info('Waiting for files', {
        geometry: exists.geometry,
        scores: exists.scores,
        geometryPath,
        scoresPath,
      });
      return false;
    }

    try {
      await this.load();
      return true;
    } catch (error) {
      log.warn('Deferred load due to error', {
        error: errorMessage(error),
        missingFile: error instanceof MissingFileError,
      });
      return false;
    }
  }

  // ==========================================================================
  // Readiness
  // ==========================================================================

  isReady(): boolean {
    return this.active !== null && this.active.isReady();
  }

  status(): ServiceStatus {
    const catalog = this.active;
    return {
      ready: this.isReady(),
      state: this.state,
      geometryPath: this.sources.geometryPath,
      scoresPath: this.sources.scoresPath,
      generation: catalog?.metadata.generation ?? null,
      polygonCount: catalog?.polygonCount ?? 0,
      scoreCount: catalog?.scoreCount ?? 0,
      loadedAt: catalog?.metadata.loadedAt.toISOString() ?? null,
      lastError: this.lastError,
    };
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Region identifier and score for a point; both null outside every region
   *
   * @throws NotReadyError before the first successful load
   * @throws InvalidPointError for non-finite coordinates
   */
  locate(lat: number, lon: number): LocateResult {
    const catalog = this.requireCatalog();
    return this.locateIn(catalog, { lat, lon });
  }

  /**
   * Locate a batch against a single catalog snapshot
   *
   * Never throws: every point reports its own outcome.
   */
  locateMany(points: readonly QueryPoint[]): LocateOutcome[] {
    let catalog: RegionCatalog;
    try {
      catalog = this.requireCatalog();
    } catch (error) {
      const reason = errorMessage(error);
      return points.map((point): LocateOutcome => ({
        status: 'error',
        lat: point.lat,
        lon: point.lon,
        reason,
      }));
    }

    return points.map((point): LocateOutcome => {
      try {
        const { regionId, score } = this.locateIn(catalog, point);
        if (regionId === null) {
          return { status: 'not_found', lat: point.lat, lon: point.lon };
        }
        return { status: 'resolved', lat: point.lat, lon: point.lon, regionId, score };
      } catch (error) {
        return {
          status: 'error',
          lat: point.lat,
          lon: point.lon,
          reason: error instanceof InvalidPointError ? error.message : `error:${errorMessage(error)}`,
        };
      }
    });
  }

  /**
   * Score for a region identifier in the active catalog
   *
   * @throws NotReadyError before the first successful load
   */
  scoreFor(regionId: string): Score {
    return this.requireCatalog().lookup(regionId);
  }

  private requireCatalog(): RegionCatalog {
    const catalog = this.active;
    if (catalog === null || !catalog.isReady()) {
      throw new NotReadyError();
    }
    return catalog;
  }

  private locateIn(catalog: RegionCatalog, point: QueryPoint): LocateResult {
    if (!isFinitePoint(point)) {
      throw new InvalidPointError(point.lat, point.lon);
    }

    const match = catalog.locate(toPosition(point), this.resolver);
    if (match === null) {
      return { regionId: null, score: null };
    }
    return { regionId: match.regionId, score: match.score };
  }
}
