/**
 * Region Catalog
 *
 * Immutable, queryable snapshot of one load generation: polygons, the region
 * identifier of each polygon (aligned by position), the score table and the
 * spatial index built over exactly those polygons.
 *
 * A catalog is built wholesale or not at all. Any bad record aborts the build,
 * so a half-built catalog can never be published.
 */

import type { Position } from 'geojson';
import { DecodeError, UnsupportedGeometryError } from '../core/errors.js';
import type { PolygonRecord, RegionPolygon, Score, ScoreTable } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { ContainmentResolver } from './containment-resolver.js';
import { SpatialIndex } from './spatial-index.js';
import { decodeRegionPolygon } from './wkb-decoder.js';

const log = createLogger({ module: 'catalog' });

/**
 * Where a catalog came from
 */
export interface CatalogMetadata {
  readonly generation: number;
  readonly geometryPath: string;
  readonly scoresPath: string;
  readonly loadedAt: Date;
}

/**
 * Resolved region for a query point
 */
export interface CatalogMatch {
  /** Position of the polygon in the catalog */
  readonly index: number;
  readonly regionId: string;
  readonly score: Score;
}

export interface CatalogSummary {
  readonly generation: number;
  readonly polygonCount: number;
  readonly scoreCount: number;
  readonly indexedCount: number;
  readonly geometryPath: string;
  readonly scoresPath: string;
  readonly loadedAt: string;
}

export class RegionCatalog {
  private constructor(
    readonly polygons: readonly RegionPolygon[],
    readonly regionIdByIndex: readonly string[],
    private readonly scores: ScoreTable,
    readonly index: SpatialIndex,
    readonly metadata: CatalogMetadata
  ) {}

  /**
   * Assemble a catalog from already-decoded parts
   *
   * @throws Error if polygons and identifiers are not aligned
   */
  static fromParts(
    polygons: readonly RegionPolygon[],
    regionIdByIndex: readonly string[],
    scores: ScoreTable,
    metadata: CatalogMetadata
  ): RegionCatalog {
    if (polygons.length !== regionIdByIndex.length) {
      throw new Error(
        `Catalog misaligned: ${polygons.length} polygons, ${regionIdByIndex.length} identifiers`
      );
    }

    return new RegionCatalog(
      Object.freeze([...polygons]),
      Object.freeze([...regionIdByIndex]),
      new Map(scores),
      SpatialIndex.build(polygons),
      metadata
    );
  }

  /**
   * Score for a region identifier; null when the identifier is not scored
   */
  lookup(regionId: string): Score {
    return this.scores.get(regionId) ?? null;
  }

  /**
   * True when the score table is non-empty
   */
  isReady(): boolean {
    return this.scores.size > 0;
  }

  /**
   * Resolve a planar position to the first covering polygon
   */
  locate(position: Position, resolver: ContainmentResolver): CatalogMatch | null {
    const candidateIndices = this.index.query(position);
    if (candidateIndices.length === 0) {
      return null;
    }

    const hit = resolver.resolve(
      position,
      candidateIndices.map((i) => this.polygons[i])
    );
    if (hit === null) {
      return null;
    }

    const index = candidateIndices[hit];
    const regionId = this.regionIdByIndex[index];
    return { index, regionId, score: this.lookup(regionId) };
  }

  get polygonCount(): number {
    return this.polygons.length;
  }

  get scoreCount(): number {
    return this.scores.size;
  }

  summary(): CatalogSummary {
    return {
      generation: this.metadata.generation,
      polygonCount: this.polygonCount,
      scoreCount: this.scoreCount,
      indexedCount: this.index.size,
      geometryPath: this.metadata.geometryPath,
      scoresPath: this.metadata.scoresPath,
      loadedAt: this.metadata.loadedAt.toISOString(),
    };
  }
}

/**
 * Decode every record and build a catalog
 *
 * @throws DecodeError / UnsupportedGeometryError annotated with the row of the first bad record
 */
export function buildCatalog(
  records: readonly PolygonRecord[],
  scores: ScoreTable,
  metadata: CatalogMetadata
): RegionCatalog {
  const polygons: RegionPolygon[] = [];
  const regionIds: string[] = [];
  const seen = new Set<string>();
  let duplicates = 0;

  records.forEach((record, row) => {
    try {
      polygons.push(decodeRegionPolygon(record.geometry));
    } catch (error) {
      if (error instanceof DecodeError || error instanceof UnsupportedGeometryError) {
        throw error.withRecord({ row, regionId: record.regionId });
      }
      throw error;
    }

    if (seen.has(record.regionId)) {
      duplicates++;
    }
    seen.add(record.regionId);
    regionIds.push(record.regionId);
  });

  if (duplicates > 0) {
    log.warn('Duplicate region identifiers in polygon table', {
      duplicates,
      geometryPath: metadata.geometryPath,
    });
  }

  const unscored = regionIds.filter((id) => !scores.has(id)).length;
  if (unscored > 0) {
    log.debug('Regions without a score', { unscored });
  }

  return RegionCatalog.fromParts(polygons, regionIds, scores, metadata);
}
