/**
 * Containment Resolver (narrow phase)
 *
 * Exact boundary-inclusive point-in-polygon test over broad-phase candidates.
 *
 * POLICY:
 * - A point on an edge or vertex is contained (holes: boundary is contained,
 *   interior is not). Boundary points resolve to some region, never none.
 * - Candidates are tested in the order given; the first that covers the
 *   point wins, including when source polygons overlap.
 * - A candidate whose geometry cannot be evaluated is skipped and the scan
 *   continues. This is the only error the lookup path swallows.
 */

import * as turf from '@turf/turf';
import type { Feature, MultiPolygon, Polygon, Position } from 'geojson';
import { GeometryEvaluationError, errorMessage } from '../core/errors.js';
import { forEachRing, isPositionInBBox } from '../core/geo-utils.js';
import type { AreaGeometry, RegionPolygon } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'containment' });

export interface ContainmentResolverOptions {
  /** Reject self-intersecting rings (turf kinks) */
  readonly validateTopology?: boolean;
}

export class ContainmentResolver {
  private readonly validateTopology: boolean;
  /** Evaluation issues per geometry object; empty array = evaluable */
  private readonly evaluated = new WeakMap<AreaGeometry, readonly string[]>();

  constructor(options: ContainmentResolverOptions = {}) {
    this.validateTopology = options.validateTopology ?? false;
  }

  /**
   * Index into `candidates` of the first polygon covering `point`, or null
   */
  resolve(point: Position, candidates: readonly RegionPolygon[]): number | null {
    for (let i = 0; i < candidates.length; i++) {
      try {
        if (this.covers(candidates[i], point)) {
          return i;
        }
      } catch (error) {
        log.debug('Skipping candidate that cannot be evaluated', {
          candidate: i,
          point,
          error: errorMessage(error),
        });
      }
    }
    return null;
  }

  /**
   * Boundary-inclusive containment test
   *
   * @throws GeometryEvaluationError when the polygon cannot be evaluated
   */
  covers(polygon: RegionPolygon, point: Position): boolean {
    if (polygon.bbox === null || !isPositionInBBox(point, polygon.bbox)) {
      return false;
    }

    const issues = this.evaluate(polygon.geometry);
    if (issues.length > 0) {
      throw new GeometryEvaluationError(issues);
    }

    return turf.booleanPointInPolygon(point, polygon.geometry, { ignoreBoundary: false });
  }

  private evaluate(geometry: AreaGeometry): readonly string[] {
    const cached = this.evaluated.get(geometry);
    if (cached) {
      return cached;
    }

    const issues = collectIssues(geometry, this.validateTopology);
    this.evaluated.set(geometry, issues);
    return issues;
  }
}

function collectIssues(geometry: AreaGeometry, validateTopology: boolean): string[] {
  const issues: string[] = [];

  forEachRing(geometry, (ring) => {
    if (ring.some(([x, y]) => !Number.isFinite(x) || !Number.isFinite(y))) {
      issues.push('ring has non-finite coordinates');
    }
  });

  if (issues.length === 0 && validateTopology) {
    try {
      const feature: Feature<Polygon | MultiPolygon> = {
        type: 'Feature',
        geometry,
        properties: {},
      };
      const kinks = turf.kinks(feature);
      if (kinks.features.length > 0) {
        issues.push(`ring self-intersects at ${kinks.features.length} point(s)`);
      }
    } catch (error) {
      issues.push(`topology check failed: ${errorMessage(error)}`);
    }
  }

  return issues;
}
