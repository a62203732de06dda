/**
 * Geometry utilities shared by the decoder, index and resolver.
 */

import type { Position } from 'geojson';
import type { AreaGeometry, BBox, RegionPolygon } from './types.js';

/**
 * Iterate every ring of a Polygon or MultiPolygon
 */
export function forEachRing(
  geometry: AreaGeometry,
  visit: (ring: Position[]) => void
): void {
  if (geometry.type === 'Polygon') {
    for (const ring of geometry.coordinates) {
      visit(ring);
    }
  } else {
    for (const polygon of geometry.coordinates) {
      for (const ring of polygon) {
        visit(ring);
      }
    }
  }
}

/**
 * Extract bounding box from Polygon or MultiPolygon geometry
 *
 * Non-finite ordinates are skipped: R-tree node extents must stay finite.
 * The resolver rejects such geometry at query time.
 *
 * @returns [minLon, minLat, maxLon, maxLat], or null when the geometry has no finite positions
 */
export function extractBBox(geometry: AreaGeometry): BBox | null {
  let minLon = Infinity;
  let minLat = Infinity;
  let maxLon = -Infinity;
  let maxLat = -Infinity;
  let seen = 0;

  forEachRing(geometry, (ring) => {
    for (const [lon, lat] of ring) {
      if (!Number.isFinite(lon) || !Number.isFinite(lat)) {
        continue;
      }
      minLon = Math.min(minLon, lon);
      minLat = Math.min(minLat, lat);
      maxLon = Math.max(maxLon, lon);
      maxLat = Math.max(maxLat, lat);
      seen++;
    }
  });

  if (seen === 0) {
    return null;
  }

  return [minLon, minLat, maxLon, maxLat] as const;
}

/**
 * Point-in-bbox test (boundary-inclusive)
 */
export function isPositionInBBox(position: Position, bbox: BBox): boolean {
  const [x, y] = position;
  return x >= bbox[0] && x <= bbox[2] && y >= bbox[1] && y <= bbox[3];
}

/**
 * Wrap a decoded geometry with its bounding box
 */
export function toRegionPolygon(geometry: AreaGeometry): RegionPolygon {
  return Object.freeze({ geometry, bbox: extractBBox(geometry) });
}
