/**
 * Core Types
 *
 * Geometry is held as GeoJSON (planar, [x, y] = [lon, lat]).
 */

import type { Polygon, MultiPolygon, Position } from 'geojson';

export type { Position };

/**
 * Areal geometry a point can be located in
 */
export type AreaGeometry = Polygon | MultiPolygon;

/**
 * Bounding box: [minX, minY, maxX, maxY]
 */
export type BBox = readonly [number, number, number, number];

/**
 * Decoded polygon with its precomputed bounding box
 *
 * `bbox` is null for an empty geometry, which can never contain a point.
 */
export interface RegionPolygon {
  readonly geometry: AreaGeometry;
  readonly bbox: BBox | null;
}

/**
 * Precomputed score; null when unknown
 */
export type Score = number | null;

/**
 * Query point in caller order
 */
export interface QueryPoint {
  readonly lat: number;
  readonly lon: number;
}

/**
 * Raw polygon table row
 */
export interface PolygonRecord {
  readonly regionId: string;
  readonly geometry: Uint8Array | string;
}

/**
 * Region identifier → score
 */
export type ScoreTable = ReadonlyMap<string, Score>;

/**
 * Planar position for a query point. Longitude first: this ordering is fixed.
 */
export function toPosition(point: QueryPoint): Position {
  return [point.lon, point.lat];
}

export function isFinitePoint(point: QueryPoint): boolean {
  return Number.isFinite(point.lat) && Number.isFinite(point.lon);
}
