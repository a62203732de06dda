/**
 * WKB Geometry Decoder
 *
 * Decodes Well-Known Binary into GeoJSON Polygon / MultiPolygon.
 *
 * Accepted encodings:
 * - ISO WKB, both byte orders, with Z (1000), M (2000) and ZM (3000) type offsets
 * - EWKB (PostGIS): high-bit Z/M/SRID flags; the SRID is read and discarded
 * - Hex strings of either of the above
 *
 * Z and M ordinates are dropped. Containment is planar on X/Y.
 *
 * Structural problems (truncation, unknown type codes, short or unclosed
 * rings, trailing bytes) raise DecodeError. Well-formed geometry that cannot
 * enclose a point raises UnsupportedGeometryError.
 */

import type { Polygon, MultiPolygon, Position } from 'geojson';
import { DecodeError, UnsupportedGeometryError } from '../core/errors.js';
import type { AreaGeometry, RegionPolygon } from '../core/types.js';
import { toRegionPolygon } from '../core/geo-utils.js';

const WKB_POLYGON = 3;
const WKB_MULTIPOLYGON = 6;

/**
 * OGC type names by base type code (used in error messages)
 */
const WKB_TYPE_NAMES: Readonly<Record<number, string>> = {
  1: 'Point',
  2: 'LineString',
  3: 'Polygon',
  4: 'MultiPoint',
  5: 'MultiLineString',
  6: 'MultiPolygon',
  7: 'GeometryCollection',
  8: 'CircularString',
  9: 'CompoundCurve',
  10: 'CurvePolygon',
  11: 'MultiCurve',
  12: 'MultiSurface',
  13: 'Curve',
  14: 'Surface',
  15: 'PolyhedralSurface',
  16: 'TIN',
  17: 'Triangle',
};

const EWKB_Z_FLAG = 0x80000000;
const EWKB_M_FLAG = 0x40000000;
const EWKB_SRID_FLAG = 0x20000000;
const EWKB_TYPE_MASK = 0x0fffffff;

/** Minimum positions in a closed ring (triangle + closure) */
const MIN_RING_POSITIONS = 4;

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

interface GeometryHeader {
  readonly littleEndian: boolean;
  readonly kind: number;
  readonly ordinates: number;
}

/**
 * Sequential reader over a WKB buffer
 */
class WkbReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.view.byteLength - this.offset;
  }

  get position(): number {
    return this.offset;
  }

  private ensure(byteCount: number, what: string): void {
    if (byteCount > this.remaining) {
      throw new DecodeError(
        `Truncated WKB: need ${byteCount} bytes for ${what} at offset ${this.offset}, ${this.remaining} left`
      );
    }
  }

  readUint8(what: string): number {
    this.ensure(1, what);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint32(littleEndian: boolean, what: string): number {
    this.ensure(4, what);
    const value = this.view.getUint32(this.offset, littleEndian);
    this.offset += 4;
    return value;
  }

  /**
   * Check that `count` entries of `entryBytes` each fit in the buffer
   * before anything is allocated for them.
   */
  expect(count: number, entryBytes: number, what: string): void {
    this.ensure(count * entryBytes, what);
  }

  readPosition(littleEndian: boolean, ordinates: number): Position {
    this.ensure(ordinates * 8, 'coordinate');
    const x = this.view.getFloat64(this.offset, littleEndian);
    const y = this.view.getFloat64(this.offset + 8, littleEndian);
    this.offset += ordinates * 8;
    return [x, y];
  }
}

/**
 * Decode WKB (bytes or hex string) into Polygon or MultiPolygon geometry
 *
 * @throws DecodeError on malformed input
 * @throws UnsupportedGeometryError for non-areal geometry kinds
 */
export function decodeWkb(input: Uint8Array | string): AreaGeometry {
  const bytes = typeof input === 'string' ? hexToBytes(input) : input;

  if (bytes.byteLength === 0) {
    throw new DecodeError('Empty WKB buffer');
  }

  const reader = new WkbReader(bytes);
  const geometry = readAreaGeometry(reader);

  if (reader.remaining > 0) {
    throw new DecodeError(
      `Unexpected ${reader.remaining} trailing bytes after geometry at offset ${reader.position}`
    );
  }

  return geometry;
}

/**
 * Decode WKB and attach the bounding box used by the spatial index
 */
export function decodeRegionPolygon(input: Uint8Array | string): RegionPolygon {
  return toRegionPolygon(decodeWkb(input));
}

function hexToBytes(hex: string): Uint8Array {
  const trimmed = hex.trim();
  if (!HEX_PATTERN.test(trimmed)) {
    throw new DecodeError('Invalid hex WKB string');
  }
  return Uint8Array.from(Buffer.from(trimmed, 'hex'));
}

function readHeader(reader: WkbReader): GeometryHeader {
  const byteOrder = reader.readUint8('byte order');
  if (byteOrder !== 0 && byteOrder !== 1) {
    throw new DecodeError(`Invalid byte order marker ${byteOrder}`);
  }
  const littleEndian = byteOrder === 1;

  const rawType = reader.readUint32(littleEndian, 'geometry type');
  const isoCode = rawType & EWKB_TYPE_MASK;
  const dimensionBlock = Math.floor(isoCode / 1000);
  const kind = isoCode % 1000;

  if (dimensionBlock > 3 || !(kind in WKB_TYPE_NAMES)) {
    throw new DecodeError(`Unknown WKB geometry type code ${rawType >>> 0}`);
  }

  const hasZ = (rawType & EWKB_Z_FLAG) !== 0 || dimensionBlock === 1 || dimensionBlock === 3;
  const hasM = (rawType & EWKB_M_FLAG) !== 0 || dimensionBlock === 2 || dimensionBlock === 3;

  if ((rawType & EWKB_SRID_FLAG) !== 0) {
    reader.readUint32(littleEndian, 'SRID');
  }

  return {
    littleEndian,
    kind,
    ordinates: 2 + (hasZ ? 1 : 0) + (hasM ? 1 : 0),
  };
}

function readAreaGeometry(reader: WkbReader): AreaGeometry {
  const header = readHeader(reader);

  switch (header.kind) {
    case WKB_POLYGON:
      return readPolygonBody(reader, header);
    case WKB_MULTIPOLYGON:
      return readMultiPolygonBody(reader, header);
    default:
      throw new UnsupportedGeometryError(WKB_TYPE_NAMES[header.kind] ?? `type ${header.kind}`);
  }
}

function readPolygonBody(reader: WkbReader, header: GeometryHeader): Polygon {
  const ringCount = reader.readUint32(header.littleEndian, 'ring count');
  reader.expect(ringCount, 4, `${ringCount} rings`);

  const coordinates: Position[][] = [];
  for (let r = 0; r < ringCount; r++) {
    coordinates.push(readRing(reader, header, r));
  }

  return { type: 'Polygon', coordinates };
}

function readMultiPolygonBody(reader: WkbReader, header: GeometryHeader): MultiPolygon {
  const partCount = reader.readUint32(header.littleEndian, 'polygon count');
  // Each member carries at least a 5-byte header and a ring count
  reader.expect(partCount, 9, `${partCount} polygons`);

  const coordinates: Position[][][] = [];
  for (let p = 0; p < partCount; p++) {
    const member = readHeader(reader);
    if (member.kind !== WKB_POLYGON) {
      throw new DecodeError(
        `MultiPolygon member ${p} is ${WKB_TYPE_NAMES[member.kind] ?? `type ${member.kind}`}, expected Polygon`
      );
    }
    coordinates.push(readPolygonBody(reader, member).coordinates);
  }

  return { type: 'MultiPolygon', coordinates };
}

function readRing(reader: WkbReader, header: GeometryHeader, ringIndex: number): Position[] {
  const pointCount = reader.readUint32(header.littleEndian, 'point count');
  reader.expect(pointCount, header.ordinates * 8, `${pointCount} ring positions`);

  if (pointCount < MIN_RING_POSITIONS) {
    throw new DecodeError(
      `Ring ${ringIndex} has ${pointCount} points, minimum ${MIN_RING_POSITIONS} required`
    );
  }

  const ring: Position[] = [];
  for (let i = 0; i < pointCount; i++) {
    ring.push(reader.readPosition(header.littleEndian, header.ordinates));
  }

  const first = ring[0];
  const last = ring[ring.length - 1];
  if (!sameOrdinate(first[0], last[0]) || !sameOrdinate(first[1], last[1])) {
    throw new DecodeError(`Ring ${ringIndex} is not closed (first point != last point)`);
  }

  return ring;
}

function sameOrdinate(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}
