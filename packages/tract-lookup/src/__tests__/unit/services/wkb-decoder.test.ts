/**
 * WKB Decoder Tests
 */

import { describe, it, expect } from 'vitest';
import { decodeWkb, decodeRegionPolygon } from '../../../services/wkb-decoder.js';
import { DecodeError, UnsupportedGeometryError } from '../../../core/errors.js';
import { encodeMultiPolygon, encodePoint, encodePolygon, rect, toHex } from '../../fixtures/wkb.js';

const UNIT_SQUARE = [
  [0, 0],
  [1, 0],
  [1, 1],
  [0, 1],
  [0, 0],
];

describe('decodeWkb', () => {
  describe('polygons', () => {
    it('decodes a little-endian polygon', () => {
      expect(decodeWkb(encodePolygon([rect(0, 0, 1, 1)]))).toEqual({
        type: 'Polygon',
        coordinates: [UNIT_SQUARE],
      });
    });

    it('decodes a big-endian polygon', () => {
      expect(decodeWkb(encodePolygon([rect(0, 0, 1, 1)], { littleEndian: false }))).toEqual({
        type: 'Polygon',
        coordinates: [UNIT_SQUARE],
      });
    });

    it('keeps interior rings in order', () => {
      const geometry = decodeWkb(encodePolygon([rect(0, 0, 10, 10), rect(4, 4, 6, 6)]));

      expect(geometry.type).toBe('Polygon');
      expect(geometry.coordinates).toHaveLength(2);
      expect(geometry.coordinates[1]).toEqual([
        [4, 4],
        [6, 4],
        [6, 6],
        [4, 6],
        [4, 4],
      ]);
    });

    it('decodes an empty polygon', () => {
      expect(decodeWkb(encodePolygon([]))).toEqual({ type: 'Polygon', coordinates: [] });
    });

    it('decodes a buffer that is a view into a larger allocation', () => {
      const wkb = encodePolygon([rect(0, 0, 1, 1)]);
      const padded = new Uint8Array(wkb.length + 7);
      padded.set(wkb, 3);
      const view = padded.subarray(3, 3 + wkb.length);

      expect(decodeWkb(view)).toEqual({ type: 'Polygon', coordinates: [UNIT_SQUARE] });
    });
  });

  describe('multipolygons', () => {
    it('decodes every member polygon', () => {
      const geometry = decodeWkb(encodeMultiPolygon([[rect(0, 0, 1, 1)], [rect(5, 5, 6, 6)]]));

      expect(geometry.type).toBe('MultiPolygon');
      expect(geometry.coordinates).toEqual([
        [UNIT_SQUARE],
        [
          [
            [5, 5],
            [6, 5],
            [6, 6],
            [5, 6],
            [5, 5],
          ],
        ],
      ]);
    });

    it('rejects a member that is not a polygon', () => {
      const header = new Uint8Array([1, 6, 0, 0, 0, 1, 0, 0, 0]);
      const point = encodePoint(0, 0);
      const bytes = new Uint8Array(header.length + point.length);
      bytes.set(header, 0);
      bytes.set(point, header.length);

      expect(() => decodeWkb(bytes)).toThrow('MultiPolygon member 0 is Point, expected Polygon');
    });
  });

  describe('dimensions and extensions', () => {
    it('drops ISO Z ordinates', () => {
      expect(decodeWkb(encodePolygon([rect(0, 0, 1, 1)], { z: 'iso' }))).toEqual({
        type: 'Polygon',
        coordinates: [UNIT_SQUARE],
      });
    });

    it('drops ISO ZM ordinates', () => {
      expect(decodeWkb(encodePolygon([rect(0, 0, 1, 1)], { zm: true }))).toEqual({
        type: 'Polygon',
        coordinates: [UNIT_SQUARE],
      });
    });

    it('reads EWKB with Z flag and SRID', () => {
      const wkb = encodeMultiPolygon([[rect(0, 0, 1, 1)]], { z: 'ewkb', srid: 4326, littleEndian: false });

      expect(decodeWkb(wkb)).toEqual({ type: 'MultiPolygon', coordinates: [[UNIT_SQUARE]] });
    });

    it('accepts hex strings in either case', () => {
      const hex = toHex(encodePolygon([rect(0, 0, 1, 1)]));

      expect(decodeWkb(hex)).toEqual({ type: 'Polygon', coordinates: [UNIT_SQUARE] });
      expect(decodeWkb(hex.toUpperCase())).toEqual({ type: 'Polygon', coordinates: [UNIT_SQUARE] });
    });
  });

  describe('malformed input', () => {
    it('rejects an empty buffer', () => {
      expect(() => decodeWkb(new Uint8Array(0))).toThrow(DecodeError);
      expect(() => decodeWkb(new Uint8Array(0))).toThrow('Empty WKB buffer');
    });

    it('rejects truncated input', () => {
      const wkb = encodePolygon([rect(0, 0, 1, 1)]);

      expect(() => decodeWkb(wkb.subarray(0, wkb.length - 4))).toThrow(/^Truncated WKB/);
    });

    it('rejects a ring count larger than the buffer can hold', () => {
      const bytes = new Uint8Array([1, 3, 0, 0, 0, 0xff, 0xff, 0xff, 0x7f]);

      expect(() => decodeWkb(bytes)).toThrow(/^Truncated WKB/);
    });

    it('rejects trailing bytes', () => {
      const wkb = encodePolygon([rect(0, 0, 1, 1)]);
      const extended = new Uint8Array(wkb.length + 2);
      extended.set(wkb, 0);

      expect(() => decodeWkb(extended)).toThrow(
        `Unexpected 2 trailing bytes after geometry at offset ${wkb.length}`
      );
    });

    it('rejects an invalid byte order marker', () => {
      expect(() => decodeWkb(new Uint8Array([2, 3, 0, 0, 0]))).toThrow('Invalid byte order marker 2');
    });

    it('rejects unknown type codes', () => {
      expect(() => decodeWkb(new Uint8Array([1, 99, 0, 0, 0]))).toThrow(
        'Unknown WKB geometry type code 99'
      );
    });

    it('rejects invalid hex', () => {
      expect(() => decodeWkb('01zz')).toThrow('Invalid hex WKB string');
      expect(() => decodeWkb('010')).toThrow('Invalid hex WKB string');
    });

    it('rejects rings with fewer than four positions', () => {
      const triangle = [
        [0, 0],
        [1, 0],
        [0, 0],
      ] as const;

      expect(() => decodeWkb(encodePolygon([triangle]))).toThrow(
        'Ring 0 has 3 points, minimum 4 required'
      );
    });

    it('rejects unclosed rings', () => {
      const open = [
        [0, 0],
        [1, 0],
        [1, 1],
        [0, 1],
      ] as const;

      expect(() => decodeWkb(encodePolygon([rect(0, 0, 10, 10), open]))).toThrow(
        'Ring 1 is not closed (first point != last point)'
      );
    });
  });

  describe('unsupported geometry', () => {
    it('rejects points with the geometry type name', () => {
      let caught: unknown;
      try {
        decodeWkb(encodePoint(1, 2));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UnsupportedGeometryError);
      expect(caught).toMatchObject({ geometryType: 'Point', code: 'UNSUPPORTED_GEOMETRY' });
    });

    it('rejects line strings', () => {
      const lineString = new Uint8Array([1, 2, 0, 0, 0, 0, 0, 0, 0]);

      expect(() => decodeWkb(lineString)).toThrow(UnsupportedGeometryError);
    });
  });
});

describe('decodeRegionPolygon', () => {
  it('attaches the bounding box', () => {
    const polygon = decodeRegionPolygon(encodePolygon([rect(2, 3, 5, 7)]));

    expect(polygon.bbox).toEqual([2, 3, 5, 7]);
    expect(Object.isFrozen(polygon)).toBe(true);
  });

  it('has no bounding box when empty', () => {
    expect(decodeRegionPolygon(encodePolygon([])).bbox).toBeNull();
  });

  it('spans every member of a multipolygon', () => {
    const polygon = decodeRegionPolygon(encodeMultiPolygon([[rect(0, 0, 1, 1)], [rect(-4, 2, -3, 9)]]));

    expect(polygon.bbox).toEqual([-4, 0, 1, 9]);
  });
});
