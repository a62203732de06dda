/**
 * Region Catalog Tests
 */

import { describe, it, expect } from 'vitest';
import { RegionCatalog, buildCatalog, type CatalogMetadata } from '../../../services/region-catalog.js';
import { ContainmentResolver } from '../../../services/containment-resolver.js';
import { decodeRegionPolygon } from '../../../services/wkb-decoder.js';
import { DecodeError, UnsupportedGeometryError } from '../../../core/errors.js';
import type { PolygonRecord } from '../../../core/types.js';
import { encodePoint, encodePolygon, rect } from '../../fixtures/wkb.js';

const metadata: CatalogMetadata = {
  generation: 3,
  geometryPath: '/data/tracts.sqlite',
  scoresPath: '/data/scores.json',
  loadedAt: new Date('2026-01-15T12:00:00.000Z'),
};

const resolver = new ContainmentResolver();

function records(): PolygonRecord[] {
  return [
    { regionId: 'R1', geometry: encodePolygon([rect(0, 0, 1, 1)]) },
    { regionId: 'R2', geometry: encodePolygon([rect(1, 0, 2, 1)]) },
  ];
}

describe('buildCatalog', () => {
  it('locates points to the covering region with its score', () => {
    const catalog = buildCatalog(records(), new Map([['R1', 5], ['R2', 8]]), metadata);

    expect(catalog.locate([0.5, 0.5], resolver)).toEqual({ index: 0, regionId: 'R1', score: 5 });
    expect(catalog.locate([1.5, 0.5], resolver)).toEqual({ index: 1, regionId: 'R2', score: 8 });
  });

  it('returns null outside every region', () => {
    const catalog = buildCatalog(records(), new Map([['R1', 5]]), metadata);

    expect(catalog.locate([3, 3], resolver)).toBeNull();
    expect(catalog.locate([0.5, 1.5], resolver)).toBeNull();
  });

  it('resolves a shared edge to the earlier row', () => {
    const catalog = buildCatalog(records(), new Map([['R1', 5], ['R2', 8]]), metadata);

    expect(catalog.locate([1, 0.5], resolver)?.regionId).toBe('R1');
  });

  it('reports a null score for unscored regions', () => {
    const catalog = buildCatalog(records(), new Map([['R1', 5]]), metadata);

    expect(catalog.locate([1.5, 0.5], resolver)).toEqual({ index: 1, regionId: 'R2', score: null });
  });

  it('annotates decode failures with the row and identifier', () => {
    const bad: PolygonRecord[] = [
      ...records(),
      { regionId: 'BAD', geometry: new Uint8Array([1, 3, 0, 0]) },
    ];

    let caught: unknown;
    try {
      buildCatalog(bad, new Map([['R1', 5]]), metadata);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DecodeError);
    expect(caught).toMatchObject({ record: { row: 2, regionId: 'BAD' } });
  });

  it('annotates unsupported geometry with the row', () => {
    const bad: PolygonRecord[] = [{ regionId: 'PT', geometry: encodePoint(0, 0) }];

    expect(() => buildCatalog(bad, new Map([['PT', 1]]), metadata)).toThrow(UnsupportedGeometryError);
    expect(() => buildCatalog(bad, new Map([['PT', 1]]), metadata)).toThrow(/\(row 0, PT\)$/);
  });

  it('keeps duplicate identifiers as separate polygons', () => {
    const duplicated: PolygonRecord[] = [
      { regionId: 'R1', geometry: encodePolygon([rect(0, 0, 1, 1)]) },
      { regionId: 'R1', geometry: encodePolygon([rect(5, 5, 6, 6)]) },
    ];

    const catalog = buildCatalog(duplicated, new Map([['R1', 2]]), metadata);

    expect(catalog.polygonCount).toBe(2);
    expect(catalog.locate([5.5, 5.5], resolver)).toEqual({ index: 1, regionId: 'R1', score: 2 });
  });
});

describe('RegionCatalog', () => {
  it('rejects misaligned polygons and identifiers', () => {
    const polygons = [decodeRegionPolygon(encodePolygon([rect(0, 0, 1, 1)]))];

    expect(() => RegionCatalog.fromParts(polygons, ['R1', 'R2'], new Map(), metadata)).toThrow(
      'Catalog misaligned: 1 polygons, 2 identifiers'
    );
  });

  it('looks up scores by identifier', () => {
    const catalog = buildCatalog(records(), new Map([['R1', 5], ['R2', null]]), metadata);

    expect(catalog.lookup('R1')).toBe(5);
    expect(catalog.lookup('R2')).toBeNull();
    expect(catalog.lookup('missing')).toBeNull();
  });

  it('is not ready without scores', () => {
    expect(buildCatalog(records(), new Map(), metadata).isReady()).toBe(false);
    expect(buildCatalog(records(), new Map([['R1', 5]]), metadata).isReady()).toBe(true);
  });

  it('does not share the score map it was built from', () => {
    const scores = new Map<string, number | null>([['R1', 5]]);
    const catalog = buildCatalog(records(), scores, metadata);

    scores.set('R1', 99);

    expect(catalog.lookup('R1')).toBe(5);
  });

  it('summarizes itself', () => {
    const catalog = buildCatalog(records(), new Map([['R1', 5]]), metadata);

    expect(catalog.summary()).toEqual({
      generation: 3,
      polygonCount: 2,
      scoreCount: 1,
      indexedCount: 2,
      geometryPath: '/data/tracts.sqlite',
      scoresPath: '/data/scores.json',
      loadedAt: '2026-01-15T12:00:00.000Z',
    });
  });
});
