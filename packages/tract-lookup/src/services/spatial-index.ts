/**
 * Spatial Index (broad phase)
 *
 * R-tree over polygon bounding boxes, bulk-loaded once per catalog build.
 * Queries return index handles into the polygon sequence the index was built
 * from, never geometry. Containment is decided by the resolver, not here:
 * every polygon whose bbox covers the point is returned.
 */

import RBush from 'rbush';
import type { Position } from 'geojson';
import type { RegionPolygon } from '../core/types.js';

/**
 * R-tree entry: bbox of one polygon plus its position in the source sequence
 */
interface IndexEntry {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
  readonly index: number;
}

/** Default rbush node size */
const NODE_CAPACITY = 9;

export class SpatialIndex {
  private readonly tree: RBush<IndexEntry>;
  private readonly entryCount: number;

  private constructor(tree: RBush<IndexEntry>, entryCount: number) {
    this.tree = tree;
    this.entryCount = entryCount;
  }

  /**
   * Bulk-load an index over `polygons`
   *
   * Polygons without a bounding box (empty geometry) are left out. The input
   * is not modified.
   */
  static build(polygons: readonly RegionPolygon[]): SpatialIndex {
    const entries: IndexEntry[] = [];

    polygons.forEach((polygon, index) => {
      if (polygon.bbox === null) {
        return;
      }
      const [minX, minY, maxX, maxY] = polygon.bbox;
      entries.push({ minX, minY, maxX, maxY, index });
    });

    const tree = new RBush<IndexEntry>(NODE_CAPACITY);
    tree.load(entries);
    return new SpatialIndex(tree, entries.length);
  }

  /**
   * Indices of every polygon whose bounding box covers `point`
   *
   * Sorted ascending, so for a fixed build and point the candidate order
   * (and therefore the resolver's tie-break) is stable.
   */
  query(point: Position): number[] {
    const [x, y] = point;
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      return [];
    }

    return this.tree
      .search({ minX: x, minY: y, maxX: x, maxY: y })
      .map((entry) => entry.index)
      .sort((a, b) => a - b);
  }

  /**
   * Number of indexed polygons
   */
  get size(): number {
    return this.entryCount;
  }
}
