/**
 * Spatial hash for point-like items in 3D
 */

import type { BoundingBox3D, Position3D } from '@sensim/core';
import { distanceSquared3D, pointInBoundingBox3D } from '@sensim/core';

// ============================================================================
// Spatial Hash Grid
// ============================================================================

/** An item returned from a radius query with its distance to the target */
export interface RadiusHit<T> {
  item: T;
  distance: number;
}

/**
 * A simple spatial hash for fast 3D point lookups
 */
export class SpatialHash3D<T> {
  private cells: Map<string, T[]> = new Map();
  private count = 0;

  constructor(
    private readonly cellSize: number,
    private readonly getPosition: (item: T) => Position3D
  ) {
    if (!(cellSize > 0)) throw new RangeError(`cellSize must be positive, got ${cellSize}`);
  }

  /** Hash a coordinate to a cell key */
  private hash(p: Position3D): string {
    const cx = Math.floor(p.x / this.cellSize);
    const cy = Math.floor(p.y / this.cellSize);
    const cz = Math.floor(p.z / this.cellSize);
    return `${cx},${cy},${cz}`;
  }

  /** Get all cell keys that a bounding box overlaps */
  private getCellKeys(bounds: BoundingBox3D): string[] {
    const keys: string[] = [];
    const minCx = Math.floor(bounds.minX / this.cellSize);
    const maxCx = Math.floor(bounds.maxX / this.cellSize);
    const minCy = Math.floor(bounds.minY / this.cellSize);
    const maxCy = Math.floor(bounds.maxY / this.cellSize);
    const minCz = Math.floor(bounds.minZ / this.cellSize);
    const maxCz = Math.floor(bounds.maxZ / this.cellSize);

    for (let cx = minCx; cx <= maxCx; cx++) {
      for (let cy = minCy; cy <= maxCy; cy++) {
        for (let cz = minCz; cz <= maxCz; cz++) {
          keys.push(`${cx},${cy},${cz}`);
        }
      }
    }
    return keys;
  }

  /** Insert an item into the hash */
  insert(item: T): void {
    const key = this.hash(this.getPosition(item));
    let cell = this.cells.get(key);
    if (!cell) {
      cell = [];
      this.cells.set(key, cell);
    }
    cell.push(item);
    this.count++;
  }

  /** Insert multiple items */
  insertAll(items: readonly T[]): void {
    for (const item of items) {
      this.insert(item);
    }
  }

  /** Number of cells a bounding box spans */
  private spannedCellCount(bounds: BoundingBox3D): number {
    const span = (min: number, max: number) =>
      Math.floor(max / this.cellSize) - Math.floor(min / this.cellSize) + 1;
    return (
      span(bounds.minX, bounds.maxX) * span(bounds.minY, bounds.maxY) * span(bounds.minZ, bounds.maxZ)
    );
  }

  /** Query items inside a bounding box */
  query(bounds: BoundingBox3D): T[] {
    const results: T[] = [];

    // Large boxes: scan occupied cells instead of enumerating empty ones
    if (this.spannedCellCount(bounds) > this.cells.size) {
      for (const cell of this.cells.values()) {
        for (const item of cell) {
          if (pointInBoundingBox3D(this.getPosition(item), bounds)) {
            results.push(item);
          }
        }
      }
      return results;
    }

    for (const key of this.getCellKeys(bounds)) {
      const cell = this.cells.get(key);
      if (!cell) continue;
      for (const item of cell) {
        if (pointInBoundingBox3D(this.getPosition(item), bounds)) {
          results.push(item);
        }
      }
    }
    return results;
  }

  /** Items within `radius` of `target`, nearest first */
  queryRadius(target: Position3D, radius: number): RadiusHit<T>[] {
    if (!(radius >= 0)) return [];
    const bounds: BoundingBox3D = {
      minX: target.x - radius,
      minY: target.y - radius,
      minZ: target.z - radius,
      maxX: target.x + radius,
      maxY: target.y + radius,
      maxZ: target.z + radius,
    };
    const radiusSq = radius * radius;
    const results: RadiusHit<T>[] = [];

    for (const item of this.query(bounds)) {
      const distSq = distanceSquared3D(target, this.getPosition(item));
      if (distSq <= radiusSq) {
        results.push({ item, distance: Math.sqrt(distSq) });
      }
    }

    return results.sort((a, b) => a.distance - b.distance);
  }

  /** Clear all items */
  clear(): void {
    this.cells.clear();
    this.count = 0;
  }

  /** Get the number of cells */
  get cellCount(): number {
    return this.cells.size;
  }

  /** Get total item count */
  get size(): number {
    return this.count;
  }
}
