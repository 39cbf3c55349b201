/**
 * Cartesian coordinate and vector definitions
 *
 * Sensor positions and field vectors share one right-handed frame in meters.
 * Orientation vectors are direction-only and are normalized before use.
 */

import { MIN_VECTOR_LENGTH } from '@sensim/shared';

// ============================================================================
// Coordinate Types
// ============================================================================

/** 3D position in meters */
export interface Position3D {
  x: number;
  y: number;
  z: number;
}

/** 3D vector (direction or field vector) */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** Axis-aligned bounding box */
export interface BoundingBox3D {
  minX: number;
  minY: number;
  minZ: number;
  maxX: number;
  maxY: number;
  maxZ: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Degrees to radians conversion factor */
export const DEG_TO_RAD = Math.PI / 180;

// ============================================================================
// Conversions
// ============================================================================

/** Degrees to radians */
export function degToRad(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

/**
 * Build a vector from an `[x, y, z]` tuple
 */
export function vectorFromTuple(tuple: readonly [number, number, number]): Vector3 {
  return { x: tuple[0], y: tuple[1], z: tuple[2] };
}

// ============================================================================
// Vector Math
// ============================================================================

/** Euclidean length */
export function vectorLength(v: Vector3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

/** Dot product */
export function dot(a: Vector3, b: Vector3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

/** Scale a vector */
export function scaleVector(v: Vector3, factor: number): Vector3 {
  return { x: v.x * factor, y: v.y * factor, z: v.z * factor };
}

/**
 * Unit vector in the direction of `v`, or null for a zero-length vector
 */
export function normalize(v: Vector3): Vector3 | null {
  const len = vectorLength(v);
  if (!Number.isFinite(len) || len < MIN_VECTOR_LENGTH) return null;
  return scaleVector(v, 1 / len);
}

// ============================================================================
// Distance
// ============================================================================

/**
 * Squared distance, for radius comparisons without a square root
 */
export function distanceSquared3D(p1: Position3D, p2: Position3D): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  const dz = p2.z - p1.z;
  return dx * dx + dy * dy + dz * dz;
}

// ============================================================================
// Bounding Box Functions
// ============================================================================

/**
 * Check if a point is inside a bounding box (inclusive)
 */
export function pointInBoundingBox3D(point: Position3D, box: BoundingBox3D): boolean {
  return (
    point.x >= box.minX &&
    point.x <= box.maxX &&
    point.y >= box.minY &&
    point.y <= box.maxY &&
    point.z >= box.minZ &&
    point.z <= box.maxZ
  );
}
