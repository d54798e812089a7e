import type { Vector3 } from "@/types";

/**
 * Vec3 - Pure utility functions for 3D vector operations
 * All functions are immutable and return new vectors
 */
export const Vec3 = {
  /**
   * Create a new vector
   */
  create(x: number, y: number, z: number): Vector3 {
    return [x, y, z];
  },

  /**
   * Return a zero vector
   */
  zero(): Vector3 {
    return [0, 0, 0];
  },

  /**
   * Copy a vector
   */
  clone(v: Vector3): Vector3 {
    return [v[0], v[1], v[2]];
  },

  /**
   * Add two vectors
   */
  add(a: Vector3, b: Vector3): Vector3 {
    return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
  },

  /**
   * Subtract vector b from vector a
   */
  subtract(a: Vector3, b: Vector3): Vector3 {
    return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
  },

  /**
   * Scale a vector by a scalar
   */
  scale(v: Vector3, scalar: number): Vector3 {
    return [v[0] * scalar, v[1] * scalar, v[2] * scalar];
  },

  dot(a: Vector3, b: Vector3): number {
    return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
  },

  cross(a: Vector3, b: Vector3): Vector3 {
    return [a[1] * b[2] - a[2] * b[1], a[2] * b[0] - a[0] * b[2], a[0] * b[1] - a[1] * b[0]];
  },

  /**
   * Calculate length (magnitude) of a vector
   */
  length(v: Vector3): number {
    return Math.sqrt(Vec3.dot(v, v));
  },

  /**
   * Normalize a vector to unit length
   * Returns zero vector if input is zero vector
   */
  normalize(v: Vector3): Vector3 {
    const len = Vec3.length(v);
    if (len === 0) return [0, 0, 0];
    return [v[0] / len, v[1] / len, v[2] / len];
  },

  distance(a: Vector3, b: Vector3): number {
    return Vec3.length(Vec3.subtract(b, a));
  },

  isZero(v: Vector3): boolean {
    return v[0] === 0 && v[1] === 0 && v[2] === 0;
  },
};
