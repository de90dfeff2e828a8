/**
 * Point utility functions
 * All functions are pure and return new objects (no mutation)
 */

import { Point } from '../types/geometry';

/**
 * Creates a new point
 */
export function createPoint(x: number, y: number): Point {
  return { x, y };
}

/**
 * Calculates the Euclidean distance between two points
 */
export function distance(p1: Point, p2: Point): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Component-wise sum of two points (vector addition)
 */
export function addPoints(p1: Point, p2: Point): Point {
  return {
    x: p1.x + p2.x,
    y: p1.y + p2.y
  };
}

/**
 * Component-wise difference p1 - p2 (vector subtraction)
 */
export function subtractPoints(p1: Point, p2: Point): Point {
  return {
    x: p1.x - p2.x,
    y: p1.y - p2.y
  };
}

/**
 * Calculates the midpoint between two points
 */
export function midpoint(p1: Point, p2: Point): Point {
  return {
    x: (p1.x + p2.x) / 2,
    y: (p1.y + p2.y) / 2
  };
}

/**
 * Translates a point by dx, dy
 */
export function translate(p: Point, dx: number, dy: number): Point {
  return {
    x: p.x + dx,
    y: p.y + dy
  };
}

/**
 * Arithmetic mean of a set of points. Returns the origin for an empty set.
 */
export function centroid(points: readonly Point[]): Point {
  if (points.length === 0) {
    return { x: 0, y: 0 };
  }
  let sumX = 0;
  let sumY = 0;
  for (const p of points) {
    sumX += p.x;
    sumY += p.y;
  }
  return {
    x: sumX / points.length,
    y: sumY / points.length
  };
}

/**
 * Checks if two points are equal (within epsilon tolerance)
 */
export function equals(p1: Point, p2: Point, epsilon: number = 0.0001): boolean {
  return Math.abs(p1.x - p2.x) < epsilon && Math.abs(p1.y - p2.y) < epsilon;
}
