/**
 * Rectangle utility functions
 * Rectangles are axis-aligned (no rotation)
 * Position (x, y) is the minimum corner; `top` is y and `bottom` is y + height
 */

import { Rectangle, RectangleSides, RectangleEdge, Point } from '../types/geometry';

/**
 * Creates a new rectangle
 */
export function createRectangle(x: number, y: number, width: number, height: number): Rectangle {
  return { x, y, width, height };
}

/**
 * Returns an independent copy of a rectangle
 */
export function copyRectangle(rect: Rectangle): Rectangle {
  return { x: rect.x, y: rect.y, width: rect.width, height: rect.height };
}

/**
 * Creates a rectangle from two corner points (min and max)
 */
export function rectangleFromCorners(p1: Point, p2: Point): Rectangle {
  const minX = Math.min(p1.x, p2.x);
  const minY = Math.min(p1.y, p2.y);
  const maxX = Math.max(p1.x, p2.x);
  const maxY = Math.max(p1.y, p2.y);
  return {
    x: minX,
    y: minY,
    width: maxX - minX,
    height: maxY - minY
  };
}

/**
 * Returns the edge coordinates of a rectangle
 */
export function rectangleSides(rect: Rectangle): RectangleSides {
  return {
    left: rect.x,
    right: rect.x + rect.width,
    top: rect.y,
    bottom: rect.y + rect.height
  };
}

/**
 * Calculates the area of a rectangle
 */
export function rectangleArea(rect: Rectangle): number {
  return rect.width * rect.height;
}

/**
 * Calculates the perimeter of a rectangle
 */
export function rectanglePerimeter(rect: Rectangle): number {
  return 2 * (rect.width + rect.height);
}

/**
 * Width divided by height. Zero-height rectangles report 0.
 */
export function rectangleAspectRatio(rect: Rectangle): number {
  return rect.height > 0 ? rect.width / rect.height : 0;
}

/**
 * Returns the center point of a rectangle
 */
export function rectangleCenter(rect: Rectangle): Point {
  return {
    x: rect.x + rect.width / 2,
    y: rect.y + rect.height / 2
  };
}

/**
 * Returns the four corner points of a rectangle, clockwise from (left, top)
 */
export function rectangleCorners(rect: Rectangle): [Point, Point, Point, Point] {
  return [
    { x: rect.x, y: rect.y },                              // left-top
    { x: rect.x + rect.width, y: rect.y },                 // right-top
    { x: rect.x + rect.width, y: rect.y + rect.height },   // right-bottom
    { x: rect.x, y: rect.y + rect.height }                 // left-bottom
  ];
}

/**
 * Checks if a point is inside a rectangle (edges count as inside)
 */
export function pointInRectangle(rect: Rectangle, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x <= rect.x + rect.width &&
    point.y >= rect.y &&
    point.y <= rect.y + rect.height
  );
}

/**
 * Checks if two rectangles overlap with positive area.
 * Rectangles that only share an edge or a corner do not intersect.
 */
export function rectanglesIntersect(rect1: Rectangle, rect2: Rectangle): boolean {
  return !(
    rect1.x + rect1.width <= rect2.x ||
    rect1.x >= rect2.x + rect2.width ||
    rect1.y + rect1.height <= rect2.y ||
    rect1.y >= rect2.y + rect2.height
  );
}

/**
 * Checks if `inner` lies entirely within `outer` (edges inclusive)
 */
export function rectangleContains(outer: Rectangle, inner: Rectangle): boolean {
  return (
    outer.x <= inner.x &&
    inner.x + inner.width <= outer.x + outer.width &&
    outer.y <= inner.y &&
    inner.y + inner.height <= outer.y + outer.height
  );
}

/**
 * Returns the intersection of two rectangles (or null if they don't overlap)
 */
export function rectangleIntersection(rect1: Rectangle, rect2: Rectangle): Rectangle | null {
  const x = Math.max(rect1.x, rect2.x);
  const y = Math.max(rect1.y, rect2.y);
  const right = Math.min(rect1.x + rect1.width, rect2.x + rect2.width);
  const bottom = Math.min(rect1.y + rect1.height, rect2.y + rect2.height);

  if (right <= x || bottom <= y) {
    return null;
  }

  return {
    x,
    y,
    width: right - x,
    height: bottom - y
  };
}

/**
 * Expands a rectangle by the given amount on all sides
 */
export function expandRectangle(rect: Rectangle, amount: number): Rectangle {
  return {
    x: rect.x - amount,
    y: rect.y - amount,
    width: rect.width + 2 * amount,
    height: rect.height + 2 * amount
  };
}

/**
 * Determines which wall of `container` the rectangle `opening` touches.
 * Walls are tested left, right, top, bottom in that order; the first
 * one within `tolerance` wins. Returns null for interior openings.
 */
export function touchingEdge(
  container: Rectangle,
  opening: Rectangle,
  tolerance: number
): RectangleEdge | null {
  if (opening.x <= container.x + tolerance) return 'left';
  if (opening.x + opening.width >= container.x + container.width - tolerance) return 'right';
  if (opening.y <= container.y + tolerance) return 'top';
  if (opening.y + opening.height >= container.y + container.height - tolerance) return 'bottom';
  return null;
}
