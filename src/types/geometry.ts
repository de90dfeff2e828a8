/**
 * Core geometry types for the floor plan search engine
 * All measurements are in meters
 */

/**
 * A 2D point representing a location in the floor plan
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * An axis-aligned rectangle defined by position and dimensions.
 * The position (x, y) is the minimum corner. Following screen
 * convention, the `top` edge sits at `y` and the `bottom` edge
 * at `y + height`.
 */
export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Edge coordinates of a rectangle
 */
export interface RectangleSides {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

/**
 * Named wall of a rectangle
 */
export type RectangleEdge = 'top' | 'bottom' | 'left' | 'right';
