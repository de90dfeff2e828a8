/**
 * Tests for point utility functions
 */

import {
  createPoint,
  distance,
  addPoints,
  subtractPoints,
  midpoint,
  translate,
  centroid,
  equals
} from './point';

describe('Point utilities', () => {
  describe('createPoint', () => {
    it('should create a point with x and y coordinates', () => {
      const p = createPoint(3, 4);
      expect(p.x).toBe(3);
      expect(p.y).toBe(4);
    });
  });

  describe('distance', () => {
    it('should calculate distance between two points', () => {
      const p1 = createPoint(0, 0);
      const p2 = createPoint(3, 4);
      expect(distance(p1, p2)).toBe(5);
    });

    it('should return 0 for same point', () => {
      const p = createPoint(5, 5);
      expect(distance(p, p)).toBe(0);
    });

    it('should work with negative coordinates', () => {
      const p1 = createPoint(-3, -4);
      const p2 = createPoint(0, 0);
      expect(distance(p1, p2)).toBe(5);
    });
  });

  describe('addPoints / subtractPoints', () => {
    it('should add component-wise', () => {
      expect(addPoints(createPoint(1, 2), createPoint(3, -5))).toEqual({ x: 4, y: -3 });
    });

    it('should subtract component-wise', () => {
      expect(subtractPoints(createPoint(1, 2), createPoint(3, -5))).toEqual({ x: -2, y: 7 });
    });

    it('should not mutate the operands', () => {
      const a = createPoint(1, 1);
      const b = createPoint(2, 2);
      addPoints(a, b);
      subtractPoints(a, b);
      expect(a).toEqual({ x: 1, y: 1 });
      expect(b).toEqual({ x: 2, y: 2 });
    });
  });

  describe('midpoint', () => {
    it('should calculate midpoint between two points', () => {
      const mid = midpoint(createPoint(0, 0), createPoint(10, 10));
      expect(mid.x).toBe(5);
      expect(mid.y).toBe(5);
    });
  });

  describe('translate', () => {
    it('should translate point by dx and dy', () => {
      const translated = translate(createPoint(5, 5), 3, -2);
      expect(translated.x).toBe(8);
      expect(translated.y).toBe(3);
    });
  });

  describe('centroid', () => {
    it('should average the points', () => {
      const c = centroid([createPoint(0, 0), createPoint(4, 0), createPoint(2, 6)]);
      expect(c).toEqual({ x: 2, y: 2 });
    });

    it('should return the origin for an empty set', () => {
      expect(centroid([])).toEqual({ x: 0, y: 0 });
    });
  });

  describe('equals', () => {
    it('should treat points within epsilon as equal', () => {
      expect(equals(createPoint(1, 1), createPoint(1.00001, 1))).toBe(true);
      expect(equals(createPoint(1, 1), createPoint(1.1, 1))).toBe(false);
    });
  });
});
