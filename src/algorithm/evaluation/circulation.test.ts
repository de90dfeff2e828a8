/**
 * Circulation Score Tests
 */

import {
  scoreConnectionEfficiency,
  scorePathLength,
  countHallwayIntersections,
  scoreIntersections,
  scoreCirculation
} from './circulation';
import { addHallway, createLayout, addRoom } from '../layout';
import { RoomType } from '../types';
import { DEFAULT_EVALUATION_CONFIG } from '../constants';
import { createCompleteLayout } from '../../../test/fixtures/layouts';

const config = DEFAULT_EVALUATION_CONFIG;

describe('scoreConnectionEfficiency', () => {
  it('should average closeness over living, kitchen and bedroom pairs', () => {
    // centers: living (3, 2.5), kitchen (8, 2.5), bedroom (2.5, 7)
    const expected =
      ((1 - 5 / 15) + (1 - Math.sqrt(20.5) / 15) + (1 - Math.sqrt(50.5) / 15)) / 3;

    expect(scoreConnectionEfficiency(createCompleteLayout(), config)).toBeCloseTo(expected, 10);
  });

  it('should measure from the last room of each type', () => {
    const layout = createLayout({ x: 0, y: 0, width: 20, height: 15 });
    addRoom(layout, RoomType.LivingRoom, { x: 0, y: 0, width: 4, height: 4 });
    addRoom(layout, RoomType.Kitchen, { x: 0, y: 4, width: 4, height: 4 });
    addRoom(layout, RoomType.Bedroom, { x: 4, y: 0, width: 4, height: 4 });
    addRoom(layout, RoomType.Bedroom, { x: 16, y: 11, width: 4, height: 4 });

    // living (2, 2) to kitchen (2, 6) is 4 m; both are over 15 m from the second bedroom (18, 13)
    expect(scoreConnectionEfficiency(layout, config)).toBeCloseTo((1 - 4 / 15) / 3, 10);
  });

  it('should score 0 with fewer than two key rooms', () => {
    const layout = createLayout({ x: 0, y: 0, width: 20, height: 15 });
    addRoom(layout, RoomType.LivingRoom, { x: 0, y: 0, width: 5, height: 5 });
    addRoom(layout, RoomType.Bathroom, { x: 6, y: 0, width: 3, height: 3 });

    expect(scoreConnectionEfficiency(layout, config)).toBe(0);
  });
});

describe('scorePathLength', () => {
  it('should score 1 without corridors', () => {
    expect(scorePathLength(createCompleteLayout())).toBe(1);
  });

  it('should compare corridor length with a tenth of the footprint area', () => {
    const layout = createCompleteLayout();
    addHallway(layout, { x: 0, y: 10, width: 20, height: 1.2 });

    // length 20 against an ideal of 30
    expect(scorePathLength(layout)).toBeCloseTo(2 / 3, 10);
  });

  it('should score 0 on an empty footprint', () => {
    const layout = createLayout({ x: 0, y: 0, width: 0, height: 0 });
    addHallway(layout, { x: 0, y: 0, width: 1, height: 1 });

    expect(scorePathLength(layout)).toBe(0);
  });
});

describe('scoreIntersections', () => {
  it('should penalize crossing corridors', () => {
    const layout = createCompleteLayout();
    addHallway(layout, { x: 0, y: 5, width: 10, height: 1 });
    addHallway(layout, { x: 4, y: 0, width: 1, height: 10 });

    expect(countHallwayIntersections(layout)).toBe(1);
    expect(scoreIntersections(layout)).toBe(0);

    addHallway(layout, { x: 15, y: 12, width: 3, height: 1 });
    addHallway(layout, { x: 15, y: 0, width: 3, height: 1 });

    expect(scoreIntersections(layout)).toBe(0.5);
  });

  it('should not count corridors that only touch', () => {
    const layout = createCompleteLayout();
    addHallway(layout, { x: 0, y: 5, width: 10, height: 1 });
    addHallway(layout, { x: 10, y: 0, width: 1, height: 10 });

    expect(countHallwayIntersections(layout)).toBe(0);
  });
});

describe('scoreCirculation', () => {
  it('should weight the three terms', () => {
    const layout = createCompleteLayout();
    const connection = scoreConnectionEfficiency(layout, config);

    expect(scoreCirculation(layout, config)).toBeCloseTo(0.3 * connection + 0.4 + 0.3, 10);
  });
});
