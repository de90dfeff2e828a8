/**
 * Circulation Score
 *
 * 0.3 x closeness of key rooms + 0.4 x corridor length + 0.3 x corridor crossings
 */

import { EvaluationConfig, Layout, RoomType } from '../types';
import { distance } from '../../geometry/point';
import { rectangleCenter, rectanglesIntersect } from '../../geometry/rectangle';
import { getPrimaryRoom, layoutTotalArea } from '../layout';
import { EVALUATION } from '../constants';

const CONNECTED_ROOMS: readonly RoomType[] = [
  RoomType.LivingRoom,
  RoomType.Kitchen,
  RoomType.Bedroom
];

/**
 * Mean closeness between the last living room, kitchen and bedroom.
 * 0 when fewer than two of them exist.
 */
export function scoreConnectionEfficiency(layout: Layout, config: EvaluationConfig): number {
  let total = 0;
  let pairs = 0;

  for (let i = 0; i < CONNECTED_ROOMS.length; i++) {
    const first = getPrimaryRoom(layout, CONNECTED_ROOMS[i]);
    if (!first) continue;

    for (let j = i + 1; j < CONNECTED_ROOMS.length; j++) {
      const second = getPrimaryRoom(layout, CONNECTED_ROOMS[j]);
      if (!second) continue;

      const d = distance(rectangleCenter(first.bounds), rectangleCenter(second.bounds));
      total += config.maxCirculationDistance > 0
        ? Math.max(0, 1 - d / config.maxCirculationDistance)
        : 0;
      pairs += 1;
    }
  }

  return pairs > 0 ? total / pairs : 0;
}

/**
 * Compares total corridor length (long side of each corridor) with a
 * target of one tenth of the footprint area
 */
export function scorePathLength(layout: Layout): number {
  if (layout.hallways.length === 0) return 1.0;

  const ideal = layoutTotalArea(layout) * EVALUATION.CORRIDOR_LENGTH_AREA_FACTOR;
  if (ideal <= 0) return 0;

  const length = layout.hallways.reduce(
    (sum, hallway) => sum + Math.max(hallway.width, hallway.height),
    0
  );
  return Math.max(0, 1 - Math.abs(length - ideal) / ideal);
}

export function countHallwayIntersections(layout: Layout): number {
  const { hallways } = layout;
  let count = 0;
  for (let i = 0; i < hallways.length; i++) {
    for (let j = i + 1; j < hallways.length; j++) {
      if (rectanglesIntersect(hallways[i], hallways[j])) {
        count += 1;
      }
    }
  }
  return count;
}

export function scoreIntersections(layout: Layout): number {
  const allowance = Math.max(1, Math.floor(layout.hallways.length / 2));
  return Math.max(0, 1 - countHallwayIntersections(layout) / allowance);
}

export function scoreCirculation(layout: Layout, config: EvaluationConfig): number {
  return (
    scoreConnectionEfficiency(layout, config) * 0.3 +
    scorePathLength(layout) * 0.4 +
    scoreIntersections(layout) * 0.3
  );
}
