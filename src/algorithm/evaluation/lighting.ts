/**
 * Lighting Score
 *
 * 0.3 x window-to-wall coverage + 0.4 x uniformity + 0.3 x source orientation
 */

import { EvaluationConfig, Layout, Orientation, RoomType } from '../types';
import { RectangleEdge } from '../../types/geometry';
import { distance } from '../../geometry/point';
import {
  rectangleArea,
  rectangleCenter,
  rectanglePerimeter,
  touchingEdge
} from '../../geometry/rectangle';
import { roomArea } from '../room';
import { getRoomsByType } from '../layout';
import { EVALUATION } from '../constants';

const EDGE_ORIENTATION: Record<RectangleEdge, Orientation> = {
  left: Orientation.West,
  right: Orientation.East,
  top: Orientation.North,
  bottom: Orientation.South
};

const PRIMARY_LIT_ROOMS: readonly RoomType[] = [
  RoomType.LivingRoom,
  RoomType.Bedroom,
  RoomType.Kitchen
];

export function scoreWindowCoverage(layout: Layout, config: EvaluationConfig): number {
  if (layout.rooms.length === 0) return 0;

  let windowArea = 0;
  let wallArea = 0;
  for (const room of layout.rooms) {
    wallArea += rectanglePerimeter(room.bounds) * EVALUATION.CEILING_HEIGHT;
    windowArea += room.windows.reduce((sum, window) => sum + rectangleArea(window), 0);
  }

  if (wallArea === 0 || config.windowAreaRatio <= 0) return 0;

  const ratio = windowArea / wallArea;
  return Math.max(0, 1 - Math.abs(ratio - config.windowAreaRatio) / config.windowAreaRatio);
}

/**
 * Mean per-room light: closeness of the nearest window scaled down for
 * large rooms. Windowless rooms contribute 0.
 */
export function scoreLightingUniformity(layout: Layout, config: EvaluationConfig): number {
  if (layout.rooms.length === 0) return 0;

  const total = layout.rooms.reduce((sum, room) => {
    if (room.windows.length === 0 || config.maxDepthFromWindow <= 0) return sum;

    const center = rectangleCenter(room.bounds);
    const nearest = Math.min(
      ...room.windows.map(window => distance(center, rectangleCenter(window)))
    );
    const depthScore = Math.max(0, 1 - nearest / config.maxDepthFromWindow);
    const area = roomArea(room);
    const areaFactor = area > 0 ? Math.min(1, EVALUATION.WELL_LIT_AREA / area) : 1;

    return sum + depthScore * areaFactor;
  }, 0);

  return total / layout.rooms.length;
}

/**
 * Rewards living rooms, bedrooms and kitchens lit from two or more sides
 */
export function scoreLightingSources(layout: Layout): number {
  let score = 0;

  for (const type of PRIMARY_LIT_ROOMS) {
    for (const room of getRoomsByType(layout, type)) {
      if (room.windows.length === 0) continue;

      const orientations = new Set<Orientation>();
      for (const window of room.windows) {
        const edge = touchingEdge(room.bounds, window, EVALUATION.WINDOW_WALL_TOLERANCE);
        if (edge) {
          orientations.add(EDGE_ORIENTATION[edge]);
        }
      }
      score += Math.min(1, orientations.size / 2);
    }
  }

  return score / (PRIMARY_LIT_ROOMS.length * 2);
}

export function scoreLighting(layout: Layout, config: EvaluationConfig): number {
  return (
    scoreWindowCoverage(layout, config) * 0.3 +
    scoreLightingUniformity(layout, config) * 0.4 +
    scoreLightingSources(layout) * 0.3
  );
}
