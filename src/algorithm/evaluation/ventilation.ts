/**
 * Ventilation Score
 *
 * 0.4 x openings per room + 0.3 x cross ventilation + 0.3 x door connectivity
 */

import { EvaluationConfig, Layout, Room } from '../types';
import { RectangleEdge } from '../../types/geometry';
import { touchingEdge } from '../../geometry/rectangle';
import { EVALUATION } from '../constants';

export function scoreVentilationPaths(layout: Layout): number {
  if (layout.rooms.length === 0) return 0;

  const total = layout.rooms.reduce((sum, room) => {
    const openings = room.doors.length + room.windows.length;
    if (openings >= 2) return sum + 1.0;
    if (openings === 1) return sum + 0.6;
    return sum + 0.2;
  }, 0);

  return total / layout.rooms.length;
}

/**
 * Whether the room has windows on two opposing walls
 */
export function hasCrossVentilation(room: Room): boolean {
  if (room.windows.length < 2) return false;

  const walls = new Set<RectangleEdge>();
  for (const window of room.windows) {
    const edge = touchingEdge(room.bounds, window, EVALUATION.WINDOW_WALL_TOLERANCE);
    if (edge) {
      walls.add(edge);
    }
  }

  return (walls.has('left') && walls.has('right')) || (walls.has('top') && walls.has('bottom'));
}

/**
 * Share of cross-ventilated rooms times the bonus (may exceed 1)
 */
export function scoreCrossVentilation(layout: Layout, config: EvaluationConfig): number {
  if (layout.rooms.length === 0) return 0;
  const count = layout.rooms.filter(hasCrossVentilation).length;
  return (count / layout.rooms.length) * config.crossVentilationBonus;
}

export function scoreAirCirculation(layout: Layout): number {
  if (layout.rooms.length === 0) return 0;
  const total = layout.rooms.reduce((sum, room) => sum + Math.min(1, room.doors.length / 2), 0);
  return total / layout.rooms.length;
}

export function scoreVentilation(layout: Layout, config: EvaluationConfig): number {
  return (
    scoreVentilationPaths(layout) * 0.4 +
    scoreCrossVentilation(layout, config) * 0.3 +
    scoreAirCirculation(layout) * 0.3
  );
}
