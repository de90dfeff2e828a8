/**
 * Space Efficiency Score
 *
 * 0.3 x footprint utilization + 0.4 x room efficiency + 0.3 x corridor share
 */

import { EvaluationConfig, Layout, Room } from '../types';
import { rectangleAspectRatio } from '../../geometry/rectangle';
import { roomArea, roomUtilizationRate } from '../room';
import { layoutHallwayArea, layoutTotalArea, layoutUtilizationRate } from '../layout';
import { AREA_STANDARDS, DEFAULT_AREA_STANDARD } from '../constants';

/**
 * 1 at the ideal rate, falling linearly to 0 at twice (or zero times) the ideal
 */
export function scoreUtilization(rate: number, ideal: number): number {
  if (ideal <= 0) return 0;
  return Math.max(0, 1 - Math.abs(rate - ideal) / ideal);
}

/**
 * Near-square rooms score 1, moderately elongated 0.8, anything else 0.5
 */
export function scoreRoomShape(aspectRatio: number): number {
  if (aspectRatio >= 0.8 && aspectRatio <= 1.25) return 1.0;
  if (aspectRatio >= 0.6 && aspectRatio <= 1.67) return 0.8;
  return 0.5;
}

export function scoreAreaAppropriateness(room: Room): number {
  const [min, max] = AREA_STANDARDS[room.type] ?? DEFAULT_AREA_STANDARD;
  const area = roomArea(room);

  if (area >= min && area <= max) return 1.0;
  if (area < min) return area / min;
  return Math.max(0, 1 - (area - max) / max);
}

export function scoreRoomEfficiency(layout: Layout): number {
  if (layout.rooms.length === 0) return 0;

  const total = layout.rooms.reduce((sum, room) => {
    const shape = scoreRoomShape(rectangleAspectRatio(room.bounds));
    return sum + (shape + roomUtilizationRate(room) + scoreAreaAppropriateness(room)) / 3;
  }, 0);

  return total / layout.rooms.length;
}

/**
 * Step function of the corridor share of the footprint
 */
export function scoreHallwayEfficiency(layout: Layout): number {
  if (layout.hallways.length === 0) return 1.0;

  const total = layoutTotalArea(layout);
  if (total === 0) return 0.3;

  const ratio = layoutHallwayArea(layout) / total;
  if (ratio < 0.05) return 1.0;
  if (ratio < 0.1) return 0.8;
  if (ratio < 0.15) return 0.6;
  return 0.3;
}

export function scoreSpaceEfficiency(layout: Layout, config: EvaluationConfig): number {
  return (
    scoreUtilization(layoutUtilizationRate(layout), config.idealUtilizationRate) * 0.3 +
    scoreRoomEfficiency(layout) * 0.4 +
    scoreHallwayEfficiency(layout) * 0.3
  );
}
