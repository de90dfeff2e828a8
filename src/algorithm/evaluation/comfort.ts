/**
 * Comfort Score
 *
 * 0.3 x noise isolation + 0.3 x privacy + 0.2 x social spaces + 0.2 x zoning.
 * Where a type occurs more than once, the last room of that type is used.
 */

import { EvaluationConfig, Layout, RoomType } from '../types';
import { centroid, distance } from '../../geometry/point';
import { rectangleAspectRatio, rectangleCenter, touchingEdge } from '../../geometry/rectangle';
import { roomArea } from '../room';
import { getPrimaryRoom } from '../layout';
import { EVALUATION } from '../constants';

const NOISE_SOURCES: readonly RoomType[] = [RoomType.Kitchen, RoomType.Bathroom];
const QUIET_ROOMS: readonly RoomType[] = [RoomType.Bedroom, RoomType.Study];
const PRIVATE_ROOMS: readonly RoomType[] = [RoomType.Bedroom, RoomType.Bathroom];
const SOCIAL_ROOMS: readonly RoomType[] = [RoomType.LivingRoom, RoomType.DiningRoom];

const ZONES: readonly (readonly RoomType[])[] = [
  [RoomType.LivingRoom, RoomType.DiningRoom],
  [RoomType.Bedroom, RoomType.Study],
  [RoomType.Kitchen, RoomType.Bathroom]
];

/**
 * Mean of min(1, d / 5 m) over noisy/quiet pairs; 1 when there is no pair
 */
export function scoreNoiseIsolation(layout: Layout): number {
  const scores: number[] = [];

  for (const sourceType of NOISE_SOURCES) {
    const source = getPrimaryRoom(layout, sourceType);
    if (!source) continue;

    for (const quietType of QUIET_ROOMS) {
      const quiet = getPrimaryRoom(layout, quietType);
      if (!quiet) continue;

      const d = distance(rectangleCenter(source.bounds), rectangleCenter(quiet.bounds));
      scores.push(Math.min(1, d / EVALUATION.NOISE_ISOLATION_DISTANCE));
    }
  }

  return scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : 1.0;
}

/**
 * Bedrooms and bathrooms lose half a point per door on an outer wall
 */
export function scorePrivacy(layout: Layout): number {
  const scores: number[] = [];

  for (const type of PRIVATE_ROOMS) {
    const room = getPrimaryRoom(layout, type);
    if (!room) continue;

    const exposed = room.doors.filter(
      door => touchingEdge(room.bounds, door, EVALUATION.DOOR_WALL_TOLERANCE) !== null
    ).length;
    scores.push(Math.max(0, 1 - exposed / 2));
  }

  return scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : 1.0;
}

export function scoreSocialSpaces(layout: Layout, config: EvaluationConfig): number {
  let score = 0;

  for (const type of SOCIAL_ROOMS) {
    const room = getPrimaryRoom(layout, type);
    if (!room) continue;

    const ideal = EVALUATION.SOCIAL_IDEAL_AREA[type] ?? 0;
    const areaScore = ideal > 0 ? Math.min(1, roomArea(room) / ideal) : 1;
    const ratio = rectangleAspectRatio(room.bounds);
    const shapeScore = ratio >= 0.8 && ratio <= 1.25 ? 1.0 : 0.7;

    score += (areaScore + shapeScore) / 2;
  }

  return (score / SOCIAL_ROOMS.length) * config.socialAreaBonus;
}

/**
 * Mean clustering of the social, private and service zones
 */
export function scoreFunctionalZoning(layout: Layout): number {
  const scores = ZONES.map(zone => {
    const rooms = layout.rooms.filter(room => zone.includes(room.type));
    if (rooms.length < 2) return 1.0;

    const centers = rooms.map(room => rectangleCenter(room.bounds));
    const middle = centroid(centers);
    const spread = centers.reduce((sum, c) => sum + distance(c, middle), 0) / centers.length;

    return Math.max(0, 1 - spread / EVALUATION.ZONE_DISPERSION_LIMIT);
  });

  return scores.reduce((a, b) => a + b, 0) / scores.length;
}

export function scoreComfort(layout: Layout, config: EvaluationConfig): number {
  return (
    scoreNoiseIsolation(layout) * 0.3 +
    scorePrivacy(layout) * 0.3 +
    scoreSocialSpaces(layout, config) * 0.2 +
    scoreFunctionalZoning(layout) * 0.2
  );
}
