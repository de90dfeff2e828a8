/**
 * Room Templates & Layout Constraints
 *
 * Templates decide how large a freshly generated room is; constraints
 * carry the adjacency and separation tables plus the corridor width.
 */

import {
  RoomType,
  RoomTemplate,
  RoomTemplateCatalog,
  RoomSize,
  LayoutConstraints,
  SeparationRule
} from './types';
import {
  DEFAULT_ROOM_TEMPLATES,
  DEFAULT_ASPECT_RATIO_MIN,
  DEFAULT_ASPECT_RATIO_MAX,
  DEFAULT_MIN_ROOM_DISTANCE,
  DEFAULT_MAX_TOTAL_ROOMS,
  DEFAULT_MIN_HALLWAY_WIDTH,
  DEFAULT_MAX_CORRIDOR_LENGTH
} from './constants';
import { SeededRandom } from './utils/random';

// ============================================================================
// TEMPLATES
// ============================================================================

export function createRoomTemplate(
  type: RoomType,
  minArea: number,
  maxArea: number,
  aspectRatioMin: number = DEFAULT_ASPECT_RATIO_MIN,
  aspectRatioMax: number = DEFAULT_ASPECT_RATIO_MAX
): RoomTemplate {
  return { type, minArea, maxArea, aspectRatioMin, aspectRatioMax };
}

/**
 * Draws a size: area and width/height ratio are uniform within the template
 * ranges, then width = sqrt(area * ratio) and height = area / width.
 */
export function sampleRoomSize(template: RoomTemplate, rng: SeededRandom): RoomSize {
  const area = rng.uniform(template.minArea, template.maxArea);
  const ratio = rng.uniform(template.aspectRatioMin, template.aspectRatioMax);
  const width = Math.sqrt(area * ratio);
  return { width, height: area / width };
}

export interface AreaOverride {
  minArea?: number;
  maxArea?: number;
}

/**
 * Default catalog with per-type area ranges replaced where given
 */
export function createRoomTemplates(
  overrides: Partial<Record<RoomType, AreaOverride>> = {}
): RoomTemplateCatalog {
  const catalog: RoomTemplateCatalog = {};

  for (const type of Object.values(RoomType)) {
    const base = DEFAULT_ROOM_TEMPLATES[type];
    const override = overrides[type];
    catalog[type] = {
      ...base,
      minArea: override?.minArea ?? base.minArea,
      maxArea: override?.maxArea ?? base.maxArea
    };
  }

  return catalog;
}

// ============================================================================
// CONSTRAINTS
// ============================================================================

const DEFAULT_ADJACENCY_RULES: Partial<Record<RoomType, RoomType[]>> = {
  [RoomType.Kitchen]: [RoomType.DiningRoom, RoomType.LivingRoom],
  [RoomType.Bedroom]: [RoomType.Bathroom],
  [RoomType.LivingRoom]: [RoomType.DiningRoom, RoomType.Hallway],
  [RoomType.Bathroom]: [RoomType.Bedroom, RoomType.Hallway]
};

const DEFAULT_SEPARATION_RULES: SeparationRule[] = [
  { first: RoomType.Bedroom, second: RoomType.Kitchen, distance: 2.0 },
  { first: RoomType.Bathroom, second: RoomType.Kitchen, distance: 1.5 },
  { first: RoomType.Bedroom, second: RoomType.LivingRoom, distance: 1.0 }
];

function copyAdjacencyRules(
  rules: Partial<Record<RoomType, RoomType[]>>
): Partial<Record<RoomType, RoomType[]>> {
  const copy: Partial<Record<RoomType, RoomType[]>> = {};
  for (const type of Object.values(RoomType)) {
    const neighbours = rules[type];
    if (neighbours) {
      copy[type] = [...neighbours];
    }
  }
  return copy;
}

export function createLayoutConstraints(
  overrides: Partial<LayoutConstraints> = {}
): LayoutConstraints {
  return {
    minRoomDistance: DEFAULT_MIN_ROOM_DISTANCE,
    maxTotalRooms: DEFAULT_MAX_TOTAL_ROOMS,
    minHallwayWidth: DEFAULT_MIN_HALLWAY_WIDTH,
    maxCorridorLength: DEFAULT_MAX_CORRIDOR_LENGTH,
    adjacencyRules: copyAdjacencyRules(DEFAULT_ADJACENCY_RULES),
    separationRules: DEFAULT_SEPARATION_RULES.map(rule => ({ ...rule })),
    ...overrides
  };
}

/**
 * Whether `second` is listed as a preferred neighbour of `first`
 */
export function shouldBeAdjacent(
  constraints: LayoutConstraints,
  first: RoomType,
  second: RoomType
): boolean {
  return constraints.adjacencyRules[first]?.includes(second) ?? false;
}

/**
 * Minimum separation between two types in either order (0 when unlisted)
 */
export function getMinSeparation(
  constraints: LayoutConstraints,
  first: RoomType,
  second: RoomType
): number {
  let separation = 0;
  for (const rule of constraints.separationRules) {
    const matches =
      (rule.first === first && rule.second === second) ||
      (rule.first === second && rule.second === first);
    if (matches) {
      separation = Math.max(separation, rule.distance);
    }
  }
  return separation;
}
