/**
 * Floor Plan Search - Algorithm Types
 *
 * ## Ownership model
 *
 * A `Layout` owns its rooms and corridors outright. Rooms are addressed by
 * their position in `layout.rooms` and identified by an integer `id` that
 * the layout hands out from `nextRoomId`. Copies keep the ids, so a room can
 * be followed through selection and mutation without relying on object
 * identity.
 *
 * Nothing in this module has behavior; see `room.ts`, `layout.ts` and
 * `templates.ts` for the operations on these records.
 */

import { Point, Rectangle } from '../types/geometry';

// ============================================================================
// ROOM CLASSIFICATION
// ============================================================================

export enum RoomType {
  LivingRoom = 'living_room',
  Bedroom = 'bedroom',
  Kitchen = 'kitchen',
  Bathroom = 'bathroom',
  DiningRoom = 'dining_room',
  Study = 'study',
  Balcony = 'balcony',
  Storage = 'storage',
  Hallway = 'hallway'
}

/**
 * Compass orientation of a wall. North is the `top` wall (y), south the
 * `bottom` wall (y + height), west the left wall and east the right wall.
 */
export enum Orientation {
  North = 'north',
  South = 'south',
  East = 'east',
  West = 'west'
}

/** Number of instances required per room type */
export type RoomRequirements = Partial<Record<RoomType, number>>;

// ============================================================================
// SPATIAL ENTITIES
// ============================================================================

export interface Furniture {
  name: string;
  /** Nominal width before rotation */
  width: number;
  /** Nominal height before rotation */
  height: number;
  canRotate: boolean;
  category: string;
  position: Point;
  isRotated: boolean;
  isPlaced: boolean;
}

export interface Room {
  /** Stable identifier, unique within the owning layout and kept by copies */
  id: number;
  type: RoomType;
  bounds: Rectangle;
  minArea: number;
  orientation?: Orientation;
  doors: Rectangle[];
  windows: Rectangle[];
  furniture: Furniture[];
}

/**
 * Free-form annotations attached to a layout.
 * `unplacedRooms` lists room types the generator had to drop;
 * `droppedRooms` lists required instances no crossover parent could supply.
 */
export interface LayoutMetadata {
  unplacedRooms?: RoomType[];
  droppedRooms?: RoomType[];
  [key: string]: unknown;
}

export interface Layout {
  /** The footprint every room is expected to fit in */
  bounds: Rectangle;
  rooms: Room[];
  /** Corridor rectangles */
  hallways: Rectangle[];
  /** Assigned by whoever evaluates the layout; never derived by the layout itself */
  fitnessScore: number;
  generationId: number;
  metadata: LayoutMetadata;
  /** Next id handed out by `addRoom` */
  nextRoomId: number;
}

export interface LayoutValidation {
  valid: boolean;
  errors: string[];
}

/**
 * Plain, JSON-ready view of a layout for renderers and exporters
 */
export interface SerializedLayout {
  bounds: Rectangle;
  rooms: {
    id: number;
    type: RoomType;
    bounds: Rectangle;
    area: number;
  }[];
  hallways: Rectangle[];
  fitnessScore: number;
  utilizationRate: number;
}

// ============================================================================
// TEMPLATES & CONSTRAINTS
// ============================================================================

export interface RoomTemplate {
  type: RoomType;
  minArea: number;
  maxArea: number;
  /** Lower bound of width / height */
  aspectRatioMin: number;
  /** Upper bound of width / height */
  aspectRatioMax: number;
}

export type RoomTemplateCatalog = Partial<Record<RoomType, RoomTemplate>>;

export interface RoomSize {
  width: number;
  height: number;
}

export interface LayoutConstraints {
  /** Minimum distance between rooms */
  minRoomDistance: number;
  maxTotalRooms: number;
  /** Width given to every synthesized corridor */
  minHallwayWidth: number;
  maxCorridorLength: number;
  /** Room type -> preferred neighbour types */
  adjacencyRules: Partial<Record<RoomType, RoomType[]>>;
  /** Minimum separations between pairs of types */
  separationRules: SeparationRule[];
}

export interface SeparationRule {
  first: RoomType;
  second: RoomType;
  distance: number;
}

// ============================================================================
// ALGORITHM PARAMETERS
// ============================================================================

export interface MonteCarloConfig {
  maxIterations: number;
  populationSize: number;
  mutationRate: number;
  crossoverRate: number;
  /** Annealing schedule. Decayed every iteration; not used for acceptance. */
  temperatureStart: number;
  temperatureEnd: number;
  coolingRate: number;
  eliteRatio: number;
  convergenceThreshold: number;
  maxNoImprovement: number;

  // Global room size bounds. Informational only: generation sizes rooms
  // from the per-type templates.
  minRoomArea: number;
  maxRoomArea: number;
  minAspectRatio: number;
  maxAspectRatio: number;
  /** Margin kept between a room and the edges of its free region */
  wallThickness: number;
}

export interface EvaluationConfig {
  // Dimension weights (not required to sum to 1)
  spaceEfficiencyWeight: number;
  lightingWeight: number;
  ventilationWeight: number;
  circulationWeight: number;
  comfortWeight: number;

  // Space efficiency
  minRoomEfficiency: number;
  idealUtilizationRate: number;
  corridorPenaltyFactor: number;

  // Lighting
  maxDepthFromWindow: number;
  windowAreaRatio: number;
  lightDecayFactor: number;

  // Ventilation
  minVentilationPath: number;
  crossVentilationBonus: number;
  deadSpacePenalty: number;

  // Circulation
  maxCirculationDistance: number;
  intersectionPenalty: number;
  connectionBonus: number;

  // Comfort
  noiseReductionFactor: number;
  privacyWeight: number;
  socialAreaBonus: number;
}

// ============================================================================
// EVALUATION RESULTS
// ============================================================================

export type EvaluationDimension =
  | 'spaceEfficiency'
  | 'lighting'
  | 'ventilation'
  | 'circulation'
  | 'comfort';

export interface DimensionScore {
  score: number;
  weight: number;
  weightedScore: number;
}

export type EvaluationBreakdown = Record<EvaluationDimension | 'total', DimensionScore>;

/** The scoring callback injected into the optimizers */
export type EvaluationFunction = (layout: Layout) => number;

// ============================================================================
// OPTIMIZER RESULTS
// ============================================================================

export interface ScoredLayout {
  layout: Layout;
  score: number;
}
