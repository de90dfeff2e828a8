/**
 * Floor Plan Search - Constants
 * Default values and configuration
 *
 * ALL VALUES ARE IN METERS (areas in square meters)
 */

import {
  RoomType,
  RoomTemplate,
  MonteCarloConfig,
  EvaluationConfig,
  EvaluationDimension
} from './types';

// ============================================================================
// ROOM CATALOG
// ============================================================================

/**
 * Default sampling templates: area range (sq m) and width/height ratio range
 */
export const DEFAULT_ROOM_TEMPLATES: Record<RoomType, RoomTemplate> = {
  [RoomType.LivingRoom]: { type: RoomType.LivingRoom, minArea: 15, maxArea: 40, aspectRatioMin: 0.8, aspectRatioMax: 1.5 },
  [RoomType.Bedroom]: { type: RoomType.Bedroom, minArea: 8, maxArea: 25, aspectRatioMin: 0.7, aspectRatioMax: 1.4 },
  [RoomType.Kitchen]: { type: RoomType.Kitchen, minArea: 6, maxArea: 20, aspectRatioMin: 0.6, aspectRatioMax: 1.8 },
  [RoomType.Bathroom]: { type: RoomType.Bathroom, minArea: 3, maxArea: 12, aspectRatioMin: 0.5, aspectRatioMax: 2.0 },
  [RoomType.DiningRoom]: { type: RoomType.DiningRoom, minArea: 10, maxArea: 25, aspectRatioMin: 0.7, aspectRatioMax: 1.6 },
  [RoomType.Study]: { type: RoomType.Study, minArea: 6, maxArea: 18, aspectRatioMin: 0.6, aspectRatioMax: 1.5 },
  [RoomType.Balcony]: { type: RoomType.Balcony, minArea: 4, maxArea: 15, aspectRatioMin: 0.3, aspectRatioMax: 3.0 },
  [RoomType.Storage]: { type: RoomType.Storage, minArea: 2, maxArea: 8, aspectRatioMin: 0.4, aspectRatioMax: 2.5 },
  [RoomType.Hallway]: { type: RoomType.Hallway, minArea: 3, maxArea: 15, aspectRatioMin: 0.2, aspectRatioMax: 5.0 }
};

// Aspect range used when a template is built without one
export const DEFAULT_ASPECT_RATIO_MIN = 0.6;
export const DEFAULT_ASPECT_RATIO_MAX = 1.67;

/**
 * Room types every livable layout must contain
 */
export const REQUIRED_ROOM_TYPES: readonly RoomType[] = [
  RoomType.LivingRoom,
  RoomType.Bedroom,
  RoomType.Kitchen,
  RoomType.Bathroom
];

// ============================================================================
// CONSTRAINT DEFAULTS
// ============================================================================

export const DEFAULT_MIN_ROOM_DISTANCE = 1.0;
export const DEFAULT_MAX_TOTAL_ROOMS = 15;
export const DEFAULT_MIN_HALLWAY_WIDTH = 1.2;
export const DEFAULT_MAX_CORRIDOR_LENGTH = 10.0;

// ============================================================================
// ALGORITHM DEFAULTS
// ============================================================================

export const DEFAULT_MONTE_CARLO_CONFIG: MonteCarloConfig = {
  maxIterations: 10000,
  populationSize: 50,
  mutationRate: 0.3,
  crossoverRate: 0.7,
  temperatureStart: 100.0,
  temperatureEnd: 0.01,
  coolingRate: 0.995,
  eliteRatio: 0.2,
  convergenceThreshold: 1e-6,
  maxNoImprovement: 100,
  minRoomArea: 5.0,
  maxRoomArea: 50.0,
  minAspectRatio: 0.5,
  maxAspectRatio: 2.0,
  wallThickness: 0.2
};

export const DEFAULT_EVALUATION_CONFIG: EvaluationConfig = {
  spaceEfficiencyWeight: 0.25,
  lightingWeight: 0.20,
  ventilationWeight: 0.15,
  circulationWeight: 0.20,
  comfortWeight: 0.20,

  minRoomEfficiency: 0.4,
  idealUtilizationRate: 0.75,
  corridorPenaltyFactor: 0.8,

  maxDepthFromWindow: 6.0,
  windowAreaRatio: 0.15,
  lightDecayFactor: 0.1,

  minVentilationPath: 2.0,
  crossVentilationBonus: 1.2,
  deadSpacePenalty: 0.5,

  maxCirculationDistance: 15.0,
  intersectionPenalty: 0.3,
  connectionBonus: 0.2,

  noiseReductionFactor: 0.8,
  privacyWeight: 0.5,
  socialAreaBonus: 1.1
};

/**
 * Maps each evaluation dimension to its weight field
 */
export const DIMENSION_WEIGHT_KEYS: Record<EvaluationDimension, keyof EvaluationConfig> = {
  spaceEfficiency: 'spaceEfficiencyWeight',
  lighting: 'lightingWeight',
  ventilation: 'ventilationWeight',
  circulation: 'circulationWeight',
  comfort: 'comfortWeight'
};

export const DIMENSION_LABELS: Record<EvaluationDimension, string> = {
  spaceEfficiency: 'Space efficiency',
  lighting: 'Lighting',
  ventilation: 'Ventilation',
  circulation: 'Circulation',
  comfort: 'Comfort'
};

// ============================================================================
// GENERATOR
// ============================================================================

export const GENERATOR = {
  /** Chance that a room gets a corridor to the living room */
  CORRIDOR_PROBABILITY: 0.3,
  /** Step of the grid scanned when partitioning runs out of free regions */
  COMPACTION_GRID_STEP: 1.0
};

// ============================================================================
// EVALUATION
// ============================================================================

/** Area (sq m) at which a social room scores full marks for size */
const SOCIAL_IDEAL_AREA: Partial<Record<RoomType, number>> = {
  [RoomType.LivingRoom]: 20,
  [RoomType.DiningRoom]: 15
};

export const EVALUATION = {
  /** Floor-to-ceiling height used to turn perimeters into wall areas */
  CEILING_HEIGHT: 2.8,
  /** How close an opening must be to a wall to count as on that wall */
  WINDOW_WALL_TOLERANCE: 0.1,
  DOOR_WALL_TOLERANCE: 0.5,
  /** Rooms up to this area are treated as fully lit by a window */
  WELL_LIT_AREA: 30,
  /** Center distance at which noise isolation is complete */
  NOISE_ISOLATION_DISTANCE: 5.0,
  /** Dispersion around a zone centroid that scores zero */
  ZONE_DISPERSION_LIMIT: 10.0,
  /** Target corridor length as a fraction of footprint area */
  CORRIDOR_LENGTH_AREA_FACTOR: 0.1,
  SOCIAL_IDEAL_AREA
};

/**
 * Area range (sq m) a room of each type is expected to fall in
 */
export const AREA_STANDARDS: Partial<Record<RoomType, [number, number]>> = {
  [RoomType.LivingRoom]: [15, 40],
  [RoomType.Bedroom]: [8, 25],
  [RoomType.Kitchen]: [6, 20],
  [RoomType.Bathroom]: [3, 12],
  [RoomType.DiningRoom]: [10, 25],
  [RoomType.Study]: [6, 18]
};

export const DEFAULT_AREA_STANDARD: [number, number] = [5, 30];

// ============================================================================
// OPTIMIZER
// ============================================================================

export const OPTIMIZER = {
  TOURNAMENT_SIZE: 3,
  /** History samples inspected by the variance convergence test */
  CONVERGENCE_WINDOW: 100,
  POSITION_JITTER: 2,
  SIZE_JITTER: 1,
  /** Size mutation never shrinks a side below this */
  MIN_MUTATED_SIDE: 3,
  /** Consecutive failed recombinations before a slot falls back to mutation */
  MAX_CROSSOVER_RETRIES: 10
};
