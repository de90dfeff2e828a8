/**
 * Floor Plan Search - Algorithm Module
 *
 * Exports all public APIs for layout generation, evaluation and search
 */

// Types - use 'export type' for type-only exports
export { RoomType, Orientation } from './types';
export type {
  Furniture,
  Room,
  Layout,
  LayoutMetadata,
  LayoutValidation,
  SerializedLayout,
  RoomRequirements,
  RoomTemplate,
  RoomTemplateCatalog,
  RoomSize,
  LayoutConstraints,
  SeparationRule,
  MonteCarloConfig,
  EvaluationConfig,
  EvaluationDimension,
  DimensionScore,
  EvaluationBreakdown,
  EvaluationFunction,
  ScoredLayout
} from './types';

// Constants
export {
  DEFAULT_ROOM_TEMPLATES,
  DEFAULT_MONTE_CARLO_CONFIG,
  DEFAULT_EVALUATION_CONFIG,
  REQUIRED_ROOM_TYPES,
  DIMENSION_LABELS
} from './constants';

// Entities
export {
  createFurniture,
  rotateFurniture,
  furnitureBounds,
  createRoom,
  roomArea,
  roomUsedArea,
  roomFreeArea,
  roomUtilizationRate,
  addDoor,
  addWindow,
  addFurniture,
  canPlaceFurniture,
  placeFurniture,
  copyRoom
} from './room';

export type { FurnitureOptions } from './room';

export {
  createLayout,
  addRoom,
  adoptRoom,
  addHallway,
  getRoomsByType,
  getPrimaryRoom,
  layoutTotalArea,
  layoutRoomArea,
  layoutHallwayArea,
  layoutUtilizationRate,
  validateLayout,
  copyLayout,
  serializeLayout
} from './layout';

// Templates & constraints
export {
  createRoomTemplate,
  createRoomTemplates,
  sampleRoomSize,
  createLayoutConstraints,
  shouldBeAdjacent,
  getMinSeparation
} from './templates';

export type { AreaOverride } from './templates';

// Generator
export { generateLayout } from './layout-generator';
export type { GenerationContext } from './layout-generator';

// Evaluation
export {
  evaluateLayout,
  evaluateLayoutDetailed,
  formatEvaluationReport,
  createEvaluator,
  DIMENSION_SCORERS
} from './evaluation';

export type { LayoutEvaluator, DimensionScorer } from './evaluation';

// Optimizers
export { MonteCarloOptimizer } from './optimizer';
export type { OptimizerOptions } from './optimizer';

export { ParallelMonteCarloOptimizer, DEFAULT_WORKER_COUNT, splitConfig } from './parallel-optimizer';
export type { ParallelOptimizerOptions, ParallelResult, WorkerResult } from './parallel-optimizer';

// Configuration & search
export {
  SearchParametersSchema,
  parseSearchParameters,
  PRESETS,
  PRESET_NAMES,
  isPresetName
} from './config';

export type { SearchParameters, SearchParametersInput, ParsedSearchParameters, PresetName } from './config';

export { runLayoutSearch } from './search';
export type { SearchOptions, LayoutSearchResult } from './search';

// Errors
export { ConfigurationError, CrossoverError } from './errors';

// Utilities
export { SeededRandom, createRandom } from './utils/random';
export {
  Logger,
  LogLevel,
  LOG_LEVEL_ENV,
  createLogger,
  setLevelFromEnv,
  enableDebugLogging,
  disableLogging
} from './utils/logger';
export type { ScopedLogger } from './utils/logger';
