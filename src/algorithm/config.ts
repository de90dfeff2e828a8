/**
 * Floor Plan Search - Configuration
 *
 * Validated search parameters: footprint and room program, algorithm
 * settings, evaluation weights and parallel execution. Every field has a
 * default, so `parseSearchParameters({})` yields a complete configuration.
 */

import { z } from 'zod';
import {
  EvaluationConfig,
  MonteCarloConfig,
  RoomRequirements,
  RoomTemplateCatalog,
  RoomType
} from './types';
import { Rectangle } from '../types/geometry';
import { DEFAULT_EVALUATION_CONFIG, DEFAULT_MONTE_CARLO_CONFIG, DEFAULT_ROOM_TEMPLATES } from './constants';
import { createRoomTemplates, AreaOverride } from './templates';
import { ConfigurationError } from './errors';

// ============================================================================
// SCHEMAS
// ============================================================================

const count = (fallback: number) => z.number().int().min(0).max(20).default(fallback);
const area = z.number().positive();
const rate = z.number().min(0).max(1);
const weight = z.number().min(0);

/** Room types a program may request */
export const PROGRAM_ROOM_TYPES = [
  RoomType.LivingRoom,
  RoomType.Bedroom,
  RoomType.Kitchen,
  RoomType.Bathroom,
  RoomType.DiningRoom,
  RoomType.Study,
  RoomType.Balcony,
  RoomType.Storage
] as const;

const RoomCountsSchema = z.object({
  [RoomType.LivingRoom]: count(1),
  [RoomType.Bedroom]: count(2),
  [RoomType.Kitchen]: count(1),
  [RoomType.Bathroom]: count(1),
  [RoomType.DiningRoom]: count(0),
  [RoomType.Study]: count(0),
  [RoomType.Balcony]: count(0),
  [RoomType.Storage]: count(0)
});

/** Per-type area bounds; omitted types keep the template catalog value */
const AreaTableSchema = z.object({
  [RoomType.LivingRoom]: area.optional(),
  [RoomType.Bedroom]: area.optional(),
  [RoomType.Kitchen]: area.optional(),
  [RoomType.Bathroom]: area.optional(),
  [RoomType.DiningRoom]: area.optional(),
  [RoomType.Study]: area.optional(),
  [RoomType.Balcony]: area.optional(),
  [RoomType.Storage]: area.optional()
});

export const LayoutParametersSchema = z.object({
  totalWidth: z.number().positive().max(500).default(20),
  totalHeight: z.number().positive().max(500).default(15),
  wallThickness: z.number().min(0).max(2).default(0.2),
  roomRequirements: RoomCountsSchema.default({}),
  minRoomArea: AreaTableSchema.default({}),
  maxRoomArea: AreaTableSchema.default({})
});

const mc = DEFAULT_MONTE_CARLO_CONFIG;

/**
 * Search settings. Room sizes are not set here: they come from the per-type
 * `layout.minRoomArea` / `layout.maxRoomArea` tables.
 */
export const AlgorithmParametersSchema = z.object({
  maxIterations: z.number().int().min(1).default(mc.maxIterations),
  populationSize: z.number().int().min(1).default(mc.populationSize),
  mutationRate: rate.default(mc.mutationRate),
  crossoverRate: rate.default(mc.crossoverRate),
  temperatureStart: z.number().positive().default(mc.temperatureStart),
  temperatureEnd: z.number().positive().default(mc.temperatureEnd),
  coolingRate: z.number().positive().max(1).default(mc.coolingRate),
  eliteRatio: z.number().min(0).lt(1).default(mc.eliteRatio),
  convergenceThreshold: z.number().min(0).default(mc.convergenceThreshold),
  maxNoImprovement: z.number().int().min(1).default(mc.maxNoImprovement)
});

const ev = DEFAULT_EVALUATION_CONFIG;

export const EvaluationParametersSchema = z.object({
  spaceEfficiencyWeight: weight.default(ev.spaceEfficiencyWeight),
  lightingWeight: weight.default(ev.lightingWeight),
  ventilationWeight: weight.default(ev.ventilationWeight),
  circulationWeight: weight.default(ev.circulationWeight),
  comfortWeight: weight.default(ev.comfortWeight),

  minRoomEfficiency: rate.default(ev.minRoomEfficiency),
  idealUtilizationRate: z.number().positive().max(1).default(ev.idealUtilizationRate),
  corridorPenaltyFactor: z.number().min(0).default(ev.corridorPenaltyFactor),

  maxDepthFromWindow: z.number().positive().default(ev.maxDepthFromWindow),
  windowAreaRatio: z.number().positive().max(1).default(ev.windowAreaRatio),
  lightDecayFactor: z.number().min(0).default(ev.lightDecayFactor),

  minVentilationPath: z.number().min(0).default(ev.minVentilationPath),
  crossVentilationBonus: z.number().min(0).default(ev.crossVentilationBonus),
  deadSpacePenalty: z.number().min(0).default(ev.deadSpacePenalty),

  maxCirculationDistance: z.number().positive().default(ev.maxCirculationDistance),
  intersectionPenalty: z.number().min(0).default(ev.intersectionPenalty),
  connectionBonus: z.number().min(0).default(ev.connectionBonus),

  noiseReductionFactor: z.number().min(0).default(ev.noiseReductionFactor),
  privacyWeight: z.number().min(0).default(ev.privacyWeight),
  socialAreaBonus: z.number().min(0).default(ev.socialAreaBonus)
});

export const ParallelParametersSchema = z.object({
  enabled: z.boolean().default(false),
  workers: z.number().int().min(1).max(64).default(4)
});

export const SearchParametersSchema = z
  .object({
    layout: LayoutParametersSchema.default({}),
    algorithm: AlgorithmParametersSchema.default({}),
    evaluation: EvaluationParametersSchema.default({}),
    parallel: ParallelParametersSchema.default({}),
    /** Seed for reproducible runs */
    seed: z.number().int().min(0).max(0xffffffff).optional()
  })
  .superRefine((data, ctx) => {
    const { roomRequirements, minRoomArea, maxRoomArea } = data.layout;

    const total = PROGRAM_ROOM_TYPES.reduce((sum, type) => sum + roomRequirements[type], 0);
    if (total === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'At least one room must be requested',
        path: ['layout', 'roomRequirements']
      });
    }

    for (const type of PROGRAM_ROOM_TYPES) {
      if (roomRequirements[type] === 0) continue;
      const min = minRoomArea[type] ?? DEFAULT_ROOM_TEMPLATES[type].minArea;
      const max = maxRoomArea[type] ?? DEFAULT_ROOM_TEMPLATES[type].maxArea;
      if (min >= max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Minimum area (${min}) must be below maximum area (${max})`,
          path: ['layout', 'minRoomArea', type]
        });
      }
    }

    if (data.algorithm.temperatureEnd > data.algorithm.temperatureStart) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'End temperature must not exceed start temperature',
        path: ['algorithm', 'temperatureEnd']
      });
    }
  });

export type SearchParametersInput = z.input<typeof SearchParametersSchema>;
export type SearchParameters = z.output<typeof SearchParametersSchema>;

// ============================================================================
// PARSING
// ============================================================================

/** Allowed distance of the weight sum from 1 before a warning is raised */
export const WEIGHT_SUM_TOLERANCE = 0.01;

export interface ParsedSearchParameters {
  parameters: SearchParameters;
  warnings: string[];
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export function weightSum(evaluation: SearchParameters['evaluation']): number {
  return (
    evaluation.spaceEfficiencyWeight +
    evaluation.lightingWeight +
    evaluation.ventilationWeight +
    evaluation.circulationWeight +
    evaluation.comfortWeight
  );
}

/**
 * Validates raw parameters and fills defaults.
 *
 * @throws ConfigurationError listing every problem found
 */
export function parseSearchParameters(input: unknown = {}): ParsedSearchParameters {
  const result = SearchParametersSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(formatIssue));
  }

  const parameters = result.data;
  const warnings: string[] = [];

  const sum = weightSum(parameters.evaluation);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    warnings.push(`Evaluation weights sum to ${sum.toFixed(2)} instead of 1.00`);
  }

  return { parameters, warnings };
}

// ============================================================================
// PRESETS
// ============================================================================

export type PresetName = 'small-apartment' | 'standard-house' | 'large-house' | 'luxury-villa';

function program(
  living: number,
  bedroom: number,
  kitchen: number,
  bathroom: number,
  dining: number,
  study: number,
  balcony: number,
  storage: number
): Record<(typeof PROGRAM_ROOM_TYPES)[number], number> {
  return {
    [RoomType.LivingRoom]: living,
    [RoomType.Bedroom]: bedroom,
    [RoomType.Kitchen]: kitchen,
    [RoomType.Bathroom]: bathroom,
    [RoomType.DiningRoom]: dining,
    [RoomType.Study]: study,
    [RoomType.Balcony]: balcony,
    [RoomType.Storage]: storage
  };
}

function weights(
  spaceEfficiency: number,
  lighting: number,
  ventilation: number,
  circulation: number,
  comfort: number
): SearchParametersInput['evaluation'] {
  return {
    spaceEfficiencyWeight: spaceEfficiency,
    lightingWeight: lighting,
    ventilationWeight: ventilation,
    circulationWeight: circulation,
    comfortWeight: comfort
  };
}

export const PRESETS: Record<PresetName, SearchParametersInput> = {
  'small-apartment': {
    layout: { totalWidth: 15, totalHeight: 12, wallThickness: 0.15, roomRequirements: program(1, 1, 1, 1, 0, 0, 1, 0) },
    algorithm: { maxIterations: 500, populationSize: 30, mutationRate: 0.4, crossoverRate: 0.6 },
    evaluation: weights(0.35, 0.25, 0.15, 0.15, 0.10)
  },
  'standard-house': {
    layout: { totalWidth: 20, totalHeight: 15, wallThickness: 0.2, roomRequirements: program(1, 2, 1, 1, 1, 0, 1, 0) },
    algorithm: { maxIterations: 1000, populationSize: 50, mutationRate: 0.3, crossoverRate: 0.7 },
    evaluation: weights(0.25, 0.20, 0.15, 0.20, 0.20)
  },
  'large-house': {
    layout: { totalWidth: 25, totalHeight: 20, wallThickness: 0.25, roomRequirements: program(1, 3, 1, 2, 1, 1, 2, 1) },
    algorithm: { maxIterations: 1500, populationSize: 60, mutationRate: 0.25, crossoverRate: 0.75 },
    evaluation: weights(0.20, 0.25, 0.20, 0.20, 0.15)
  },
  'luxury-villa': {
    layout: { totalWidth: 30, totalHeight: 25, wallThickness: 0.3, roomRequirements: program(2, 4, 1, 3, 1, 2, 3, 2) },
    algorithm: { maxIterations: 2000, populationSize: 80, mutationRate: 0.2, crossoverRate: 0.8 },
    evaluation: weights(0.15, 0.25, 0.20, 0.25, 0.15)
  }
};

export const PRESET_NAMES = Object.keys(PRESETS);

export function isPresetName(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, name);
}

// ============================================================================
// DERIVED SETTINGS
// ============================================================================

export function buildFootprint(parameters: SearchParameters): Rectangle {
  return { x: 0, y: 0, width: parameters.layout.totalWidth, height: parameters.layout.totalHeight };
}

/**
 * Requested counts, omitting types with a count of 0
 */
export function buildRoomRequirements(parameters: SearchParameters): RoomRequirements {
  const requirements: RoomRequirements = {};
  for (const type of PROGRAM_ROOM_TYPES) {
    const n = parameters.layout.roomRequirements[type];
    if (n > 0) {
      requirements[type] = n;
    }
  }
  return requirements;
}

export function buildRoomTemplates(parameters: SearchParameters): RoomTemplateCatalog {
  const overrides: Partial<Record<RoomType, AreaOverride>> = {};
  for (const type of PROGRAM_ROOM_TYPES) {
    overrides[type] = {
      minArea: parameters.layout.minRoomArea[type],
      maxArea: parameters.layout.maxRoomArea[type]
    };
  }
  return createRoomTemplates(overrides);
}

export function buildMonteCarloConfig(parameters: SearchParameters): MonteCarloConfig {
  return {
    ...DEFAULT_MONTE_CARLO_CONFIG,
    ...parameters.algorithm,
    wallThickness: parameters.layout.wallThickness
  };
}

export function buildEvaluationConfig(parameters: SearchParameters): EvaluationConfig {
  return { ...parameters.evaluation };
}
