/**
 * Floor Plan Search - Layout Evaluation
 *
 * Five independent scorers share one signature, `(layout, config) => number`.
 * The total is the weighted sum of their scores; weights are used as given
 * and never normalized.
 */

import {
  DimensionScore,
  EvaluationBreakdown,
  EvaluationConfig,
  EvaluationDimension,
  EvaluationFunction,
  Layout
} from '../types';
import {
  DEFAULT_EVALUATION_CONFIG,
  DIMENSION_LABELS,
  DIMENSION_WEIGHT_KEYS
} from '../constants';
import { scoreSpaceEfficiency } from './space-efficiency';
import { scoreLighting } from './lighting';
import { scoreVentilation } from './ventilation';
import { scoreCirculation } from './circulation';
import { scoreComfort } from './comfort';

export type DimensionScorer = (layout: Layout, config: EvaluationConfig) => number;

/**
 * Scorers in reporting order
 */
export const DIMENSION_SCORERS: Record<EvaluationDimension, DimensionScorer> = {
  spaceEfficiency: scoreSpaceEfficiency,
  lighting: scoreLighting,
  ventilation: scoreVentilation,
  circulation: scoreCirculation,
  comfort: scoreComfort
};

const DIMENSIONS: readonly EvaluationDimension[] = [
  'spaceEfficiency',
  'lighting',
  'ventilation',
  'circulation',
  'comfort'
];

export function evaluateLayoutDetailed(
  layout: Layout,
  config: EvaluationConfig = DEFAULT_EVALUATION_CONFIG
): EvaluationBreakdown {
  let total = 0;
  let totalWeight = 0;

  const scoreDimension = (dimension: EvaluationDimension): DimensionScore => {
    const score = DIMENSION_SCORERS[dimension](layout, config);
    const weight = config[DIMENSION_WEIGHT_KEYS[dimension]];
    const weightedScore = score * weight;
    total += weightedScore;
    totalWeight += weight;
    return { score, weight, weightedScore };
  };

  // Summed in reporting order
  const spaceEfficiency = scoreDimension('spaceEfficiency');
  const lighting = scoreDimension('lighting');
  const ventilation = scoreDimension('ventilation');
  const circulation = scoreDimension('circulation');
  const comfort = scoreDimension('comfort');

  return {
    spaceEfficiency,
    lighting,
    ventilation,
    circulation,
    comfort,
    total: { score: total, weight: totalWeight, weightedScore: total }
  };
}

/**
 * Weighted total; always equal to `evaluateLayoutDetailed(...).total.weightedScore`
 */
export function evaluateLayout(
  layout: Layout,
  config: EvaluationConfig = DEFAULT_EVALUATION_CONFIG
): number {
  return evaluateLayoutDetailed(layout, config).total.weightedScore;
}

/**
 * Plain-text report of a breakdown, two decimals per figure
 */
export function formatEvaluationReport(breakdown: EvaluationBreakdown): string {
  const lines = [
    '=== Layout Evaluation Report ===',
    '',
    `Total score: ${breakdown.total.weightedScore.toFixed(2)}`,
    ''
  ];

  for (const dimension of DIMENSIONS) {
    const result = breakdown[dimension];
    lines.push(
      `${DIMENSION_LABELS[dimension]}:`,
      `  Score: ${result.score.toFixed(2)}`,
      `  Weight: ${result.weight.toFixed(2)}`,
      `  Weighted score: ${result.weightedScore.toFixed(2)}`,
      ''
    );
  }

  return lines.join('\n');
}

export interface LayoutEvaluator {
  readonly config: EvaluationConfig;
  evaluate: EvaluationFunction;
  evaluateDetailed: (layout: Layout) => EvaluationBreakdown;
  report: (layout: Layout) => string;
}

/**
 * Binds a configuration to the evaluation functions
 */
export function createEvaluator(
  config: EvaluationConfig = DEFAULT_EVALUATION_CONFIG
): LayoutEvaluator {
  return {
    config,
    evaluate: layout => evaluateLayout(layout, config),
    evaluateDetailed: layout => evaluateLayoutDetailed(layout, config),
    report: layout => formatEvaluationReport(evaluateLayoutDetailed(layout, config))
  };
}
