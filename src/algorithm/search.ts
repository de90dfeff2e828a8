/**
 * Floor Plan Search - Search Entry Point
 *
 * Validates raw parameters, builds the footprint, program, templates and
 * evaluator from them, runs the sequential or parallel optimizer and
 * evaluates the winning layout in detail.
 */

import { EvaluationBreakdown, Layout, LayoutValidation } from './types';
import {
  SearchParameters,
  parseSearchParameters,
  buildFootprint,
  buildRoomRequirements,
  buildRoomTemplates,
  buildMonteCarloConfig,
  buildEvaluationConfig
} from './config';
import { createEvaluator, formatEvaluationReport } from './evaluation';
import { createLayoutConstraints } from './templates';
import { validateLayout } from './layout';
import { MonteCarloOptimizer } from './optimizer';
import { ParallelMonteCarloOptimizer } from './parallel-optimizer';
import { SeededRandom, createRandom } from './utils/random';
import { createLogger } from './utils/logger';

const log = createLogger('search');

export interface SearchOptions {
  /** Overrides the seed given in the parameters */
  rng?: SeededRandom;
}

export interface LayoutSearchResult {
  parameters: SearchParameters;
  layout: Layout;
  bestScore: number;
  evaluation: EvaluationBreakdown;
  report: string;
  validation: LayoutValidation;
  /** Summed over all workers in a parallel run */
  generationCount: number;
  /** Best-score history of the run (of the winning worker when parallel) */
  scoreHistory: number[];
  warnings: string[];
}

export async function runLayoutSearch(
  input: unknown = {},
  options: SearchOptions = {}
): Promise<LayoutSearchResult> {
  const { parameters, warnings } = parseSearchParameters(input);
  for (const warning of warnings) {
    log.warn(warning);
  }

  const footprint = buildFootprint(parameters);
  const requirements = buildRoomRequirements(parameters);
  const config = buildMonteCarloConfig(parameters);
  const evaluator = createEvaluator(buildEvaluationConfig(parameters));
  const rng = options.rng ?? createRandom(parameters.seed);
  const shared = {
    constraints: createLayoutConstraints(),
    templates: buildRoomTemplates(parameters),
    rng
  };

  log.info(
    `searching ${footprint.width}x${footprint.height} footprint` +
      (parameters.parallel.enabled ? ` with ${parameters.parallel.workers} workers` : '')
  );

  let layout: Layout;
  let generationCount: number;
  let scoreHistory: number[];

  if (parameters.parallel.enabled) {
    const optimizer = new ParallelMonteCarloOptimizer(config, evaluator.evaluate, {
      ...shared,
      workers: parameters.parallel.workers
    });
    const result = await optimizer.optimizeDetailed(footprint, requirements);
    const winner = result.workers.find(worker => worker.layout === result.layout);

    layout = result.layout;
    generationCount = result.workers.reduce((sum, worker) => sum + worker.generationCount, 0);
    scoreHistory = winner ? [...winner.scoreHistory] : [];
  } else {
    const optimizer = new MonteCarloOptimizer(config, evaluator.evaluate, shared);
    layout = optimizer.optimize(footprint, requirements);
    generationCount = optimizer.generationCount;
    scoreHistory = [...optimizer.scoreHistory];
  }

  const evaluation = evaluator.evaluateDetailed(layout);
  const validation = validateLayout(layout);
  layout.fitnessScore = evaluation.total.weightedScore;

  if (!validation.valid) {
    log.warn(`best layout has ${validation.errors.length} validation errors`);
  }

  return {
    parameters,
    layout,
    bestScore: evaluation.total.weightedScore,
    evaluation,
    report: formatEvaluationReport(evaluation),
    validation,
    generationCount,
    scoreHistory,
    warnings
  };
}
