/**
 * Floor Plan Search - Parallel Optimizer
 *
 * Splits the iteration and population budgets across independent workers,
 * each with its own optimizer and forked random stream. Workers run as
 * asynchronous tasks that yield to the event loop between iterations; the
 * evaluation function is a plain closure, so the work stays on one thread.
 *
 * The returned layout is the worker best with the highest re-evaluated score.
 */

import {
  EvaluationFunction,
  Layout,
  LayoutConstraints,
  MonteCarloConfig,
  RoomRequirements,
  RoomTemplateCatalog
} from './types';
import { Rectangle } from '../types/geometry';
import { MonteCarloOptimizer } from './optimizer';
import { SeededRandom, createRandom } from './utils/random';
import { createLogger } from './utils/logger';

const log = createLogger('parallel');

export const DEFAULT_WORKER_COUNT = 4;

export interface ParallelOptimizerOptions {
  workers?: number;
  constraints?: LayoutConstraints;
  templates?: RoomTemplateCatalog;
  rng?: SeededRandom;
}

export interface WorkerResult {
  worker: number;
  layout: Layout;
  /** Score of `layout` recomputed after the worker finished */
  score: number;
  generationCount: number;
  scoreHistory: number[];
}

export interface ParallelResult {
  layout: Layout;
  score: number;
  workers: WorkerResult[];
}

/**
 * Per-worker share of the budget (integer division, at least 1 each)
 */
export function splitConfig(config: MonteCarloConfig, workers: number): MonteCarloConfig {
  return {
    ...config,
    maxIterations: Math.max(1, Math.floor(config.maxIterations / workers)),
    populationSize: Math.max(1, Math.floor(config.populationSize / workers))
  };
}

const nextTick = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

export class ParallelMonteCarloOptimizer {
  readonly config: MonteCarloConfig;
  readonly workers: number;
  private readonly evaluate: EvaluationFunction;
  private readonly options: ParallelOptimizerOptions;

  constructor(
    config: MonteCarloConfig,
    evaluate: EvaluationFunction,
    options: ParallelOptimizerOptions = {}
  ) {
    this.config = config;
    this.evaluate = evaluate;
    this.options = options;
    this.workers = Math.max(1, Math.floor(options.workers ?? DEFAULT_WORKER_COUNT));
  }

  async optimize(footprint: Rectangle, requirements: RoomRequirements): Promise<Layout> {
    const result = await this.optimizeDetailed(footprint, requirements);
    return result.layout;
  }

  async optimizeDetailed(footprint: Rectangle, requirements: RoomRequirements): Promise<ParallelResult> {
    const rng = this.options.rng ?? createRandom();
    const workerConfig = splitConfig(this.config, this.workers);

    // Forked up front so each stream depends only on the worker index
    const streams = Array.from({ length: this.workers }, () => rng.fork());

    log.info(
      `running ${this.workers} workers x ${workerConfig.maxIterations} iterations, population ${workerConfig.populationSize}`
    );

    const results = await Promise.all(
      streams.map((stream, worker) => this.runWorker(worker, workerConfig, stream, footprint, requirements))
    );

    let best = results[0];
    for (const result of results) {
      if (result.score > best.score) {
        best = result;
      }
    }

    return { layout: best.layout, score: best.score, workers: results };
  }

  private async runWorker(
    worker: number,
    config: MonteCarloConfig,
    rng: SeededRandom,
    footprint: Rectangle,
    requirements: RoomRequirements
  ): Promise<WorkerResult> {
    const optimizer = new MonteCarloOptimizer(config, this.evaluate, {
      constraints: this.options.constraints,
      templates: this.options.templates,
      rng
    });

    let layout = optimizer.initialize(footprint, requirements);
    for (let i = 0; i < config.maxIterations; i++) {
      await nextTick();
      if (optimizer.step()) break;
    }
    layout = optimizer.bestLayout ?? layout;

    const score = this.evaluate(layout);
    log.debug(`worker ${worker} done: ${optimizer.generationCount} generations, score ${score.toFixed(4)}`);

    return {
      worker,
      layout,
      score,
      generationCount: optimizer.generationCount,
      scoreHistory: optimizer.scoreHistory
    };
  }
}
