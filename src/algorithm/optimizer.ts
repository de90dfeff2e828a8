/**
 * Floor Plan Search - Monte Carlo Optimizer
 *
 * Evolves a population of random layouts:
 *   selection (tournament + elites) -> crossover / mutation ->
 *   merge with the current population -> keep the best `populationSize`
 *
 * The best layout seen so far is tracked separately, so the score history
 * never decreases. The run stops after `maxIterations`, after
 * `maxNoImprovement` iterations without a strictly better layout, or when
 * the recent history has flattened out.
 *
 * ## Temperature
 *
 * An annealing temperature is decayed every iteration and exposed for
 * inspection. It does not influence selection or variation.
 */

import {
  Layout,
  LayoutConstraints,
  MonteCarloConfig,
  EvaluationFunction,
  RoomRequirements,
  RoomTemplateCatalog,
  RoomType,
  ScoredLayout
} from './types';
import { Rectangle } from '../types/geometry';
import { createLayout, copyLayout, adoptRoom, getRoomsByType, addRoom } from './layout';
import { generateLayout, GenerationContext } from './layout-generator';
import { createRoomTemplates, createLayoutConstraints, sampleRoomSize } from './templates';
import { OPTIMIZER } from './constants';
import { CrossoverError } from './errors';
import { SeededRandom, createRandom } from './utils/random';
import { createLogger } from './utils/logger';

const log = createLogger('optimizer');

export interface OptimizerOptions {
  constraints?: LayoutConstraints;
  templates?: RoomTemplateCatalog;
  /** Source of all randomness; a random seed is drawn when omitted */
  rng?: SeededRandom;
}

type MutationKind = 'position' | 'size' | 'swap' | 'replace';

const MUTATION_KINDS: readonly [MutationKind, ...MutationKind[]] = [
  'position',
  'size',
  'swap',
  'replace'
];

interface SearchProblem {
  footprint: Rectangle;
  requirements: RoomRequirements;
}

/**
 * Population variance
 */
function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  return values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
}

function requestedTypes(requirements: RoomRequirements): RoomType[] {
  return Object.values(RoomType).filter(type => (requirements[type] ?? 0) > 0);
}

export class MonteCarloOptimizer {
  readonly config: MonteCarloConfig;
  private readonly evaluate: EvaluationFunction;
  private readonly rng: SeededRandom;
  private readonly generation: GenerationContext;

  private problem: SearchProblem | null = null;
  private population: ScoredLayout[] = [];
  private noImprovementCount = 0;

  bestLayout: Layout | null = null;
  bestScore = Number.NEGATIVE_INFINITY;
  /** Iterations completed without triggering convergence */
  generationCount = 0;
  /** Best score after each iteration */
  scoreHistory: number[] = [];
  temperature: number;

  constructor(config: MonteCarloConfig, evaluate: EvaluationFunction, options: OptimizerOptions = {}) {
    this.config = config;
    this.evaluate = evaluate;
    this.rng = options.rng ?? createRandom();
    this.temperature = config.temperatureStart;
    this.generation = {
      config,
      constraints: options.constraints ?? createLayoutConstraints(),
      templates: options.templates ?? createRoomTemplates(),
      rng: this.rng
    };
  }

  // ==========================================================================
  // RUN CONTROL
  // ==========================================================================

  /**
   * Runs the full search and returns the best layout found
   */
  optimize(footprint: Rectangle, requirements: RoomRequirements): Layout {
    const best = this.initialize(footprint, requirements);

    for (let i = 0; i < this.config.maxIterations; i++) {
      if (this.step()) break;
    }

    log.info(`finished after ${this.generationCount} generations, best score ${this.bestScore.toFixed(4)}`);
    return this.bestLayout ?? best;
  }

  /**
   * Resets state and builds the initial population. Returns its best member.
   */
  initialize(footprint: Rectangle, requirements: RoomRequirements): Layout {
    this.problem = { footprint, requirements };
    this.generationCount = 0;
    this.scoreHistory = [];
    this.noImprovementCount = 0;
    this.temperature = this.config.temperatureStart;

    const size = Math.max(1, this.config.populationSize);
    const initial: Layout[] = [];
    for (let i = 0; i < size; i++) {
      initial.push(generateLayout(footprint, requirements, this.generation));
    }

    this.population = this.score(initial).sort((a, b) => b.score - a.score);
    const top = this.population[0];
    this.bestLayout = copyLayout(top.layout);
    this.bestScore = top.score;
    return this.bestLayout;
  }

  /**
   * Runs one iteration. Returns true once the search has converged.
   */
  step(): boolean {
    const problem = this.problem;
    if (!problem) {
      throw new Error('MonteCarloOptimizer.step() called before initialize()');
    }

    const parents = this.selectParents();
    const offspring = this.breed(parents, problem);

    this.population = [...this.population, ...this.score(offspring)]
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(1, this.config.populationSize));

    const top = this.population[0];
    if (top.score > this.bestScore) {
      this.bestLayout = copyLayout(top.layout);
      this.bestScore = top.score;
      this.noImprovementCount = 0;
    } else {
      this.noImprovementCount += 1;
    }

    this.scoreHistory.push(this.bestScore);
    this.temperature = Math.max(this.config.temperatureEnd, this.temperature * this.config.coolingRate);

    if (this.hasConverged()) {
      log.debug(`converged at generation ${this.generationCount}`);
      return true;
    }

    this.generationCount += 1;
    return false;
  }

  hasConverged(): boolean {
    if (this.noImprovementCount >= this.config.maxNoImprovement) {
      return true;
    }

    const window = OPTIMIZER.CONVERGENCE_WINDOW;
    if (this.scoreHistory.length >= window) {
      return variance(this.scoreHistory.slice(-window)) < this.config.convergenceThreshold;
    }

    return false;
  }

  /**
   * Current population, best first
   */
  getPopulation(): readonly ScoredLayout[] {
    return this.population;
  }

  // ==========================================================================
  // SELECTION
  // ==========================================================================

  private score(layouts: Layout[]): ScoredLayout[] {
    return layouts.map(layout => {
      const score = this.evaluate(layout);
      layout.fitnessScore = score;
      return { layout, score };
    });
  }

  /**
   * Tournament winners (sampled with replacement) followed by the elites,
   * all copied
   */
  private selectParents(): Layout[] {
    const { populationSize, eliteRatio } = this.config;
    const winners = Math.floor(populationSize * (1 - eliteRatio));
    const elites = Math.min(Math.floor(populationSize * eliteRatio), this.population.length);
    const selected: Layout[] = [];

    for (let i = 0; i < winners; i++) {
      let winner = this.population[this.rng.int(0, this.population.length - 1)];
      for (let k = 1; k < OPTIMIZER.TOURNAMENT_SIZE; k++) {
        const contender = this.population[this.rng.int(0, this.population.length - 1)];
        if (contender.score > winner.score) {
          winner = contender;
        }
      }
      selected.push(copyLayout(winner.layout));
    }

    for (let i = 0; i < elites; i++) {
      selected.push(copyLayout(this.population[i].layout));
    }

    // Tiny populations can round both shares down to zero
    if (selected.length === 0) {
      selected.push(copyLayout(this.population[0].layout));
    }

    return selected;
  }

  private breed(parents: Layout[], problem: SearchProblem): Layout[] {
    const offspring: Layout[] = [];
    const size = Math.max(1, this.config.populationSize);

    while (offspring.length < size) {
      const child = this.produceChild(parents, problem);
      child.generationId = this.generationCount + 1;
      offspring.push(child);
    }

    return offspring;
  }

  private produceChild(parents: Layout[], { footprint, requirements }: SearchProblem): Layout {
    if (parents.length >= 2 && this.rng.chance(this.config.crossoverRate)) {
      for (let attempt = 0; attempt < OPTIMIZER.MAX_CROSSOVER_RETRIES; attempt++) {
        const [first, second] = this.rng.sample(parents, 2);
        try {
          return this.crossover(first, second, footprint, requirements);
        } catch (error) {
          if (!(error instanceof CrossoverError)) throw error;
          log.debug(`crossover attempt ${attempt + 1} failed: ${error.message}`);
        }
      }
      log.debug('crossover retries exhausted, falling back to mutation');
    }

    const parent = parents[this.rng.int(0, parents.length - 1)];
    return this.mutate(parent, footprint, requirements);
  }

  // ==========================================================================
  // VARIATION
  // ==========================================================================

  /**
   * Builds a child on `footprint` taking each required room instance from
   * one of the parents (coin flip, falling back to whichever parent has the
   * type). Instances neither parent can supply are listed in
   * `metadata.droppedRooms`. The child is mutated with probability
   * `mutationRate`.
   *
   * @throws CrossoverError when neither parent contributes any room
   */
  crossover(
    first: Layout,
    second: Layout,
    footprint: Rectangle,
    requirements: RoomRequirements
  ): Layout {
    const child = createLayout(footprint);
    const dropped: RoomType[] = [];

    for (const type of requestedTypes(requirements)) {
      const count = requirements[type] ?? 0;
      const fromFirst = getRoomsByType(first, type);
      const fromSecond = getRoomsByType(second, type);

      for (let i = 0; i < count; i++) {
        const preferred = this.rng.chance(0.5) ? fromFirst : fromSecond;
        const other = preferred === fromFirst ? fromSecond : fromFirst;
        const source = preferred.length > 0 ? preferred : other;

        if (source.length > 0) {
          adoptRoom(child, source[i % source.length]);
        } else {
          dropped.push(type);
        }
      }
    }

    if (child.rooms.length === 0) {
      throw new CrossoverError('parents share no requested room type');
    }

    if (dropped.length > 0) {
      child.metadata.droppedRooms = dropped;
      log.debug(`crossover dropped ${dropped.join(', ')}`);
    }

    return this.rng.chance(this.config.mutationRate)
      ? this.mutate(child, footprint, requirements)
      : child;
  }

  /**
   * Returns a mutated copy of `layout`; the input is left untouched.
   * Moves that would leave the footprint are discarded, and a replacement
   * room is shrunk to the footprint when its sampled size exceeds it.
   */
  mutate(layout: Layout, footprint: Rectangle, requirements: RoomRequirements): Layout {
    const mutated = copyLayout(layout);
    const kind = this.rng.choice(MUTATION_KINDS);
    const right = footprint.x + footprint.width;
    const bottom = footprint.y + footprint.height;
    const { rooms } = mutated;

    switch (kind) {
      case 'position': {
        if (rooms.length === 0) break;
        const room = rooms[this.rng.int(0, rooms.length - 1)];
        const jitter = OPTIMIZER.POSITION_JITTER;
        const x = Math.max(footprint.x, room.bounds.x + this.rng.uniform(-jitter, jitter));
        const y = Math.max(footprint.y, room.bounds.y + this.rng.uniform(-jitter, jitter));
        if (x + room.bounds.width <= right && y + room.bounds.height <= bottom) {
          room.bounds = { ...room.bounds, x, y };
        }
        break;
      }

      case 'size': {
        if (rooms.length === 0) break;
        const room = rooms[this.rng.int(0, rooms.length - 1)];
        const jitter = OPTIMIZER.SIZE_JITTER;
        const width = Math.max(OPTIMIZER.MIN_MUTATED_SIDE, room.bounds.width + this.rng.uniform(-jitter, jitter));
        const height = Math.max(OPTIMIZER.MIN_MUTATED_SIDE, room.bounds.height + this.rng.uniform(-jitter, jitter));
        if (room.bounds.x + width <= right && room.bounds.y + height <= bottom) {
          room.bounds = { ...room.bounds, width, height };
        }
        break;
      }

      case 'swap': {
        if (rooms.length < 2) break;
        const [a, b] = this.rng.sample(rooms, 2);
        const held = a.bounds;
        a.bounds = b.bounds;
        b.bounds = held;
        break;
      }

      case 'replace': {
        if (rooms.length < 2) break;
        rooms.splice(this.rng.int(0, rooms.length - 1), 1);

        const types = requestedTypes(requirements);
        if (types.length === 0) break;
        const type = types[this.rng.int(0, types.length - 1)];
        const template = this.generation.templates[type];
        if (!template) break;

        // Clamped so the fresh room always fits the footprint
        const size = sampleRoomSize(template, this.rng);
        const width = Math.min(size.width, footprint.width);
        const height = Math.min(size.height, footprint.height);
        const x = this.rng.uniform(footprint.x, right - width);
        const y = this.rng.uniform(footprint.y, bottom - height);
        addRoom(mutated, type, { x, y, width, height }, template.minArea);
        break;
      }
    }

    return mutated;
  }
}
