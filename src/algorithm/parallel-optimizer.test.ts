/**
 * Parallel Optimizer Tests
 */

import { ParallelMonteCarloOptimizer, splitConfig } from './parallel-optimizer';
import { createEvaluator } from './evaluation';
import { SeededRandom } from './utils/random';
import { STANDARD_FOOTPRINT } from '../../test/fixtures/footprints';
import { TWO_BEDROOM_PROGRAM, FAST_CONFIG } from '../../test/fixtures/configs';

const evaluator = createEvaluator();

describe('splitConfig', () => {
  it('should divide the budgets between workers', () => {
    const share = splitConfig(FAST_CONFIG, 3);

    expect(share.maxIterations).toBe(16);
    expect(share.populationSize).toBe(6);
    expect(share.mutationRate).toBe(FAST_CONFIG.mutationRate);
  });

  it('should give every worker at least one iteration and one layout', () => {
    const share = splitConfig(FAST_CONFIG, 100);

    expect(share.maxIterations).toBe(1);
    expect(share.populationSize).toBe(1);
  });
});

describe('ParallelMonteCarloOptimizer', () => {
  it('should return the best of the workers', async () => {
    const optimizer = new ParallelMonteCarloOptimizer(FAST_CONFIG, evaluator.evaluate, {
      workers: 2,
      rng: new SeededRandom(17)
    });

    const result = await optimizer.optimizeDetailed(STANDARD_FOOTPRINT, TWO_BEDROOM_PROGRAM);
    const scores = result.workers.map(worker => worker.score);

    expect(result.workers).toHaveLength(2);
    expect(result.score).toBe(Math.max(...scores));
    expect(result.score).toBeGreaterThanOrEqual(Math.min(...scores));
    expect(result.score).toBe(evaluator.evaluate(result.layout));
    for (const worker of result.workers) {
      expect(worker.scoreHistory.length).toBeLessThanOrEqual(25);
    }
  });

  it('should be reproducible for a fixed seed', async () => {
    const run = (): Promise<number> =>
      new ParallelMonteCarloOptimizer(FAST_CONFIG, evaluator.evaluate, {
        workers: 3,
        rng: new SeededRandom(5)
      })
        .optimizeDetailed(STANDARD_FOOTPRINT, TWO_BEDROOM_PROGRAM)
        .then(result => result.score);

    expect(await run()).toBe(await run());
  });

  it('should resolve to a layout from optimize', async () => {
    const optimizer = new ParallelMonteCarloOptimizer(FAST_CONFIG, evaluator.evaluate, {
      workers: 2,
      rng: new SeededRandom(3)
    });

    const layout = await optimizer.optimize(STANDARD_FOOTPRINT, TWO_BEDROOM_PROGRAM);

    expect(layout.rooms.length).toBeGreaterThan(0);
  });

  it('should clamp the worker count', () => {
    expect(new ParallelMonteCarloOptimizer(FAST_CONFIG, evaluator.evaluate, { workers: 0 }).workers).toBe(1);
    expect(new ParallelMonteCarloOptimizer(FAST_CONFIG, evaluator.evaluate).workers).toBe(4);
  });
});
