/**
 * Search Entry Point Tests
 */

import { runLayoutSearch } from './search';
import { ConfigurationError } from './errors';
import { evaluateLayout } from './evaluation';
import { RoomType } from './types';
import { SeededRandom } from './utils/random';

const QUICK = {
  algorithm: { maxIterations: 10, populationSize: 6 },
  seed: 7
};

describe('runLayoutSearch', () => {
  it('should return a scored and evaluated layout', async () => {
    const result = await runLayoutSearch(QUICK);

    expect(result.layout.rooms.length).toBeGreaterThan(0);
    expect(result.bestScore).toBe(result.evaluation.total.weightedScore);
    expect(result.layout.fitnessScore).toBe(result.bestScore);
    expect(result.bestScore).toBe(evaluateLayout(result.layout));
    expect(result.scoreHistory.length).toBeGreaterThan(0);
    expect(result.scoreHistory.length).toBeLessThanOrEqual(10);
    expect(result.scoreHistory[result.scoreHistory.length - 1]).toBe(result.bestScore);
    expect(result.report.split('\n')[0]).toBe('=== Layout Evaluation Report ===');
    expect(result.warnings).toEqual([]);
  });

  it('should keep rooms on the requested footprint', async () => {
    const result = await runLayoutSearch({ ...QUICK, layout: { totalWidth: 14, totalHeight: 10 } });

    expect(result.layout.bounds).toEqual({ x: 0, y: 0, width: 14, height: 10 });
    expect(result.validation.errors.filter(error => error.includes('outside'))).toEqual([]);
  });

  it('should only place requested room types', async () => {
    const result = await runLayoutSearch({
      ...QUICK,
      layout: {
        roomRequirements: {
          [RoomType.LivingRoom]: 1,
          [RoomType.Bedroom]: 0,
          [RoomType.Kitchen]: 1,
          [RoomType.Bathroom]: 0
        }
      }
    });

    for (const room of result.layout.rooms) {
      expect([RoomType.LivingRoom, RoomType.Kitchen]).toContain(room.type);
    }
  });

  it('should be reproducible for a fixed seed', async () => {
    const first = await runLayoutSearch(QUICK);
    const second = await runLayoutSearch(QUICK);

    expect(second.bestScore).toBe(first.bestScore);
    expect(second.layout.rooms).toEqual(first.layout.rooms);
  });

  it('should prefer an explicit random source over the seed', async () => {
    const first = await runLayoutSearch({ algorithm: QUICK.algorithm }, { rng: new SeededRandom(3) });
    const second = await runLayoutSearch(QUICK, { rng: new SeededRandom(3) });

    expect(second.layout.rooms).toEqual(first.layout.rooms);
  });

  it('should split the run across parallel workers', async () => {
    const result = await runLayoutSearch({ ...QUICK, parallel: { enabled: true, workers: 2 } });

    expect(result.layout.rooms.length).toBeGreaterThan(0);
    expect(result.bestScore).toBe(evaluateLayout(result.layout));
    expect(result.scoreHistory.length).toBeGreaterThan(0);
    expect(result.scoreHistory.length).toBeLessThanOrEqual(5);
    expect(result.generationCount).toBeLessThanOrEqual(10);
  });

  it('should pass on configuration warnings', async () => {
    const result = await runLayoutSearch({ ...QUICK, evaluation: { lightingWeight: 0.4 } });

    expect(result.warnings).toEqual(['Evaluation weights sum to 1.20 instead of 1.00']);
  });

  it('should reject invalid parameters', async () => {
    await expect(runLayoutSearch({ layout: { totalWidth: 0 } })).rejects.toThrow(ConfigurationError);
  });
});
