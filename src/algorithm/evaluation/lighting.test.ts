/**
 * Lighting Score Tests
 */

import {
  scoreWindowCoverage,
  scoreLightingUniformity,
  scoreLightingSources,
  scoreLighting
} from './lighting';
import { addWindow } from '../room';
import { DEFAULT_EVALUATION_CONFIG } from '../constants';
import { createCompleteLayout, createCrossLitLayout } from '../../../test/fixtures/layouts';

const config = DEFAULT_EVALUATION_CONFIG;

describe('lighting', () => {
  it('should score a windowless layout as unlit', () => {
    const layout = createCompleteLayout();

    expect(scoreWindowCoverage(layout, config)).toBe(0);
    expect(scoreLightingUniformity(layout, config)).toBe(0);
    expect(scoreLightingSources(layout)).toBe(0);
    expect(scoreLighting(layout, config)).toBe(0);
  });

  it('should compare window area with wall area', () => {
    // 0.3 sq m of glass on 22 m x 2.8 m of wall
    expect(scoreWindowCoverage(createCrossLitLayout(), config)).toBeCloseTo(0.3 / 61.6 / 0.15, 10);
  });

  it('should score uniformity from the nearest window', () => {
    // room center (3, 2.5), window centers (0.05, 1.75) and (5.95, 1.75)
    const expected = 1 - Math.sqrt(2.95 * 2.95 + 0.75 * 0.75) / 6;
    expect(scoreLightingUniformity(createCrossLitLayout(), config)).toBeCloseTo(expected, 10);
  });

  it('should count windowless rooms as zero in the uniformity mean', () => {
    const lit = createCrossLitLayout();
    const single = scoreLightingUniformity(lit, config);

    const mixed = createCompleteLayout();
    addWindow(mixed.rooms[0], { x: 0, y: 1, width: 0.1, height: 1.5 });
    addWindow(mixed.rooms[0], { x: 5.9, y: 1, width: 0.1, height: 1.5 });

    expect(scoreLightingUniformity(mixed, config)).toBeCloseTo(single / 4, 10);
  });

  it('should reward rooms lit from two orientations', () => {
    // one living room with west and east windows
    expect(scoreLightingSources(createCrossLitLayout())).toBeCloseTo(1 / 6, 10);
  });

  it('should give half credit for a single orientation', () => {
    const layout = createCompleteLayout();
    addWindow(layout.rooms[1], { x: 7, y: 0, width: 1.5, height: 0.1 });

    expect(scoreLightingSources(layout)).toBeCloseTo(0.5 / 6, 10);
  });
});
