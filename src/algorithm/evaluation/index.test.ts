/**
 * Layout Evaluation Tests
 */

import {
  evaluateLayout,
  evaluateLayoutDetailed,
  formatEvaluationReport,
  createEvaluator
} from './index';
import { scoreLightingUniformity } from './lighting';
import { createLayout } from '../layout';
import { EvaluationBreakdown } from '../types';
import { DEFAULT_EVALUATION_CONFIG } from '../constants';
import { createCompleteLayout, createCrossLitLayout } from '../../../test/fixtures/layouts';

describe('evaluateLayoutDetailed', () => {
  it('should report the weighted sum as the total', () => {
    const breakdown = evaluateLayoutDetailed(createCompleteLayout());
    const dimensions = [
      breakdown.spaceEfficiency,
      breakdown.lighting,
      breakdown.ventilation,
      breakdown.circulation,
      breakdown.comfort
    ];

    for (const result of dimensions) {
      expect(result.weightedScore).toBe(result.score * result.weight);
    }
    expect(breakdown.total.score).toBe(breakdown.total.weightedScore);
    expect(breakdown.total.weight).toBeCloseTo(1, 10);
    expect(breakdown.total.weightedScore).toBeCloseTo(
      dimensions.reduce((sum, result) => sum + result.weightedScore, 0),
      10
    );
  });

  it('should agree exactly with evaluateLayout', () => {
    for (const layout of [createCompleteLayout(), createCrossLitLayout()]) {
      expect(evaluateLayoutDetailed(layout).total.weightedScore).toBe(evaluateLayout(layout));
    }
  });

  it('should use weights as given without normalizing', () => {
    const layout = createCompleteLayout();
    const doubled = {
      ...DEFAULT_EVALUATION_CONFIG,
      spaceEfficiencyWeight: 2,
      lightingWeight: 2,
      ventilationWeight: 2,
      circulationWeight: 2,
      comfortWeight: 2
    };
    const breakdown = evaluateLayoutDetailed(layout, doubled);

    expect(breakdown.total.weight).toBe(10);
    expect(breakdown.lighting.weight).toBe(2);
    expect(breakdown.total.weightedScore).toBeGreaterThan(evaluateLayout(layout));
  });

  it('should score a windowless layout with zero uniformity and a finite total', () => {
    const layout = createCompleteLayout();

    expect(scoreLightingUniformity(layout, DEFAULT_EVALUATION_CONFIG)).toBe(0);
    expect(Number.isFinite(evaluateLayout(layout))).toBe(true);
  });

  it('should stay finite for degenerate layouts', () => {
    expect(Number.isFinite(evaluateLayout(createLayout({ x: 0, y: 0, width: 0, height: 0 })))).toBe(true);
    expect(Number.isFinite(evaluateLayout(createLayout({ x: 0, y: 0, width: 10, height: 10 })))).toBe(true);
  });
});

describe('formatEvaluationReport', () => {
  it('should render every dimension with two decimals', () => {
    const entry = { score: 0.5, weight: 0.2, weightedScore: 0.1 };
    const breakdown: EvaluationBreakdown = {
      spaceEfficiency: { score: 0.8, weight: 0.25, weightedScore: 0.2 },
      lighting: entry,
      ventilation: entry,
      circulation: entry,
      comfort: entry,
      total: { score: 0.6, weight: 1.05, weightedScore: 0.6 }
    };

    const lines = formatEvaluationReport(breakdown).split('\n');

    expect(lines.slice(0, 9)).toEqual([
      '=== Layout Evaluation Report ===',
      '',
      'Total score: 0.60',
      '',
      'Space efficiency:',
      '  Score: 0.80',
      '  Weight: 0.25',
      '  Weighted score: 0.20',
      ''
    ]);
    expect(lines).toContain('Comfort:');
    expect(lines).toHaveLength(29);
  });
});

describe('createEvaluator', () => {
  it('should bind the configuration', () => {
    const evaluator = createEvaluator();
    const layout = createCompleteLayout();

    expect(evaluator.config).toBe(DEFAULT_EVALUATION_CONFIG);
    expect(evaluator.evaluate(layout)).toBe(evaluateLayout(layout));
    expect(evaluator.evaluateDetailed(layout)).toEqual(evaluateLayoutDetailed(layout));
    expect(evaluator.report(layout)).toContain('Total score: ');
  });
});
