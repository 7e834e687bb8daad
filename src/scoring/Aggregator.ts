/**
 * Aggregator
 *
 * Weighted overall score over the technique categories that were scored,
 * with weights renormalised to sum to 1, and the grade estimate for it.
 */

import type { GradeRow, ScoringConfig } from '../config/scoringConfig';
import { DEFAULT_SCORING_CONFIG, INDETERMINATE_GRADE } from '../config/scoringConfig';
import type { Category, MetricOutcome, TechniqueCategory } from '../types/assessment';
import { TECHNIQUE_CATEGORIES } from '../types/assessment';

export interface Aggregate {
  overallScore: number | null;
  grade: string;
  weights: Partial<Record<TechniqueCategory, number>>;
}

/**
 * First row (highest minimum first) whose minimum the score reaches.
 */
export function lookupGrade(score: number, grades: readonly GradeRow[]): string {
  for (const row of grades) {
    if (score >= row.min) return row.label;
  }
  return grades[grades.length - 1]?.label ?? INDETERMINATE_GRADE;
}

export function aggregate(
  metrics: Partial<Record<Category, MetricOutcome>>,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): Aggregate {
  const scored: { category: TechniqueCategory; score: number; weight: number }[] = [];
  for (const category of TECHNIQUE_CATEGORIES) {
    const metric = metrics[category];
    const weight = config.weights[category];
    if (metric?.status === 'scored' && weight > 0) {
      scored.push({ category, score: metric.score, weight });
    }
  }

  const total = scored.reduce((sum, s) => sum + s.weight, 0);
  if (scored.length === 0 || total <= 0) {
    return { overallScore: null, grade: INDETERMINATE_GRADE, weights: {} };
  }

  const weights: Partial<Record<TechniqueCategory, number>> = {};
  let overall = 0;
  for (const s of scored) {
    const w = s.weight / total;
    weights[s.category] = w;
    overall += w * s.score;
  }

  return { overallScore: overall, grade: lookupGrade(overall, config.grades), weights };
}
