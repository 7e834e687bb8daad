/**
 * Scorer
 *
 * Maps each category's RawSignal to a 0..100 score through the category's
 * own normalisation rule, then to a named level through its bucket table.
 * Insufficient categories pass through as insufficient; they are never given
 * a default score.
 */

import type { LevelBucket, ScoringConfig } from '../config/scoringConfig';
import { DEFAULT_SCORING_CONFIG } from '../config/scoringConfig';
import type { Category, ExtractionOutcome, MetricOutcome } from '../types/assessment';
import { clamp } from '../utils/math';

/**
 * First bucket (highest threshold first) whose threshold the score reaches.
 * A score exactly on a threshold belongs to the higher bucket; scores below
 * every threshold fall into the last bucket.
 */
export function lookupLevel(score: number, buckets: readonly LevelBucket[]): string {
  for (const bucket of buckets) {
    if (score >= bucket.min) return bucket.level;
  }
  const floor = buckets[buckets.length - 1];
  if (!floor) {
    throw new Error('Bucket table is empty');
  }
  return floor.level;
}

export class Scorer {
  constructor(private readonly config: ScoringConfig = DEFAULT_SCORING_CONFIG) {}

  /** Name of the best bucket for a category */
  topLevel(category: Category): string {
    return this.config.rules[category].buckets[0]?.level ?? '';
  }

  score(category: Category, outcome: ExtractionOutcome): MetricOutcome {
    if (!outcome.ok) {
      return { name: category, status: 'insufficient', reason: outcome.error.reason };
    }

    const { value, raw } = outcome.signal;
    const rule = this.config.rules[category];
    const normalized = rule.normalize(value);
    if (!Number.isFinite(normalized)) {
      return { name: category, status: 'insufficient', reason: `non-finite measurement ${value}` };
    }

    const score = clamp(normalized, 0, 100);
    return {
      name: category,
      status: 'scored',
      score,
      level: lookupLevel(score, rule.buckets),
      value,
      raw,
    };
  }

  scoreAll(
    outcomes: ReadonlyMap<Category, ExtractionOutcome>
  ): Partial<Record<Category, MetricOutcome>> {
    const metrics: Partial<Record<Category, MetricOutcome>> = {};
    for (const [category, outcome] of outcomes) {
      metrics[category] = this.score(category, outcome);
    }
    return metrics;
  }
}
