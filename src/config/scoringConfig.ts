/**
 * Scoring Configuration
 *
 * Per-category normalisation (raw measurement -> 0..100 score), level bucket
 * tables, category weights, the grade table and SWOT limits. A ScoringConfig
 * is frozen once built so several can be used side by side.
 */

import type { Category, TechniqueCategory } from '../types/assessment';
import { clamp } from '../utils/math';

export interface LevelBucket {
  level: string;
  min: number;
}

export interface CategoryRule {
  normalize(value: number): number;
  /** Highest threshold first; the last bucket is the floor */
  buckets: readonly LevelBucket[];
}

export interface GradeRow {
  min: number;
  label: string;
}

export interface SwotLimits {
  strengths: number;
  weaknesses: number;
  opportunities: number;
  threats: number;
}

export interface ScoringConfig {
  rules: Readonly<Record<Category, CategoryRule>>;
  weights: Readonly<Record<TechniqueCategory, number>>;
  grades: readonly GradeRow[];
  /** Scores strictly below this are weaknesses */
  weaknessCutoff: number;
  limits: SwotLimits;
}

export const GENERIC_BUCKETS: readonly LevelBucket[] = [
  { level: 'excellent', min: 75 },
  { level: 'good', min: 60 },
  { level: 'medium', min: 45 },
  { level: 'poor', min: 0 },
];

export const HIP_BUCKETS: readonly LevelBucket[] = [
  { level: 'excellent', min: 90 },
  { level: 'good', min: 75 },
  { level: 'medium', min: 55 },
  { level: 'poor', min: 0 },
];

export const EXHAUSTION_BUCKETS: readonly LevelBucket[] = [
  { level: 'low', min: 70 },
  { level: 'moderate', min: 50 },
  { level: 'high', min: 30 },
  { level: 'critical', min: 0 },
];

export const ARM_EFFICIENCY_BUCKETS: readonly LevelBucket[] = [
  { level: 'optimal', min: 95 },
  { level: 'acceptable', min: 50 },
  { level: 'overloaded', min: 5 },
  { level: 'critical', min: 0 },
];

/**
 * 100 up to `reference`, then falls off as reference/value.
 */
export function inverseAbove(reference: number): (value: number) => number {
  return (value) => (value <= reference ? 100 : (100 * reference) / value);
}

/**
 * Torso deviation in degrees to score.
 */
export function scoreHipDeviation(degrees: number): number {
  if (degrees <= 5) return 95;
  if (degrees <= 15) return 80;
  if (degrees <= 25) return 60;
  return Math.max(20, 50 - (degrees - 25) * 1.5);
}

/**
 * Share of load on the arms (%) to score. 30-40% is the healthy range.
 */
export function scoreArmLoad(armPercent: number): number {
  if (armPercent <= 40) return 100;
  if (armPercent <= 50) return 100 - (armPercent - 40) * 5;
  return Math.max(0, 50 - (armPercent - 50) * 3);
}

/** Planning seconds at which route reading is ~63% of the way to full marks */
const ROUTE_READING_TAU = 6;

export const DEFAULT_CATEGORY_RULES: Readonly<Record<Category, CategoryRule>> = {
  quiet_feet: {
    normalize: (deviation) => clamp(100 - 40 * deviation, 20, 100),
    buckets: GENERIC_BUCKETS,
  },
  hip_position: {
    normalize: scoreHipDeviation,
    buckets: HIP_BUCKETS,
  },
  diagonal: {
    normalize: (ratio) => clamp(ratio * 100, 10, 100),
    buckets: GENERIC_BUCKETS,
  },
  route_reading: {
    normalize: (seconds) => 20 + 80 * (1 - Math.exp(-seconds / ROUTE_READING_TAU)),
    buckets: GENERIC_BUCKETS,
  },
  rhythm: {
    // ms of interval std-dev
    normalize: inverseAbove(150),
    buckets: GENERIC_BUCKETS,
  },
  dynamic_control: {
    // seconds to settle
    normalize: inverseAbove(0.5),
    buckets: GENERIC_BUCKETS,
  },
  grip_release: {
    // acceleration at release
    normalize: inverseAbove(2),
    buckets: GENERIC_BUCKETS,
  },
  exhaustion: {
    normalize: (percent) => 100 - percent,
    buckets: EXHAUSTION_BUCKETS,
  },
  arm_efficiency: {
    normalize: scoreArmLoad,
    buckets: ARM_EFFICIENCY_BUCKETS,
  },
};

export const DEFAULT_WEIGHTS: Readonly<Record<TechniqueCategory, number>> = {
  quiet_feet: 0.2,
  hip_position: 0.2,
  diagonal: 0.15,
  grip_release: 0.15,
  rhythm: 0.1,
  dynamic_control: 0.1,
  route_reading: 0.1,
};

export const DEFAULT_GRADES: readonly GradeRow[] = [
  { min: 85, label: '7b+' },
  { min: 80, label: '7a-7b' },
  { min: 75, label: '6c-7a' },
  { min: 68, label: '6b-6c' },
  { min: 60, label: '6a-6b' },
  { min: 50, label: '5c-6a' },
  { min: 40, label: '5b-5c' },
  { min: 30, label: '5a-5b' },
  { min: 0, label: 'below 5a' },
];

export const INDETERMINATE_GRADE = 'indeterminate';

export const DEFAULT_SWOT_LIMITS: SwotLimits = {
  strengths: 4,
  weaknesses: 4,
  opportunities: 3,
  threats: 3,
};

export function createScoringConfig(
  overrides: Partial<ScoringConfig> = {}
): ScoringConfig {
  const config: ScoringConfig = {
    rules: DEFAULT_CATEGORY_RULES,
    weights: DEFAULT_WEIGHTS,
    grades: DEFAULT_GRADES,
    weaknessCutoff: 55,
    limits: DEFAULT_SWOT_LIMITS,
    ...overrides,
  };
  return Object.freeze({
    ...config,
    rules: Object.freeze({ ...config.rules }),
    weights: Object.freeze({ ...config.weights }),
    grades: Object.freeze([...config.grades].sort((a, b) => b.min - a.min)),
    limits: Object.freeze({ ...config.limits }),
  });
}

export const DEFAULT_SCORING_CONFIG = createScoringConfig();
