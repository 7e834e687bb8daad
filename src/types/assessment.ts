/**
 * Assessment Types
 *
 * Everything downstream of the landmark buffer: raw signals, scored metrics,
 * the technique profile, tension events and the SWOT report.
 */

import type { InsufficientDataError } from '../errors';

export const TECHNIQUE_CATEGORIES = [
  'quiet_feet',
  'hip_position',
  'diagonal',
  'route_reading',
  'rhythm',
  'dynamic_control',
  'grip_release',
] as const;

export const ADDITIONAL_CATEGORIES = ['exhaustion', 'arm_efficiency'] as const;

export type TechniqueCategory = (typeof TECHNIQUE_CATEGORIES)[number];
export type AdditionalCategory = (typeof ADDITIONAL_CATEGORIES)[number];
export type Category = TechniqueCategory | AdditionalCategory;

/** Technique categories first, then additional ones; also the tie-break order */
export const CATEGORIES: readonly Category[] = [...TECHNIQUE_CATEGORIES, ...ADDITIONAL_CATEGORIES];

export type RawValues = Record<string, number | string>;

/**
 * Kinematic measurement for one category.
 * `value` feeds normalisation, `raw` feeds text placeholders.
 */
export interface RawSignal {
  category: Category;
  value: number;
  raw: RawValues;
}

export type ExtractionOutcome =
  | { ok: true; signal: RawSignal }
  | { ok: false; error: InsufficientDataError };

export interface MetricResult {
  name: Category;
  status: 'scored';
  score: number;
  level: string;
  value: number;
  raw: RawValues;
}

export interface InsufficientMetric {
  name: Category;
  status: 'insufficient';
  reason: string;
}

export type MetricOutcome = MetricResult | InsufficientMetric;

export interface TechniqueProfile {
  metrics: Partial<Record<Category, MetricOutcome>>;
  overallScore: number | null;
  grade: string;
  /** Renormalised weights actually applied */
  weights: Partial<Record<TechniqueCategory, number>>;
}

export type TensionJoint = 'elbow' | 'shoulder' | 'knee' | 'lower_back';
export type TensionKind = 'angle_lock' | 'rotation' | 'twist';
export type TensionSide = 'left' | 'right' | 'none';

export interface TensionEvent {
  joint: TensionJoint;
  kind: TensionKind;
  side: TensionSide;
  count: number;
  /** Most extreme angle (degrees) reached during the counted events */
  extremumValue: number;
}

export interface SwotItem {
  /** Category name or rule id */
  source: string;
  /** Score for strengths and weaknesses, severity for threats */
  value: number;
  text: string;
}

export interface SwotReport {
  strengths: SwotItem[];
  weaknesses: SwotItem[];
  opportunities: SwotItem[];
  threats: SwotItem[];
}

export type Diagnostic =
  | { kind: 'malformed-frame'; frameIndex: number; joint?: string; reason: string }
  | { kind: 'low-confidence'; joint: string; count: number }
  | { kind: 'insufficient-data'; category: Category; reason: string }
  | { kind: 'template-resolution'; entry: string; reason: string }
  | { kind: 'placeholder-substitution'; source: string; placeholder: string };

export interface AssessmentReport {
  profile: TechniqueProfile;
  swot: SwotReport;
  tension: TensionEvent[];
  diagnostics: Diagnostic[];
  frames: { accepted: number; dropped: number };
}
