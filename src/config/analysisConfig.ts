/**
 * Analysis Configuration
 *
 * Fixed, human-authored constants for ingestion, motion detection, feature
 * extraction and tension tracking. Every value can be overridden per session
 * with a Partial; the defaults below are what the assessment was tuned on.
 *
 * Units: seconds, normalised image coordinates (per second for velocities),
 * degrees for angles.
 */

import type { JointName } from '../types/pose';

export interface BufferConfig {
  /** Retained frames per joint; 3600 = two minutes at 30 fps */
  capacity: number;
  /** Landmarks below this confidence are dropped */
  minConfidence: number;
  /** Per-joint confidence overrides */
  jointMinConfidence: Partial<Record<JointName, number>>;
  /** How long a dropped joint keeps its last valid position */
  maxHoldSeconds: number;
  /** Coordinates outside [min, max] are impossible */
  coordinateBounds: readonly [number, number];
}

export const DEFAULT_BUFFER_CONFIG: BufferConfig = {
  capacity: 3600,
  minConfidence: 0.5,
  jointMinConfidence: {},
  maxHoldSeconds: 0.5,
  coordinateBounds: [-1, 2],
};

export interface DetectionConfig {
  /** Below this speed a limb counts as still */
  movementVelocity: number;
  /** Still time before a limb counts as settled on a hold */
  settleDwell: number;
  /** A foot settling this close to its active hold is a reposition */
  holdRadius: number;
  /** Hip-centre rise after which the active foot hold is considered left behind */
  comAdvanceDistance: number;
  /** Shortest mid-climb still period that counts as a reading pause */
  minPauseDuration: number;
  /** Hand speed that marks a dynamic move */
  dynamicVelocity: number;
}

export const DEFAULT_DETECTION_CONFIG: DetectionConfig = {
  movementVelocity: 0.1,
  settleDwell: 0.3,
  holdRadius: 0.03,
  comAdvanceDistance: 0.05,
  minPauseDuration: 1.0,
  dynamicVelocity: 1.0,
};

export type GradeBracket = '5a-5c' | '6a-6b' | '6c-7a' | '7b+';

export interface FeatureConfig {
  minValidSamples: number;
  /** Classified hand releases needed for the diagonal category */
  minMovementEvents: number;
  minRhythmIntervals: number;
  minGripReleases: number;
  minExhaustionSamples: number;
  /** Hip-centre acceleration treated as sensor noise when comparing quarters */
  exhaustionNoiseFloor: number;
  /** Expected foot repositions per hold, by route grade bracket */
  footNorms: Record<GradeBracket, number>;
  gradeBracket: GradeBracket;
  /** Hip-centre minus shoulder-centre x std-dev to diagonal-ratio penalty */
  swayScale: number;
  swayCap: number;
  /** Seconds credited for each mid-climb reading pause */
  pauseWeight: number;
  /** Depth gap between hip and shoulder centres that counts as hips off the wall */
  hipDepthThreshold: number;
  /** Degrees added per unit of depth gap beyond the threshold */
  hipDepthPenalty: number;
  /** Limb-height weighting for load distribution */
  armLoadWeight: number;
  legLoadWeight: number;
}

export const DEFAULT_FEATURE_CONFIG: FeatureConfig = {
  minValidSamples: 10,
  minMovementEvents: 3,
  minRhythmIntervals: 3,
  minGripReleases: 2,
  minExhaustionSamples: 20,
  exhaustionNoiseFloor: 0.5,
  footNorms: {
    '5a-5c': 2.0,
    '6a-6b': 1.5,
    '6c-7a': 1.0,
    '7b+': 0.5,
  },
  gradeBracket: '6a-6b',
  swayScale: 5,
  swayCap: 0.2,
  pauseWeight: 2,
  hipDepthThreshold: 0.05,
  hipDepthPenalty: 100,
  armLoadWeight: 1.5,
  legLoadWeight: 1.2,
};

export interface TensionConfig {
  /** Elbow angle below this is a locked-off arm */
  elbowAcuteAngle: number;
  /** Hip-shoulder-elbow angle above this is a hanging shoulder */
  shoulderOverheadAngle: number;
  /** Knee deviation from the hip-ankle line above this is a rotation */
  kneeRotationAngle: number;
  /** Shoulder line to hip line angle at or above this is a twist */
  twistAngle: number;
}

export const DEFAULT_TENSION_CONFIG: TensionConfig = {
  elbowAcuteAngle: 70,
  shoulderOverheadAngle: 150,
  kneeRotationAngle: 25,
  twistAngle: 30,
};

export interface AnalysisConfig {
  buffer: BufferConfig;
  detection: DetectionConfig;
  features: FeatureConfig;
  tension: TensionConfig;
}

export interface AnalysisConfigOverrides {
  buffer?: Partial<BufferConfig>;
  detection?: Partial<DetectionConfig>;
  features?: Partial<FeatureConfig>;
  tension?: Partial<TensionConfig>;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = Object.freeze({
  buffer: DEFAULT_BUFFER_CONFIG,
  detection: DEFAULT_DETECTION_CONFIG,
  features: DEFAULT_FEATURE_CONFIG,
  tension: DEFAULT_TENSION_CONFIG,
});

/**
 * Merge overrides onto the defaults, one section at a time.
 */
export function resolveAnalysisConfig(
  overrides: AnalysisConfigOverrides = {}
): AnalysisConfig {
  return {
    buffer: { ...DEFAULT_BUFFER_CONFIG, ...overrides.buffer },
    detection: { ...DEFAULT_DETECTION_CONFIG, ...overrides.detection },
    features: { ...DEFAULT_FEATURE_CONFIG, ...overrides.features },
    tension: { ...DEFAULT_TENSION_CONFIG, ...overrides.tension },
  };
}
