/**
 * Climb Technique Analyzer
 *
 * Pose landmark stream in, technique assessment out.
 *
 * @example
 * const templates = loadTemplateSet('./templates.json');
 * const report = assessClimb(frames, { templates });
 * console.log(report.profile.grade, report.swot.weaknesses);
 */

export { assessClimb, assessClimb$ } from './pipeline/assessClimb';
export { ClimbSession } from './pipeline/ClimbSession';
export type { ClimbSessionOptions, ClimbSessionState } from './pipeline/ClimbSession';

export { LandmarkBuffer } from './models/LandmarkBuffer';
export type { LandmarkBufferOptions } from './models/LandmarkBuffer';
export { MotionEventDetector } from './models/MotionEventDetector';
export { Skeleton } from './models/Skeleton';
export { TensionAnalyzer } from './analyzers/TensionAnalyzer';

export {
  CATEGORY_ORDER,
  extractAll,
  featureRegistry,
  getFeatureExtractor,
} from './features';

export { Scorer, lookupLevel } from './scoring/Scorer';
export { aggregate, lookupGrade } from './scoring/Aggregator';
export type { Aggregate } from './scoring/Aggregator';

export {
  DEFAULT_TEMPLATES,
  DEFAULT_TEMPLATE_SET,
  loadTemplateSet,
  resolveTemplateSet,
} from './templates/TemplateResolver';
export type { TemplateResolverOptions } from './templates/TemplateResolver';
export { renderTemplate } from './templates/renderTemplate';
export { SwotSynthesizer } from './swot/SwotSynthesizer';
export type { SwotResult, SwotSynthesizerOptions } from './swot/SwotSynthesizer';

export {
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_BUFFER_CONFIG,
  DEFAULT_DETECTION_CONFIG,
  DEFAULT_FEATURE_CONFIG,
  DEFAULT_TENSION_CONFIG,
  resolveAnalysisConfig,
} from './config/analysisConfig';
export type {
  AnalysisConfig,
  AnalysisConfigOverrides,
  BufferConfig,
  DetectionConfig,
  FeatureConfig,
  GradeBracket,
  TensionConfig,
} from './config/analysisConfig';
export {
  DEFAULT_SCORING_CONFIG,
  INDETERMINATE_GRADE,
  createScoringConfig,
} from './config/scoringConfig';
export type { CategoryRule, GradeRow, LevelBucket, ScoringConfig } from './config/scoringConfig';

export {
  EmptySessionError,
  InsufficientDataError,
  MalformedFrameError,
  SessionStateError,
} from './errors';
export { createLogger, setLogLevel } from './utils/logger';
export type { LogLevel, Logger } from './utils/logger';

export * from './types/assessment';
export type * from './types/motion';
export * from './types/pose';
export type * from './types/templates';
export type * from './types/feature';
