/**
 * Feature Extractor Definition
 *
 * A feature extractor turns the buffered session into one RawSignal, or an
 * insufficient-data outcome when there were too few valid inputs.
 * Extractors are pure: same buffer and config, same outcome.
 */

import type { FeatureConfig } from '../config/analysisConfig';
import type { LandmarkBuffer } from '../models/LandmarkBuffer';
import type { Category, ExtractionOutcome } from './assessment';

export interface FeatureExtractor {
  category: Category;
  /** Human-readable name */
  name: string;
  /** technique categories are weighted into the overall score; additional ones are not */
  kind: 'technique' | 'additional';
  description: string;
  extract(buffer: LandmarkBuffer, config: FeatureConfig): ExtractionOutcome;
}
