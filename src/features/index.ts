/**
 * Feature Registry
 *
 * Every category's extractor, in declaration order. This order is also the
 * tie-break order wherever results are sorted.
 */

import type { Category, ExtractionOutcome } from '../types/assessment';
import { CATEGORIES } from '../types/assessment';
import type { FeatureExtractor } from '../types/feature';
import type { FeatureConfig } from '../config/analysisConfig';
import type { LandmarkBuffer } from '../models/LandmarkBuffer';
import { armEfficiencyExtractor } from './armEfficiency';
import { diagonalExtractor } from './diagonal';
import { dynamicControlExtractor } from './dynamicControl';
import { exhaustionExtractor } from './exhaustion';
import { gripReleaseExtractor } from './gripRelease';
import { hipPositionExtractor } from './hipPosition';
import { quietFeetExtractor } from './quietFeet';
import { rhythmExtractor } from './rhythm';
import { routeReadingExtractor } from './routeReading';

export const featureRegistry: Record<Category, FeatureExtractor> = {
  quiet_feet: quietFeetExtractor,
  hip_position: hipPositionExtractor,
  diagonal: diagonalExtractor,
  route_reading: routeReadingExtractor,
  rhythm: rhythmExtractor,
  dynamic_control: dynamicControlExtractor,
  grip_release: gripReleaseExtractor,
  exhaustion: exhaustionExtractor,
  arm_efficiency: armEfficiencyExtractor,
};

export const CATEGORY_ORDER: readonly Category[] = CATEGORIES;

/**
 * Get an extractor by category
 *
 * @throws Error if the category has no extractor
 */
export function getFeatureExtractor(category: Category): FeatureExtractor {
  const extractor = featureRegistry[category];
  if (!extractor) {
    throw new Error(`Unknown category: ${category}`);
  }
  return extractor;
}

/**
 * Run every extractor against a finalized buffer.
 */
export function extractAll(
  buffer: LandmarkBuffer,
  config: FeatureConfig
): Map<Category, ExtractionOutcome> {
  const outcomes = new Map<Category, ExtractionOutcome>();
  for (const category of CATEGORY_ORDER) {
    outcomes.set(category, getFeatureExtractor(category).extract(buffer, config));
  }
  return outcomes;
}

export { armEfficiencyExtractor } from './armEfficiency';
export { diagonalExtractor } from './diagonal';
export { dynamicControlExtractor } from './dynamicControl';
export { exhaustionExtractor } from './exhaustion';
export { gripReleaseExtractor } from './gripRelease';
export { hipPositionExtractor } from './hipPosition';
export { quietFeetExtractor } from './quietFeet';
export { rhythmExtractor } from './rhythm';
export { routeReadingExtractor } from './routeReading';
