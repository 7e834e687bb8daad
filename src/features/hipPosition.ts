/**
 * Hip Position
 *
 * Mean torso deviation while moving: angle between the hip-centre ->
 * shoulder-centre vector and straight up the wall, plus a penalty when
 * depth shows the hips hanging away from the wall. Reading pauses are left
 * out so resting postures don't dilute the measurement.
 */

import type { FeatureExtractor } from '../types/feature';
import { mean, round } from '../utils/math';
import { climbingSkeletons, insufficient, signal } from './helpers';

export const hipPositionExtractor: FeatureExtractor = {
  category: 'hip_position',
  name: 'Hip Position',
  kind: 'technique',
  description: 'Torso deviation from the wall plane while climbing',

  extract(buffer, config) {
    const deviations: number[] = [];
    for (const skeleton of climbingSkeletons(buffer)) {
      const deviation = skeleton.getTorsoDeviation(
        config.hipDepthThreshold,
        config.hipDepthPenalty
      );
      if (deviation !== null) deviations.push(deviation);
    }

    if (deviations.length < config.minValidSamples) {
      return insufficient(
        'hip_position',
        `only ${deviations.length} climbing frames with hips and shoulders`
      );
    }

    const angle = mean(deviations);
    return signal('hip_position', angle, {
      angle: round(angle, 1),
      // rough share of extra load the arms take for the lean
      overload: round(Math.min(60, angle * 1.5)),
    });
  },
};
