/**
 * Quiet Feet
 *
 * How often feet are re-adjusted on a hold they already stand on, compared
 * with what is normal for the route's grade bracket. Harder routes expect
 * more precise, first-time placements.
 */

import type { FeatureExtractor } from '../types/feature';
import { round } from '../utils/math';
import { insufficient, signal } from './helpers';

export const quietFeetExtractor: FeatureExtractor = {
  category: 'quiet_feet',
  name: 'Quiet Feet',
  kind: 'technique',
  description: 'Foot repositions per hold against the grade-bracket norm',

  extract(buffer, config) {
    const validFrames = buffer
      .skeletons()
      .filter((s) => s.hasJoints('leftAnkle', 'rightAnkle')).length;
    if (validFrames < config.minValidSamples) {
      return insufficient('quiet_feet', `only ${validFrames} frames with both ankles`);
    }

    const holds = buffer.events('foot-placement').length;
    if (holds === 0) {
      return insufficient('quiet_feet', 'no foot placements detected');
    }

    const repositions = buffer.events('reposition').length;
    const perHold = repositions / holds;
    const norm = config.footNorms[config.gradeBracket];
    const deviation = Math.max(0, perHold - norm) / norm;

    return signal('quiet_feet', deviation, {
      repositions: round(perHold, 2),
      norm,
      holds,
      bracket: config.gradeBracket,
    });
  },
};
