/**
 * Route Reading
 *
 * Planning time: the still period before the first move plus a fixed
 * credit for each mid-climb reading pause.
 */

import type { FeatureExtractor } from '../types/feature';
import { round } from '../utils/math';
import { insufficient, signal } from './helpers';

export const routeReadingExtractor: FeatureExtractor = {
  category: 'route_reading',
  name: 'Route Reading',
  kind: 'technique',
  description: 'Pre-climb inspection and mid-climb reading pauses',

  extract(buffer, config) {
    const tracked = buffer
      .skeletons()
      .filter(
        (s) =>
          s.getHipCenter() !== null ||
          s.hasJoints('leftWrist') ||
          s.hasJoints('rightWrist') ||
          s.hasJoints('leftAnkle') ||
          s.hasJoints('rightAnkle')
      ).length;
    if (tracked < config.minValidSamples) {
      return insufficient('route_reading', `only ${tracked} frames with a tracked body point`);
    }

    let startTime = 0;
    let pauses = 0;
    for (const pause of buffer.events('pause')) {
      if (pause.preClimb) startTime += pause.duration;
      else pauses++;
    }

    return signal('route_reading', startTime + config.pauseWeight * pauses, {
      start_time: round(startTime, 1),
      pauses,
    });
  },
};
