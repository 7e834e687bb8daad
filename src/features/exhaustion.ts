/**
 * Exhaustion
 *
 * Movement quality at the end of the climb against the start. Quality is
 * read from hip-centre acceleration (shakiness of the centre of mass): the
 * session's acceleration series is cut into quarters and the last quarter's
 * mean is compared with the first's.
 *
 * Both quarter means are floored at the noise level so a motionless start
 * does not turn every later movement into 100% degradation.
 */

import type { FeatureExtractor } from '../types/feature';
import { accelerationMagnitude, clamp, mean, round } from '../utils/math';
import { insufficient, signal } from './helpers';

export const exhaustionExtractor: FeatureExtractor = {
  category: 'exhaustion',
  name: 'Exhaustion',
  kind: 'additional',
  description: 'Degradation of centre-of-mass steadiness from first to last quarter',

  extract(buffer, config) {
    const skeletons = buffer.skeletons();
    const series: number[] = [];

    for (let i = 1; i + 1 < skeletons.length; i++) {
      const window = [skeletons[i - 1], skeletons[i], skeletons[i + 1]];
      if (!window.every((s) => s.isObserved('leftHip', 'rightHip'))) continue;
      const [p0, p1, p2] = window.map((s) => s.getHipCenter());
      if (!p0 || !p1 || !p2) continue;

      const magnitude = accelerationMagnitude(
        p0,
        window[0].getTimestamp(),
        p1,
        window[1].getTimestamp(),
        p2,
        window[2].getTimestamp()
      );
      if (magnitude !== null) series.push(magnitude);
    }

    if (series.length < config.minExhaustionSamples) {
      return insufficient('exhaustion', `only ${series.length} steadiness samples`);
    }

    const quarter = Math.floor(series.length / 4);
    const floor = config.exhaustionNoiseFloor;
    const first = Math.max(floor, mean(series.slice(0, quarter)));
    const last = Math.max(floor, mean(series.slice(quarter * 3)));
    const percent = clamp(((last - first) / first) * 100, 0, 100);

    return signal('exhaustion', percent, { percent: round(percent) });
  },
};
