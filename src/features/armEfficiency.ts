/**
 * Arm Efficiency (load distribution)
 *
 * Estimated share of body weight carried by the arms. Each limb's load is
 * modelled from its vertical distance to the hip centre: hands far above the
 * hips hang the body from the arms, feet far below push it up. Arm distances
 * are weighted 1.5, leg distances 1.2 by default. 30-40% on the arms is healthy.
 */

import type { FeatureExtractor } from '../types/feature';
import { mean, round } from '../utils/math';
import { insufficient, signal } from './helpers';

export const armEfficiencyExtractor: FeatureExtractor = {
  category: 'arm_efficiency',
  name: 'Arm Efficiency',
  kind: 'additional',
  description: 'Share of load carried by the arms',

  extract(buffer, config) {
    const shares: number[] = [];

    for (const skeleton of buffer.skeletons()) {
      const hip = skeleton.getHipCenter();
      const lw = skeleton.getPosition('leftWrist');
      const rw = skeleton.getPosition('rightWrist');
      const la = skeleton.getPosition('leftAnkle');
      const ra = skeleton.getPosition('rightAnkle');
      if (!hip || !lw || !rw || !la || !ra) continue;

      const arms = (Math.abs(hip.y - lw.y) + Math.abs(hip.y - rw.y)) * config.armLoadWeight;
      const legs = (Math.abs(la.y - hip.y) + Math.abs(ra.y - hip.y)) * config.legLoadWeight;
      if (arms + legs === 0) continue;
      shares.push((arms / (arms + legs)) * 100);
    }

    if (shares.length < config.minValidSamples) {
      return insufficient('arm_efficiency', `only ${shares.length} frames with all limbs`);
    }

    const armLoad = mean(shares);
    return signal('arm_efficiency', armLoad, {
      arm_load: round(armLoad),
      leg_load: round(100 - armLoad),
    });
  },
};
