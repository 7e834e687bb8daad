/**
 * Grip Release
 *
 * Smoothness of letting go: hand acceleration at the release frame, from
 * the wrist samples on either side of it. A release is measurable only when
 * all three samples were actually observed (not held) and still retained.
 */

import type { FeatureExtractor } from '../types/feature';
import { sideJoint } from '../types/pose';
import { accelerationMagnitude, mean, round } from '../utils/math';
import { insufficient, signal } from './helpers';

export const gripReleaseExtractor: FeatureExtractor = {
  category: 'grip_release',
  name: 'Grip Release',
  kind: 'technique',
  description: 'Hand acceleration when leaving a hold',

  extract(buffer, config) {
    const magnitudes: number[] = [];

    for (const release of buffer.events('hand-release')) {
      const index = buffer.indexOfFrame(release.frameIndex);
      if (index < 1) continue;

      const joint = sideJoint(release.side, 'Wrist');
      const before = buffer.getSkeleton(index - 1);
      const at = buffer.getSkeleton(index);
      const after = buffer.getSkeleton(index + 1);
      if (!before || !at || !after) continue;
      if (![before, at, after].every((s) => s.isObserved(joint))) continue;

      const p0 = before.getPosition(joint);
      const p1 = at.getPosition(joint);
      const p2 = after.getPosition(joint);
      if (!p0 || !p1 || !p2) continue;

      const magnitude = accelerationMagnitude(
        p0,
        before.getTimestamp(),
        p1,
        at.getTimestamp(),
        p2,
        after.getTimestamp()
      );
      if (magnitude !== null) magnitudes.push(magnitude);
    }

    if (magnitudes.length < config.minGripReleases) {
      return insufficient('grip_release', `only ${magnitudes.length} measurable releases`);
    }

    const jerk = mean(magnitudes);
    return signal('grip_release', jerk, { jerk: round(jerk, 2) });
  },
};
