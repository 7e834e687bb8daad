/**
 * Diagonal
 *
 * When a hand leaves a hold the body hangs on the other hand and whatever
 * foot is loaded. Support on opposite corners (other hand + same-side foot)
 * is the diagonal; other hand + opposite foot is the "square" pattern that
 * makes the body barn-door. Releases with zero or two loaded feet say
 * nothing about the pattern and are skipped.
 *
 * Body sway (std-dev of the hips' horizontal offset from the shoulders)
 * is subtracted as a penalty.
 */

import type { FeatureExtractor } from '../types/feature';
import { round, stdDev } from '../utils/math';
import { climbingSkeletons, insufficient, signal } from './helpers';

export const diagonalExtractor: FeatureExtractor = {
  category: 'diagonal',
  name: 'Diagonal',
  kind: 'technique',
  description: 'Share of moves made on diagonal support, less body sway',

  extract(buffer, config) {
    let diagonal = 0;
    let classified = 0;
    for (const release of buffer.events('hand-release')) {
      if (release.loadedFeet.length !== 1) continue;
      classified++;
      if (release.loadedFeet[0] === release.side) diagonal++;
    }

    if (classified < config.minMovementEvents) {
      return insufficient('diagonal', `only ${classified} classifiable hand moves`);
    }

    const offsets: number[] = [];
    for (const skeleton of climbingSkeletons(buffer)) {
      const sway = skeleton.getLateralSway();
      if (sway !== null) offsets.push(sway);
    }
    const sway = stdDev(offsets);
    const ratio = diagonal / classified;
    const penalty = Math.min(config.swayCap, sway * config.swayScale);

    return signal('diagonal', Math.max(0, ratio - penalty), {
      diagonal_ratio: round(ratio * 100),
      sway: round(sway, 3),
      moves: classified,
    });
  },
};
