/**
 * Dynamic Control
 *
 * Mean time to stabilise the hand after a dynamic move. Moves that never
 * settled (hand lost, session ended) are not counted.
 */

import type { FeatureExtractor } from '../types/feature';
import { mean, round } from '../utils/math';
import { insufficient, signal } from './helpers';

export const dynamicControlExtractor: FeatureExtractor = {
  category: 'dynamic_control',
  name: 'Dynamic Control',
  kind: 'technique',
  description: 'Settle time after dynamic moves',

  extract(buffer) {
    const moves = buffer.events('dynamic-move');
    if (moves.length === 0) {
      return insufficient('dynamic_control', 'no settled dynamic moves');
    }

    const time = mean(moves.map((m) => m.settleTime));
    return signal('dynamic_control', time, {
      time: round(time, 2),
      moves: moves.length,
    });
  },
};
