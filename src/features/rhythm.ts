/**
 * Rhythm
 *
 * Consistency of hand-move timing: population std-dev (ms) of the intervals
 * between consecutive hand releases.
 */

import type { FeatureExtractor } from '../types/feature';
import { round, stdDev } from '../utils/math';
import { insufficient, signal } from './helpers';

export const rhythmExtractor: FeatureExtractor = {
  category: 'rhythm',
  name: 'Rhythm',
  kind: 'technique',
  description: 'Variability of time between hand moves',

  extract(buffer, config) {
    const times = buffer
      .events('hand-release')
      .map((e) => e.timestamp)
      .sort((a, b) => a - b);

    const intervals: number[] = [];
    for (let i = 1; i < times.length; i++) {
      intervals.push(times[i] - times[i - 1]);
    }

    if (intervals.length < config.minRhythmIntervals) {
      return insufficient('rhythm', `only ${intervals.length} intervals between hand moves`);
    }

    const variance = stdDev(intervals) * 1000;
    return signal('rhythm', variance, { variance: round(variance) });
  },
};
