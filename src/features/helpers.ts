/**
 * Shared helpers for feature extractors.
 */

import { InsufficientDataError } from '../errors';
import type { LandmarkBuffer } from '../models/LandmarkBuffer';
import type { Skeleton } from '../models/Skeleton';
import type { Category, ExtractionOutcome, RawValues } from '../types/assessment';
import type { PauseEvent } from '../types/motion';
import { EPSILON } from '../utils/math';

export function signal(category: Category, value: number, raw: RawValues): ExtractionOutcome {
  return { ok: true, signal: { category, value, raw } };
}

export function insufficient(category: Category, reason: string): ExtractionOutcome {
  return { ok: false, error: new InsufficientDataError(category, reason) };
}

function inPause(timestamp: number, pauses: readonly PauseEvent[]): boolean {
  return pauses.some(
    (pause) => timestamp >= pause.start - EPSILON && timestamp <= pause.end + EPSILON
  );
}

/**
 * Retained frames that are not part of any detected pause.
 */
export function climbingSkeletons(buffer: LandmarkBuffer): Skeleton[] {
  const pauses = buffer.events('pause');
  return buffer.skeletons().filter((s) => !inPause(s.getTimestamp(), pauses));
}
