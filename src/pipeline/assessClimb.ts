/**
 * One-shot assessment helpers over a finite frame sequence.
 */

import { defer, type Observable } from 'rxjs';
import { map, reduce } from 'rxjs/operators';
import type { AssessmentReport } from '../types/assessment';
import type { PoseFrame } from '../types/pose';
import { ClimbSession, type ClimbSessionOptions } from './ClimbSession';

/**
 * Assess a recorded attempt held in memory.
 *
 * @throws EmptySessionError if `frames` is empty
 */
export function assessClimb(
  frames: Iterable<PoseFrame>,
  options: ClimbSessionOptions = {}
): AssessmentReport {
  const session = new ClimbSession(options);
  for (const frame of frames) {
    session.append(frame);
  }
  return session.complete();
}

/**
 * Assess a frame stream. Each subscription gets its own session and emits
 * one report when the stream completes; an empty stream errors with
 * EmptySessionError.
 */
export function assessClimb$(
  frames$: Observable<PoseFrame>,
  options: ClimbSessionOptions = {}
): Observable<AssessmentReport> {
  return defer(() =>
    frames$.pipe(
      reduce((session, frame) => {
        session.append(frame);
        return session;
      }, new ClimbSession(options)),
      map((session) => session.complete())
    )
  );
}
