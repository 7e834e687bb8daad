import { describe, expect, it } from 'vitest';
import type { Pose } from '../test-utils/climbFixtures';
import { BASE_POSE, shift, skeletonOf, without } from '../test-utils/climbFixtures';
import type { MotionEvent } from '../types/motion';
import type { JointName, Point } from '../types/pose';
import { MotionEventDetector } from './MotionEventDetector';

const FPS = 10;

function feed(
  detector: MotionEventDetector,
  poses: Partial<Record<JointName, Point>>[]
): void {
  poses.forEach((p, i) => detector.update(skeletonOf(p, i, i / FPS)));
}

function still(count: number, p: Pose = BASE_POSE): Pose[] {
  return Array.from({ length: count }, () => p);
}

describe('MotionEventDetector', () => {
  it('reports a motionless session as one pre-climb pause', () => {
    const detector = new MotionEventDetector();
    feed(detector, still(21));
    detector.finalize();

    const pauses = detector.getEventsOfKind('pause');
    expect(pauses).toEqual([{ kind: 'pause', start: 0, end: 2, duration: 2, preClimb: true }]);
    expect(detector.getEventsOfKind('hand-release')).toEqual([]);
  });

  it('places both feet once they settle', () => {
    const detector = new MotionEventDetector();
    feed(detector, still(5));

    const placements = detector.getEventsOfKind('foot-placement');
    expect(placements.map((e) => [e.side, e.holdId, e.frameIndex])).toEqual([
      ['left', 'left-1', 3],
      ['right', 'right-1', 3],
    ]);
  });

  it('emits a hand release with the feet loaded at that instant', () => {
    const detector = new MotionEventDetector();
    const moved = shift(BASE_POSE, ['rightWrist'], 0, -0.05);
    feed(detector, [...still(10), moved, moved]);

    expect(detector.getEvents().map((e) => e.kind)).toEqual([
      'foot-placement',
      'foot-placement',
      'hand-release',
      'pause',
    ]);
    expect(detector.getEventsOfKind('hand-release')[0]).toEqual({
      kind: 'hand-release',
      side: 'right',
      timestamp: 1,
      frameIndex: 10,
      loadedFeet: ['left', 'right'],
    });
    expect(detector.getEventsOfKind('pause')[0]).toMatchObject({
      start: 0,
      end: 0.9,
      preClimb: true,
    });
  });

  it('counts a foot settling back on its hold as a reposition', () => {
    const detector = new MotionEventDetector();
    const lifted = shift(BASE_POSE, ['leftAnkle'], 0, -0.05);
    feed(detector, [...still(10), lifted, ...still(9)]);

    const repositions = detector.getEventsOfKind('reposition');
    expect(repositions).toEqual([
      { kind: 'reposition', side: 'left', holdId: 'left-1', timestamp: 1.5, frameIndex: 15 },
    ]);
    expect(detector.getEventsOfKind('foot-placement')).toHaveLength(2);
  });

  it('treats the same spot as a new hold once the hips have risen', () => {
    const detector = new MotionEventDetector();
    const raised = shift(BASE_POSE, ['leftHip', 'rightHip'], 0, -0.06);
    const lifted = shift(raised, ['leftAnkle'], 0, -0.05);
    feed(detector, [...still(10), lifted, ...still(9, raised)]);

    expect(detector.getEventsOfKind('reposition')).toEqual([]);
    const left = detector.getEventsOfKind('foot-placement').filter((e) => e.side === 'left');
    expect(left.map((e) => e.holdId)).toEqual(['left-1', 'left-2']);
  });

  it('measures settle time of a dynamic move from the last spike', () => {
    const detector = new MotionEventDetector();
    const thrown = shift(BASE_POSE, ['rightWrist'], 0, -0.15);
    const caught = shift(thrown, ['rightWrist'], 0, -0.02);
    feed(detector, [...still(10), thrown, ...still(9, caught)]);

    const moves = detector.getEventsOfKind('dynamic-move');
    expect(moves).toHaveLength(1);
    expect(moves[0].side).toBe('right');
    expect(moves[0].frameIndex).toBe(15);
    expect(moves[0].peakVelocity).toBeCloseTo(1.5);
    expect(moves[0].settleTime).toBeCloseTo(0.2);
  });

  it('drops a pending dynamic move when the hand is lost', () => {
    const detector = new MotionEventDetector();
    const thrown = shift(BASE_POSE, ['rightWrist'], 0, -0.15);
    const withoutWrist = without(thrown, 'rightWrist');
    feed(detector, [...still(10), thrown, withoutWrist, ...still(8, thrown)]);

    expect(detector.getEventsOfKind('dynamic-move')).toEqual([]);
  });

  it('does not settle or release a hand from held samples', () => {
    const detector = new MotionEventDetector();
    const reachAt = (i: number) => shift(BASE_POSE, ['rightWrist'], 0, -0.05 * i);
    for (let i = 0; i < 10; i++) {
      // frames 5-8 repeat the frame 4 position, as the buffer does for a dropout
      const held = i >= 5 && i <= 8;
      detector.update(skeletonOf(reachAt(held ? 4 : i), i, i / FPS, held ? ['rightWrist'] : []));
    }

    expect(detector.getEvents().map((e) => e.kind)).toEqual(['foot-placement', 'foot-placement']);
  });

  it('drops a pending dynamic move when the hand is held', () => {
    const detector = new MotionEventDetector();
    const thrown = shift(BASE_POSE, ['rightWrist'], 0, -0.15);
    feed(detector, [...still(10), thrown]);
    for (let i = 11; i < 14; i++) {
      detector.update(skeletonOf(thrown, i, i / FPS, ['rightWrist']));
    }
    for (let i = 14; i < 20; i++) {
      detector.update(skeletonOf(thrown, i, i / FPS));
    }

    expect(detector.getEventsOfKind('dynamic-move')).toEqual([]);
  });

  it('keeps mid-climb pauses only when long enough', () => {
    const detector = new MotionEventDetector();
    const up = shift(BASE_POSE, ['leftHip', 'rightHip'], 0, -0.05);
    const poses: Pose[] = [
      ...still(10), // 0.0 - 0.9
      up, // 1.0 move
      ...still(15, up), // 1.1 - 2.5
      BASE_POSE, // 2.6 move
      ...still(5), // 2.7 - 3.1
      up, // 3.2 move
    ];
    feed(detector, poses);
    detector.finalize();

    const pauses = detector.getEventsOfKind('pause');
    expect(pauses).toHaveLength(2);
    expect(pauses[0].preClimb).toBe(true);
    expect(pauses[1].preClimb).toBe(false);
    expect(pauses[1].start).toBeCloseTo(1.1);
    expect(pauses[1].duration).toBeCloseTo(1.4);
  });

  it('streams events and completes on finalize', () => {
    const detector = new MotionEventDetector();
    const seen: MotionEvent['kind'][] = [];
    let completed = false;
    detector.events$.subscribe({
      next: (event) => seen.push(event.kind),
      complete: () => {
        completed = true;
      },
    });

    feed(detector, still(5));
    detector.finalize();
    detector.finalize();

    expect(seen).toEqual(['foot-placement', 'foot-placement', 'pause']);
    expect(completed).toBe(true);
    expect(detector.isFinalized()).toBe(true);
  });
});
