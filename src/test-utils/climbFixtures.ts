/**
 * Climb Fixtures for Unit Tests
 *
 * Synthetic pose frames for a climber facing the wall. The base pose is
 * upright with both hands above the shoulders and both feet planted:
 * no tension thresholds are crossed and torso deviation is 0°.
 */

import type { JointName, JointSample, Landmark, Point, PoseFrame } from '../types/pose';
import { JOINT_NAMES } from '../types/pose';
import { Skeleton } from '../models/Skeleton';

export type Pose = Record<JointName, Point>;

export const BASE_POSE: Pose = {
  nose: { x: 0.5, y: 0.2 },
  leftShoulder: { x: 0.45, y: 0.3 },
  rightShoulder: { x: 0.55, y: 0.3 },
  leftElbow: { x: 0.36, y: 0.26 },
  rightElbow: { x: 0.64, y: 0.26 },
  leftWrist: { x: 0.36, y: 0.16 },
  rightWrist: { x: 0.64, y: 0.16 },
  leftHip: { x: 0.47, y: 0.5 },
  rightHip: { x: 0.53, y: 0.5 },
  leftKnee: { x: 0.46, y: 0.65 },
  rightKnee: { x: 0.54, y: 0.65 },
  leftAnkle: { x: 0.46, y: 0.8 },
  rightAnkle: { x: 0.54, y: 0.8 },
};

export function pose(overrides: Partial<Pose> = {}): Pose {
  return { ...BASE_POSE, ...overrides };
}

/**
 * Shift a set of joints by (dx, dy).
 */
export function shift(p: Pose, joints: readonly JointName[], dx: number, dy: number): Pose {
  const out: Pose = { ...p };
  for (const joint of joints) {
    out[joint] = { ...p[joint], x: p[joint].x + dx, y: p[joint].y + dy };
  }
  return out;
}

/**
 * Copy of a pose with some joints missing.
 */
export function without(p: Partial<Pose>, ...joints: JointName[]): Partial<Pose> {
  const out: Partial<Pose> = { ...p };
  for (const joint of joints) delete out[joint];
  return out;
}

export function makeFrame(
  frameIndex: number,
  timestamp: number,
  points: Partial<Record<JointName, Point>>,
  confidence = 0.9
): PoseFrame {
  const landmarks: Partial<Record<JointName, Landmark>> = {};
  for (const joint of JOINT_NAMES) {
    const p = points[joint];
    if (p) landmarks[joint] = { ...p, confidence };
  }
  return { frameIndex, timestamp, landmarks };
}

/**
 * Frames at a fixed rate; timestamp = i / fps.
 */
export function buildFrames(
  count: number,
  poseAt: (i: number, t: number) => Partial<Record<JointName, Point>>,
  fps = 10
): PoseFrame[] {
  const frames: PoseFrame[] = [];
  for (let i = 0; i < count; i++) {
    const t = i / fps;
    frames.push(makeFrame(i, t, poseAt(i, t)));
  }
  return frames;
}

/**
 * Skeleton built straight from points; joints listed in `held` carry the
 * held status, every other joint is observed.
 */
export function skeletonOf(
  points: Partial<Record<JointName, Point>>,
  frameIndex = 0,
  timestamp = 0,
  held: readonly JointName[] = []
): Skeleton {
  const samples: Partial<Record<JointName, JointSample>> = {};
  for (const joint of JOINT_NAMES) {
    const p = points[joint];
    if (p) {
      const status = held.includes(joint) ? 'held' : 'observed';
      samples[joint] = { frameIndex, timestamp, position: p, status };
    }
  }
  return new Skeleton(frameIndex, timestamp, samples);
}

/**
 * Step-by-step climb builder. Each hold/move appends frames; moves shift
 * joints relative to the current pose in a single frame.
 *
 * @example
 * const frames = new ClimbScript().hold(10).move(['rightWrist'], 0, -0.05).hold(5).frames();
 */
export class ClimbScript {
  private current: Partial<Pose>;
  private readonly poses: Partial<Pose>[] = [];

  constructor(start: Partial<Pose> = BASE_POSE) {
    this.current = start;
  }

  get length(): number {
    return this.poses.length;
  }

  hold(count: number): this {
    for (let i = 0; i < count; i++) this.poses.push(this.current);
    return this;
  }

  move(joints: readonly JointName[], dx: number, dy: number): this {
    const next: Partial<Pose> = { ...this.current };
    for (const joint of joints) {
      const p = this.current[joint];
      if (p) next[joint] = { ...p, x: p.x + dx, y: p.y + dy };
    }
    this.current = next;
    this.poses.push(next);
    return this;
  }

  /** Replace the pose for subsequent frames without emitting one */
  set(next: Partial<Pose>): this {
    this.current = next;
    return this;
  }

  frames(fps = 10): PoseFrame[] {
    return buildFrames(this.poses.length, (i) => this.poses[i], fps);
  }
}
