/**
 * Pose Types
 *
 * Landmark observations as delivered by the pose provider, and the
 * per-joint samples the landmark buffer keeps after validation.
 * Coordinates are normalised image coordinates with y growing downward.
 */

/**
 * Body landmarks the engine reads. Anything else the provider emits is ignored.
 */
export const JOINT_NAMES = [
  'nose',
  'leftShoulder',
  'rightShoulder',
  'leftElbow',
  'rightElbow',
  'leftWrist',
  'rightWrist',
  'leftHip',
  'rightHip',
  'leftKnee',
  'rightKnee',
  'leftAnkle',
  'rightAnkle',
] as const;

export type JointName = (typeof JOINT_NAMES)[number];

export type Side = 'left' | 'right';

export const SIDES: readonly Side[] = ['left', 'right'];

export interface Landmark {
  x: number;
  y: number;
  /** Relative depth, smaller is closer to the camera */
  z?: number;
  /** Provider confidence in [0, 1] */
  confidence: number;
}

/**
 * One observation of the body. Frames are immutable once created.
 */
export interface PoseFrame {
  frameIndex: number;
  /** Seconds since the start of the recording */
  timestamp: number;
  landmarks: Partial<Record<JointName, Landmark>>;
}

export interface Point {
  x: number;
  y: number;
  z?: number;
}

/**
 * observed: valid landmark in this frame
 * held: previous valid position carried forward
 * lost: no usable position
 */
export type SampleStatus = 'observed' | 'held' | 'lost';

export interface JointSample {
  frameIndex: number;
  timestamp: number;
  position: Point | null;
  status: SampleStatus;
}

export interface FrameStamp {
  frameIndex: number;
  timestamp: number;
}

/**
 * Joint name for a side, e.g. sideJoint('left', 'Wrist') -> 'leftWrist'
 */
export function sideJoint(
  side: Side,
  part: 'Shoulder' | 'Elbow' | 'Wrist' | 'Hip' | 'Knee' | 'Ankle'
): JointName {
  return `${side}${part}`;
}
