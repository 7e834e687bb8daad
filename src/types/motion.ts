/**
 * Motion Event Types
 *
 * Discrete events derived while frames stream into the landmark buffer.
 * The event log is append-only and covers the whole session, including
 * frames already evicted from the ring buffers.
 */

import type { Point, Side } from './pose';

export interface PauseEvent {
  kind: 'pause';
  /** Timestamp of the first still frame */
  start: number;
  /** Timestamp of the last still frame */
  end: number;
  duration: number;
  /** True for still periods before the climber first moved */
  preClimb: boolean;
}

export interface FootPlacementEvent {
  kind: 'foot-placement';
  side: Side;
  holdId: string;
  timestamp: number;
  frameIndex: number;
  position: Point;
}

export interface RepositionEvent {
  kind: 'reposition';
  side: Side;
  holdId: string;
  timestamp: number;
  frameIndex: number;
}

export interface HandReleaseEvent {
  kind: 'hand-release';
  side: Side;
  timestamp: number;
  frameIndex: number;
  /** Feet settled on a hold when the hand left */
  loadedFeet: Side[];
}

export interface DynamicMoveEvent {
  kind: 'dynamic-move';
  side: Side;
  /** Timestamp at which the hand settled again */
  timestamp: number;
  frameIndex: number;
  peakVelocity: number;
  /** Seconds from the last velocity spike to the start of the final still run */
  settleTime: number;
}

export type MotionEvent =
  | PauseEvent
  | FootPlacementEvent
  | RepositionEvent
  | HandReleaseEvent
  | DynamicMoveEvent;

export type MotionEventKind = MotionEvent['kind'];

export type MotionEventOf<K extends MotionEventKind> = Extract<
  MotionEvent,
  { kind: K }
>;
