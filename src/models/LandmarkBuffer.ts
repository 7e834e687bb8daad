/**
 * Landmark Buffer
 *
 * Validated, bounded history of joint positions for one climbing session.
 *
 * - One RingBuffer per joint, index-aligned: every accepted frame appends
 *   exactly one sample per joint, so index i is the same frame everywhere.
 * - Frames must arrive with strictly increasing frameIndex and timestamp;
 *   anything else is dropped whole.
 * - Rejected landmarks (low confidence, impossible values, missing) carry
 *   the last valid position forward for maxHoldSeconds, then go lost.
 * - Motion events are detected as frames arrive and kept for the whole
 *   session, even after the frames that produced them are evicted.
 */

import type { Observable } from 'rxjs';
import type { BufferConfig, DetectionConfig } from '../config/analysisConfig';
import { DEFAULT_BUFFER_CONFIG } from '../config/analysisConfig';
import { MalformedFrameError } from '../errors';
import type { Diagnostic } from '../types/assessment';
import type { MotionEvent, MotionEventKind, MotionEventOf } from '../types/motion';
import type { FrameStamp, JointName, JointSample, Landmark, Point, PoseFrame } from '../types/pose';
import { JOINT_NAMES } from '../types/pose';
import type { Logger } from '../utils/logger';
import { createLogger } from '../utils/logger';
import { EPSILON } from '../utils/math';
import { MotionEventDetector } from './MotionEventDetector';
import { RingBuffer } from './RingBuffer';
import { Skeleton } from './Skeleton';

export interface LandmarkBufferOptions {
  buffer?: Partial<BufferConfig>;
  detection?: Partial<DetectionConfig>;
  logger?: Logger;
}

export class LandmarkBuffer {
  private readonly config: BufferConfig;
  private readonly log: Logger;
  private readonly detector: MotionEventDetector;

  private readonly stamps: RingBuffer<FrameStamp>;
  private readonly joints = new Map<JointName, RingBuffer<JointSample>>();
  private readonly lastValid = new Map<JointName, { position: Point; timestamp: number }>();
  private readonly lowConfidence = new Map<JointName, number>();
  /** Keys already warned about in this session: 'frame' or a joint name */
  private readonly reported = new Set<string>();
  private readonly diagnostics: Diagnostic[] = [];

  private lastStamp: FrameStamp | null = null;
  private accepted = 0;
  private dropped = 0;
  private finalized = false;

  constructor(options: LandmarkBufferOptions = {}) {
    this.config = { ...DEFAULT_BUFFER_CONFIG, ...options.buffer };
    this.log = options.logger ?? createLogger({ component: 'LandmarkBuffer' });
    this.detector = new MotionEventDetector(options.detection);
    this.stamps = new RingBuffer<FrameStamp>(this.config.capacity);
    for (const joint of JOINT_NAMES) {
      this.joints.set(joint, new RingBuffer<JointSample>(this.config.capacity));
    }
  }

  /** Retained frames */
  get length(): number {
    return this.stamps.length;
  }

  get acceptedFrames(): number {
    return this.accepted;
  }

  get droppedFrames(): number {
    return this.dropped;
  }

  get events$(): Observable<MotionEvent> {
    return this.detector.events$;
  }

  /**
   * Validate and store one frame. Returns false when the frame was dropped.
   */
  append(frame: PoseFrame): boolean {
    if (this.finalized) {
      return false;
    }

    const orderProblem = this.checkOrder(frame);
    if (orderProblem) {
      this.dropFrame(new MalformedFrameError(frame.frameIndex, orderProblem));
      return false;
    }

    const stamp: FrameStamp = { frameIndex: frame.frameIndex, timestamp: frame.timestamp };
    const samples: Partial<Record<JointName, JointSample>> = {};
    for (const joint of JOINT_NAMES) {
      const sample = this.sampleJoint(joint, frame.landmarks[joint], stamp);
      samples[joint] = sample;
      this.ring(joint).push(sample);
    }
    this.stamps.push(stamp);
    this.lastStamp = stamp;
    this.accepted++;

    this.detector.update(new Skeleton(stamp.frameIndex, stamp.timestamp, samples));
    return true;
  }

  /**
   * Recent samples of one joint covering at least `duration` seconds back from
   * the newest sample, or everything retained if the session is shorter.
   */
  window(joint: JointName, duration: number): JointSample[] {
    const ring = this.ring(joint);
    const newest = ring.last();
    if (!newest) return [];

    const out: JointSample[] = [];
    for (let i = ring.length - 1; i >= 0; i--) {
      const sample = ring.at(i);
      if (!sample) break;
      out.push(sample);
      if (newest.timestamp - sample.timestamp >= duration - EPSILON) break;
    }
    return out.reverse();
  }

  samples(joint: JointName): JointSample[] {
    return this.ring(joint).toArray();
  }

  getSkeleton(index: number): Skeleton | undefined {
    const stamp = this.stamps.at(index);
    if (!stamp) return undefined;
    const samples: Partial<Record<JointName, JointSample>> = {};
    for (const joint of JOINT_NAMES) {
      samples[joint] = this.ring(joint).at(index);
    }
    return new Skeleton(stamp.frameIndex, stamp.timestamp, samples);
  }

  latestSkeleton(): Skeleton | undefined {
    return this.getSkeleton(this.stamps.length - 1);
  }

  skeletons(): Skeleton[] {
    const out: Skeleton[] = [];
    for (let i = 0; i < this.stamps.length; i++) {
      const skeleton = this.getSkeleton(i);
      if (skeleton) out.push(skeleton);
    }
    return out;
  }

  /**
   * Retained index of a frame, or -1 if it was never accepted or has been evicted.
   */
  indexOfFrame(frameIndex: number): number {
    let lo = 0;
    let hi = this.stamps.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const stamp = this.stamps.at(mid);
      if (!stamp) return -1;
      if (stamp.frameIndex === frameIndex) return mid;
      if (stamp.frameIndex < frameIndex) lo = mid + 1;
      else hi = mid - 1;
    }
    return -1;
  }

  events(): readonly MotionEvent[];
  events<K extends MotionEventKind>(kind: K): MotionEventOf<K>[];
  events<K extends MotionEventKind>(kind?: K): readonly MotionEvent[] | MotionEventOf<K>[] {
    return kind === undefined ? this.detector.getEvents() : this.detector.getEventsOfKind(kind);
  }

  getDiagnostics(): readonly Diagnostic[] {
    return this.diagnostics;
  }

  isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * End of session: close open detector state and summarise dropped landmarks.
   */
  finalize(): void {
    if (this.finalized) return;
    this.finalized = true;
    this.detector.finalize();

    for (const [joint, count] of this.lowConfidence) {
      this.diagnostics.push({ kind: 'low-confidence', joint, count });
      this.log.info(`Dropped ${count} low-confidence samples for ${joint}`, {
        action: 'finalize',
      });
    }
  }

  private ring(joint: JointName): RingBuffer<JointSample> {
    let ring = this.joints.get(joint);
    if (!ring) {
      ring = new RingBuffer<JointSample>(this.config.capacity);
      this.joints.set(joint, ring);
    }
    return ring;
  }

  private checkOrder(frame: PoseFrame): string | null {
    if (!Number.isFinite(frame.timestamp) || !Number.isFinite(frame.frameIndex)) {
      return 'non-finite frame index or timestamp';
    }
    const last = this.lastStamp;
    if (!last) return null;
    if (frame.frameIndex <= last.frameIndex) {
      return `frame index ${frame.frameIndex} does not follow ${last.frameIndex}`;
    }
    if (frame.timestamp <= last.timestamp) {
      return `timestamp ${frame.timestamp} does not follow ${last.timestamp}`;
    }
    return null;
  }

  private dropFrame(error: MalformedFrameError): void {
    this.dropped++;
    this.diagnostics.push({
      kind: 'malformed-frame',
      frameIndex: error.frameIndex,
      reason: error.reason,
    });
    if (this.firstReport('frame')) {
      this.log.warn(`${error.message} (further dropped frames not logged)`, { action: 'append' });
    }
  }

  private sampleJoint(
    joint: JointName,
    landmark: Landmark | undefined,
    stamp: FrameStamp
  ): JointSample {
    if (landmark) {
      const problem = this.impossibleValue(landmark);
      if (problem) {
        const error = new MalformedFrameError(stamp.frameIndex, problem, joint);
        if (this.firstReport(joint)) {
          this.log.warn(error.message, { action: 'append' });
          this.diagnostics.push({
            kind: 'malformed-frame',
            frameIndex: stamp.frameIndex,
            joint,
            reason: problem,
          });
        }
      } else if (landmark.confidence < this.minConfidence(joint)) {
        this.lowConfidence.set(joint, (this.lowConfidence.get(joint) ?? 0) + 1);
      } else {
        const position: Point =
          landmark.z !== undefined
            ? { x: landmark.x, y: landmark.y, z: landmark.z }
            : { x: landmark.x, y: landmark.y };
        this.lastValid.set(joint, { position, timestamp: stamp.timestamp });
        return { ...stamp, position, status: 'observed' };
      }
    }

    const last = this.lastValid.get(joint);
    if (last && stamp.timestamp - last.timestamp <= this.config.maxHoldSeconds + EPSILON) {
      return { ...stamp, position: last.position, status: 'held' };
    }
    return { ...stamp, position: null, status: 'lost' };
  }

  private firstReport(key: string): boolean {
    if (this.reported.has(key)) return false;
    this.reported.add(key);
    return true;
  }

  private minConfidence(joint: JointName): number {
    return this.config.jointMinConfidence[joint] ?? this.config.minConfidence;
  }

  private impossibleValue(landmark: Landmark): string | null {
    const [min, max] = this.config.coordinateBounds;
    const coords = [landmark.x, landmark.y];
    if (landmark.z !== undefined) coords.push(landmark.z);
    if (coords.some((v) => !Number.isFinite(v))) {
      return 'non-finite coordinate';
    }
    if (landmark.x < min || landmark.x > max || landmark.y < min || landmark.y > max) {
      return `coordinate outside [${min}, ${max}]`;
    }
    if (!Number.isFinite(landmark.confidence) || landmark.confidence < 0 || landmark.confidence > 1) {
      return `confidence ${landmark.confidence} outside [0, 1]`;
    }
    return null;
  }
}
