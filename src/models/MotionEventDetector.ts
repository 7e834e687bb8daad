/**
 * Motion Event Detector
 *
 * Turns the per-frame limb positions into discrete climbing events:
 * pauses, foot placements and repositions, hand releases and dynamic moves.
 * Runs incrementally, one skeleton at a time, in arrival order.
 *
 * STATE MODEL (per tracked point):
 *   moving --speed < movementVelocity--> still --dwell >= settleDwell--> settled
 *   settled --speed >= movementVelocity--> moving   (a "release")
 *   any --held--> unchanged; an unsettled still run restarts after the gap
 *   any --lost--> reset (no history, no pending move)
 *
 * Held samples repeat the last observed position, so they never produce
 * speed, dwell time, settles or releases.
 */

import { Observable, Subject } from 'rxjs';
import type { DetectionConfig } from '../config/analysisConfig';
import { DEFAULT_DETECTION_CONFIG } from '../config/analysisConfig';
import type { MotionEvent, MotionEventKind, MotionEventOf } from '../types/motion';
import type { Point, SampleStatus, Side } from '../types/pose';
import { SIDES, sideJoint } from '../types/pose';
import { EPSILON, distance } from '../utils/math';
import type { Skeleton } from './Skeleton';

type TrackState = 'lost' | 'held' | 'still' | 'moving';

interface TrackUpdate {
  state: TrackState;
  /** null on the first sample after a reset */
  speed: number | null;
  becameSettled: boolean;
  released: boolean;
}

/**
 * Still/settled tracking for one point.
 */
export class LimbTracker {
  private last: { t: number; p: Point } | null = null;
  private stillSince: number | null = null;
  private settled = false;

  constructor(private readonly config: DetectionConfig) {}

  isSettled(): boolean {
    return this.settled;
  }

  /** Timestamp of the first frame of the current still run */
  getStillSince(): number | null {
    return this.stillSince;
  }

  update(t: number, p: Point | null, status: SampleStatus = 'observed'): TrackUpdate {
    if (!p || status === 'lost') {
      this.reset();
      return { state: 'lost', speed: null, becameSettled: false, released: false };
    }
    if (status === 'held') {
      if (!this.settled) this.stillSince = null;
      return { state: 'held', speed: null, becameSettled: false, released: false };
    }

    let speed: number | null = null;
    if (this.last) {
      const dt = t - this.last.t;
      speed = dt > 0 ? distance(this.last.p, p) / dt : 0;
    }
    this.last = { t, p };

    if (speed !== null && speed >= this.config.movementVelocity) {
      const released = this.settled;
      this.settled = false;
      this.stillSince = null;
      return { state: 'moving', speed, becameSettled: false, released };
    }

    if (this.stillSince === null) {
      this.stillSince = t;
    }
    let becameSettled = false;
    if (!this.settled && t - this.stillSince >= this.config.settleDwell - EPSILON) {
      this.settled = true;
      becameSettled = true;
    }
    return { state: 'still', speed, becameSettled, released: false };
  }

  reset(): void {
    this.last = null;
    this.stillSince = null;
    this.settled = false;
  }
}

interface ActiveHold {
  id: string;
  position: Point;
  /** Hip-centre y when the foot was placed */
  comY: number | null;
}

interface PendingDynamic {
  peakVelocity: number;
  lastSpike: number;
}

export class MotionEventDetector {
  private readonly config: DetectionConfig;
  private readonly log: MotionEvent[] = [];
  private readonly eventSubject = new Subject<MotionEvent>();

  private readonly hands: Record<Side, LimbTracker>;
  private readonly feet: Record<Side, LimbTracker>;
  private readonly hips: LimbTracker;

  private readonly activeHold: Record<Side, ActiveHold | null> = { left: null, right: null };
  private readonly holdCount: Record<Side, number> = { left: 0, right: 0 };
  private readonly pendingDynamic: Record<Side, PendingDynamic | null> = {
    left: null,
    right: null,
  };

  private pauseRun: { start: number; end: number } | null = null;
  private hasMoved = false;
  private finalized = false;

  constructor(config: Partial<DetectionConfig> = {}) {
    this.config = { ...DEFAULT_DETECTION_CONFIG, ...config };
    this.hands = {
      left: new LimbTracker(this.config),
      right: new LimbTracker(this.config),
    };
    this.feet = {
      left: new LimbTracker(this.config),
      right: new LimbTracker(this.config),
    };
    this.hips = new LimbTracker(this.config);
  }

  /**
   * Emits each event as it is detected; completes on finalize().
   */
  get events$(): Observable<MotionEvent> {
    return this.eventSubject.asObservable();
  }

  getEvents(): readonly MotionEvent[] {
    return this.log;
  }

  getEventsOfKind<K extends MotionEventKind>(kind: K): MotionEventOf<K>[] {
    return this.log.filter((event): event is MotionEventOf<K> => event.kind === kind);
  }

  isFinalized(): boolean {
    return this.finalized;
  }

  update(skeleton: Skeleton): void {
    if (this.finalized) return;

    const t = skeleton.getTimestamp();
    const frameIndex = skeleton.getFrameIndex();
    const hipCenter = skeleton.getHipCenter();
    const states: TrackState[] = [];

    // Feet before hands: a hand release reads which feet are loaded now.
    for (const side of SIDES) {
      const ankle = sideJoint(side, 'Ankle');
      const position = skeleton.getPosition(ankle);
      const update = this.feet[side].update(t, position, skeleton.getStatus(ankle));
      states.push(update.state);
      if (update.becameSettled && position) {
        this.onFootSettled(side, position, hipCenter?.y ?? null, t, frameIndex);
      }
    }

    for (const side of SIDES) {
      const wrist = sideJoint(side, 'Wrist');
      const update = this.hands[side].update(t, skeleton.getPosition(wrist), skeleton.getStatus(wrist));
      states.push(update.state);
      this.onHandUpdate(side, update, t, frameIndex);
    }

    const hipStatus = skeleton.isObserved('leftHip', 'rightHip') ? 'observed' : 'held';
    states.push(this.hips.update(t, hipCenter, hipStatus).state);

    this.onBodyState(states, t);
  }

  /**
   * Close open still runs and drop moves that never settled.
   */
  finalize(): void {
    if (this.finalized) return;
    this.closePause();
    this.pendingDynamic.left = null;
    this.pendingDynamic.right = null;
    this.finalized = true;
    this.eventSubject.complete();
  }

  private onFootSettled(
    side: Side,
    position: Point,
    comY: number | null,
    t: number,
    frameIndex: number
  ): void {
    const hold = this.activeHold[side];
    if (hold && distance(position, hold.position) <= this.config.holdRadius + EPSILON) {
      const advanced =
        comY !== null &&
        hold.comY !== null &&
        hold.comY - comY >= this.config.comAdvanceDistance - EPSILON;
      if (!advanced) {
        this.emit({ kind: 'reposition', side, holdId: hold.id, timestamp: t, frameIndex });
        return;
      }
    }

    this.holdCount[side]++;
    const id = `${side}-${this.holdCount[side]}`;
    this.activeHold[side] = { id, position, comY };
    this.emit({ kind: 'foot-placement', side, holdId: id, timestamp: t, frameIndex, position });
  }

  private onHandUpdate(side: Side, update: TrackUpdate, t: number, frameIndex: number): void {
    if (update.state === 'lost' || update.state === 'held') {
      this.pendingDynamic[side] = null;
      return;
    }

    if (update.released) {
      const loadedFeet = SIDES.filter((foot) => this.feet[foot].isSettled());
      this.emit({ kind: 'hand-release', side, timestamp: t, frameIndex, loadedFeet });
    }

    if (update.speed !== null && update.speed >= this.config.dynamicVelocity) {
      const previous = this.pendingDynamic[side];
      this.pendingDynamic[side] = {
        peakVelocity: Math.max(previous?.peakVelocity ?? 0, update.speed),
        lastSpike: t,
      };
    }

    const pending = this.pendingDynamic[side];
    if (update.becameSettled && pending) {
      const stillSince = this.hands[side].getStillSince() ?? t;
      this.emit({
        kind: 'dynamic-move',
        side,
        timestamp: t,
        frameIndex,
        peakVelocity: pending.peakVelocity,
        settleTime: Math.max(0, stillSince - pending.lastSpike),
      });
      this.pendingDynamic[side] = null;
    }
  }

  private onBodyState(states: TrackState[], t: number): void {
    if (states.every((state) => state === 'lost' || state === 'held')) {
      this.closePause();
      return;
    }
    if (states.includes('moving')) {
      this.closePause();
      this.hasMoved = true;
      return;
    }
    if (this.pauseRun) {
      this.pauseRun.end = t;
    } else {
      this.pauseRun = { start: t, end: t };
    }
  }

  private closePause(): void {
    const run = this.pauseRun;
    this.pauseRun = null;
    if (!run) return;

    const duration = run.end - run.start;
    const preClimb = !this.hasMoved;
    const counts = preClimb
      ? duration > EPSILON
      : duration >= this.config.minPauseDuration - EPSILON;
    if (counts) {
      this.emit({ kind: 'pause', start: run.start, end: run.end, duration, preClimb });
    }
  }

  private emit(event: MotionEvent): void {
    this.log.push(event);
    this.eventSubject.next(event);
  }
}
