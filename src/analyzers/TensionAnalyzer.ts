/**
 * Tension Analyzer
 *
 * Watches joint angles frame by frame for injury-risk positions and counts
 * how often each joint enters one. Counting is edge-triggered: staying in a
 * locked position is one event, leaving and re-entering is another. A frame
 * where the joint can't be measured ends the current event.
 *
 * Zones:
 * - elbow angle_lock: shoulder-elbow-wrist below elbowAcuteAngle (min tracked)
 * - shoulder angle_lock: hip-shoulder-elbow above shoulderOverheadAngle (max tracked)
 * - knee rotation: knee off the hip-ankle line by more than kneeRotationAngle (max tracked)
 * - lower_back twist: shoulder line vs hip line at or above twistAngle (max tracked)
 */

import type { TensionConfig } from '../config/analysisConfig';
import { DEFAULT_TENSION_CONFIG } from '../config/analysisConfig';
import type { Skeleton } from '../models/Skeleton';
import type { TensionEvent, TensionJoint, TensionKind, TensionSide } from '../types/assessment';

interface ZoneCheck {
  joint: TensionJoint;
  kind: TensionKind;
  side: TensionSide;
  /** Which extreme to record */
  extreme: 'min' | 'max';
  measure(skeleton: Skeleton): number | null;
  inZone(value: number, config: TensionConfig): boolean;
}

interface ZoneState {
  active: boolean;
  count: number;
  extremum: number | null;
}

const ZONE_CHECKS: readonly ZoneCheck[] = [
  ...(['left', 'right'] as const).map(
    (side): ZoneCheck => ({
      joint: 'elbow',
      kind: 'angle_lock',
      side,
      extreme: 'min',
      measure: (s) => s.getElbowAngle(side),
      inZone: (v, c) => v < c.elbowAcuteAngle,
    })
  ),
  ...(['left', 'right'] as const).map(
    (side): ZoneCheck => ({
      joint: 'shoulder',
      kind: 'angle_lock',
      side,
      extreme: 'max',
      measure: (s) => s.getShoulderAngle(side),
      inZone: (v, c) => v > c.shoulderOverheadAngle,
    })
  ),
  ...(['left', 'right'] as const).map(
    (side): ZoneCheck => ({
      joint: 'knee',
      kind: 'rotation',
      side,
      extreme: 'max',
      measure: (s) => s.getKneeRotation(side),
      inZone: (v, c) => v > c.kneeRotationAngle,
    })
  ),
  {
    joint: 'lower_back',
    kind: 'twist',
    side: 'none',
    extreme: 'max',
    measure: (s) => s.getTorsoTwist(),
    inZone: (v, c) => v >= c.twistAngle,
  },
];

export class TensionAnalyzer {
  private readonly config: TensionConfig;
  private readonly states: ZoneState[];

  constructor(config: Partial<TensionConfig> = {}) {
    this.config = { ...DEFAULT_TENSION_CONFIG, ...config };
    this.states = ZONE_CHECKS.map(() => ({ active: false, count: 0, extremum: null }));
  }

  update(skeleton: Skeleton): void {
    ZONE_CHECKS.forEach((check, i) => {
      const state = this.states[i];
      const value = check.measure(skeleton);

      if (value === null || !check.inZone(value, this.config)) {
        state.active = false;
        return;
      }

      if (!state.active) {
        state.active = true;
        state.count++;
      }
      if (state.extremum === null) {
        state.extremum = value;
      } else {
        state.extremum =
          check.extreme === 'min' ? Math.min(state.extremum, value) : Math.max(state.extremum, value);
      }
    });
  }

  /**
   * One event per joint/kind/side that was entered at least once, in fixed order.
   */
  getEvents(): TensionEvent[] {
    const events: TensionEvent[] = [];
    ZONE_CHECKS.forEach((check, i) => {
      const state = this.states[i];
      if (state.count === 0 || state.extremum === null) return;
      events.push({
        joint: check.joint,
        kind: check.kind,
        side: check.side,
        count: state.count,
        extremumValue: state.extremum,
      });
    });
    return events;
  }
}
