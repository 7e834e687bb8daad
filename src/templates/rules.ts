/**
 * SWOT Rules
 *
 * Typed calculations behind opportunity texts and the condition checks behind
 * threat texts. Template files only supply the text and the thresholds; the
 * arithmetic lives here.
 */

import type { Category, RawValues, TensionEvent, TensionJoint, TensionSide } from '../types/assessment';
import { round } from '../utils/math';

// ============================================
// Opportunities
// ============================================

export interface OpportunityCalculation {
  /** Raw fields that must be present and numeric */
  requires: readonly string[];
  calculate(score: number, inputs: Readonly<Record<string, number>>): RawValues;
}

export const OPPORTUNITY_CALCULATIONS: Readonly<Record<Category, OpportunityCalculation>> = {
  hip_position: {
    requires: [],
    calculate: (score) => {
      const target = Math.min(score + 20, 85);
      return { target, reduction: Math.round((target - score) / 2) };
    },
  },
  quiet_feet: {
    requires: ['repositions', 'norm', 'holds'],
    calculate: (_, { repositions, norm, holds }) => {
      const saved = Math.max(0, Math.round((repositions - norm) * holds));
      return { saved, energy: Math.min(30, saved * 3) };
    },
  },
  diagonal: {
    requires: ['diagonal_ratio'],
    calculate: (_, { diagonal_ratio }) => ({ target: Math.min(90, diagonal_ratio + 25) }),
  },
  route_reading: {
    requires: ['pauses'],
    calculate: (_, { pauses }) => ({ target_pauses: Math.max(3, pauses + 2) }),
  },
  rhythm: {
    requires: ['variance'],
    calculate: (_, { variance }) => ({ saved: Math.min(25, Math.round(variance / 40)) }),
  },
  dynamic_control: {
    requires: ['time'],
    calculate: (_, { time }) => ({ saved_time: round(Math.max(0, time - 0.5), 1) }),
  },
  grip_release: {
    requires: [],
    calculate: () => ({}),
  },
  exhaustion: {
    requires: ['percent'],
    calculate: (_, { percent }) => ({ time: Math.min(40, Math.round(percent / 2)) }),
  },
  arm_efficiency: {
    requires: ['leg_load'],
    calculate: (_, { leg_load }) => ({ current: leg_load }),
  },
};

export type OpportunityResult =
  | { ok: true; values: RawValues }
  | { ok: false; missing: string[] };

/**
 * Run a category's calculation. Fails, listing the fields, when a required
 * raw input is absent or not a finite number.
 */
export function evaluateOpportunity(
  category: Category,
  score: number,
  raw: Readonly<RawValues>
): OpportunityResult {
  const calculation = OPPORTUNITY_CALCULATIONS[category];
  const inputs: Record<string, number> = {};
  const missing: string[] = [];

  for (const name of calculation.requires) {
    const value = raw[name];
    if (typeof value === 'number' && Number.isFinite(value)) {
      inputs[name] = value;
    } else {
      missing.push(name);
    }
  }
  if (missing.length > 0) {
    return { ok: false, missing };
  }
  return { ok: true, values: calculation.calculate(score, inputs) };
}

// ============================================
// Threats
// ============================================

export interface ThreatInputs {
  tension: readonly TensionEvent[];
  /** Exhaustion percent when it was measured */
  exhaustionPercent: number | null;
}

export interface ThreatFinding {
  /** Used to order threats, highest first */
  severity: number;
  side: TensionSide;
  values: RawValues;
}

export type ConditionCheck = (inputs: ThreatInputs, threshold: number) => ThreatFinding | null;

/**
 * Side whose own count reaches the threshold, with that count. When both
 * sides reach it the higher count wins; equal counts are not attributed.
 */
export function flaggedSide(
  events: readonly TensionEvent[],
  threshold: number
): { side: TensionSide; count: number } | null {
  const count = (side: TensionSide) =>
    events.filter((e) => e.side === side).reduce((sum, e) => sum + e.count, 0);
  const left = count('left');
  const right = count('right');
  const worst = Math.max(left, right);
  if (worst === 0 || worst < threshold) return null;
  if (left > right) return { side: 'left', count: left };
  if (right > left) return { side: 'right', count: right };
  return { side: 'none', count: worst };
}

function jointCountCheck(joint: TensionJoint, kind: TensionEvent['kind']): ConditionCheck {
  return ({ tension }, threshold) => {
    const flagged = flaggedSide(
      tension.filter((e) => e.joint === joint && e.kind === kind),
      threshold
    );
    if (!flagged) return null;
    return { severity: flagged.count, side: flagged.side, values: { count: flagged.count } };
  };
}

export const CONDITION_CHECKS: Readonly<Record<string, ConditionCheck>> = {
  shoulder_lock: jointCountCheck('shoulder', 'angle_lock'),
  elbow_acute: jointCountCheck('elbow', 'angle_lock'),
  knee_rotation: jointCountCheck('knee', 'rotation'),
  lower_back_twist: ({ tension }, threshold) => {
    const twist = tension.find((e) => e.joint === 'lower_back' && e.kind === 'twist');
    if (!twist || twist.extremumValue < threshold) return null;
    return {
      severity: twist.extremumValue,
      side: 'none',
      values: { angle: Math.round(twist.extremumValue), count: twist.count },
    };
  },
  exhaustion_critical: ({ exhaustionPercent }, threshold) => {
    if (exhaustionPercent === null || exhaustionPercent < threshold) return null;
    return {
      severity: exhaustionPercent,
      side: 'none',
      values: { percent: Math.round(exhaustionPercent) },
    };
  },
};
