/**
 * Numeric helpers shared by the buffer, extractors and scorer.
 */

import type { Point } from '../types/pose';

/** Tolerance for comparing durations built from float timestamps */
export const EPSILON = 1e-9;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Population standard deviation.
 */
export function stdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let acc = 0;
  for (const v of values) acc += (v - m) ** 2;
  return Math.sqrt(acc / values.length);
}

/**
 * Planar distance (x, y). Depth is too noisy to use for motion.
 */
export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function midpoint(a: Point, b: Point): Point {
  const mid: Point = { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
  if (a.z !== undefined && b.z !== undefined) {
    mid.z = (a.z + b.z) / 2;
  }
  return mid;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * Angle in degrees between two planar vectors, or null if either is zero-length.
 */
export function angleBetween(
  u: { x: number; y: number },
  v: { x: number; y: number }
): number | null {
  const lu = Math.hypot(u.x, u.y);
  const lv = Math.hypot(v.x, v.y);
  if (lu === 0 || lv === 0) return null;
  const cos = clamp((u.x * v.x + u.y * v.y) / (lu * lv), -1, 1);
  return toDegrees(Math.acos(cos));
}

/**
 * Angle at `vertex` formed by p1-vertex-p2, in degrees.
 */
export function angleAt(p1: Point, vertex: Point, p2: Point): number | null {
  return angleBetween(
    { x: p1.x - vertex.x, y: p1.y - vertex.y },
    { x: p2.x - vertex.x, y: p2.y - vertex.y }
  );
}

/**
 * Magnitude of the second derivative of position over three consecutive
 * samples with possibly uneven spacing.
 */
export function accelerationMagnitude(
  p0: Point,
  t0: number,
  p1: Point,
  t1: number,
  p2: Point,
  t2: number
): number | null {
  const dt1 = t1 - t0;
  const dt2 = t2 - t1;
  const span = (t2 - t0) / 2;
  if (dt1 <= 0 || dt2 <= 0) return null;
  const ax = ((p2.x - p1.x) / dt2 - (p1.x - p0.x) / dt1) / span;
  const ay = ((p2.y - p1.y) / dt2 - (p1.y - p0.y) / dt1) / span;
  return Math.hypot(ax, ay);
}

export function round(value: number, digits = 0): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
