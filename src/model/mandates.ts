import type { MandatePoint } from './types';

/**
 * Piecewise-linear fill over control points, in any order.
 * Outside the defined range the nearest boundary value is held flat.
 * A year sitting exactly on a control point returns its value untouched.
 */
export function interpolateControlPoints(schedule: readonly MandatePoint[], year: number): number {
  if (schedule.length === 0) return 0;

  const points = [...schedule].sort((a, b) => a.year - b.year);

  const first = points[0];
  const last = points[points.length - 1];
  if (year <= first.year) return first.share;
  if (year >= last.year) return last.share;

  for (let i = 1; i < points.length; i++) {
    const hi = points[i];
    if (year > hi.year) continue;
    if (year === hi.year) return hi.share;
    const lo = points[i - 1];
    const t = (year - lo.year) / (hi.year - lo.year);
    return lo.share + (hi.share - lo.share) * t;
  }

  return last.share;
}

export function clampShare(share: number): number {
  return Math.min(1, Math.max(0, share));
}

export function getMandateShare(points: readonly MandatePoint[], year: number): number {
  return clampShare(interpolateControlPoints(points, year));
}
