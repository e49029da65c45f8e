/**
 * Bounds enforced by the input surfaces (terminal form, browser form, tool
 * arguments). The validator assumes values already sit inside them.
 */
import type { RawBeamInput } from "./types.js";

export const INPUT_LIMITS = {
  span_m: { min: 1, max: 100 },
  E_gpa: { min: 1, max: 500 },
  I_cm4: { min: 1, max: 1e5 },
  num_points: { min: 2, max: 10_000 },
  maxPointLoads: 5,
  maxMoments: 3,
} as const;

export function clamp(value: number, range: { min: number; max: number }): number {
  return Math.max(range.min, Math.min(range.max, value));
}

function requireAtMost(items: readonly unknown[], max: number, field: string) {
  if (items.length > max) {
    throw new Error(`${field} accepts at most ${max} items (got ${items.length}).`);
  }
}

/** Clamps beam properties; load lists longer than the form allows are rejected. */
export function applyInputLimits(raw: RawBeamInput): RawBeamInput {
  requireAtMost(raw.point_loads, INPUT_LIMITS.maxPointLoads, "point_loads");
  requireAtMost(raw.moments, INPUT_LIMITS.maxMoments, "moments");
  return {
    ...raw,
    span_m: clamp(raw.span_m, INPUT_LIMITS.span_m),
    E_gpa: clamp(raw.E_gpa, INPUT_LIMITS.E_gpa),
    I_cm4: clamp(raw.I_cm4, INPUT_LIMITS.I_cm4),
  };
}
