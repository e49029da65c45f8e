/**
 * Shear, moment, slope and deflection along the span.
 *
 * V and M are evaluated in closed form at each station by superposition.
 * Slope and deflection come from two inclusive forward cumulative sums scaled
 * by Δx, after which deflection is shifted so its minimum is zero. That shift
 * approximates the support conditions; y(0) and y(L) are not forced to zero.
 */
import { DomainError } from "./errors.js";
import type { FieldSample, LoadCase, ReactionPair } from "./types.js";

export const DEFAULT_SAMPLES = 1000;

// ─── Point-wise evaluation ───────────────────────────────────────────────────

export function shearAt(loadCase: LoadCase, reactions: ReactionPair, x: number): number {
  let V = reactions.RA_n;
  for (const p of loadCase.point_loads) {
    if (x >= p.position_m) V -= p.magnitude_n;
  }
  const udl = loadCase.udl;
  if (udl && x >= udl.start_m) {
    V -= udl.intensity_n_per_m * (Math.min(x, udl.end_m) - udl.start_m);
  }
  return V;
}

export function momentAt(loadCase: LoadCase, reactions: ReactionPair, x: number): number {
  let M = reactions.RA_n * x;
  for (const p of loadCase.point_loads) {
    if (x >= p.position_m) M -= p.magnitude_n * (x - p.position_m);
  }
  const udl = loadCase.udl;
  if (udl && x >= udl.start_m) {
    const w = udl.intensity_n_per_m;
    const a = udl.start_m;
    const b = udl.end_m;
    if (x <= b) {
      M -= (w * (x - a) ** 2) / 2;
    } else {
      M -= w * ((b - a) ** 2 / 2 + (x - b) * (b - a));
    }
  }
  // Each applied couple steps the moment by its signed magnitude.
  for (const m of loadCase.moments) {
    if (x >= m.position_m) M += m.magnitude_nm;
  }
  return M;
}

// ─── Integration ─────────────────────────────────────────────────────────────

/** Inclusive running sum of `values`, each term scaled by `dx`. */
export function cumulativeIntegral(values: readonly number[], dx: number): number[] {
  const out = new Array<number>(values.length);
  let sum = 0;
  values.forEach((v, i) => {
    sum += v;
    out[i] = sum * dx;
  });
  return out;
}

// ─── Sampler ─────────────────────────────────────────────────────────────────

export function evaluateField(
  loadCase: LoadCase,
  reactions: ReactionPair,
  samples: number = DEFAULT_SAMPLES,
): FieldSample {
  if (!Number.isInteger(samples) || samples < 2) {
    throw new DomainError(`Sample count must be an integer of at least 2 (got ${samples}).`, "num_points");
  }

  const L = loadCase.beam.length_m;
  const EI = loadCase.beam.EI_nm2;
  const dx = L / (samples - 1);

  const x_m: number[] = [];
  const shear_n: number[] = [];
  const moment_nm: number[] = [];
  for (let i = 0; i < samples; i++) {
    const x = (i * L) / (samples - 1);
    x_m.push(x);
    shear_n.push(shearAt(loadCase, reactions, x));
    moment_nm.push(momentAt(loadCase, reactions, x));
  }

  const slope_rad = cumulativeIntegral(
    moment_nm.map((M) => M / EI),
    dx,
  );
  const raw = cumulativeIntegral(slope_rad, dx);
  const yMin = raw.reduce((lo, y) => Math.min(lo, y), Infinity);
  const deflection_m = raw.map((y) => y - yMin);

  return { x_m, shear_n, moment_nm, slope_rad, deflection_m };
}
