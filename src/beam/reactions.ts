/**
 * Support reactions from global equilibrium (pin at x = 0, roller at x = L).
 *
 *   ΣM about A:  RB·L = Σ P·a + W·x̄ − Σ M0
 *   ΣFy:         RA = ΣP + W − RB
 *
 * Applied moments subtract from the overturning sum; `momentAt` in field.ts
 * steps the moment up by the same signed magnitude at the couple.
 */
import type { LoadCase, ReactionPair } from "./types.js";

export function udlResultant(loadCase: LoadCase): { force_n: number; centroid_m: number } {
  const udl = loadCase.udl;
  if (!udl) return { force_n: 0, centroid_m: 0 };
  return {
    force_n: udl.intensity_n_per_m * (udl.end_m - udl.start_m),
    centroid_m: (udl.start_m + udl.end_m) / 2,
  };
}

export function totalVerticalLoad(loadCase: LoadCase): number {
  let total = udlResultant(loadCase).force_n;
  for (const p of loadCase.point_loads) total += p.magnitude_n;
  return total;
}

export function solveReactions(loadCase: LoadCase): ReactionPair {
  const L = loadCase.beam.length_m;
  const udl = udlResultant(loadCase);

  let momentAboutA = udl.force_n * udl.centroid_m;
  for (const p of loadCase.point_loads) momentAboutA += p.magnitude_n * p.position_m;
  for (const m of loadCase.moments) momentAboutA -= m.magnitude_nm;

  const RB_n = momentAboutA / L;
  const RA_n = totalVerticalLoad(loadCase) - RB_n;
  return { RA_n, RB_n };
}
