/**
 * Input validation: form units in, frozen SI load case out.
 *
 * Input-surface clamps (span, modulus and inertia ranges, load counts) live in
 * `limits.ts` and are applied by the callers; this module only rejects values
 * that would make the calculation meaningless or place a load off the beam.
 */
import { DomainError, LoadRangeError, describeItem } from "./errors.js";
import type { LoadItemRef } from "./errors.js";
import type {
  AppliedMoment,
  BeamSpec,
  DistributedLoad,
  LoadCase,
  PointLoad,
  RawBeamInput,
} from "./types.js";

// ─── Unit conversion ─────────────────────────────────────────────────────────

export const KN_TO_N = 1e3;
export const GPA_TO_PA = 1e9;
export const CM4_TO_M4 = 1e-8;

// ─── Checks ──────────────────────────────────────────────────────────────────

function requirePositive(value: number, field: string, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new DomainError(`${label} must be a positive number (got ${value}).`, field);
  }
}

function requireFinite(value: number, field: string, label: string): void {
  if (!Number.isFinite(value)) {
    throw new DomainError(`${label} must be a finite number (got ${value}).`, field);
  }
}

function requireOnBeam(position: number, span: number, item: LoadItemRef): void {
  if (position < 0 || position > span) {
    throw new LoadRangeError(
      `${describeItem(item)} position (${position} m) must lie within the beam [0, ${span} m].`,
      item,
    );
  }
}

// ─── Validator ───────────────────────────────────────────────────────────────

export function validateLoadCase(raw: RawBeamInput): LoadCase {
  requirePositive(raw.span_m, "span_m", "Beam length");
  requirePositive(raw.E_gpa, "E_gpa", "Young's modulus");
  requirePositive(raw.I_cm4, "I_cm4", "Moment of inertia");

  raw.point_loads.forEach((p, i) => {
    requireFinite(p.magnitude_kn, `point_loads[${i}].magnitude_kn`, `Point load ${i + 1} magnitude`);
    requireFinite(p.position_m, `point_loads[${i}].position_m`, `Point load ${i + 1} position`);
  });
  raw.moments.forEach((m, i) => {
    requireFinite(m.magnitude_knm, `moments[${i}].magnitude_knm`, `Moment ${i + 1} magnitude`);
    requireFinite(m.position_m, `moments[${i}].position_m`, `Moment ${i + 1} position`);
  });
  if (raw.udl) {
    requireFinite(raw.udl.intensity_kn_per_m, "udl.intensity_kn_per_m", "UDL intensity");
    requireFinite(raw.udl.start_m, "udl.start_m", "UDL start");
    requireFinite(raw.udl.end_m, "udl.end_m", "UDL end");
  }

  const L = raw.span_m;

  raw.point_loads.forEach((p, i) => requireOnBeam(p.position_m, L, { kind: "point_load", index: i + 1 }));

  let udl: DistributedLoad | null = null;
  if (raw.udl) {
    const { start_m: a, end_m: b } = raw.udl;
    if (a < 0 || a > b || b > L) {
      throw new LoadRangeError(
        `UDL range [${a}, ${b} m] is invalid: it needs 0 ≤ start ≤ end ≤ ${L} m.`,
        { kind: "udl", index: 1 },
      );
    }
    udl = Object.freeze({
      intensity_n_per_m: raw.udl.intensity_kn_per_m * KN_TO_N,
      start_m: a,
      end_m: b,
    });
  }

  raw.moments.forEach((m, i) => requireOnBeam(m.position_m, L, { kind: "moment", index: i + 1 }));

  const E_pa = raw.E_gpa * GPA_TO_PA;
  const I_m4 = raw.I_cm4 * CM4_TO_M4;
  const beam: BeamSpec = Object.freeze({ length_m: L, E_pa, I_m4, EI_nm2: E_pa * I_m4 });

  const point_loads: readonly PointLoad[] = Object.freeze(
    raw.point_loads.map((p) =>
      Object.freeze({ magnitude_n: p.magnitude_kn * KN_TO_N, position_m: p.position_m }),
    ),
  );
  const moments: readonly AppliedMoment[] = Object.freeze(
    raw.moments.map((m) =>
      Object.freeze({ magnitude_nm: m.magnitude_knm * KN_TO_N, position_m: m.position_m }),
    ),
  );

  return Object.freeze({ beam, point_loads, udl, moments });
}
