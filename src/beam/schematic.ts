/**
 * Load diagram description: supports, load arrows, moment arrows and the UDL
 * zone, in display units. Renderers draw from this without touching the engine.
 */
import type { BeamSchematic, LoadCase } from "./types.js";

const N_TO_KN = 1e-3;

export function formatLabel(value: number, unit: string): string {
  return `${value.toFixed(1)}${unit}`;
}

export function describeSchematic(loadCase: LoadCase): BeamSchematic {
  const L = loadCase.beam.length_m;
  const udl = loadCase.udl;

  return {
    span_m: L,
    supports: [
      { kind: "pin", x_m: 0, label: "RA" },
      { kind: "roller", x_m: L, label: "RB" },
    ],
    point_loads: loadCase.point_loads.map((p) => {
      const kn = p.magnitude_n * N_TO_KN;
      return {
        x_m: p.position_m,
        magnitude_kn: kn,
        direction: kn >= 0 ? "down" : "up",
        label: formatLabel(kn, "kN"),
      };
    }),
    moments: loadCase.moments.map((m) => {
      const knm = m.magnitude_nm * N_TO_KN;
      return {
        x_m: m.position_m,
        magnitude_knm: knm,
        direction: knm >= 0 ? "right" : "left",
        label: formatLabel(knm, "kNm"),
      };
    }),
    udl: udl
      ? {
          start_m: udl.start_m,
          end_m: udl.end_m,
          intensity_kn_per_m: udl.intensity_n_per_m * N_TO_KN,
          label: formatLabel(udl.intensity_n_per_m * N_TO_KN, "kN/m"),
        }
      : null,
  };
}
