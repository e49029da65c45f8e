/**
 * Full pipeline: validate → reactions → field, converted to display units
 * (kN, kNm, rad, mm) with extremes and the load schematic attached.
 */
import { evaluateField, DEFAULT_SAMPLES } from "./field.js";
import { solveReactions, totalVerticalLoad } from "./reactions.js";
import { describeSchematic } from "./schematic.js";
import { validateLoadCase } from "./validate.js";
import type { BeamAnalysis, Extreme, RawBeamInput } from "./types.js";

export interface AnalyzeOptions {
  /** Stations along the span, ends included. */
  samples?: number;
}

/** Largest absolute value and where it occurs; the first station wins ties. */
export function findExtreme(xs: readonly number[], values: readonly number[]): Extreme {
  let best: Extreme = { value: 0, x_m: 0 };
  values.forEach((v, i) => {
    if (Math.abs(v) > Math.abs(best.value)) best = { value: v, x_m: xs[i] ?? 0 };
  });
  return best;
}

export function analyzeBeam(raw: RawBeamInput, options: AnalyzeOptions = {}): BeamAnalysis {
  const samples = options.samples ?? DEFAULT_SAMPLES;
  const loadCase = validateLoadCase(raw);
  const reactions = solveReactions(loadCase);
  const field = evaluateField(loadCase, reactions, samples);

  const diagrams = {
    x_m: [...field.x_m],
    shear_kn: field.shear_n.map((v) => v / 1e3),
    moment_knm: field.moment_nm.map((v) => v / 1e3),
    slope_rad: [...field.slope_rad],
    deflection_mm: field.deflection_m.map((v) => v * 1e3),
  };

  return {
    span_m: loadCase.beam.length_m,
    EI_knm2: loadCase.beam.EI_nm2 / 1e3,
    samples,
    reactions: { RA_kn: reactions.RA_n / 1e3, RB_kn: reactions.RB_n / 1e3 },
    total_load_kn: totalVerticalLoad(loadCase) / 1e3,
    diagrams,
    extremes: {
      shear_kn: findExtreme(diagrams.x_m, diagrams.shear_kn),
      moment_knm: findExtreme(diagrams.x_m, diagrams.moment_knm),
      deflection_mm: findExtreme(diagrams.x_m, diagrams.deflection_mm),
    },
    schematic: describeSchematic(loadCase),
  };
}
