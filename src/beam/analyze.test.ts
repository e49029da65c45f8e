import { describe, it, expect } from "vitest";
import { analyzeBeam, findExtreme } from "./analyze.js";
import { LoadRangeError } from "./errors.js";
import { mixedInput, symmetricInput, udlOnlyInput } from "../testing/fixtures.js";

describe("analyzeBeam", () => {
  it("reports the symmetric case in display units", () => {
    const result = analyzeBeam(symmetricInput(), { samples: 1001 });
    expect(result.reactions).toEqual({ RA_kn: 5, RB_kn: 5 });
    expect(result.total_load_kn).toBe(10);
    expect(result.samples).toBe(1001);
    expect(result.extremes.moment_knm).toEqual({ value: 25, x_m: 5 });
    expect(result.extremes.shear_kn).toEqual({ value: 5, x_m: 0 });
    expect(result.diagrams.shear_kn[0]).toBe(5);
    expect(result.diagrams.shear_kn[1000]).toBe(-5);
  });

  it("defaults to 1000 stations", () => {
    const { diagrams } = analyzeBeam(symmetricInput());
    for (const series of Object.values(diagrams)) {
      expect(series).toHaveLength(1000);
    }
  });

  it("solves the UDL-only case", () => {
    const { reactions } = analyzeBeam(udlOnlyInput(), { samples: 50 });
    expect(reactions.RB_kn).toBeCloseTo(3.2, 12);
    expect(reactions.RA_kn).toBeCloseTo(4.8, 12);
  });

  it("converts deflection to millimetres with a zero minimum", () => {
    const { diagrams } = analyzeBeam(mixedInput(), { samples: 200 });
    expect(Math.min(...diagrams.deflection_mm)).toBe(0);
  });

  it("produces nothing when a load is off the beam", () => {
    expect(() =>
      analyzeBeam({ ...symmetricInput(), point_loads: [{ magnitude_kn: 10, position_m: 12 }] }),
    ).toThrow(LoadRangeError);
  });

  it("attaches the load schematic", () => {
    const { schematic } = analyzeBeam(mixedInput(), { samples: 10 });
    expect(schematic.point_loads.map((p) => p.x_m)).toEqual([2, 3]);
    expect(schematic.udl?.label).toBe("2.0kN/m");
  });
});

describe("findExtreme", () => {
  it("keeps the sign of the largest magnitude", () => {
    expect(findExtreme([0, 1, 2], [1, -3, 2])).toEqual({ value: -3, x_m: 1 });
  });

  it("prefers the first station on ties", () => {
    expect(findExtreme([0, 1, 2], [2, -2, 2])).toEqual({ value: 2, x_m: 0 });
  });
});
