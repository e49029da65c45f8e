import { describe, it, expect } from "vitest";
import { solveReactions, totalVerticalLoad, udlResultant } from "./reactions.js";
import { validateLoadCase } from "./validate.js";
import { emptyInput, mixedInput, symmetricInput, udlOnlyInput } from "../testing/fixtures.js";

describe("solveReactions", () => {
  it("splits a mid-span load equally", () => {
    expect(solveReactions(validateLoadCase(symmetricInput()))).toEqual({ RA_n: 5000, RB_n: 5000 });
  });

  it("places the UDL resultant at its centroid", () => {
    const lc = validateLoadCase(udlOnlyInput());
    expect(udlResultant(lc)).toEqual({ force_n: 8000, centroid_m: 4 });
    const { RA_n, RB_n } = solveReactions(lc);
    expect(RB_n).toBeCloseTo(3200, 9);
    expect(RA_n).toBeCloseTo(4800, 9);
  });

  it("gives zero reactions for an unloaded beam", () => {
    expect(solveReactions(validateLoadCase(emptyInput()))).toEqual({ RA_n: 0, RB_n: 0 });
  });

  it("subtracts applied moments from the overturning sum", () => {
    const lc = validateLoadCase({ ...emptyInput(), moments: [{ magnitude_knm: 5, position_m: 4 }] });
    const { RA_n, RB_n } = solveReactions(lc);
    expect(RB_n).toBe(-500);
    expect(RA_n).toBe(500);
  });

  it("satisfies vertical equilibrium for a mixed load case", () => {
    const lc = validateLoadCase(mixedInput());
    const { RA_n, RB_n } = solveReactions(lc);
    expect(totalVerticalLoad(lc)).toBe(28000);
    expect(RA_n + RB_n).toBeCloseTo(28000, 9);
    expect(RB_n).toBeCloseTo(7700, 9);
    expect(RA_n).toBeCloseTo(20300, 9);
  });
});
