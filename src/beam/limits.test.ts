import { describe, it, expect } from "vitest";
import { applyInputLimits, clamp, INPUT_LIMITS } from "./limits.js";
import { symmetricInput } from "../testing/fixtures.js";

describe("applyInputLimits", () => {
  it("clamps beam properties to the form bounds", () => {
    const out = applyInputLimits({ ...symmetricInput(), span_m: 150, E_gpa: 0.5, I_cm4: 2e5 });
    expect(out.span_m).toBe(100);
    expect(out.E_gpa).toBe(1);
    expect(out.I_cm4).toBe(1e5);
  });

  it("accepts the full 5 point loads and 3 moments unchanged", () => {
    const point_loads = Array.from({ length: INPUT_LIMITS.maxPointLoads }, (_, i) => ({ magnitude_kn: 1, position_m: i }));
    const moments = Array.from({ length: INPUT_LIMITS.maxMoments }, (_, i) => ({ magnitude_knm: 1, position_m: i }));
    const out = applyInputLimits({ ...symmetricInput(), point_loads, moments });
    expect(out.point_loads).toEqual(point_loads);
    expect(out.moments).toEqual(moments);
  });

  it("rejects extra point loads instead of dropping them", () => {
    const point_loads = Array.from({ length: 6 }, (_, i) => ({ magnitude_kn: 10, position_m: i }));
    expect(() => applyInputLimits({ ...symmetricInput(), point_loads })).toThrow(
      "point_loads accepts at most 5 items (got 6).",
    );
  });

  it("rejects extra moments instead of dropping them", () => {
    const moments = Array.from({ length: 4 }, (_, i) => ({ magnitude_knm: 1, position_m: i }));
    expect(() => applyInputLimits({ ...symmetricInput(), moments })).toThrow(
      "moments accepts at most 3 items (got 4).",
    );
  });

  it("leaves NaN for the validator to reject", () => {
    expect(clamp(Number.NaN, INPUT_LIMITS.span_m)).toBeNaN();
  });
});
