import { describe, it, expect } from "vitest";
import { describeSchematic, formatLabel } from "./schematic.js";
import { validateLoadCase } from "./validate.js";
import { mixedInput, symmetricInput } from "../testing/fixtures.js";

describe("describeSchematic", () => {
  it("describes supports, loads, moments and the UDL zone", () => {
    const s = describeSchematic(validateLoadCase(mixedInput()));
    expect(s.span_m).toBe(10);
    expect(s.supports).toEqual([
      { kind: "pin", x_m: 0, label: "RA" },
      { kind: "roller", x_m: 10, label: "RB" },
    ]);
    expect(s.point_loads[0]).toEqual({ x_m: 2, magnitude_kn: 10, direction: "down", label: "10.0kN" });
    expect(s.moments).toEqual([{ x_m: 4, magnitude_knm: 5, direction: "right", label: "5.0kNm" }]);
    expect(s.udl).toEqual({ start_m: 2, end_m: 6, intensity_kn_per_m: 2, label: "2.0kN/m" });
  });

  it("points negative loads and moments the other way", () => {
    const s = describeSchematic(
      validateLoadCase({
        ...symmetricInput(),
        point_loads: [{ magnitude_kn: -4, position_m: 1 }],
        moments: [{ magnitude_knm: -2.5, position_m: 6 }],
      }),
    );
    expect(s.point_loads[0]?.direction).toBe("up");
    expect(s.point_loads[0]?.label).toBe("-4.0kN");
    expect(s.moments[0]?.direction).toBe("left");
    expect(s.udl).toBeNull();
  });
});

describe("formatLabel", () => {
  it("uses one decimal place", () => {
    expect(formatLabel(12.345, "kN")).toBe("12.3kN");
  });
});
