import { describe, it, expect } from "vitest";
import { diagramPanels, generateDiagramSheet, symmetricRange } from "./svg.js";
import { analyzeBeam } from "../beam/analyze.js";
import { mixedInput, symmetricInput } from "../testing/fixtures.js";

describe("symmetricRange", () => {
  it("pads the peak magnitude by 15%", () => {
    expect(symmetricRange([2, -4])).toBeCloseTo(4.6, 12);
  });

  it("falls back to 1 for a flat series", () => {
    expect(symmetricRange([0, 0])).toBe(1);
    expect(symmetricRange([])).toBe(1);
  });
});

describe("generateDiagramSheet", () => {
  it("draws the four diagrams in order", () => {
    const analysis = analyzeBeam(symmetricInput(), { samples: 101 });
    expect(diagramPanels(analysis).map((p) => p.title)).toEqual([
      "Shear Force",
      "Bending Moment",
      "Slope",
      "Deflection",
    ]);
    const svg = generateDiagramSheet(analysis);
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg"')).toBe(true);
    expect(svg.endsWith("</svg>")).toBe(true);
    expect(svg).toContain(">Shear Force (kN)</text>");
    expect(svg).toContain(">Bending Moment (kN·m)</text>");
    expect(svg).toContain(">Slope (rad)</text>");
    expect(svg).toContain(">Deflection (mm)</text>");
    expect(svg).toContain("RA = 5.00 kN, RB = 5.00 kN");
    expect(svg).toContain(">25.00 kN·m</text>");
  });

  it("labels the loads from the schematic", () => {
    const svg = generateDiagramSheet(analyzeBeam(mixedInput(), { samples: 50 }));
    expect(svg).toContain(">10.0kN</text>");
    expect(svg).toContain(">2.0kN/m</text>");
    expect(svg).toContain(">5.0kNm</text>");
    expect(svg.match(/<polygon /g)).toHaveLength(1);
  });
});
