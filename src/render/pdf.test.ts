import { describe, it, expect } from "vitest";
import { generatePdfReport, REPORT_TITLE, summaryLines } from "./pdf.js";
import { analyzeBeam } from "../beam/analyze.js";
import { mixedInput, symmetricInput } from "../testing/fixtures.js";

describe("summaryLines", () => {
  it("lists inputs, reactions and extremes", () => {
    const input = symmetricInput();
    const lines = summaryLines(analyzeBeam(input, { samples: 1001 }), input);
    expect(lines).toEqual([
      "Span L = 10 m, E = 200 GPa, I = 5000 cm^4 (EI = 10000.0 kNm^2)",
      "Point load 1: 10 kN at 5 m",
      "Left support RA = 5.00 kN, right support RB = 5.00 kN",
      "Max shear 5.00 kN at x = 0.00 m",
      "Max moment 25.00 kNm at x = 5.00 m",
      expect.stringMatching(/^Max deflection \d+\.\d{3} mm at x = \d+\.\d{2} m$/),
    ]);
  });

  it("includes the UDL and moments when present", () => {
    const input = mixedInput();
    const lines = summaryLines(analyzeBeam(input, { samples: 20 }), input);
    expect(lines).toContain("UDL: 2 kN/m from 2 m to 6 m");
    expect(lines).toContain("Moment 1: 5 kNm at 4 m");
  });
});

describe("generatePdfReport", () => {
  it("writes a three-page PDF", () => {
    const input = mixedInput();
    const report = generatePdfReport(analyzeBeam(input, { samples: 100 }), input);
    expect(report.pages).toBe(3);
    expect(Buffer.from(report.data.subarray(0, 5)).toString("latin1")).toBe("%PDF-");
  });

  it("records the report title in the document info", () => {
    const input = mixedInput();
    const report = generatePdfReport(analyzeBeam(input, { samples: 20 }), input);
    expect(Buffer.from(report.data).toString("latin1")).toContain(`/Title (${REPORT_TITLE})`);
  });
});
