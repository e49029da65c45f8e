import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createBeamAnalysisToolDefinition } from "./beam-analysis.js";
import { LoadRangeError } from "../../beam/errors.js";

describe("beam_analysis tool", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "beamcalc-"));
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  const tool = () => createBeamAnalysisToolDefinition({ outputDir, defaultSamples: 1000 });

  it("analyzes a beam from untyped arguments", async () => {
    const result = await tool().execute("t1", {
      span_m: 10,
      point_loads: [{ magnitude_kn: 10, position_m: 5 }],
      num_points: 1001,
    });
    const analysis = result.details?.analysis;
    expect(analysis?.reactions).toEqual({ RA_kn: 5, RB_kn: 5 });
    expect(analysis?.samples).toBe(1001);
    const text = result.content[0]?.text ?? "";
    expect(text.split("\n")).toContain("| Left (RA) | 5.00 |");
    expect(text.split("\n")).toContain("- Max moment: 25.00 kN·m at x = 5.00 m");
    expect(result.details?.output_path).toBeUndefined();
  });

  it("uses the material defaults and clamps out-of-range properties", async () => {
    const result = await tool().execute("t2", { span_m: 10, E_gpa: 900 });
    // 500 GPa × 5000 cm⁴ = 25 000 kN·m²
    expect(result.details?.analysis.EI_knm2).toBeCloseTo(25000, 6);
    expect(result.details?.analysis.samples).toBe(1000);
  });

  it("clamps num_points to at least 2", async () => {
    const result = await tool().execute("t3", { span_m: 4, num_points: 1 });
    expect(result.details?.analysis.diagrams.x_m).toEqual([0, 4]);
  });

  it("writes the diagram sheet when output_path is given", async () => {
    const result = await tool().execute("t4", {
      span_m: 6,
      udl: { intensity_kn_per_m: 3, start_m: 0, end_m: 6 },
      output_path: "sheets/beam.svg",
    });
    const target = path.join(outputDir, "sheets", "beam.svg");
    expect(result.details?.output_path).toBe(target);
    expect(fs.readFileSync(target, "utf-8")).toBe(result.details?.diagram_svg);
  });

  it("rejects a sixth point load instead of analysing five", async () => {
    const point_loads = Array.from({ length: 6 }, (_, i) => ({ magnitude_kn: 10, position_m: i + 1 }));
    await expect(tool().execute("t8", { span_m: 10, point_loads })).rejects.toThrow(
      "point_loads accepts at most 5 items (got 6).",
    );
  });

  it.each(["../escape.svg", "sheets/../../escape.svg", "."])(
    "keeps output_path %s inside the output directory",
    async (output_path) => {
      await expect(tool().execute("t9", { span_m: 6, output_path })).rejects.toThrow(
        `output_path must name a file inside ${path.resolve(outputDir)}.`,
      );
      expect(fs.existsSync(path.join(outputDir, "..", "escape.svg"))).toBe(false);
    },
  );

  it("rejects an absolute output_path outside the output directory", async () => {
    const outside = path.join(path.dirname(outputDir), `outside-${path.basename(outputDir)}.svg`);
    await expect(tool().execute("t10", { span_m: 6, output_path: outside })).rejects.toThrow("output_path must name a file inside");
    expect(fs.existsSync(outside)).toBe(false);
  });

  it("rejects malformed arguments", async () => {
    await expect(tool().execute("t5", { span_m: "10" })).rejects.toThrow("span_m must be a number.");
    await expect(tool().execute("t6", { span_m: 10, point_loads: {} })).rejects.toThrow(
      "point_loads must be an array.",
    );
    await expect(
      tool().execute("t7", { span_m: 10, moments: [{ magnitude_knm: 1 }] }),
    ).rejects.toThrow("moments[0].position_m must be a number.");
  });

  it("surfaces range errors from the engine", async () => {
    await expect(
      tool().execute("t8", { span_m: 10, point_loads: [{ magnitude_kn: 10, position_m: 12 }] }),
    ).rejects.toBeInstanceOf(LoadRangeError);
  });
});
