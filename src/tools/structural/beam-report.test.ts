import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createBeamReportToolDefinition, DEFAULT_REPORT_NAME } from "./beam-report.js";
import { createAllToolDefinitions } from "../index.js";

describe("beam_report tool", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "beamcalc-"));
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it("writes the PDF report to the output directory", async () => {
    const tool = createBeamReportToolDefinition({ outputDir, defaultSamples: 200 });
    const result = await tool.execute("r1", {
      span_m: 10,
      point_loads: [{ magnitude_kn: 10, position_m: 5 }],
      moments: [{ magnitude_knm: 5, position_m: 4 }],
    });
    const target = path.join(outputDir, DEFAULT_REPORT_NAME);
    expect(result.details?.output_path).toBe(target);
    expect(result.details?.pages).toBe(3);
    expect(result.content[0]?.text).toBe(`Report saved to: ${target}`);
    const head = fs.readFileSync(target).subarray(0, 5).toString("latin1");
    expect(head).toBe("%PDF-");
  });
});

describe("createAllToolDefinitions", () => {
  it("registers the beam tools", () => {
    const names = createAllToolDefinitions({ outputDir: os.tmpdir(), defaultSamples: 10 }).map((t) => t.name);
    expect(names).toEqual(["beam_analysis", "beam_report"]);
  });
});
