#!/usr/bin/env node
/**
 * beamcalc: interactive terminal form for the simply supported beam calculator.
 *
 * Asks for the beam and its loads, prints reactions and extremes, and writes
 * the PDF report or SVG diagram sheet on request.
 */
import { describeError, ensureDirs, OUTPUT_DIR, SAMPLES, TOOL_OPTIONS } from "./shared.js";

import readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { createBeamAnalysisToolDefinition, createBeamReportToolDefinition } from "./tools/index.js";
import { askChoice, askYesNo, collectBeamInput, FormAborted } from "./form.js";
import type { FormIO } from "./form.js";

// ─── REPL ────────────────────────────────────────────────────────────────────

async function main() {
  ensureDirs();

  const analysisTool = createBeamAnalysisToolDefinition(TOOL_OPTIONS);
  const reportTool = createBeamReportToolDefinition(TOOL_OPTIONS);

  console.log(`\x1b[2m┌ beamcalc\x1b[0m`);
  console.log(`\x1b[2m│ samples: ${SAMPLES}\x1b[0m`);
  console.log(`\x1b[2m│ exports: ${OUTPUT_DIR}\x1b[0m`);
  console.log(`\x1b[2m└ press Enter to accept [defaults] · /status /quit\x1b[0m`);
  console.log();

  const rl = readline.createInterface({ input: stdin, output: stdout });
  const io: FormIO = {
    ask: async (question) => {
      try {
        return await rl.question(`\x1b[1m${question}\x1b[0m`);
      } catch {
        throw new FormAborted(); // EOF
      }
    },
    say: (message) => console.log(`\x1b[33m${message}\x1b[0m`),
    command: (name) => {
      if (name === "status") {
        console.log(`\x1b[2mSamples: ${SAMPLES}\x1b[0m`);
        console.log(`\x1b[2mExports: ${OUTPUT_DIR}\x1b[0m`);
      } else {
        console.log(`\x1b[2mUnknown command /${name}\x1b[0m`);
      }
    },
  };

  for (;;) {
    try {
      const input = await collectBeamInput(io);
      const startTime = Date.now();

      const result = await analysisTool.execute(`cli-${startTime}`, input);
      console.log();
      for (const part of result.content) console.log(part.text);
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
      console.log(`\x1b[2m(${elapsed}s)\x1b[0m\n`);

      const exportAs = await askChoice(io, "Export", ["pdf", "svg", "none"] as const, "none");
      if (exportAs === "pdf") {
        const report = await reportTool.execute(`cli-${Date.now()}`, input);
        for (const part of report.content) console.log(part.text);
      } else if (exportAs === "svg") {
        const sheet = await analysisTool.execute(`cli-${Date.now()}`, {
          ...input,
          output_path: "beam_results.svg",
        });
        if (sheet.details?.output_path) console.log(`Diagram saved to: ${sheet.details.output_path}`);
      }

      if (!(await askYesNo(io, "Another calculation?", true))) break;
      console.log();
    } catch (err) {
      if (err instanceof FormAborted) break;
      const { body } = describeError(err);
      console.error(`\x1b[31mError: ${body.error}\x1b[0m\n`);
    }
  }

  rl.close();
  console.log("\x1b[2mBye.\x1b[0m");
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
