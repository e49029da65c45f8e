/**
 * Beam report tool: runs the analysis and writes the paginated PDF report.
 */
import fs from "node:fs";
import path from "node:path";
import { analyzeBeam } from "../../beam/analyze.js";
import { generatePdfReport } from "../../render/pdf.js";
import type { ToolDefinition, ToolOptions } from "../types.js";
import { beamParameterProperties, parseBeamArgs } from "./beam-params.js";

export const DEFAULT_REPORT_NAME = "beam_results.pdf";

export interface BeamReportDetails {
  output_path: string;
  bytes: number;
  pages: number;
}

export function createBeamReportToolDefinition(
  options: ToolOptions,
): ToolDefinition<BeamReportDetails> {
  return {
    name: "beam_report",
    label: "Beam Report",
    description:
      "Export the simply supported beam diagrams (load diagram, shear, moment, slope, deflection) " +
      "and the reaction summary to a PDF report.",
    parameters: {
      type: "object",
      properties: {
        ...beamParameterProperties,
        output_path: {
          type: "string",
          description: `PDF file path (default: ${DEFAULT_REPORT_NAME} in the output directory).`,
        },
      },
      required: ["span_m"],
    },
    execute: async (_toolCallId, args) => {
      const { input, samples, outputPath } = parseBeamArgs(args, options);
      const analysis = analyzeBeam(input, { samples });
      const report = generatePdfReport(analysis, input);

      const target = outputPath ?? path.resolve(options.outputDir, DEFAULT_REPORT_NAME);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, report.data);

      return {
        content: [{ type: "text", text: `Report saved to: ${target}` }],
        details: { output_path: target, bytes: report.data.byteLength, pages: report.pages },
      };
    },
  };
}
