/**
 * Beam analysis tool.
 *
 * Simply supported beam under point loads, one UDL and applied moments.
 * Returns reactions, extremes and the full shear / moment / slope /
 * deflection sequences; optionally writes the diagram sheet as SVG.
 */
import fs from "node:fs";
import path from "node:path";
import { analyzeBeam } from "../../beam/analyze.js";
import type { BeamAnalysis, RawBeamInput } from "../../beam/types.js";
import { generateDiagramSheet } from "../../render/svg.js";
import type { ToolDefinition, ToolOptions } from "../types.js";
import { beamParameterProperties, parseBeamArgs } from "./beam-params.js";

export interface BeamAnalysisDetails {
  analysis: BeamAnalysis;
  diagram_svg: string;
  output_path?: string;
}

// ─── Summary ─────────────────────────────────────────────────────────────────

function fmt(n: number, digits = 2): string {
  return n.toFixed(digits);
}

export function formatSummary(analysis: BeamAnalysis, input: RawBeamInput): string {
  const { reactions, extremes: e } = analysis;
  const lines = [
    `### Simply supported beam, L = ${input.span_m} m`,
    ``,
    `E = ${input.E_gpa} GPa, I = ${input.I_cm4} cm⁴, EI = ${fmt(analysis.EI_knm2, 1)} kN·m²`,
    ``,
    `| Support | Reaction (kN) |`,
    `| --- | --- |`,
    `| Left (RA) | ${fmt(reactions.RA_kn)} |`,
    `| Right (RB) | ${fmt(reactions.RB_kn)} |`,
    ``,
    `- Total vertical load: ${fmt(analysis.total_load_kn)} kN`,
    `- Max shear: ${fmt(e.shear_kn.value)} kN at x = ${fmt(e.shear_kn.x_m)} m`,
    `- Max moment: ${fmt(e.moment_knm.value)} kN·m at x = ${fmt(e.moment_knm.x_m)} m`,
    `- Max deflection: ${fmt(e.deflection_mm.value, 3)} mm at x = ${fmt(e.deflection_mm.x_m)} m`,
  ];
  return lines.join("\n");
}

// ─── Tool definition ─────────────────────────────────────────────────────────

export function createBeamAnalysisToolDefinition(
  options: ToolOptions,
): ToolDefinition<BeamAnalysisDetails> {
  return {
    name: "beam_analysis",
    label: "Beam Analysis",
    description:
      "Analyze a simply supported beam (pin at left, roller at right) under point loads, " +
      "an optional uniformly distributed load and applied moments. Returns support reactions, " +
      "shear force, bending moment, slope and deflection along the span. Can save the diagrams as SVG.",
    parameters: {
      type: "object",
      properties: {
        ...beamParameterProperties,
        output_path: {
          type: "string",
          description: "File path to save the diagram sheet as SVG. If not provided, no file is written.",
        },
      },
      required: ["span_m"],
    },
    execute: async (_toolCallId, args) => {
      const { input, samples, outputPath } = parseBeamArgs(args, options);
      const analysis = analyzeBeam(input, { samples });
      const svg = generateDiagramSheet(analysis);

      if (outputPath) {
        fs.mkdirSync(path.dirname(outputPath), { recursive: true });
        fs.writeFileSync(outputPath, svg, "utf-8");
      }

      let summary = formatSummary(analysis, input);
      if (outputPath) summary += `\n\nDiagram saved to: ${outputPath}`;

      return {
        content: [{ type: "text", text: summary }],
        details: { analysis, diagram_svg: svg, output_path: outputPath },
      };
    },
  };
}
