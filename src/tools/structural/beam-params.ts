/**
 * Argument parsing shared by the beam tools: untyped JSON in, form-unit
 * `RawBeamInput` out, clamped to the input surface limits.
 */
import path from "node:path";
import { INPUT_LIMITS, applyInputLimits, clamp } from "../../beam/limits.js";
import type {
  RawBeamInput,
  RawDistributedLoad,
  RawMoment,
  RawPointLoad,
} from "../../beam/types.js";
import { isRecord } from "../types.js";
import type { ToolOptions } from "../types.js";

// ─── JSON schema ─────────────────────────────────────────────────────────────

export const beamParameterProperties = {
  span_m: {
    type: "number",
    description: "Beam length in meters (1–100).",
    minimum: INPUT_LIMITS.span_m.min,
    maximum: INPUT_LIMITS.span_m.max,
  },
  E_gpa: {
    type: "number",
    description: "Young's modulus in GPa (default: 200).",
    minimum: INPUT_LIMITS.E_gpa.min,
    maximum: INPUT_LIMITS.E_gpa.max,
  },
  I_cm4: {
    type: "number",
    description: "Second moment of area in cm⁴ (default: 5000).",
    minimum: INPUT_LIMITS.I_cm4.min,
    maximum: INPUT_LIMITS.I_cm4.max,
  },
  point_loads: {
    type: "array",
    description: "Up to 5 point loads. Positive magnitude acts downward.",
    maxItems: INPUT_LIMITS.maxPointLoads,
    items: {
      type: "object",
      properties: {
        magnitude_kn: { type: "number", description: "Load in kN." },
        position_m: { type: "number", description: "Distance from the left support in m." },
      },
      required: ["magnitude_kn", "position_m"],
    },
  },
  udl: {
    type: "object",
    description: "Optional single uniformly distributed load.",
    properties: {
      intensity_kn_per_m: { type: "number", description: "Intensity in kN/m, downward positive." },
      start_m: { type: "number", description: "Start position in m." },
      end_m: { type: "number", description: "End position in m." },
    },
    required: ["intensity_kn_per_m", "start_m", "end_m"],
  },
  moments: {
    type: "array",
    description: "Up to 3 applied moments. A positive magnitude steps the bending moment up at its position.",
    maxItems: INPUT_LIMITS.maxMoments,
    items: {
      type: "object",
      properties: {
        magnitude_knm: { type: "number", description: "Moment in kN·m." },
        position_m: { type: "number", description: "Distance from the left support in m." },
      },
      required: ["magnitude_knm", "position_m"],
    },
  },
  num_points: {
    type: "number",
    description: "Stations along the span for the diagrams (default: 1000).",
    minimum: INPUT_LIMITS.num_points.min,
    maximum: INPUT_LIMITS.num_points.max,
  },
} as const;

// ─── Parsing ─────────────────────────────────────────────────────────────────

export interface ParsedBeamArgs {
  input: RawBeamInput;
  samples: number;
  outputPath?: string;
}

function requireNumber(raw: unknown, field: string): number {
  if (typeof raw !== "number") {
    throw new Error(`${field} must be a number.`);
  }
  return raw;
}

function optionalNumber(raw: unknown, field: string, fallback: number): number {
  return raw === undefined || raw === null ? fallback : requireNumber(raw, field);
}

function requireArray(raw: unknown, field: string): unknown[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    throw new Error(`${field} must be an array.`);
  }
  return raw;
}

function requireObject(raw: unknown, field: string): Record<string, unknown> {
  if (!isRecord(raw)) {
    throw new Error(`${field} must be an object.`);
  }
  return raw;
}

function parsePointLoad(raw: unknown, i: number): RawPointLoad {
  const obj = requireObject(raw, `point_loads[${i}]`);
  return {
    magnitude_kn: requireNumber(obj.magnitude_kn, `point_loads[${i}].magnitude_kn`),
    position_m: requireNumber(obj.position_m, `point_loads[${i}].position_m`),
  };
}

function parseMoment(raw: unknown, i: number): RawMoment {
  const obj = requireObject(raw, `moments[${i}]`);
  return {
    magnitude_knm: requireNumber(obj.magnitude_knm, `moments[${i}].magnitude_knm`),
    position_m: requireNumber(obj.position_m, `moments[${i}].position_m`),
  };
}

function parseUdl(raw: unknown): RawDistributedLoad | null {
  if (raw === undefined || raw === null) return null;
  const obj = requireObject(raw, "udl");
  return {
    intensity_kn_per_m: requireNumber(obj.intensity_kn_per_m, "udl.intensity_kn_per_m"),
    start_m: requireNumber(obj.start_m, "udl.start_m"),
    end_m: requireNumber(obj.end_m, "udl.end_m"),
  };
}

/** Resolves `requested` under `outputDir`; paths that leave it are rejected. */
export function resolveOutputPath(outputDir: string, requested: string): string {
  const root = path.resolve(outputDir);
  const resolved = path.resolve(root, requested);
  const relative = path.relative(root, resolved);
  if (!relative || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new Error(`output_path must name a file inside ${root}.`);
  }
  return resolved;
}

export function parseBeamArgs(args: unknown, options: ToolOptions): ParsedBeamArgs {
  const params = requireObject(args ?? {}, "arguments");

  const input = applyInputLimits({
    span_m: requireNumber(params.span_m, "span_m"),
    E_gpa: optionalNumber(params.E_gpa, "E_gpa", 200),
    I_cm4: optionalNumber(params.I_cm4, "I_cm4", 5000),
    point_loads: requireArray(params.point_loads, "point_loads").map(parsePointLoad),
    udl: parseUdl(params.udl),
    moments: requireArray(params.moments, "moments").map(parseMoment),
  });

  const samples =
    typeof params.num_points === "number" && Number.isFinite(params.num_points)
      ? clamp(Math.round(params.num_points), INPUT_LIMITS.num_points)
      : options.defaultSamples;

  const outputPath =
    typeof params.output_path === "string" && params.output_path.trim()
      ? resolveOutputPath(options.outputDir, params.output_path.trim())
      : undefined;

  return { input, samples, outputPath };
}
