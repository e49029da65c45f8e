/**
 * Shared setup code used by both the CLI (entry.ts) and the web server (server.ts).
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { DEFAULT_SAMPLES } from "./beam/field.js";
import { INPUT_LIMITS, clamp } from "./beam/limits.js";
import { DomainError, LoadRangeError } from "./beam/errors.js";
import type { ToolOptions } from "./tools/types.js";

// ─── .env loading ────────────────────────────────────────────────────────────

export function parseDotEnv(content: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim();
    if (key) vars[key] = value;
  }
  return vars;
}

export function loadDotEnv(envPath = path.join(process.cwd(), ".env")) {
  let content: string;
  try {
    content = fs.readFileSync(envPath, "utf-8");
  } catch {
    return; // no .env file
  }
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (!(key in process.env)) process.env[key] = value;
  }
}

// Load .env immediately so env vars are available for module-level constants
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

export function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    console.warn(`Ignoring ${name}=${raw}: not an integer, using ${fallback}.`);
    return fallback;
  }
  return parsed;
}

export const BEAMCALC_HOME = process.env.BEAMCALC_HOME ?? path.join(os.homedir(), ".beamcalc");
export const OUTPUT_DIR = path.resolve(process.env.BEAMCALC_OUTPUT_DIR ?? "exports");
export const PORT = readIntEnv("PORT", 3001);
export const SAMPLES = clamp(readIntEnv("BEAMCALC_SAMPLES", DEFAULT_SAMPLES), INPUT_LIMITS.num_points);

export const TOOL_OPTIONS: ToolOptions = { outputDir: OUTPUT_DIR, defaultSamples: SAMPLES };

// ─── Ensure directories ─────────────────────────────────────────────────────

export function ensureDirs() {
  for (const dir of [BEAMCALC_HOME, OUTPUT_DIR]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export interface ErrorReport {
  status: number;
  body: { error: string; kind: string; item?: LoadRangeError["item"]; field?: string };
}

/** Maps a thrown value to an HTTP status and a JSON body. */
export function describeError(err: unknown): ErrorReport {
  if (err instanceof LoadRangeError) {
    return { status: 422, body: { error: err.message, kind: "range", item: err.item } };
  }
  if (err instanceof DomainError) {
    return { status: 422, body: { error: err.message, kind: "domain", field: err.field } };
  }
  if (err instanceof RangeError) {
    return { status: 422, body: { error: err.message, kind: "range" } };
  }
  if (err instanceof Error && "code" in err) {
    // fs / system failures while writing exports
    return { status: 500, body: { error: err.message, kind: "internal" } };
  }
  if (err instanceof Error) {
    return { status: 400, body: { error: err.message, kind: "invalid_arguments" } };
  }
  return { status: 500, body: { error: String(err), kind: "internal" } };
}
