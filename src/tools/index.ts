/**
 * Barrel file: exports all tool definitions.
 *
 * Each tool follows the pattern: createXxxToolDefinition(options) → ToolDefinition
 */

// ─── Structural ─────────────────────────────────────────────────────────────
import { createBeamAnalysisToolDefinition } from "./structural/beam-analysis.js";
import { createBeamReportToolDefinition } from "./structural/beam-report.js";
import type { ToolDefinition, ToolOptions } from "./types.js";

export { createBeamAnalysisToolDefinition, createBeamReportToolDefinition };
export type { ToolDefinition, ToolOptions, ToolResult, ToolContent } from "./types.js";

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions(options: ToolOptions): ToolDefinition[] {
  return [
    createBeamAnalysisToolDefinition(options),
    createBeamReportToolDefinition(options),
  ];
}
