/**
 * Shape shared by every tool definition: JSON-schema parameters plus an
 * `execute` that takes untyped arguments.
 */

export interface ToolContent {
  type: "text";
  text: string;
}

export interface ToolResult<TDetails = unknown> {
  content: ToolContent[];
  details?: TDetails;
}

export interface ToolDefinition<TDetails = unknown> {
  name: string;
  label: string;
  description: string;
  parameters: Record<string, unknown>;
  execute: (toolCallId: string, args: unknown) => Promise<ToolResult<TDetails>>;
}

export interface ToolOptions {
  /** Directory relative output paths resolve against. */
  outputDir: string;
  /** Stations per diagram when the caller gives no `num_points`. */
  defaultSamples: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
