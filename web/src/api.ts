import type { BeamAnalysis, RawBeamInput } from "../../src/beam/types.js";
import type { LoadItemRef } from "../../src/beam/errors.js";

export interface AnalysisResponse {
  summary: string;
  analysis: BeamAnalysis;
  diagramSvg: string;
}

export interface Status {
  samples: number;
  outputDir: string;
  tools: string[];
}

/** Error returned by the API; `item` points at the offending load when there is one. */
export class ApiError extends Error {
  readonly status: number;
  readonly item?: LoadItemRef;

  constructor(message: string, status: number, item?: LoadItemRef) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.item = item;
  }
}

async function failure(res: Response): Promise<ApiError> {
  try {
    const data: { error?: string; item?: LoadItemRef } = await res.json();
    return new ApiError(data.error ?? `HTTP ${res.status}`, res.status, data.item);
  } catch {
    return new ApiError(`HTTP ${res.status}`, res.status);
  }
}

export async function getStatus(): Promise<Status> {
  const res = await fetch("/api/status");
  if (!res.ok) throw await failure(res);
  return res.json();
}

export async function analyze(input: RawBeamInput, numPoints?: number): Promise<AnalysisResponse> {
  const res = await fetch("/api/tools/beam_analysis", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ ...input, num_points: numPoints }),
  });
  if (!res.ok) throw await failure(res);
  const data: {
    content: Array<{ type: string; text: string }>;
    details: { analysis: BeamAnalysis; diagram_svg: string };
  } = await res.json();
  return {
    summary: data.content.map((c) => c.text).join("\n\n"),
    analysis: data.details.analysis,
    diagramSvg: data.details.diagram_svg,
  };
}

/** Fetch the PDF report and hand it to the browser as a download. */
export async function downloadReport(input: RawBeamInput, numPoints?: number): Promise<void> {
  const res = await fetch("/api/report", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ ...input, num_points: numPoints }),
  });
  if (!res.ok) throw await failure(res);
  const blob = await res.blob();
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = "beam_results.pdf";
  a.click();
  URL.revokeObjectURL(url);
}
