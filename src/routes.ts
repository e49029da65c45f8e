/**
 * HTTP routes for the browser form: tool listing and execution, PDF report
 * download, and static serving of the built web UI.
 */
import http from "node:http";
import fs from "node:fs";
import path from "node:path";
import { analyzeBeam } from "./beam/analyze.js";
import { generatePdfReport } from "./render/pdf.js";
import { describeError } from "./shared.js";
import { createAllToolDefinitions } from "./tools/index.js";
import type { ToolOptions } from "./tools/types.js";
import { parseBeamArgs } from "./tools/structural/beam-params.js";
import { DEFAULT_REPORT_NAME } from "./tools/structural/beam-report.js";

export interface RouteOptions extends ToolOptions {
  /** Built web UI; static serving is skipped when absent. */
  staticDir?: string;
}

// ─── Static file serving ────────────────────────────────────────────────────

const MIME_TYPES: Record<string, string> = {
  ".html": "text/html",
  ".js": "application/javascript",
  ".css": "text/css",
  ".json": "application/json",
  ".png": "image/png",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
  ".woff2": "font/woff2",
};

function serveStatic(staticDir: string, res: http.ServerResponse, pathname: string): boolean {
  let filePath = path.join(staticDir, pathname);

  // Security: prevent path traversal
  if (!filePath.startsWith(staticDir)) {
    return false;
  }

  if (fs.existsSync(filePath) && fs.statSync(filePath).isDirectory()) {
    filePath = path.join(filePath, "index.html");
  }

  if (!fs.existsSync(filePath)) {
    return false;
  }

  const contentType = MIME_TYPES[path.extname(filePath)] ?? "application/octet-stream";
  res.writeHead(200, { "Content-Type": contentType });
  res.end(fs.readFileSync(filePath));
  return true;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function corsHeaders(): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  };
}

function jsonResponse(res: http.ServerResponse, status: number, data: unknown) {
  res.writeHead(status, { ...corsHeaders(), "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer) => (body += chunk.toString()));
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const body = await readBody(req);
  if (!body.trim()) return {};
  try {
    return JSON.parse(body);
  } catch {
    throw new Error("Invalid JSON body.");
  }
}

function errorResponse(res: http.ServerResponse, err: unknown) {
  const { status, body } = describeError(err);
  if (status >= 500) console.error(`\x1b[31mRequest failed: ${body.error}\x1b[0m`);
  jsonResponse(res, status, body);
}

// ─── Handler ─────────────────────────────────────────────────────────────────

export function createRequestHandler(options: RouteOptions): http.RequestListener {
  const tools = createAllToolDefinitions(options);
  const toolsByName = new Map(tools.map((t) => [t.name, t]));

  function handleStatus(res: http.ServerResponse) {
    jsonResponse(res, 200, {
      samples: options.defaultSamples,
      outputDir: options.outputDir,
      tools: tools.map((t) => t.name),
    });
  }

  function handleToolList(res: http.ServerResponse) {
    jsonResponse(res, 200, {
      tools: tools.map(({ name, label, description, parameters }) => ({
        name,
        label,
        description,
        parameters,
      })),
    });
  }

  async function handleToolCall(req: http.IncomingMessage, res: http.ServerResponse, name: string) {
    const tool = toolsByName.get(name);
    if (!tool) {
      jsonResponse(res, 404, { error: `Unknown tool: ${name}` });
      return;
    }
    const args = await readJson(req);
    const result = await tool.execute(`http-${Date.now()}`, args);
    jsonResponse(res, 200, result);
  }

  async function handleReport(req: http.IncomingMessage, res: http.ServerResponse) {
    const { input, samples } = parseBeamArgs(await readJson(req), options);
    const analysis = analyzeBeam(input, { samples });
    const { data } = generatePdfReport(analysis, input);
    res.writeHead(200, {
      ...corsHeaders(),
      "Content-Type": "application/pdf",
      "Content-Length": data.byteLength.toString(),
      "Content-Disposition": `attachment; filename="${DEFAULT_REPORT_NAME}"`,
    });
    res.end(data);
  }

  return async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method?.toUpperCase();

    // CORS preflight
    if (method === "OPTIONS") {
      res.writeHead(204, corsHeaders());
      res.end();
      return;
    }

    try {
      if (method === "GET" && url.pathname === "/api/status") {
        handleStatus(res);
      } else if (method === "GET" && url.pathname === "/api/tools") {
        handleToolList(res);
      } else if (method === "POST" && url.pathname.startsWith("/api/tools/")) {
        const name = decodeURIComponent(url.pathname.slice("/api/tools/".length));
        await handleToolCall(req, res, name);
      } else if (method === "POST" && url.pathname === "/api/report") {
        await handleReport(req, res);
      } else if (method === "GET" && options.staticDir && !url.pathname.startsWith("/api/")) {
        // SPA fallback to index.html
        if (!serveStatic(options.staticDir, res, url.pathname)) {
          serveStatic(options.staticDir, res, "/index.html") || jsonResponse(res, 404, { error: "Not found" });
        }
      } else {
        jsonResponse(res, 404, { error: "Not found" });
      }
    } catch (err) {
      errorResponse(res, err);
    }
  };
}
