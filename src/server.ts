#!/usr/bin/env node
/**
 * beamcalc web server: JSON API + static hosting for the browser form.
 */
import { ensureDirs, OUTPUT_DIR, PORT, SAMPLES, TOOL_OPTIONS } from "./shared.js";

import http from "node:http";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createRequestHandler } from "./routes.js";

// Resolve web/dist relative to this file's directory
const STATIC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../web/dist");

ensureDirs();

const server = http.createServer(createRequestHandler({ ...TOOL_OPTIONS, staticDir: STATIC_DIR }));

server.listen(PORT, () => {
  console.log(`\x1b[2m┌ beamcalc web server\x1b[0m`);
  console.log(`\x1b[2m│ http://localhost:${PORT}\x1b[0m`);
  console.log(`\x1b[2m│ samples: ${SAMPLES}\x1b[0m`);
  console.log(`\x1b[2m└ exports: ${OUTPUT_DIR}\x1b[0m`);
});
