/**
 * SVG diagram sheet: load schematic followed by shear, moment, slope and
 * deflection panels stacked on a shared x axis.
 */
import type { BeamAnalysis, BeamSchematic } from "../beam/types.js";

// ─── Panels ──────────────────────────────────────────────────────────────────

export interface DiagramPanel {
  title: string;
  unit: string;
  color: string;
  values: number[];
  /** Decimal places for the grid and peak labels. */
  digits: number;
}

export function diagramPanels(analysis: BeamAnalysis): DiagramPanel[] {
  const d = analysis.diagrams;
  return [
    { title: "Shear Force", unit: "kN", color: "#1565c0", values: d.shear_kn, digits: 2 },
    { title: "Bending Moment", unit: "kN·m", color: "#d32f2f", values: d.moment_knm, digits: 2 },
    { title: "Slope", unit: "rad", color: "#7b1fa2", values: d.slope_rad, digits: 5 },
    { title: "Deflection", unit: "mm", color: "#2e7d32", values: d.deflection_mm, digits: 3 },
  ];
}

/** Half-height of a panel's value axis: peak magnitude plus 15%, or 1 for a flat series. */
export function symmetricRange(values: readonly number[]): number {
  let peak = 0;
  for (const v of values) peak = Math.max(peak, Math.abs(v));
  return peak * 1.15 || 1;
}

// ─── Sheet ───────────────────────────────────────────────────────────────────

const WIDTH = 800;
const MARGIN = { top: 50, right: 60, bottom: 40, left: 90 };
const SCHEMATIC_HEIGHT = 110;
const PANEL_HEIGHT = 160;
const PANEL_GAP = 45;

export function generateDiagramSheet(analysis: BeamAnalysis): string {
  const panels = diagramPanels(analysis);
  const height =
    MARGIN.top + SCHEMATIC_HEIGHT + panels.length * (PANEL_HEIGHT + PANEL_GAP) + MARGIN.bottom;
  const plotWidth = WIDTH - MARGIN.left - MARGIN.right;
  const L = analysis.span_m;
  const xScale = (x: number) => MARGIN.left + (x / L) * plotWidth;

  const lines: string[] = [];
  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${WIDTH} ${height}" width="${WIDTH}" height="${height}" font-family="Arial, sans-serif" font-size="11">`);
  lines.push(`<rect width="${WIDTH}" height="${height}" fill="#fafafa" rx="4"/>`);
  lines.push(`<text x="${WIDTH / 2}" y="22" text-anchor="middle" font-size="14" font-weight="bold">Simply Supported Beam - L = ${L.toFixed(2)} m - RA = ${analysis.reactions.RA_kn.toFixed(2)} kN, RB = ${analysis.reactions.RB_kn.toFixed(2)} kN</text>`);

  drawSchematic(lines, analysis.schematic, xScale, MARGIN.top + 60);

  panels.forEach((panel, i) => {
    const top = MARGIN.top + SCHEMATIC_HEIGHT + i * (PANEL_HEIGHT + PANEL_GAP) + 20;
    drawPanel(lines, panel, analysis.diagrams.x_m, xScale, top, plotWidth);
  });

  const e = analysis.extremes;
  lines.push(`<text x="${WIDTH / 2}" y="${height - 12}" text-anchor="middle" font-size="10" fill="#555">V_max = ${e.shear_kn.value.toFixed(2)} kN | M_max = ${e.moment_knm.value.toFixed(2)} kN·m | δ_max = ${e.deflection_mm.value.toFixed(3)} mm</text>`);
  lines.push(`</svg>`);
  return lines.join("\n");
}

// ─── Schematic ───────────────────────────────────────────────────────────────

function drawSchematic(
  lines: string[],
  schematic: BeamSchematic,
  xScale: (x: number) => number,
  beamY: number,
): void {
  const beamLeft = xScale(0);
  const beamRight = xScale(schematic.span_m);
  const s = 12;

  lines.push(`<defs>`);
  lines.push(`<marker id="arrowLoad" markerWidth="8" markerHeight="8" refX="4" refY="8" orient="auto"><path d="M0,0 L4,8 L8,0" fill="#1565c0"/></marker>`);
  lines.push(`<marker id="arrowMoment" markerWidth="6" markerHeight="6" refX="3" refY="3" orient="auto"><path d="M0,0 L6,3 L0,6" fill="#ef6c00"/></marker>`);
  lines.push(`</defs>`);

  if (schematic.udl) {
    const u = schematic.udl;
    const x1 = xScale(u.start_m);
    const x2 = xScale(u.end_m);
    lines.push(`<rect x="${x1}" y="${beamY - 30}" width="${x2 - x1}" height="24" fill="#ef6c00" fill-opacity="0.4"/>`);
    lines.push(`<text x="${(x1 + x2) / 2}" y="${beamY - 34}" text-anchor="middle" fill="#ef6c00" font-size="10">${u.label}</text>`);
  }

  lines.push(`<line x1="${beamLeft}" y1="${beamY}" x2="${beamRight}" y2="${beamY}" stroke="#333" stroke-width="3"/>`);

  for (const support of schematic.supports) {
    const sx = xScale(support.x_m);
    if (support.kind === "pin") {
      lines.push(`<polygon points="${sx},${beamY} ${sx - s},${beamY + s * 1.5} ${sx + s},${beamY + s * 1.5}" fill="none" stroke="#333" stroke-width="1.5"/>`);
    } else {
      lines.push(`<circle cx="${sx}" cy="${beamY + s + 4}" r="${s / 2}" fill="none" stroke="#333" stroke-width="1.5"/>`);
      lines.push(`<line x1="${sx - s}" y1="${beamY + s * 1.5 + 2}" x2="${sx + s}" y2="${beamY + s * 1.5 + 2}" stroke="#333" stroke-width="1.5"/>`);
    }
    lines.push(`<text x="${sx}" y="${beamY + s * 1.5 + 16}" text-anchor="middle" font-size="10">${support.label}</text>`);
  }

  for (const load of schematic.point_loads) {
    const px = xScale(load.x_m);
    const [from, to] = load.direction === "down" ? [beamY - 45, beamY - 3] : [beamY - 3, beamY - 45];
    lines.push(`<line x1="${px}" y1="${from}" x2="${px}" y2="${to}" stroke="#1565c0" stroke-width="2" marker-end="url(#arrowLoad)"/>`);
    lines.push(`<text x="${px}" y="${beamY - 50}" text-anchor="middle" fill="#1565c0" font-size="10">${load.label}</text>`);
  }

  for (const moment of schematic.moments) {
    const px = xScale(moment.x_m);
    const r = 12;
    // Arc over the top, arrowhead on the side the moment points to.
    const [start, end] = moment.direction === "right" ? [px - r, px + r] : [px + r, px - r];
    const sweep = moment.direction === "right" ? 1 : 0;
    lines.push(`<path d="M ${start} ${beamY - 5} A ${r} ${r} 0 1 ${sweep} ${end} ${beamY - 5}" fill="none" stroke="#ef6c00" stroke-width="1.5" marker-end="url(#arrowMoment)"/>`);
    lines.push(`<text x="${px}" y="${beamY - 22}" text-anchor="middle" fill="#ef6c00" font-size="10">${moment.label}</text>`);
  }
}

// ─── Diagram panel ───────────────────────────────────────────────────────────

function drawPanel(
  lines: string[],
  panel: DiagramPanel,
  xs: number[],
  xScale: (x: number) => number,
  top: number,
  plotWidth: number,
): void {
  const range = symmetricRange(panel.values);
  const mid = top + PANEL_HEIGHT / 2;
  const yScale = (v: number) => mid - (v / range) * (PANEL_HEIGHT / 2);

  lines.push(`<text x="${MARGIN.left}" y="${top - 6}" font-size="12" font-weight="bold">${panel.title} (${panel.unit})</text>`);
  drawGrid(lines, MARGIN.left, top, plotWidth, PANEL_HEIGHT, mid, range, panel.digits);

  const first = xs[0] ?? 0;
  const last = xs[xs.length - 1] ?? 0;
  let path = `M ${xScale(first)} ${yScale(0)}`;
  panel.values.forEach((v, i) => {
    path += ` L ${xScale(xs[i] ?? 0)} ${yScale(v)}`;
  });
  path += ` L ${xScale(last)} ${yScale(0)} Z`;
  lines.push(`<path d="${path}" fill="${panel.color}" fill-opacity="0.25" stroke="${panel.color}" stroke-width="1.5"/>`);

  let peakIndex = 0;
  panel.values.forEach((v, i) => {
    if (Math.abs(v) > Math.abs(panel.values[peakIndex] ?? 0)) peakIndex = i;
  });
  const peak = panel.values[peakIndex] ?? 0;
  const px = xScale(xs[peakIndex] ?? 0);
  lines.push(`<circle cx="${px}" cy="${yScale(peak)}" r="3" fill="${panel.color}"/>`);
  lines.push(`<text x="${px + 5}" y="${yScale(peak) - 5}" fill="${panel.color}" font-size="10">${peak.toFixed(panel.digits)} ${panel.unit}</text>`);
}

function drawGrid(
  lines: string[],
  left: number,
  top: number,
  plotWidth: number,
  panelHeight: number,
  midY: number,
  range: number,
  digits: number,
): void {
  const right = left + plotWidth;

  lines.push(`<rect x="${left}" y="${top}" width="${plotWidth}" height="${panelHeight}" fill="white" stroke="#ddd" stroke-width="0.5"/>`);
  lines.push(`<line x1="${left}" y1="${midY}" x2="${right}" y2="${midY}" stroke="#999" stroke-width="0.5" stroke-dasharray="4,3"/>`);

  for (let i = 1; i <= 3; i++) {
    const frac = i / 3;
    const yUp = midY - frac * (panelHeight / 2);
    const yDown = midY + frac * (panelHeight / 2);
    const val = (frac * range).toFixed(digits);
    lines.push(`<line x1="${left}" y1="${yUp}" x2="${right}" y2="${yUp}" stroke="#eee" stroke-width="0.5"/>`);
    lines.push(`<line x1="${left}" y1="${yDown}" x2="${right}" y2="${yDown}" stroke="#eee" stroke-width="0.5"/>`);
    lines.push(`<text x="${left - 4}" y="${yUp + 3}" text-anchor="end" font-size="9" fill="#888">${val}</text>`);
    lines.push(`<text x="${left - 4}" y="${yDown + 3}" text-anchor="end" font-size="9" fill="#888">-${val}</text>`);
  }
  lines.push(`<text x="${left - 4}" y="${midY + 3}" text-anchor="end" font-size="9" fill="#888">0</text>`);
}
