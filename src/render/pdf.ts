/**
 * Paginated PDF report drawn with jsPDF vector primitives.
 *
 * Page 1: inputs, reactions, extremes and the load schematic.
 * Pages 2–3: shear/moment and slope/deflection diagrams.
 */
import { jsPDF } from "jspdf";
import type { BeamAnalysis, BeamSchematic, RawBeamInput } from "../beam/types.js";
import { diagramPanels, symmetricRange } from "./svg.js";
import type { DiagramPanel } from "./svg.js";

const PAGE = { width: 210, height: 297, margin: 20 };
const PLOT_WIDTH = PAGE.width - 2 * PAGE.margin - 15;
const PANEL_HEIGHT = 95;
export const REPORT_TITLE = "Beam Bending Calculation";

export interface PdfReport {
  data: Uint8Array;
  pages: number;
}

export function generatePdfReport(analysis: BeamAnalysis, input: RawBeamInput): PdfReport {
  const doc = new jsPDF({ orientation: "portrait", unit: "mm", format: "a4" });
  doc.setProperties({ title: REPORT_TITLE, subject: "Simply supported beam analysis" });

  const left = PAGE.margin + 15;
  const xScale = (x: number) => left + (x / analysis.span_m) * PLOT_WIDTH;

  // ── Page 1: summary ──
  doc.setFont("helvetica", "bold");
  doc.setFontSize(16);
  doc.text(REPORT_TITLE, PAGE.width / 2, PAGE.margin, { align: "center" });

  doc.setFont("helvetica", "normal");
  doc.setFontSize(10);
  const summary = summaryLines(analysis, input);
  summary.forEach((line, i) => doc.text(line, PAGE.margin, PAGE.margin + 12 + i * 6));

  const schematicY = PAGE.margin + 12 + summary.length * 6 + 35;
  drawSchematic(doc, analysis.schematic, xScale, schematicY);

  // ── Diagram pages, two panels each ──
  const panels = diagramPanels(analysis);
  for (let i = 0; i < panels.length; i += 2) {
    doc.addPage();
    panels.slice(i, i + 2).forEach((panel, j) => {
      const top = PAGE.margin + 10 + j * (PANEL_HEIGHT + 30);
      drawPanel(doc, panel, analysis.diagrams.x_m, xScale, left, top);
    });
  }

  return { data: new Uint8Array(doc.output("arraybuffer")), pages: doc.getNumberOfPages() };
}

export function summaryLines(analysis: BeamAnalysis, input: RawBeamInput): string[] {
  const lines = [
    `Span L = ${input.span_m} m, E = ${input.E_gpa} GPa, I = ${input.I_cm4} cm^4 (EI = ${analysis.EI_knm2.toFixed(1)} kNm^2)`,
  ];
  input.point_loads.forEach((p, i) => {
    lines.push(`Point load ${i + 1}: ${p.magnitude_kn} kN at ${p.position_m} m`);
  });
  if (input.udl) {
    lines.push(`UDL: ${input.udl.intensity_kn_per_m} kN/m from ${input.udl.start_m} m to ${input.udl.end_m} m`);
  }
  input.moments.forEach((m, i) => {
    lines.push(`Moment ${i + 1}: ${m.magnitude_knm} kNm at ${m.position_m} m`);
  });
  const e = analysis.extremes;
  lines.push(
    `Left support RA = ${analysis.reactions.RA_kn.toFixed(2)} kN, right support RB = ${analysis.reactions.RB_kn.toFixed(2)} kN`,
    `Max shear ${e.shear_kn.value.toFixed(2)} kN at x = ${e.shear_kn.x_m.toFixed(2)} m`,
    `Max moment ${e.moment_knm.value.toFixed(2)} kNm at x = ${e.moment_knm.x_m.toFixed(2)} m`,
    `Max deflection ${e.deflection_mm.value.toFixed(3)} mm at x = ${e.deflection_mm.x_m.toFixed(2)} m`,
  );
  return lines;
}

function drawSchematic(
  doc: jsPDF,
  schematic: BeamSchematic,
  xScale: (x: number) => number,
  beamY: number,
): void {
  doc.setFont("helvetica", "bold");
  doc.setFontSize(12);
  doc.text("Beam Diagram", PAGE.margin, beamY - 28);
  doc.setFont("helvetica", "normal");
  doc.setFontSize(8);

  if (schematic.udl) {
    const u = schematic.udl;
    doc.setFillColor("#f5b97f");
    doc.rect(xScale(u.start_m), beamY - 12, xScale(u.end_m) - xScale(u.start_m), 9, "F");
    doc.setTextColor("#ef6c00");
    doc.text(u.label, (xScale(u.start_m) + xScale(u.end_m)) / 2, beamY - 14, { align: "center" });
  }

  doc.setDrawColor("#333333");
  doc.setLineWidth(1);
  doc.line(xScale(0), beamY, xScale(schematic.span_m), beamY);
  doc.setLineWidth(0.3);

  doc.setTextColor("#000000");
  for (const support of schematic.supports) {
    const sx = xScale(support.x_m);
    if (support.kind === "pin") {
      doc.triangle(sx, beamY, sx - 3, beamY + 5, sx + 3, beamY + 5, "S");
    } else {
      doc.circle(sx, beamY + 2.5, 2, "S");
      doc.line(sx - 3, beamY + 5, sx + 3, beamY + 5);
    }
    doc.text(support.label, sx, beamY + 10, { align: "center" });
  }

  doc.setDrawColor("#1565c0");
  doc.setFillColor("#1565c0");
  doc.setTextColor("#1565c0");
  for (const load of schematic.point_loads) {
    const px = xScale(load.x_m);
    doc.line(px, beamY - 18, px, beamY - 1);
    if (load.direction === "down") {
      doc.triangle(px, beamY - 0.5, px - 1.2, beamY - 3, px + 1.2, beamY - 3, "F");
    } else {
      doc.triangle(px, beamY - 18.5, px - 1.2, beamY - 16, px + 1.2, beamY - 16, "F");
    }
    doc.text(load.label, px, beamY - 20, { align: "center" });
  }

  doc.setDrawColor("#ef6c00");
  doc.setFillColor("#ef6c00");
  doc.setTextColor("#ef6c00");
  for (const moment of schematic.moments) {
    const px = xScale(moment.x_m);
    const dir = moment.direction === "right" ? 1 : -1;
    doc.line(px, beamY - 6, px + dir * 6, beamY - 6);
    doc.triangle(px + dir * 7, beamY - 6, px + dir * 5.5, beamY - 7.2, px + dir * 5.5, beamY - 4.8, "F");
    doc.text(moment.label, px, beamY - 8, { align: "center" });
  }
  doc.setTextColor("#000000");
}

function drawPanel(
  doc: jsPDF,
  panel: DiagramPanel,
  xs: number[],
  xScale: (x: number) => number,
  left: number,
  top: number,
): void {
  const range = symmetricRange(panel.values);
  const mid = top + PANEL_HEIGHT / 2;
  const yScale = (v: number) => mid - (v / range) * (PANEL_HEIGHT / 2);

  doc.setFont("helvetica", "bold");
  doc.setFontSize(12);
  doc.setTextColor("#000000");
  doc.text(`${panel.title} (${panel.unit.replace("·", "")})`, left, top - 4);

  doc.setFont("helvetica", "normal");
  doc.setFontSize(7);
  doc.setDrawColor("#dddddd");
  doc.setLineWidth(0.2);
  doc.rect(left, top, PLOT_WIDTH, PANEL_HEIGHT, "S");
  for (let i = -3; i <= 3; i++) {
    const y = mid - (i / 3) * (PANEL_HEIGHT / 2);
    doc.setDrawColor(i === 0 ? "#999999" : "#eeeeee");
    doc.line(left, y, left + PLOT_WIDTH, y);
    doc.setTextColor("#888888");
    doc.text(((i / 3) * range).toFixed(panel.digits), left - 1.5, y + 1, { align: "right" });
  }

  doc.setDrawColor(panel.color);
  doc.setLineWidth(0.4);
  for (let i = 1; i < panel.values.length; i++) {
    doc.line(
      xScale(xs[i - 1] ?? 0),
      yScale(panel.values[i - 1] ?? 0),
      xScale(xs[i] ?? 0),
      yScale(panel.values[i] ?? 0),
    );
  }

  const xAxisY = top + PANEL_HEIGHT + 5;
  doc.setTextColor("#888888");
  const span = xs[xs.length - 1] ?? 0;
  for (let i = 0; i <= 5; i++) {
    const x = (span * i) / 5;
    doc.text(x.toFixed(1), xScale(x), xAxisY, { align: "center" });
  }
  doc.text("x (m)", left + PLOT_WIDTH, xAxisY + 5, { align: "right" });
}
