/**
 * Beam engine types.
 *
 * `Raw*` shapes are what the input surfaces hand over (kN, kNm, GPa, cm⁴, m).
 * Everything else is SI (N, N·m, Pa, m⁴, m) and frozen once built.
 */

// ─── Raw input (form units) ──────────────────────────────────────────────────

export interface RawPointLoad {
  magnitude_kn: number;
  position_m: number;
}

export interface RawDistributedLoad {
  intensity_kn_per_m: number;
  start_m: number;
  end_m: number;
}

export interface RawMoment {
  magnitude_knm: number;
  position_m: number;
}

export interface RawBeamInput {
  span_m: number;
  E_gpa: number;
  I_cm4: number;
  point_loads: RawPointLoad[];
  udl?: RawDistributedLoad | null;
  moments: RawMoment[];
}

// ─── Validated load case (SI) ────────────────────────────────────────────────

export interface BeamSpec {
  readonly length_m: number;
  readonly E_pa: number;
  readonly I_m4: number;
  /** E·I in N·m² */
  readonly EI_nm2: number;
}

export interface PointLoad {
  /** N, downward positive */
  readonly magnitude_n: number;
  readonly position_m: number;
}

export interface DistributedLoad {
  readonly intensity_n_per_m: number;
  readonly start_m: number;
  readonly end_m: number;
}

export interface AppliedMoment {
  /** N·m, signed; a positive couple steps M(x) up at its position */
  readonly magnitude_nm: number;
  readonly position_m: number;
}

export interface LoadCase {
  readonly beam: BeamSpec;
  readonly point_loads: readonly PointLoad[];
  readonly udl: DistributedLoad | null;
  readonly moments: readonly AppliedMoment[];
}

export interface ReactionPair {
  readonly RA_n: number;
  readonly RB_n: number;
}

export interface FieldSample {
  readonly x_m: readonly number[];
  readonly shear_n: readonly number[];
  readonly moment_nm: readonly number[];
  readonly slope_rad: readonly number[];
  readonly deflection_m: readonly number[];
}

// ─── Schematic ───────────────────────────────────────────────────────────────

export type SupportKind = "pin" | "roller";

export interface SupportMark {
  kind: SupportKind;
  x_m: number;
  label: "RA" | "RB";
}

export interface LoadArrow {
  x_m: number;
  magnitude_kn: number;
  direction: "down" | "up";
  label: string;
}

export interface MomentArrow {
  x_m: number;
  magnitude_knm: number;
  direction: "right" | "left";
  label: string;
}

export interface UdlZone {
  start_m: number;
  end_m: number;
  intensity_kn_per_m: number;
  label: string;
}

export interface BeamSchematic {
  span_m: number;
  supports: SupportMark[];
  point_loads: LoadArrow[];
  moments: MomentArrow[];
  udl: UdlZone | null;
}

// ─── Analysis output (display units) ─────────────────────────────────────────

export interface Reactions {
  RA_kn: number;
  RB_kn: number;
}

export interface Diagrams {
  x_m: number[];
  shear_kn: number[];
  moment_knm: number[];
  slope_rad: number[];
  deflection_mm: number[];
}

export interface Extreme {
  value: number;
  x_m: number;
}

export interface Extremes {
  shear_kn: Extreme;
  moment_knm: Extreme;
  deflection_mm: Extreme;
}

export interface BeamAnalysis {
  span_m: number;
  EI_knm2: number;
  samples: number;
  reactions: Reactions;
  total_load_kn: number;
  diagrams: Diagrams;
  extremes: Extremes;
  schematic: BeamSchematic;
}
