/**
 * Terminal form: asks for the beam, its loads and the export choice one field
 * at a time, with the same defaults and bounds as the browser form.
 */
import { INPUT_LIMITS } from "./beam/limits.js";
import type { RawBeamInput, RawMoment, RawPointLoad } from "./beam/types.js";

export interface FormIO {
  ask(question: string): Promise<string>;
  say(message: string): void;
  /** Called for slash commands other than /quit; return to re-ask the field. */
  command?(name: string): void;
}

/** Thrown when the user types /quit (or the input stream closes). */
export class FormAborted extends Error {
  constructor() {
    super("Form aborted");
    this.name = "FormAborted";
  }
}

interface Range {
  min: number;
  max: number;
}

async function askRaw(io: FormIO, question: string): Promise<string> {
  for (;;) {
    const answer = (await io.ask(question)).trim();
    if (answer === "/quit" || answer === "/exit") throw new FormAborted();
    if (answer.startsWith("/")) {
      if (io.command) io.command(answer.slice(1));
      else io.say(`Unknown command ${answer}`);
      continue;
    }
    return answer;
  }
}

export async function askNumber(
  io: FormIO,
  label: string,
  fallback: number,
  range?: Range,
): Promise<number> {
  for (;;) {
    const answer = await askRaw(io, `${label} [${fallback}]: `);
    const value = answer === "" ? fallback : Number(answer);
    if (!Number.isFinite(value)) {
      io.say(`${label}: "${answer}" is not a number.`);
      continue;
    }
    if (range && (value < range.min || value > range.max)) {
      io.say(`${label} must be between ${range.min} and ${range.max}.`);
      continue;
    }
    return value;
  }
}

export async function askInteger(io: FormIO, label: string, fallback: number, range: Range): Promise<number> {
  for (;;) {
    const value = await askNumber(io, label, fallback, range);
    if (Number.isInteger(value)) return value;
    io.say(`${label} must be a whole number.`);
  }
}

export async function askYesNo(io: FormIO, label: string, fallback: boolean): Promise<boolean> {
  for (;;) {
    const answer = (await askRaw(io, `${label} [${fallback ? "Y/n" : "y/N"}]: `)).toLowerCase();
    if (answer === "") return fallback;
    if (answer === "y" || answer === "yes") return true;
    if (answer === "n" || answer === "no") return false;
    io.say(`Please answer y or n.`);
  }
}

export async function askChoice<T extends string>(
  io: FormIO,
  label: string,
  choices: readonly T[],
  fallback: T,
): Promise<T> {
  for (;;) {
    const answer = (await askRaw(io, `${label} (${choices.join("/")}) [${fallback}]: `)).toLowerCase();
    if (answer === "") return fallback;
    const match = choices.find((c) => c === answer);
    if (match) return match;
    io.say(`Choose one of: ${choices.join(", ")}.`);
  }
}

// ─── Beam form ───────────────────────────────────────────────────────────────

export async function collectBeamInput(io: FormIO): Promise<RawBeamInput> {
  const span_m = await askNumber(io, "Beam Length (m)", 10, INPUT_LIMITS.span_m);
  const E_gpa = await askNumber(io, "Young's Modulus (GPa)", 200, INPUT_LIMITS.E_gpa);
  const I_cm4 = await askNumber(io, "Moment of Inertia (cm⁴)", 5000, INPUT_LIMITS.I_cm4);

  const loadCount = await askInteger(io, "Number of Point Loads", 2, {
    min: 0,
    max: INPUT_LIMITS.maxPointLoads,
  });
  const point_loads: RawPointLoad[] = [];
  for (let i = 0; i < loadCount; i++) {
    point_loads.push({
      magnitude_kn: await askNumber(io, `Load ${i + 1} Magnitude (kN)`, 10),
      position_m: await askNumber(io, `Load ${i + 1} Position (m)`, 2 + i),
    });
  }

  let udl: RawBeamInput["udl"] = null;
  if (await askYesNo(io, "Include a UDL?", false)) {
    udl = {
      intensity_kn_per_m: await askNumber(io, "UDL Magnitude (kN/m)", 2),
      start_m: await askNumber(io, "UDL Start (m)", 2),
      end_m: await askNumber(io, "UDL End (m)", 6),
    };
  }

  const momentCount = await askInteger(io, "Number of Applied Moments", 1, {
    min: 0,
    max: INPUT_LIMITS.maxMoments,
  });
  const moments: RawMoment[] = [];
  for (let i = 0; i < momentCount; i++) {
    moments.push({
      magnitude_knm: await askNumber(io, `Moment ${i + 1} Magnitude (kNm)`, 5),
      position_m: await askNumber(io, `Moment ${i + 1} Position (m)`, 4 + i),
    });
  }

  return { span_m, E_gpa, I_cm4, point_loads, udl, moments };
}
