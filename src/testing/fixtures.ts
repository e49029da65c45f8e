import type { RawBeamInput } from "../beam/types.js";

/** 10 kN at mid-span of a 10 m beam. */
export function symmetricInput(): RawBeamInput {
  return {
    span_m: 10,
    E_gpa: 200,
    I_cm4: 5000,
    point_loads: [{ magnitude_kn: 10, position_m: 5 }],
    udl: null,
    moments: [],
  };
}

/** 2 kN/m over [2, 6] m on a 10 m beam, nothing else. */
export function udlOnlyInput(): RawBeamInput {
  return {
    span_m: 10,
    E_gpa: 200,
    I_cm4: 5000,
    point_loads: [],
    udl: { intensity_kn_per_m: 2, start_m: 2, end_m: 6 },
    moments: [],
  };
}

/** Every load kind at once. */
export function mixedInput(): RawBeamInput {
  return {
    span_m: 10,
    E_gpa: 200,
    I_cm4: 5000,
    point_loads: [
      { magnitude_kn: 10, position_m: 2 },
      { magnitude_kn: 10, position_m: 3 },
    ],
    udl: { intensity_kn_per_m: 2, start_m: 2, end_m: 6 },
    moments: [{ magnitude_knm: 5, position_m: 4 }],
  };
}

export function emptyInput(): RawBeamInput {
  return { span_m: 10, E_gpa: 200, I_cm4: 5000, point_loads: [], udl: null, moments: [] };
}
