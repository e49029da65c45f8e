import type { ReactNode } from "react";
import { INPUT_LIMITS } from "../../src/beam/limits.js";
import type { RawBeamInput, RawMoment, RawPointLoad } from "../../src/beam/types.js";
import type { LoadItemRef } from "../../src/beam/errors.js";

interface Props {
  value: RawBeamInput;
  onChange: (next: RawBeamInput) => void;
  /** Load flagged by the last failed calculation. */
  invalidItem?: LoadItemRef;
}

export const DEFAULT_INPUT: RawBeamInput = {
  span_m: 10,
  E_gpa: 200,
  I_cm4: 5000,
  point_loads: [
    { magnitude_kn: 10, position_m: 2 },
    { magnitude_kn: 10, position_m: 3 },
  ],
  udl: null,
  moments: [{ magnitude_knm: 5, position_m: 4 }],
};

function NumberField({
  label,
  value,
  onChange,
  min,
  max,
  invalid,
}: {
  label: string;
  value: number;
  onChange: (v: number) => void;
  min?: number;
  max?: number;
  invalid?: boolean;
}) {
  return (
    <label className="flex flex-col gap-1 text-xs text-gray-600">
      {label}
      <input
        type="number"
        value={Number.isFinite(value) ? value : ""}
        min={min}
        max={max}
        step="any"
        onChange={(e) => onChange(e.target.valueAsNumber)}
        className={`rounded-lg border px-3 py-1.5 text-sm text-gray-900 focus:outline-none focus:ring-2 focus:ring-blue-500 ${
          invalid ? "border-red-500 bg-red-50" : "border-gray-300"
        }`}
      />
    </label>
  );
}

function Section({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section className="space-y-2">
      <h2 className="text-sm font-semibold text-gray-900">{title}</h2>
      {children}
    </section>
  );
}

export default function BeamForm({ value, onChange, invalidItem }: Props) {
  const isInvalid = (kind: LoadItemRef["kind"], index: number) =>
    invalidItem?.kind === kind && invalidItem.index === index;

  const setPointLoad = (i: number, patch: Partial<RawPointLoad>) =>
    onChange({
      ...value,
      point_loads: value.point_loads.map((p, j) => (j === i ? { ...p, ...patch } : p)),
    });

  const setMoment = (i: number, patch: Partial<RawMoment>) =>
    onChange({
      ...value,
      moments: value.moments.map((m, j) => (j === i ? { ...m, ...patch } : m)),
    });

  const setPointLoadCount = (n: number) => {
    const loads = value.point_loads.slice(0, n);
    while (loads.length < n) loads.push({ magnitude_kn: 10, position_m: 2 + loads.length });
    onChange({ ...value, point_loads: loads });
  };

  const setMomentCount = (n: number) => {
    const moments = value.moments.slice(0, n);
    while (moments.length < n) moments.push({ magnitude_knm: 5, position_m: 4 + moments.length });
    onChange({ ...value, moments });
  };

  return (
    <div className="space-y-6">
      <Section title="Beam and material">
        <div className="grid grid-cols-3 gap-3">
          <NumberField
            label="Beam Length (m)"
            value={value.span_m}
            min={INPUT_LIMITS.span_m.min}
            max={INPUT_LIMITS.span_m.max}
            onChange={(span_m) => onChange({ ...value, span_m })}
          />
          <NumberField
            label="Young's Modulus (GPa)"
            value={value.E_gpa}
            min={INPUT_LIMITS.E_gpa.min}
            max={INPUT_LIMITS.E_gpa.max}
            onChange={(E_gpa) => onChange({ ...value, E_gpa })}
          />
          <NumberField
            label="Moment of Inertia (cm⁴)"
            value={value.I_cm4}
            min={INPUT_LIMITS.I_cm4.min}
            max={INPUT_LIMITS.I_cm4.max}
            onChange={(I_cm4) => onChange({ ...value, I_cm4 })}
          />
        </div>
      </Section>

      <Section title="Point loads">
        <label className="flex items-center gap-3 text-xs text-gray-600">
          Number of Point Loads: {value.point_loads.length}
          <input
            type="range"
            min={0}
            max={INPUT_LIMITS.maxPointLoads}
            value={value.point_loads.length}
            onChange={(e) => setPointLoadCount(e.target.valueAsNumber)}
          />
        </label>
        {value.point_loads.map((p, i) => (
          <div key={i} className="grid grid-cols-2 gap-3">
            <NumberField
              label={`Load ${i + 1} Magnitude (kN)`}
              value={p.magnitude_kn}
              onChange={(magnitude_kn) => setPointLoad(i, { magnitude_kn })}
            />
            <NumberField
              label={`Load ${i + 1} Position (m)`}
              value={p.position_m}
              invalid={isInvalid("point_load", i + 1)}
              onChange={(position_m) => setPointLoad(i, { position_m })}
            />
          </div>
        ))}
      </Section>

      <Section title="UDL">
        <label className="flex items-center gap-2 text-xs text-gray-600">
          <input
            type="checkbox"
            checked={value.udl != null}
            onChange={(e) =>
              onChange({
                ...value,
                udl: e.target.checked ? { intensity_kn_per_m: 2, start_m: 2, end_m: 6 } : null,
              })
            }
          />
          Include a UDL?
        </label>
        {value.udl && (
          <div className="grid grid-cols-3 gap-3">
            <NumberField
              label="UDL Magnitude (kN/m)"
              value={value.udl.intensity_kn_per_m}
              onChange={(intensity_kn_per_m) =>
                value.udl && onChange({ ...value, udl: { ...value.udl, intensity_kn_per_m } })
              }
            />
            <NumberField
              label="UDL Start (m)"
              value={value.udl.start_m}
              invalid={isInvalid("udl", 1)}
              onChange={(start_m) => value.udl && onChange({ ...value, udl: { ...value.udl, start_m } })}
            />
            <NumberField
              label="UDL End (m)"
              value={value.udl.end_m}
              invalid={isInvalid("udl", 1)}
              onChange={(end_m) => value.udl && onChange({ ...value, udl: { ...value.udl, end_m } })}
            />
          </div>
        )}
      </Section>

      <Section title="Applied moments">
        <label className="flex items-center gap-3 text-xs text-gray-600">
          Number of Applied Moments: {value.moments.length}
          <input
            type="range"
            min={0}
            max={INPUT_LIMITS.maxMoments}
            value={value.moments.length}
            onChange={(e) => setMomentCount(e.target.valueAsNumber)}
          />
        </label>
        {value.moments.map((m, i) => (
          <div key={i} className="grid grid-cols-2 gap-3">
            <NumberField
              label={`Moment ${i + 1} Magnitude (kNm)`}
              value={m.magnitude_knm}
              onChange={(magnitude_knm) => setMoment(i, { magnitude_knm })}
            />
            <NumberField
              label={`Moment ${i + 1} Position (m)`}
              value={m.position_m}
              invalid={isInvalid("moment", i + 1)}
              onChange={(position_m) => setMoment(i, { position_m })}
            />
          </div>
        ))}
      </Section>
    </div>
  );
}
