import { useState, useEffect } from "react";
import BeamForm, { DEFAULT_INPUT } from "./BeamForm.js";
import Results from "./Results.js";
import { analyze, downloadReport, getStatus, ApiError } from "./api.js";
import type { AnalysisResponse } from "./api.js";
import type { RawBeamInput } from "../../src/beam/types.js";
import type { LoadItemRef } from "../../src/beam/errors.js";

export default function App() {
  const [input, setInput] = useState<RawBeamInput>(DEFAULT_INPUT);
  const [samples, setSamples] = useState<number | undefined>(undefined);
  const [result, setResult] = useState<AnalysisResponse | null>(null);
  const [error, setError] = useState<{ message: string; item?: LoadItemRef } | null>(null);
  const [busy, setBusy] = useState(false);

  useEffect(() => {
    getStatus()
      .then((s) => setSamples(s.samples))
      .catch(() => setSamples(undefined));
  }, []);

  const run = async (action: () => Promise<void>) => {
    setBusy(true);
    setError(null);
    try {
      await action();
    } catch (err) {
      if (err instanceof ApiError) {
        setError({ message: err.message, item: err.item });
      } else {
        setError({ message: err instanceof Error ? err.message : String(err) });
      }
    } finally {
      setBusy(false);
    }
  };

  const handleCalculate = () =>
    run(async () => {
      setResult(null);
      setResult(await analyze(input, samples));
    });

  const handleExport = () => run(() => downloadReport(input, samples));

  return (
    <div className="min-h-screen bg-white">
      <header className="flex items-center justify-between px-4 py-2 border-b border-gray-200">
        <div className="flex items-center gap-3">
          <h1 className="text-sm font-semibold text-gray-900">Beam Bending Calculator</h1>
          {samples !== undefined && (
            <span className="text-xs text-gray-400 font-mono">{samples} stations</span>
          )}
        </div>
      </header>

      <main className="max-w-5xl mx-auto grid grid-cols-1 lg:grid-cols-2 gap-8 px-4 py-6">
        <div className="space-y-4">
          <p className="text-sm text-gray-500">
            Simply supported beam with point loads, a UDL and applied moments.
          </p>
          <BeamForm value={input} onChange={setInput} invalidItem={error?.item} />
          <div className="flex gap-2">
            <button
              onClick={handleCalculate}
              disabled={busy}
              className="rounded-xl bg-blue-600 text-white px-4 py-2.5 text-sm font-medium hover:bg-blue-700 disabled:opacity-40 disabled:cursor-not-allowed transition-colors"
            >
              {busy ? "..." : "Calculate"}
            </button>
            <button
              onClick={handleExport}
              disabled={busy}
              className="rounded-xl border border-gray-300 px-4 py-2.5 text-sm text-gray-700 hover:bg-gray-100 disabled:opacity-40 transition-colors"
            >
              Export to PDF
            </button>
          </div>
          {error && (
            <div className="rounded-lg bg-red-100 text-red-700 text-sm px-3 py-2">{error.message}</div>
          )}
        </div>

        <div>{result && <Results result={result} />}</div>
      </main>
    </div>
  );
}
