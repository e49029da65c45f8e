import Markdown from "react-markdown";
import type { AnalysisResponse } from "./api.js";

export default function Results({ result }: { result: AnalysisResponse }) {
  const src = `data:image/svg+xml;charset=utf-8,${encodeURIComponent(result.diagramSvg)}`;
  return (
    <div className="space-y-4">
      <div className="prose prose-sm max-w-none prose-gray">
        <Markdown>{result.summary}</Markdown>
      </div>
      <img src={src} alt="Beam diagrams" className="w-full rounded-lg border border-gray-200" />
    </div>
  );
}
