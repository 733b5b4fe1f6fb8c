import { FileText, Sparkles } from "lucide-react";
import type { SimplifiedDocument } from "@plainlex/shared";

interface DocumentComparisonProps {
  originalText: string;
  simplifiedText: string;
  document: SimplifiedDocument | null;
}

function describeDocument(document: SimplifiedDocument): string {
  const parts = [`${document.metadata.wordCount} words`];
  if (document.metadata.pageCount !== undefined) {
    parts.push(`${document.metadata.pageCount} pages`);
  }
  if (document.chunkCount > 1) {
    parts.push(`${document.chunkCount} sections`);
  }
  return parts.join(" · ");
}

export function DocumentComparison({ originalText, simplifiedText, document }: DocumentComparisonProps) {
  return (
    <section className="comparison" aria-label="Document comparison">
      <article className="panel comparison-pane">
        <h3>
          <FileText size={16} aria-hidden="true" /> Original
        </h3>
        {document ? <small className="muted">{describeDocument(document)}</small> : null}
        <pre className="comparison-text" data-testid="original-text">
          {originalText}
        </pre>
      </article>
      <article className="panel comparison-pane">
        <h3>
          <Sparkles size={16} aria-hidden="true" /> Simplified
        </h3>
        {document && document.failedSections > 0 ? (
          <small className="warning-inline">
            {document.failedSections} section(s) could not be simplified.
          </small>
        ) : null}
        <pre className="comparison-text" data-testid="simplified-text">
          {simplifiedText}
        </pre>
      </article>
    </section>
  );
}
