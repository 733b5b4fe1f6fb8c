import type { DocumentMetadata } from "@plainlex/shared";

export interface ParsedDocumentResult {
  text: string;
  metadata: DocumentMetadata;
}

export interface DocumentParser {
  parse(buffer: Buffer): Promise<ParsedDocumentResult>;
}

/** Raised when an upload cannot be turned into text; maps to HTTP 400. */
export class DocumentExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocumentExtractionError";
  }
}

export function countWords(input: string): number {
  const normalized = input.trim();
  if (normalized.length === 0) {
    return 0;
  }

  return normalized.split(/\s+/).length;
}

export function countLines(input: string): number {
  return input.length > 0 ? input.split(/\r?\n/).length : 0;
}
