export type DocumentFileType = "pdf" | "txt";

export interface DocumentMetadata {
  pageCount?: number;
  wordCount: number;
  lineCount?: number;
}

/**
 * A document after simplification. Lives only for the duration of the
 * request that produced it; nothing is persisted.
 */
export interface SimplifiedDocument {
  filename: string;
  fileType: DocumentFileType;
  original: string;
  simplified: string;
  chunkCount: number;
  failedSections: number;
  metadata: DocumentMetadata;
}
