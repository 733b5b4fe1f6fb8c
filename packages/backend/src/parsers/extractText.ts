import type { DocumentFileType } from "@plainlex/shared";
import { PDFParser } from "./PDFParser.js";
import { TextParser } from "./TextParser.js";
import { validateUploadedFile, type UploadedFileLike } from "./fileValidator.js";
import { DocumentExtractionError, type DocumentParser, type ParsedDocumentResult } from "./types.js";

export interface ExtractedDocument extends ParsedDocumentResult {
  filename: string;
  fileType: DocumentFileType;
  mimeType: string;
}

const parsers: Record<DocumentFileType, DocumentParser> = {
  pdf: new PDFParser(),
  txt: new TextParser()
};

export async function extractDocumentText(
  file: UploadedFileLike,
  options: { maxSizeBytes?: number } = {}
): Promise<ExtractedDocument> {
  const validated = await validateUploadedFile(file, options);
  const parsed = await parsers[validated.fileType].parse(file.buffer);

  if (parsed.text.trim().length === 0) {
    throw new DocumentExtractionError("The uploaded file is empty");
  }

  return {
    ...parsed,
    filename: validated.sanitizedFilename,
    fileType: validated.fileType,
    mimeType: validated.mimeType
  };
}
