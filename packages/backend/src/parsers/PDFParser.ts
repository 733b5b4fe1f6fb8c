import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { logger } from "../utils/logger.js";
import {
  DocumentExtractionError,
  countLines,
  countWords,
  type DocumentParser,
  type ParsedDocumentResult
} from "./types.js";

// pdf-parse separates pages with a blank line and lines within a page with "\n".
const PAGE_SEPARATOR = "\n\n";

export class PDFParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    let result: { text: string; numpages: number };
    try {
      result = await pdfParse(buffer);
    } catch (error) {
      logger.warn({ err: error }, "Error reading PDF file");
      throw new DocumentExtractionError(
        "Could not read the PDF document. Please ensure it's a valid PDF file."
      );
    }

    const pages = (result.text ?? "")
      .split(PAGE_SEPARATOR)
      .filter((page) => page.trim().length > 0);
    const text = pages.join(PAGE_SEPARATOR);

    return {
      text,
      metadata: {
        pageCount: result.numpages,
        wordCount: countWords(text),
        lineCount: countLines(text)
      }
    };
  }
}
