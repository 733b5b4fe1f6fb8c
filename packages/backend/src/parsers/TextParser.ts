import { countLines, countWords, type DocumentParser, type ParsedDocumentResult } from "./types.js";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });
const latin1Decoder = new TextDecoder("latin1");

export class TextParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const text = decodeText(buffer);
    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: countLines(text)
      }
    };
  }
}

/** UTF-8 first; bytes that are not valid UTF-8 are read as Latin-1, which accepts any input. */
export function decodeText(buffer: Buffer): string {
  try {
    return utf8Decoder.decode(buffer);
  } catch {
    return latin1Decoder.decode(buffer);
  }
}
