import { appConfig } from "../config.js";
import { logger } from "../utils/logger.js";
import { LLMNotConfiguredError, type LLMServiceLike } from "./llmTypes.js";
import { chunkText } from "./textChunker.js";

export interface DocumentSimplifierOptions {
  chunkSize: number;
  fallbackChunkSize: number;
  chunkDelayMs: number;
}

export interface SimplificationProgress {
  index: number;
  total: number;
}

export interface SimplificationResult {
  simplified: string;
  chunkCount: number;
  failedSections: number;
}

const SECTION_SEPARATOR = "\n\n";

/**
 * Simplifies a document section by section. A section the model rejects is
 * retried as smaller sub-sections; a sub-section that still fails is replaced
 * by an inline error marker so the rest of the document survives.
 */
export class DocumentSimplifier {
  private readonly options: DocumentSimplifierOptions;

  constructor(
    private readonly llmService: LLMServiceLike,
    options: Partial<DocumentSimplifierOptions> = {}
  ) {
    this.options = {
      chunkSize: options.chunkSize ?? appConfig.SIMPLIFY_CHUNK_SIZE,
      fallbackChunkSize: options.fallbackChunkSize ?? appConfig.SIMPLIFY_FALLBACK_CHUNK_SIZE,
      chunkDelayMs: options.chunkDelayMs ?? appConfig.SIMPLIFY_CHUNK_DELAY_MS
    };
  }

  async simplify(
    text: string,
    callbacks: { onProgress?: (progress: SimplificationProgress) => void } = {}
  ): Promise<SimplificationResult> {
    const chunks = chunkText(text, this.options.chunkSize);
    if (chunks.length === 0) {
      throw new Error("There is no text to simplify");
    }
    logger.info({ chunkCount: chunks.length, textLength: text.length }, "Split document into chunks");

    const sections: string[] = [];
    const sectionErrors: unknown[] = [];

    for (const [index, chunk] of chunks.entries()) {
      callbacks.onProgress?.({ index: index + 1, total: chunks.length });
      logger.debug({ chunk: index + 1, total: chunks.length }, "Processing chunk");
      if (index > 0) {
        await this.pause();
      }

      try {
        sections.push(await this.llmService.simplifyText(chunk));
      } catch (error) {
        rethrowIfFatal(error);
        logger.warn({ err: error, chunk: index + 1 }, "Chunk failed, retrying as smaller sections");

        for (const subChunk of chunkText(chunk, this.options.fallbackChunkSize)) {
          await this.pause();
          try {
            sections.push(await this.llmService.simplifyText(subChunk));
          } catch (subError) {
            rethrowIfFatal(subError);
            logger.error({ err: subError, chunk: index + 1 }, "Error processing sub-chunk");
            sectionErrors.push(subError);
            sections.push(`[Error processing this section: ${errorMessage(subError)}]`);
          }
        }
      }
    }

    if (sectionErrors.length === sections.length) {
      throw sectionErrors[0];
    }

    const simplified = sections.join(SECTION_SEPARATOR);
    if (simplified.trim().length === 0) {
      throw new Error("The language model returned an empty simplification");
    }

    return {
      simplified,
      chunkCount: chunks.length,
      failedSections: sectionErrors.length
    };
  }

  private async pause(): Promise<void> {
    if (this.options.chunkDelayMs <= 0) {
      return;
    }
    await new Promise((resolve) => {
      setTimeout(resolve, this.options.chunkDelayMs);
    });
  }
}

function rethrowIfFatal(error: unknown): void {
  if (error instanceof LLMNotConfiguredError) {
    throw error;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }
  return String(error);
}
