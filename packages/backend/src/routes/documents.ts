import type { RequestHandler } from "express";
import { Router } from "express";
import multer from "multer";
import type { SimplifiedDocument, SimplifyDocumentResponse } from "@plainlex/shared";
import { appConfig } from "../config.js";
import { extractDocumentText } from "../parsers/extractText.js";
import { getLLMServiceSingleton } from "../runtime/llmRuntime.js";
import { DocumentSimplifier } from "../services/DocumentSimplifier.js";
import { LLMNotConfiguredError, type LLMServiceLike } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import { toHttpError } from "./errors.js";

interface CreateDocumentsRouterOptions {
  llmService?: LLMServiceLike;
  simplifier?: DocumentSimplifier;
  maxUploadSize?: number;
}

export function createDocumentsRouter(options: CreateDocumentsRouterOptions = {}): Router {
  const llmService = options.llmService ?? getLLMServiceSingleton();
  const simplifier = options.simplifier ?? new DocumentSimplifier(llmService);
  const maxUploadSize = options.maxUploadSize ?? appConfig.MAX_UPLOAD_SIZE;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadSize,
      files: 1
    }
  });

  const documentsRouter = Router();

  /** Wrap multer middleware to answer MulterError (e.g. file too large) with 400 */
  const handleUpload: RequestHandler = (req, res, next) => {
    upload.single("file")(req, res, (err: unknown) => {
      if (err) {
        const message =
          err instanceof multer.MulterError
            ? err.code === "LIMIT_FILE_SIZE"
              ? `File too large. Maximum allowed size is ${Math.round(maxUploadSize / 1024 / 1024)}MB`
              : err.message
            : err instanceof Error
              ? err.message
              : "File upload failed";
        res.status(400).json({ error: message });
        return;
      }
      next();
    });
  };

  documentsRouter.post("/simplify", handleUpload, async (req, res) => {
    if (!llmService.isConfigured()) {
      const { status, body } = toHttpError(new LLMNotConfiguredError(), "");
      res.status(status).json(body);
      return;
    }

    if (!req.file) {
      res.status(400).json({ error: "No file uploaded" });
      return;
    }

    try {
      const extracted = await extractDocumentText(req.file, { maxSizeBytes: maxUploadSize });
      logger.info(
        {
          filename: extracted.filename,
          mimeType: extracted.mimeType,
          textLength: extracted.text.length
        },
        "Extracted document text"
      );

      const result = await simplifier.simplify(extracted.text, {
        onProgress: ({ index, total }) => {
          logger.info({ filename: extracted.filename }, `Processing chunk ${index}/${total}`);
        }
      });

      const document: SimplifiedDocument = {
        filename: extracted.filename,
        fileType: extracted.fileType,
        original: extracted.text,
        simplified: result.simplified,
        chunkCount: result.chunkCount,
        failedSections: result.failedSections,
        metadata: extracted.metadata
      };
      const response: SimplifyDocumentResponse = {
        original: document.original,
        simplified: document.simplified,
        document
      };
      res.json(response);
    } catch (error) {
      const { status, body } = toHttpError(error, "Error processing the document");
      if (status >= 500) {
        logger.error({ err: error, filename: req.file.originalname }, "Error processing document");
      }
      res.status(status).json(body);
    }
  });

  return documentsRouter;
}
