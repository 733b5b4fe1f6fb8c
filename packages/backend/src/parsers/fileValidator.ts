import { basename, extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";
import type { DocumentFileType } from "@plainlex/shared";
import { DocumentExtractionError } from "./types.js";

export interface UploadedFileLike {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export interface FileValidationOptions {
  maxSizeBytes?: number;
}

export interface ValidatedFile {
  fileType: DocumentFileType;
  sanitizedFilename: string;
  mimeType: string;
  size: number;
}

export const UNSUPPORTED_FILE_MESSAGE = "Unsupported file type. Please upload a .txt or .pdf file.";

const extensionToType: Record<string, DocumentFileType> = {
  ".pdf": "pdf",
  ".txt": "txt"
};

const allowedMimeTypes: Record<DocumentFileType, string[]> = {
  pdf: ["application/pdf"],
  txt: ["text/plain"]
};

const extensionFallbackMime: Record<DocumentFileType, string> = {
  pdf: "application/pdf",
  txt: "text/plain"
};

export async function validateUploadedFile(
  file: UploadedFileLike,
  options: FileValidationOptions = {}
): Promise<ValidatedFile> {
  const extension = extname(file.originalname).toLowerCase();
  const fileType = extensionToType[extension];
  if (!fileType) {
    throw new DocumentExtractionError(UNSUPPORTED_FILE_MESSAGE);
  }

  if (options.maxSizeBytes !== undefined && file.size > options.maxSizeBytes) {
    throw new DocumentExtractionError(
      `File is too large. Maximum size is ${options.maxSizeBytes} bytes.`
    );
  }

  const allowed = allowedMimeTypes[fileType];
  const declaredMime = (file.mimetype || "").toLowerCase().split(";")[0]?.trim() ?? "";
  const detected = await fileTypeFromBuffer(file.buffer);
  const detectedMime = detected?.mime.toLowerCase();

  // Browsers often send application/octet-stream for .txt files.
  const effectiveDeclaredMime =
    declaredMime === "application/octet-stream" ? "" : declaredMime;

  if (effectiveDeclaredMime && !allowed.includes(effectiveDeclaredMime)) {
    throw new DocumentExtractionError(
      `MIME type mismatch for ${extension}. Received ${declaredMime}.`
    );
  }

  if (detectedMime && !allowed.includes(detectedMime)) {
    throw new DocumentExtractionError(
      `Binary signature mismatch for ${extension}. Detected ${detectedMime}.`
    );
  }

  return {
    fileType,
    sanitizedFilename: sanitizeFilename(file.originalname),
    mimeType: detectedMime ?? (effectiveDeclaredMime || extensionFallbackMime[fileType]),
    size: file.size
  };
}

export function sanitizeFilename(filename: string): string {
  const cleanBase = basename(filename).replace(/[^\w.-]/g, "_");
  return cleanBase.length > 0 ? cleanBase : "file";
}
