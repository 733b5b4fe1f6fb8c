import type { ApiErrorResponse } from "@plainlex/shared";
import { DocumentExtractionError } from "../parsers/types.js";
import { LLMNotConfiguredError } from "../services/llmTypes.js";

export interface HttpErrorPayload {
  status: number;
  body: ApiErrorResponse;
}

/** Upstream failures surface their own message; anything without one gets `fallbackMessage`. */
export function toHttpError(error: unknown, fallbackMessage: string): HttpErrorPayload {
  if (error instanceof DocumentExtractionError) {
    return { status: 400, body: { error: error.message } };
  }
  if (error instanceof LLMNotConfiguredError) {
    return { status: 503, body: { error: error.message } };
  }

  const message = error instanceof Error && error.message.trim().length > 0 ? error.message : fallbackMessage;
  return { status: 500, body: { error: message } };
}
