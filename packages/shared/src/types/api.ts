import type { ChatTurn } from "./chat.js";
import type { SimplifiedDocument } from "./document.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export interface RootResponse {
  message: string;
}

export interface SimplifyDocumentResponse {
  original: string;
  simplified: string;
  document: SimplifiedDocument;
}

export interface ChatRequest {
  message: string;
  documentContent?: string;
  history?: ChatTurn[];
}

export interface ChatResponse {
  response: string;
}

export type ChatStreamEventName = "ack" | "delta" | "done" | "error";

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec: number;
  checks: {
    llm: ServiceConnectionStatus;
  };
  memoryUsage: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
