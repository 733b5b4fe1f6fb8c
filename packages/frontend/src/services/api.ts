import type {
  ChatRequest,
  ChatResponse,
  HealthResponse,
  SimplifyDocumentResponse
} from "@plainlex/shared";

export class ApiClientError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(message: string, status: number, details?: unknown) {
    super(message);
    this.name = "ApiClientError";
    this.status = status;
    this.details = details;
  }
}

type HttpMethod = "GET" | "POST";

interface RequestOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: BodyInit | null | undefined;
  json?: unknown;
  signal?: AbortSignal | undefined;
}

const API_BASE_URL = resolveApiBaseUrl(import.meta.env.VITE_API_BASE_URL);

export function resolveApiBaseUrl(rawBaseUrl: string | undefined): string {
  if (!rawBaseUrl || rawBaseUrl.trim().length === 0) {
    return "http://localhost:8000/api";
  }

  const trimmed = rawBaseUrl.trim().replace(/\/+$/, "");
  if (trimmed.endsWith("/api")) {
    return trimmed;
  }
  return `${trimmed}/api`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readErrorPayload(response: Response): Promise<{ message: string; details?: unknown }> {
  let payload: unknown;
  try {
    payload = await response.json();
  } catch {
    return {
      message: `Request failed with status ${response.status}`
    };
  }

  if (!isRecord(payload)) {
    return {
      message: `Request failed with status ${response.status}`
    };
  }

  const error = payload.error;
  const details = payload.details;
  return {
    message: typeof error === "string" ? error : `Request failed with status ${response.status}`,
    details
  };
}

async function request<T>(path: string, options: RequestOptions = {}): Promise<T> {
  const url = `${API_BASE_URL}${path}`;
  const headers = new Headers(options.headers);

  let body: BodyInit | null | undefined = options.body;
  if (options.json !== undefined) {
    headers.set("Content-Type", "application/json");
    body = JSON.stringify(options.json);
  }

  const requestInit: RequestInit = {
    method: options.method ?? "GET",
    headers
  };
  if (body !== undefined) {
    requestInit.body = body;
  }
  if (options.signal !== undefined) {
    requestInit.signal = options.signal;
  }

  const response = await fetch(url, requestInit);

  if (!response.ok) {
    const { message, details } = await readErrorPayload(response);
    throw new ApiClientError(message, response.status, details);
  }

  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("application/json")) {
    throw new ApiClientError("Unexpected response type from API", response.status);
  }

  return (await response.json()) as T;
}

export const apiClient = {
  documents: {
    async simplify(file: File, signal?: AbortSignal): Promise<SimplifyDocumentResponse> {
      const formData = new FormData();
      formData.set("file", file);

      return request<SimplifyDocumentResponse>("/documents/simplify", {
        method: "POST",
        body: formData,
        signal
      });
    }
  },

  chat: {
    async send(payload: ChatRequest, signal?: AbortSignal): Promise<string> {
      const result = await request<ChatResponse>("/chat", {
        method: "POST",
        json: payload,
        signal
      });
      return result.response;
    }
  },

  health: {
    async get(signal?: AbortSignal): Promise<HealthResponse> {
      return request<HealthResponse>("/health", { signal });
    }
  }
};

/** The message to show for a failed call: the server's, or `fallback` when there is none. */
export function describeApiError(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return fallback;
}
