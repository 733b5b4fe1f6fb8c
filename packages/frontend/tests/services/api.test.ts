import { afterEach, describe, expect, it, vi } from "vitest";
import { ApiClientError, apiClient, describeApiError, resolveApiBaseUrl } from "../../src/services/api";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("resolveApiBaseUrl", () => {
  it("defaults to the local backend", () => {
    expect(resolveApiBaseUrl(undefined)).toBe("http://localhost:8000/api");
    expect(resolveApiBaseUrl("   ")).toBe("http://localhost:8000/api");
  });

  it("appends /api once and drops trailing slashes", () => {
    expect(resolveApiBaseUrl("https://plainlex.test/")).toBe("https://plainlex.test/api");
    expect(resolveApiBaseUrl("https://plainlex.test/api/")).toBe("https://plainlex.test/api");
  });
});

describe("apiClient", () => {
  it("posts the document as multipart form data", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({
        original: "Original",
        simplified: "Simple",
        document: {
          filename: "lease.txt",
          fileType: "txt",
          original: "Original",
          simplified: "Simple",
          chunkCount: 1,
          failedSections: 0,
          metadata: { wordCount: 1 }
        }
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const file = new File(["Original"], "lease.txt", { type: "text/plain" });
    const result = await apiClient.documents.simplify(file);

    expect(result.simplified).toBe("Simple");
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://localhost:8000/api/documents/simplify");
    expect(call?.[1]?.method).toBe("POST");
    expect(call?.[1]?.body).toBeInstanceOf(FormData);
  });

  it("sends chat payloads as JSON and returns the reply text", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ response: "Rent is due monthly." })
    );
    vi.stubGlobal("fetch", fetchMock);

    const reply = await apiClient.chat.send({
      message: "When is rent due?",
      documentContent: "Pay rent monthly.",
      history: []
    });

    expect(reply).toBe("Rent is due monthly.");
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://localhost:8000/api/chat");
    expect(call?.[1]?.body).toBe(
      JSON.stringify({ message: "When is rent due?", documentContent: "Pay rent monthly.", history: [] })
    );
  });

  it("throws ApiClientError with the server message", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ error: "No file uploaded" }, 400))
    );

    const file = new File([""], "empty.txt");
    await expect(apiClient.documents.simplify(file)).rejects.toMatchObject({
      name: "ApiClientError",
      message: "No file uploaded",
      status: 400
    });
  });

  it("falls back to the status code when the error body is not JSON", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("Bad gateway", { status: 502 }))
    );

    await expect(apiClient.health.get()).rejects.toThrow("Request failed with status 502");
  });
});

describe("describeApiError", () => {
  it("prefers the error message", () => {
    expect(describeApiError(new ApiClientError("Upstream failed", 500), "Error sending message")).toBe(
      "Upstream failed"
    );
  });

  it("uses the fallback for blank or unknown errors", () => {
    expect(describeApiError(new Error(""), "Error sending message")).toBe("Error sending message");
    expect(describeApiError("boom", "Error sending message")).toBe("Error sending message");
  });
});
