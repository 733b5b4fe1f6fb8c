import { afterEach, describe, expect, it, vi } from "vitest";
import { DocumentSimplifier } from "../../../src/services/DocumentSimplifier.js";
import { LLMNotConfiguredError } from "../../../src/services/llmTypes.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";

function buildSimplifier(llm: FakeLLMService): DocumentSimplifier {
  return new DocumentSimplifier(llm, {
    chunkSize: 11,
    fallbackChunkSize: 6,
    chunkDelayMs: 0
  });
}

describe("DocumentSimplifier", () => {
  it("simplifies every chunk in order and reports progress", async () => {
    const llm = new FakeLLMService({ simplify: async (section) => section.toUpperCase() });
    const onProgress = vi.fn();

    const result = await buildSimplifier(llm).simplify("alpha beta gamma delta", { onProgress });

    expect(result).toEqual({
      simplified: "ALPHA BETA\n\nGAMMA\n\nDELTA",
      chunkCount: 3,
      failedSections: 0
    });
    expect(onProgress.mock.calls).toEqual([
      [{ index: 1, total: 3 }],
      [{ index: 2, total: 3 }],
      [{ index: 3, total: 3 }]
    ]);
  });

  it("retries a failed chunk as smaller sections", async () => {
    const llm = new FakeLLMService({
      simplify: async (section) => {
        if (section === "alpha beta") {
          throw new Error("too long");
        }
        return section.toUpperCase();
      }
    });

    const result = await buildSimplifier(llm).simplify("alpha beta gamma");

    expect(result.simplified).toBe("ALPHA\n\nBETA\n\nGAMMA");
    expect(result.failedSections).toBe(0);
    expect(llm.simplifiedSections).toEqual(["alpha beta", "alpha", "beta", "gamma"]);
  });

  it("marks sections that still fail and keeps the rest", async () => {
    const llm = new FakeLLMService({
      simplify: async (section) => {
        if (section.includes("beta")) {
          throw new Error("blocked");
        }
        return section.toUpperCase();
      }
    });

    const result = await buildSimplifier(llm).simplify("alpha beta gamma");

    expect(result.simplified).toBe(
      "ALPHA\n\n[Error processing this section: blocked]\n\nGAMMA"
    );
    expect(result.chunkCount).toBe(2);
    expect(result.failedSections).toBe(1);
  });

  it("fails with the first error when no section could be simplified", async () => {
    const llm = new FakeLLMService({
      simplify: async () => {
        throw new Error("blocked");
      }
    });

    await expect(buildSimplifier(llm).simplify("beta")).rejects.toThrow("blocked");
  });

  it("does not degrade a missing API key into section markers", async () => {
    const llm = new FakeLLMService({
      simplify: async () => {
        throw new LLMNotConfiguredError();
      }
    });

    await expect(buildSimplifier(llm).simplify("alpha beta gamma")).rejects.toBeInstanceOf(
      LLMNotConfiguredError
    );
    expect(llm.simplifiedSections).toEqual(["alpha beta"]);
  });

  it("rejects blank text", async () => {
    const llm = new FakeLLMService();

    await expect(buildSimplifier(llm).simplify(" \n ")).rejects.toThrow(
      "There is no text to simplify"
    );
  });
});

describe("DocumentSimplifier pacing", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("pauses between chunks and between fallback sub-chunks", async () => {
    vi.useFakeTimers();
    const llm = new FakeLLMService({
      simplify: async (section) => {
        if (section === "alpha beta") {
          throw new Error("too long");
        }
        return section.toUpperCase();
      }
    });
    const simplifier = new DocumentSimplifier(llm, {
      chunkSize: 11,
      fallbackChunkSize: 6,
      chunkDelayMs: 1000
    });

    const result = simplifier.simplify("alpha beta gamma");
    expect(llm.simplifiedSections).toEqual(["alpha beta"]);

    await vi.advanceTimersByTimeAsync(999);
    expect(llm.simplifiedSections).toEqual(["alpha beta"]);

    await vi.advanceTimersByTimeAsync(1);
    expect(llm.simplifiedSections).toEqual(["alpha beta", "alpha"]);

    await vi.advanceTimersByTimeAsync(1000);
    expect(llm.simplifiedSections).toEqual(["alpha beta", "alpha", "beta"]);

    await vi.advanceTimersByTimeAsync(999);
    expect(llm.simplifiedSections).toEqual(["alpha beta", "alpha", "beta"]);

    await vi.advanceTimersByTimeAsync(1);
    expect(llm.simplifiedSections).toEqual(["alpha beta", "alpha", "beta", "gamma"]);
    await expect(result).resolves.toEqual({
      simplified: "ALPHA\n\nBETA\n\nGAMMA",
      chunkCount: 2,
      failedSections: 0
    });
  });
});
