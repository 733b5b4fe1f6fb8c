import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { createHealthRouter } from "../../src/routes/health.js";
import { FakeLLMService } from "../helpers/FakeLLMService.js";

describe("health api", () => {
  it("returns ok when the language model is configured", async () => {
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        llmService: new FakeLLMService(),
        startTime: Date.now() - 5_000
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
    expect(response.body.checks).toEqual({ llm: "ok" });
    expect(response.body.uptimeSec).toBeGreaterThanOrEqual(5);
    expect(response.body.memoryUsage.rss).toBeGreaterThan(0);
  });

  it("returns degraded when the language model is not configured", async () => {
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({ llmService: new FakeLLMService({ configured: false }) })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("degraded");
    expect(response.body.checks).toEqual({ llm: "not_configured" });
  });

  it("reports a failed check when the probe throws", async () => {
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkLlm: async () => {
          throw new Error("probe failed");
        }
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.body.status).toBe("degraded");
    expect(response.body.checks).toEqual({ llm: "failed" });
  });
});
