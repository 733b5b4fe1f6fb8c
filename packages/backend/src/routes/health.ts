import { Router } from "express";
import type { HealthResponse, ServiceConnectionStatus } from "@plainlex/shared";
import { getLLMServiceSingleton } from "../runtime/llmRuntime.js";
import type { LLMServiceLike } from "../services/llmTypes.js";

interface CreateHealthRouterOptions {
  llmService?: LLMServiceLike;
  checkLlm?: () => Promise<ServiceConnectionStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const checkLlm =
    options.checkLlm ??
    (async (): Promise<ServiceConnectionStatus> => {
      const llmService = options.llmService ?? getLLMServiceSingleton();
      return llmService.isConfigured() ? "ok" : "not_configured";
    });
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    let llm: ServiceConnectionStatus;
    try {
      llm = await checkLlm();
    } catch {
      llm = "failed";
    }

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status: llm === "ok" ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        llm
      },
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.json(response);
  });

  return healthRouter;
}
