import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import type { RootResponse } from "@plainlex/shared";
import { appConfig } from "./config.js";
import { requestLogger } from "./middleware/logger.js";
import { createApiRateLimiter } from "./middleware/rateLimiter.js";
import { createChatRouter } from "./routes/chat.js";
import { createDocumentsRouter } from "./routes/documents.js";
import { createHealthRouter } from "./routes/health.js";
import type { DocumentSimplifier } from "./services/DocumentSimplifier.js";
import type { LLMServiceLike } from "./services/llmTypes.js";
import { logger } from "./utils/logger.js";

export interface CreateAppOptions {
  llmService?: LLMServiceLike;
  simplifier?: DocumentSimplifier;
  corsOrigin?: string;
  jsonBodyLimit?: number;
}

interface ClientHttpError {
  status: number;
  type?: string;
  message: string;
}

/** body-parser errors carry a 4xx `status` and `expose: true`. */
function isClientHttpError(err: unknown): err is ClientHttpError {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500 &&
    "expose" in err &&
    err.expose === true
  );
}

export function createApp(options: CreateAppOptions = {}): express.Express {
  const app = express();

  app.use(requestLogger);
  app.use(
    cors({
      origin: options.corsOrigin ?? appConfig.CORS_ORIGIN
    })
  );
  app.use(express.json({ limit: options.jsonBodyLimit ?? appConfig.JSON_BODY_LIMIT }));
  app.use(createApiRateLimiter());

  app.get("/", (_req, res) => {
    const response: RootResponse = { message: "Welcome to Plainlex API" };
    res.json(response);
  });

  const services: { llmService?: LLMServiceLike } = {};
  if (options.llmService) {
    services.llmService = options.llmService;
  }

  app.use(
    "/api/documents",
    createDocumentsRouter(
      options.simplifier ? { ...services, simplifier: options.simplifier } : services
    )
  );
  app.use("/api/chat", createChatRouter(services));
  app.use("/api/health", createHealthRouter(services));

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && "body" in err) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    if (isClientHttpError(err)) {
      const error = err.type === "entity.too.large" ? "Request body too large" : err.message;
      res.status(err.status).json({ error });
      return;
    }

    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
