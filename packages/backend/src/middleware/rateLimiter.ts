import rateLimit from "express-rate-limit";
import type { RequestHandler } from "express";
import { appConfig } from "../config.js";

export function createApiRateLimiter(
  options: { windowMs?: number; limit?: number } = {}
): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs ?? appConfig.RATE_LIMIT_WINDOW_MS,
    limit: options.limit ?? appConfig.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests. Please try again later." }
  });
}
