import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = Date.now();

  res.on("finish", () => {
    const durationMs = Date.now() - startTime;
    const fields = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs
    };

    if (res.statusCode >= 500) {
      logger.error(fields, "HTTP request failed");
    } else if (res.statusCode >= 400) {
      logger.warn(fields, "HTTP request rejected");
    } else {
      logger.info(fields, "HTTP request");
    }
  });

  next();
};
