import type { Request, Response } from "express";
import { Router } from "express";
import { z } from "zod";
import type { ChatResponse, ChatStreamEventName } from "@plainlex/shared";
import { validate } from "../middleware/validator.js";
import { getLLMServiceSingleton } from "../runtime/llmRuntime.js";
import type { LLMServiceLike, QuestionInput } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import { toHttpError } from "./errors.js";

const MAX_DOCUMENT_CHARS = 1_000_000;
export const MAX_HISTORY_TURNS = 50;
const CHAT_FALLBACK_ERROR = "Error sending message";

const chatBodySchema = z.object({
  message: z.string().trim().min(1),
  documentContent: z.string().max(MAX_DOCUMENT_CHARS).optional(),
  history: z
    .array(
      z.object({
        sender: z.enum(["user", "bot"]),
        text: z.string()
      })
    )
    .default([])
    // Only the most recent turns reach the model; longer transcripts are not an error.
    .transform((turns) => turns.slice(-MAX_HISTORY_TURNS))
});

type ChatBody = z.infer<typeof chatBodySchema>;

interface CreateChatRouterOptions {
  llmService?: LLMServiceLike;
  heartbeatIntervalMs?: number;
}

function wantsSse(req: Request): boolean {
  const accepts = req.headers.accept ?? "";
  const streamFlag = req.query.stream;
  const streamRequested =
    typeof streamFlag === "string" && streamFlag.toLowerCase() === "true";
  return accepts.includes("text/event-stream") || streamRequested;
}

function sendSseEvent(res: Response, eventName: ChatStreamEventName, payload: unknown): void {
  res.write(`event: ${eventName}\n`);
  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}

export function createChatRouter(options: CreateChatRouterOptions = {}): Router {
  const llmService = options.llmService ?? getLLMServiceSingleton();
  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? 15_000;

  const chatRouter = Router();

  chatRouter.post("/", validate({ body: chatBodySchema }), async (req, res) => {
    const body: ChatBody = req.body;
    const input: QuestionInput = {
      question: body.message,
      history: body.history
    };
    if (body.documentContent !== undefined) {
      input.documentContent = body.documentContent;
    }

    if (!wantsSse(req)) {
      try {
        let reply = "";
        for await (const delta of llmService.answerQuestion(input)) {
          reply += delta;
        }
        const response: ChatResponse = { response: reply };
        res.json(response);
      } catch (error) {
        const { status, body: errorBody } = toHttpError(error, CHAT_FALLBACK_ERROR);
        logger.error({ err: error }, "Chat completion failed");
        res.status(status).json(errorBody);
      }
      return;
    }

    res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    res.setHeader("Cache-Control", "no-cache, no-transform");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    sendSseEvent(res, "ack", { message: body.message });
    const heartbeat = setInterval(() => {
      res.write(": heartbeat\n\n");
    }, heartbeatIntervalMs);

    let closed = false;
    res.on("close", () => {
      closed = true;
      clearInterval(heartbeat);
    });

    let reply = "";
    try {
      for await (const delta of llmService.answerQuestion(input)) {
        if (closed) {
          break;
        }
        reply += delta;
        sendSseEvent(res, "delta", { content: delta });
      }
      if (!closed) {
        const response: ChatResponse = { response: reply };
        sendSseEvent(res, "done", response);
      }
    } catch (error) {
      logger.error({ err: error }, "Chat stream failed");
      if (!closed) {
        sendSseEvent(res, "error", toHttpError(error, CHAT_FALLBACK_ERROR).body);
      }
    } finally {
      clearInterval(heartbeat);
      if (!closed) {
        res.end();
      }
    }
  });

  return chatRouter;
}
