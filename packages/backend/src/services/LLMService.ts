import OpenAI from "openai";
import type { ChatTurn } from "@plainlex/shared";
import {
  buildSimplifySystemPrompt,
  buildChatSystemPrompt,
  buildSimplifyUserPrompt
} from "../prompts/index.js";
import { appConfig } from "../config.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import {
  EmptyCompletionError,
  LLMNotConfiguredError,
  type ChatCompletionClient,
  type LLMConfig,
  type LLMServiceLike,
  type QuestionInput
} from "./llmTypes.js";

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  temperature: number;
  maxTokens: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

export class LLMService implements LLMServiceLike {
  private client: ChatCompletionClient | null;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: ChatCompletionClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "https://generativelanguage.googleapis.com/v1beta/openai/",
      temperature: config.temperature ?? 0.2,
      maxTokens: config.maxTokens ?? 8192,
      maxConcurrent: config.maxConcurrent ?? 1,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 4000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 120_000
    };

    // Built on first use so that a missing key surfaces per request, not at start-up.
    this.client = deps?.client ?? null;

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  static fromEnv(): LLMService {
    const provider = appConfig.LLM_PROVIDER;

    return new LLMService({
      apiKey:
        provider === "openai"
          ? appConfig.OPENAI_API_KEY
          : appConfig.GEMINI_API_KEY || appConfig.GOOGLE_API_KEY,
      baseURL: provider === "openai" ? appConfig.OPENAI_BASE_URL : appConfig.GEMINI_BASE_URL,
      chatModel: provider === "openai" ? appConfig.OPENAI_CHAT_MODEL : appConfig.GEMINI_CHAT_MODEL,
      temperature: appConfig.LLM_TEMPERATURE,
      maxTokens: appConfig.LLM_MAX_TOKENS,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS
    });
  }

  isConfigured(): boolean {
    return this.client !== null || this.config.apiKey.trim().length > 0;
  }

  async simplifyText(section: string): Promise<string> {
    const client = this.getClient();
    const response = await this.rateLimiter.run(() =>
      client.chat.completions.create({
        model: this.config.chatModel,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        messages: [
          { role: "system", content: buildSimplifySystemPrompt() },
          { role: "user", content: buildSimplifyUserPrompt(section) }
        ]
      })
    );

    const content = response.choices[0]?.message.content?.trim() ?? "";
    if (content.length === 0) {
      throw new EmptyCompletionError();
    }
    return content;
  }

  async *answerQuestion(input: QuestionInput): AsyncGenerator<string> {
    const client = this.getClient();
    const stream = await this.rateLimiter.run(() =>
      client.chat.completions.create({
        model: this.config.chatModel,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        stream: true,
        messages: [
          { role: "system", content: buildChatSystemPrompt(input.documentContent) },
          ...toConversation(input.history ?? []),
          { role: "user", content: input.question }
        ]
      })
    );

    let produced = false;
    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta.content;
      if (delta) {
        produced = true;
        yield delta;
      }
    }

    if (!produced) {
      throw new EmptyCompletionError();
    }
  }

  private getClient(): ChatCompletionClient {
    if (this.client) {
      return this.client;
    }
    if (!this.isConfigured()) {
      throw new LLMNotConfiguredError();
    }

    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseURL,
      // Retries go through LLMRateLimiter.
      maxRetries: 0
    });
    return this.client;
  }
}

function toConversation(history: ChatTurn[]): OpenAI.ChatCompletionMessageParam[] {
  return history
    .filter((turn) => turn.text.trim().length > 0)
    .map((turn): OpenAI.ChatCompletionMessageParam =>
      turn.sender === "user"
        ? { role: "user", content: turn.text }
        : { role: "assistant", content: turn.text }
    );
}
