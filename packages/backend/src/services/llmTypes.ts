import type OpenAI from "openai";
import type { ChatTurn } from "@plainlex/shared";

export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  temperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface QuestionInput {
  question: string;
  documentContent?: string;
  history?: ChatTurn[];
}

/** The subset of the OpenAI SDK client the service calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.ChatCompletion>;
      create(
        body: OpenAI.ChatCompletionCreateParamsStreaming
      ): Promise<AsyncIterable<OpenAI.ChatCompletionChunk>>;
    };
  };
}

export interface LLMServiceLike {
  isConfigured(): boolean;
  simplifyText(section: string): Promise<string>;
  answerQuestion(input: QuestionInput): AsyncGenerator<string>;
}

export class LLMNotConfiguredError extends Error {
  constructor() {
    super("Language model is not configured. Please set an API key.");
    this.name = "LLMNotConfiguredError";
  }
}

export class EmptyCompletionError extends Error {
  constructor() {
    super("The language model returned an empty response");
    this.name = "EmptyCompletionError";
  }
}
