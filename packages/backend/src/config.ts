import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

// npm runs workspace scripts from the package directory; the .env lives at the repository root.
loadEnv({ path: [resolve(process.cwd(), ".env"), resolve(process.cwd(), "../../.env")] });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().default("*"),
  MAX_UPLOAD_SIZE: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  // Fits a chat document at the 1,000,000 character cap even when every character takes several bytes.
  JSON_BODY_LIMIT: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LLM_PROVIDER: z.enum(["gemini", "openai"]).default("gemini"),
  GEMINI_API_KEY: z.string().default(""),
  GOOGLE_API_KEY: z.string().default(""),
  GEMINI_BASE_URL: z.string().default("https://generativelanguage.googleapis.com/v1beta/openai/"),
  GEMINI_CHAT_MODEL: z.string().default("gemini-1.5-pro-latest"),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(8192),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(1),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(4000),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(30),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  SIMPLIFY_CHUNK_SIZE: z.coerce.number().int().positive().default(15_000),
  SIMPLIFY_FALLBACK_CHUNK_SIZE: z.coerce.number().int().positive().default(8_000),
  SIMPLIFY_CHUNK_DELAY_MS: z.coerce.number().int().min(0).default(1_000)
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);
