import { ConfigurationError } from "@lexsc/core/errors";

export interface ApiConfig {
  host: string;
  port: number;
  requestTimeoutMs: number;
  rateLimitMax: number;
  rateLimitWindow: string;
  corsOrigins: string[];
  llmBaseUrl: string;
  llmModel: string;
  llmTimeoutMs: number;
  llmTemperature: number;
}

function parseIntegerEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (!raw) {
    return defaultValue;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`ENV ${name} must be an integer. Received: ${raw}`);
  }
  return parsed;
}

function parseFloatEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (!raw) {
    return defaultValue;
  }

  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`ENV ${name} must be a number. Received: ${raw}`);
  }
  return parsed;
}

function parseCsvEnv(name: string, defaultValue: string): string[] {
  const raw = process.env[name] ?? defaultValue;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadApiConfigFromEnv(): ApiConfig {
  return {
    host: process.env.HOST ?? "0.0.0.0",
    port: parseIntegerEnv("PORT", 3000),
    requestTimeoutMs: parseIntegerEnv("REQUEST_TIMEOUT_MS", 120000),
    rateLimitMax: parseIntegerEnv("RATE_LIMIT_MAX", 60),
    rateLimitWindow: process.env.RATE_LIMIT_WINDOW ?? "1 minute",
    corsOrigins: parseCsvEnv("CORS_ORIGINS", "http://localhost:5173,http://127.0.0.1:5173"),
    llmBaseUrl: process.env.RAG_LLM_BASE_URL ?? process.env.OLLAMA_URL ?? "http://127.0.0.1:11434",
    llmModel: process.env.RAG_LLM_MODEL ?? "qwen2.5:7b-instruct",
    llmTimeoutMs: parseIntegerEnv("RAG_LLM_TIMEOUT_MS", 90000),
    llmTemperature: parseFloatEnv("RAG_LLM_TEMPERATURE", 0.3),
  };
}
