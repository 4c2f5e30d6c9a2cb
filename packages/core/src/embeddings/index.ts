import { ConfigurationError } from "../errors";

export interface Embedder {
  embed(text: string): Promise<number[]>;
  /** One vector per input, in input order. */
  embedBatch(texts: string[]): Promise<number[][]>;
}

type EmbeddingsProvider = "local" | "openai";
type FallbackProvider = "none" | "openai";

interface EmbeddingsConfig {
  provider: EmbeddingsProvider;
  fallbackProvider: FallbackProvider;
  model: string;
  timeoutMs: number;
  localUrl: string;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiModel: string;
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

function parseEnumEnv<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  const raw = process.env[name];
  if (!raw) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    throw new ConfigurationError(`ENV ${name} must be one of: ${allowed.join(", ")}. Received: ${raw}`);
  }
  return match;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function parseArrayEmbedding(payload: unknown): number[] {
  if (!Array.isArray(payload)) {
    throw new Error("Embedding payload is not an array");
  }

  if (payload.length === 0) {
    throw new Error("Embedding payload is empty");
  }

  return payload.map((value, index) => {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new Error(`Embedding value at index ${index} is invalid`);
    }
    return value;
  });
}

/**
 * Accepts the OpenAI shape (`data[].embedding`, ordered by `index`), the
 * Ollama `/api/embed` shape (`embeddings[]`) and the legacy single
 * `embedding` shape.
 */
export function extractEmbeddingsFromPayload(payload: unknown): number[][] {
  if (!isRecord(payload)) {
    throw new Error("Embedding response must be a JSON object");
  }

  if (Array.isArray(payload.embedding)) {
    return [parseArrayEmbedding(payload.embedding)];
  }

  if (Array.isArray(payload.data) && payload.data.length > 0) {
    const rows = payload.data.map((item, position) => {
      if (!isRecord(item) || !Array.isArray(item.embedding)) {
        throw new Error(`Embedding response item ${position} has no embedding`);
      }
      const index = typeof item.index === "number" ? item.index : position;
      return { index, vector: parseArrayEmbedding(item.embedding) };
    });

    return rows.sort((left, right) => left.index - right.index).map((row) => row.vector);
  }

  if (Array.isArray(payload.embeddings) && payload.embeddings.length > 0) {
    return payload.embeddings.map((item) => parseArrayEmbedding(item));
  }

  throw new Error("Embedding response does not include an embedding vector");
}

function expectCount(vectors: number[][], expected: number): number[][] {
  if (vectors.length !== expected) {
    throw new Error(`Embedding response returned ${vectors.length} vectors for ${expected} inputs`);
  }
  return vectors;
}

class LocalEmbedder implements Embedder {
  constructor(
    private readonly url: string,
    private readonly model: string,
    private readonly timeoutMs: number,
  ) {}

  private async embedWithBody(payload: Record<string, unknown>): Promise<number[][] | null> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        return null;
      }

      const responsePayload = (await response.json()) as unknown;
      return extractEmbeddingsFromPayload(responsePayload);
    } catch {
      // Formato nao suportado por este endpoint: o chamador tenta o proximo.
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }

  async embed(text: string): Promise<number[]> {
    const openAiShape = await this.embedWithBody({
      model: this.model,
      input: text,
    });
    if (openAiShape && openAiShape.length > 0) {
      return openAiShape[0];
    }

    const ollamaShape = await this.embedWithBody({
      model: this.model,
      prompt: text,
    });
    if (ollamaShape && ollamaShape.length > 0) {
      return ollamaShape[0];
    }

    throw new Error("Local embedder failed for both supported payload shapes");
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const batched = await this.embedWithBody({
      model: this.model,
      input: texts,
    });
    if (batched && batched.length === texts.length) {
      return batched;
    }

    const vectors: number[][] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }
    return vectors;
  }
}

class OpenAIEmbedder implements Embedder {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly timeoutMs: number,
  ) {}

  private async request(input: string | string[]): Promise<number[][]> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl.replace(/\/+$/, "")}/embeddings`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          input,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`OpenAI embedder failed (${response.status} ${response.statusText})`);
      }

      const payload = (await response.json()) as unknown;
      return extractEmbeddingsFromPayload(payload);
    } finally {
      clearTimeout(timeout);
    }
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = expectCount(await this.request(text), 1);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    return expectCount(await this.request(texts), texts.length);
  }
}

export class FallbackEmbedder implements Embedder {
  constructor(
    private readonly primary: Embedder,
    private readonly fallback: Embedder | null,
  ) {}

  async embed(text: string): Promise<number[]> {
    try {
      return await this.primary.embed(text);
    } catch (error) {
      if (!this.fallback) {
        throw error;
      }
      return this.fallback.embed(text);
    }
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    try {
      return await this.primary.embedBatch(texts);
    } catch (error) {
      if (!this.fallback) {
        throw error;
      }
      return this.fallback.embedBatch(texts);
    }
  }
}

function loadEmbeddingsConfig(): EmbeddingsConfig {
  return {
    provider: parseEnumEnv("EMBEDDINGS_PROVIDER", ["local", "openai"], "local"),
    fallbackProvider: parseEnumEnv("EMBEDDINGS_FALLBACK_PROVIDER", ["none", "openai"], "none"),
    model: process.env.EMBEDDINGS_MODEL ?? "bge-m3",
    timeoutMs: parseIntegerEnv("EMBEDDINGS_TIMEOUT_MS", 30000),
    localUrl: process.env.LOCAL_EMBEDDINGS_URL ?? "http://127.0.0.1:11434/api/embed",
    openaiApiKey: process.env.OPENAI_API_KEY ?? null,
    openaiBaseUrl: process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
    openaiModel: process.env.OPENAI_EMBEDDINGS_MODEL ?? "text-embedding-3-small",
  };
}

export function createEmbedderFromEnv(): Embedder {
  const config = loadEmbeddingsConfig();

  const openaiEmbedder =
    config.openaiApiKey && config.openaiApiKey.trim().length > 0
      ? new OpenAIEmbedder(
          config.openaiBaseUrl,
          config.openaiApiKey,
          config.openaiModel,
          config.timeoutMs,
        )
      : null;

  if (config.provider === "openai") {
    if (!openaiEmbedder) {
      throw new ConfigurationError("OPENAI_API_KEY is required when EMBEDDINGS_PROVIDER=openai");
    }
    return openaiEmbedder;
  }

  const primary = new LocalEmbedder(config.localUrl, config.model, config.timeoutMs);
  const fallback = config.fallbackProvider === "openai" ? openaiEmbedder : null;

  if (config.fallbackProvider === "openai" && !fallback) {
    throw new ConfigurationError("OPENAI_API_KEY is required when EMBEDDINGS_FALLBACK_PROVIDER=openai");
  }

  return new FallbackEmbedder(primary, fallback);
}
