export interface LlmChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LlmCallOptions {
  temperature?: number;
}

export interface LlmChatClient {
  complete(messages: LlmChatMessage[], options?: LlmCallOptions): Promise<string>;
  /**
   * Opens the generation request before resolving, so connection and HTTP
   * errors surface here rather than while iterating.
   */
  stream(messages: LlmChatMessage[], options?: LlmCallOptions): Promise<AsyncIterable<string>>;
}

export interface OllamaChatClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature: number;
}

function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parseStreamLine(line: string): string | null {
  if (line.length === 0) {
    return null;
  }

  const payload: unknown = JSON.parse(line);
  if (!isRecord(payload)) {
    return null;
  }
  if (typeof payload.error === "string") {
    throw new Error(`ollama stream failed: ${payload.error}`);
  }

  const message = payload.message;
  if (isRecord(message) && typeof message.content === "string" && message.content.length > 0) {
    return message.content;
  }
  return null;
}

/** Yields `message.content` of each NDJSON line of an Ollama `/api/chat` stream. */
export async function* readOllamaChatStream(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffered = "";

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        break;
      }

      buffered += decoder.decode(value, { stream: true });
      let newline = buffered.indexOf("\n");
      while (newline >= 0) {
        const fragment = parseStreamLine(buffered.slice(0, newline).trim());
        buffered = buffered.slice(newline + 1);
        if (fragment !== null) {
          yield fragment;
        }
        newline = buffered.indexOf("\n");
      }
    }

    buffered += decoder.decode();
    const last = parseStreamLine(buffered.trim());
    if (last !== null) {
      yield last;
    }
  } finally {
    reader.releaseLock();
  }
}

export class OllamaChatClient implements LlmChatClient {
  private readonly baseUrl: string;

  constructor(private readonly options: OllamaChatClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
  }

  private async post(
    messages: LlmChatMessage[],
    stream: boolean,
    options: LlmCallOptions,
    signal: AbortSignal,
  ): Promise<Response> {
    const response = await fetch(`${this.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.model,
        stream,
        messages,
        options: {
          temperature: options.temperature ?? this.options.temperature,
        },
      }),
      signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`ollama chat failed (${response.status}): ${text}`);
    }

    return response;
  }

  async complete(messages: LlmChatMessage[], options: LlmCallOptions = {}): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.post(messages, false, options, controller.signal);
      const payload: unknown = await response.json();
      const message = isRecord(payload) ? payload.message : undefined;
      const content = isRecord(message) && typeof message.content === "string" ? message.content.trim() : "";
      if (!content) {
        throw new Error("ollama chat response does not include message content");
      }

      return content;
    } finally {
      clearTimeout(timeout);
    }
  }

  async stream(messages: LlmChatMessage[], options: LlmCallOptions = {}): Promise<AsyncIterable<string>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.post(messages, true, options, controller.signal);
      if (!response.body) {
        throw new Error("ollama chat stream has no response body");
      }
      return readOllamaChatStream(response.body);
    } finally {
      // The timeout bounds opening the stream, not reading it.
      clearTimeout(timeout);
    }
  }
}
