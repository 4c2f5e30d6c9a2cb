import { vi } from "vitest";
import { createSilentLogger } from "@lexsc/core/logger";
import type { Embedder } from "@lexsc/core/embeddings/index";
import type { IndexedChunkRecord } from "@lexsc/core/types";
import { DocumentMap } from "@lexsc/core/vector/documentMap";
import { FlatL2Index } from "@lexsc/core/vector/flatIndex";
import type { RagContext } from "../src/context";
import type { LlmCallOptions, LlmChatClient, LlmChatMessage } from "../src/llm/ollama";

export function buildRecord(
  id: string,
  rowIndex: number,
  uniqueId: string,
  fonte: string,
  text: string,
): IndexedChunkRecord {
  return {
    id,
    text,
    metadata: { fonte, ano_publicacao: 2018, chunk_index: 0, ID_UNICO: uniqueId },
    row_index: rowIndex,
  };
}

export const RECORDS: IndexedChunkRecord[] = [
  buildRecord("doc_1", 0, "LC_715_2018_ART_1", "LC 715.html", " Art. 1º Fica criado o fundo estadual. "),
  buildRecord("doc_2", 1, "LEI_100_2020_ART_2", "LEI 100.html", "Art. 2º Regras de licitacao."),
  buildRecord("doc_3", 2, "LC_715_2018_ART_3", "LC 715.html", "Art. 3º O fundo sera gerido pela secretaria."),
  buildRecord("doc_4", 3, "DECRETO_9_2019", "decretos/DECRETO 9.html", "O Estado regulamenta as compras publicas."),
];

export const VECTORS = [
  [5, 5],
  [0, 0.1],
  [1, 0],
  [9, 9],
];

export interface ScriptedAnswers {
  extraction?: string | Error;
  rewrite?: string | Error;
  intent?: string | Error;
  stream?: string[] | Error;
}

function answer(value: string | Error | undefined, fallback: string): Promise<string> {
  if (value instanceof Error) {
    return Promise.reject(value);
  }
  return Promise.resolve(value ?? fallback);
}

async function* fragmentsOf(parts: string[]): AsyncGenerator<string> {
  for (const part of parts) {
    yield part;
  }
}

/** Answers each prompt kind from the script, telling them apart by their closing line. */
export function scriptedLlm(script: ScriptedAnswers = {}) {
  const complete = vi.fn(async (messages: LlmChatMessage[], _options?: LlmCallOptions): Promise<string> => {
    const prompt = messages[messages.length - 1]?.content ?? "";
    if (prompt.endsWith("ID ÚNICO:")) {
      return answer(script.extraction, "NULO");
    }
    if (prompt.endsWith("FRASE REESCRITA:")) {
      return answer(script.rewrite, "consulta reescrita");
    }
    if (prompt.startsWith("CLASSIFIQUE")) {
      return answer(script.intent, "JURIDICA");
    }
    throw new Error("unexpected prompt");
  });

  const stream = vi.fn(
    async (_messages: LlmChatMessage[], _options?: LlmCallOptions): Promise<AsyncIterable<string>> => {
      if (script.stream instanceof Error) {
        throw script.stream;
      }
      return fragmentsOf(script.stream ?? ["Resposta ", "final."]);
    },
  );

  const client: LlmChatClient = { complete, stream };
  return { client, complete, stream };
}

export function fakeEmbedder(vector: number[] | Error = [0, 0]) {
  const embed = vi.fn(async (_text: string): Promise<number[]> => {
    if (vector instanceof Error) {
      throw vector;
    }
    return vector;
  });
  const embedder: Embedder = {
    embed,
    embedBatch: vi.fn(async (texts: string[]) => Promise.all(texts.map((text) => embed(text)))),
  };
  return { embedder, embed };
}

export function buildContext(overrides: Partial<RagContext> = {}): RagContext {
  return {
    embedder: fakeEmbedder().embedder,
    llm: scriptedLlm().client,
    index: FlatL2Index.fromVectors(VECTORS),
    documents: DocumentMap.fromRecords(RECORDS),
    logger: createSilentLogger(),
    searchRetry: { attempts: 3, minDelayMs: 2000, maxDelayMs: 60000 },
    topK: 10,
    generationTemperature: 0.3,
    sleep: vi.fn(async () => undefined),
    ...overrides,
  };
}

export async function collect(fragments: AsyncIterable<string>): Promise<string> {
  let text = "";
  for await (const fragment of fragments) {
    text += fragment;
  }
  return text;
}
