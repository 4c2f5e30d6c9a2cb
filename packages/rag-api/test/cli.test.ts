import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CorpusStore } from "@lexsc/core/storage/corpusStore";
import { DocumentMap } from "@lexsc/core/vector/documentMap";
import { FlatL2Index } from "@lexsc/core/vector/flatIndex";
import { buildProgram, type CliActions } from "../src/cli";
import type { ApiConfig } from "../src/config";
import { createRuntimeContext } from "../src/server";

function fakeActions() {
  const serve = vi.fn(async () => undefined);
  const chat = vi.fn(async () => undefined);
  const actions: CliActions = { serve, chat };
  return { actions, serve, chat };
}

describe("lexsc-rag program", () => {
  it("passes the verbose flag to serve", async () => {
    const { actions, serve, chat } = fakeActions();

    await buildProgram(actions).parseAsync(["node", "lexsc-rag", "-v", "serve"]);

    expect(serve).toHaveBeenCalledWith({ verbose: true });
    expect(chat).not.toHaveBeenCalled();
  });

  it("defaults verbose to false for chat", async () => {
    const { actions, chat } = fakeActions();

    await buildProgram(actions).parseAsync(["node", "lexsc-rag", "chat"]);

    expect(chat).toHaveBeenCalledWith({ verbose: false });
  });
});

describe("createRuntimeContext", () => {
  let root: string | null = null;

  afterEach(async () => {
    vi.unstubAllEnvs();
    if (root) {
      await fs.rm(root, { recursive: true, force: true });
      root = null;
    }
  });

  it("loads the persisted corpus with a debug logger when verbose", async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "lexsc-runtime-"));
    const dataDir = path.join(root, "data");
    await new CorpusStore(dataDir).writeIndex(
      FlatL2Index.fromVectors([[1, 0]]),
      DocumentMap.fromChunks([
        {
          id: "doc_1",
          text: "Art. 1º Fica criado o fundo estadual.",
          metadata: { fonte: "LC 715.html", ano_publicacao: 2018, chunk_index: 0, ID_UNICO: "LC_715_2018_ART_1" },
        },
      ]),
    );
    vi.stubEnv("DATA_DIR", dataDir);
    vi.stubEnv("EMBEDDINGS_PROVIDER", "local");
    vi.stubEnv("EMBEDDINGS_FALLBACK_PROVIDER", "none");

    const apiConfig: ApiConfig = {
      host: "127.0.0.1",
      port: 0,
      requestTimeoutMs: 5000,
      rateLimitMax: 100,
      rateLimitWindow: "1 minute",
      corsOrigins: ["*"],
      llmBaseUrl: "http://127.0.0.1:11434",
      llmModel: "test-model",
      llmTimeoutMs: 5000,
      llmTemperature: 0.3,
    };

    const ctx = await createRuntimeContext(apiConfig, { verbose: true, logToStderr: true });

    expect(ctx.logger.level).toBe("debug");
    expect(ctx.documents?.size).toBe(1);
    expect(ctx.generationTemperature).toBe(0.3);
  });
});
