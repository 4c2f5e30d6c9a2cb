import { describe, expect, it } from "vitest";
import { contextualizeQuery, parseIntentLabel } from "../src/orchestrator/intent";
import { getResponse } from "../src/orchestrator/responder";
import { REFUSAL_TEXT, RETRIEVAL_ERROR_TEXT, SYSTEM_INSTRUCTION, buildRagPrompt } from "../src/prompts";
import { buildContext, collect, fakeEmbedder, scriptedLlm } from "./fixtures";

const FORCED_CONTEXT = "[Contexto Forçado (DECRETO 9.html)]: O Estado regulamenta as compras publicas.";

describe("getResponse", () => {
  it("refuses non-legal questions without retrieval or generation", async () => {
    const llm = scriptedLlm({ intent: "NAO_JURIDICA" });
    const { embedder, embed } = fakeEmbedder();
    const ctx = buildContext({ llm: llm.client, embedder });

    const response = await getResponse(ctx, "Quem ganhou o campeonato de 1994?", []);

    expect(response).toEqual({ kind: "refusal", text: REFUSAL_TEXT });
    expect(llm.complete).toHaveBeenCalledTimes(1);
    expect(embed).not.toHaveBeenCalled();
    expect(llm.stream).not.toHaveBeenCalled();
  });

  it("returns the retrieval error without generating when there is no context", async () => {
    const llm = scriptedLlm();
    const ctx = buildContext({ llm: llm.client, index: null });

    const response = await getResponse(ctx, "O que diz a LC 715?", []);

    expect(response).toEqual({ kind: "error", text: RETRIEVAL_ERROR_TEXT, sources: new Set() });
    expect(llm.stream).not.toHaveBeenCalled();
  });

  it("streams the answer generated from the retrieved context", async () => {
    const llm = scriptedLlm({ extraction: "DECRETO_9_2019", stream: ["Resposta ", "final."] });
    const ctx = buildContext({ llm: llm.client });
    const query = "Quais os objetivos do Decreto 9 de 2019?";

    const response = await getResponse(ctx, query, []);

    expect(response.kind).toBe("stream");
    if (response.kind !== "stream") {
      return;
    }
    expect(response.sources).toEqual(new Set(["DECRETO 9.html"]));
    await expect(collect(response.fragments)).resolves.toBe("Resposta final.");
    expect(llm.stream).toHaveBeenCalledWith(
      [
        { role: "system", content: SYSTEM_INSTRUCTION },
        { role: "user", content: buildRagPrompt(FORCED_CONTEXT, query) },
      ],
      { temperature: 0.3 },
    );
  });

  it("keeps the retrieved sources when generation cannot start", async () => {
    const llm = scriptedLlm({ extraction: "DECRETO_9_2019", stream: new Error("connection refused") });

    const response = await getResponse(buildContext({ llm: llm.client }), "Resumo do Decreto 9 de 2019", []);

    expect(response).toEqual({
      kind: "error",
      text: "Ocorreu um erro no processamento do Chat (Stream). Erro: connection refused",
      sources: new Set(["DECRETO 9.html"]),
    });
  });

  it("ends an interrupted stream with the generation error", async () => {
    async function* interrupted(): AsyncGenerator<string> {
      yield "Parcial";
      throw new Error("socket closed");
    }
    const llm = scriptedLlm({ extraction: "DECRETO_9_2019" });
    llm.stream.mockImplementationOnce(async () => interrupted());

    const response = await getResponse(buildContext({ llm: llm.client }), "Resumo do Decreto 9 de 2019", []);

    expect(response.kind).toBe("stream");
    if (response.kind === "stream") {
      await expect(collect(response.fragments)).resolves.toBe(
        "Parcial\n\nOcorreu um erro no processamento do Chat (Stream). Erro: socket closed",
      );
    }
  });

  it("answers when the classifier fails", async () => {
    const llm = scriptedLlm({ intent: new Error("timeout"), extraction: "DECRETO_9_2019" });

    const response = await getResponse(buildContext({ llm: llm.client }), "Resumo do Decreto 9 de 2019", []);

    expect(response.kind).toBe("stream");
  });
});

describe("intent helpers", () => {
  it("defaults unknown labels to JURIDICA", () => {
    expect(parseIntentLabel(" nao_juridica\n")).toBe("NAO_JURIDICA");
    expect(parseIntentLabel("TALVEZ")).toBe("JURIDICA");
  });

  it("adds the previous user question to follow-ups", () => {
    const history = [
      { role: "assistant" as const, content: "Olá!" },
      { role: "user" as const, content: "Quais os objetivos da Lei 741?" },
      { role: "assistant" as const, content: "Os objetivos são..." },
    ];

    expect(contextualizeQuery("E o artigo 5º?", history)).toBe(
      "Com base na pergunta anterior ('Quais os objetivos da Lei 741?'), a nova pergunta é: 'E o artigo 5º?'",
    );
    expect(contextualizeQuery("Primeira pergunta", [])).toBe("Primeira pergunta");
  });
});
