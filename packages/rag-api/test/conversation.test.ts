import { Readable, Writable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { runChat } from "../src/chat";
import { ConversationSession, renderSourcesFooter } from "../src/conversation";
import { GREETING_TEXT, REFUSAL_TEXT } from "../src/prompts";
import { buildContext, scriptedLlm } from "./fixtures";

function captureOutput() {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { output, text: () => chunks.join("") };
}

describe("ConversationSession", () => {
  it("starts from the greeting and excludes the pending question from prior turns", () => {
    const session = new ConversationSession();
    session.append("user", "O que diz a LC 715?");

    expect(session.turns()).toHaveLength(2);
    expect(session.priorTurns()).toEqual([{ role: "assistant", content: GREETING_TEXT }]);

    session.reset();
    expect(session.turns()).toEqual([{ role: "assistant", content: GREETING_TEXT }]);
  });
});

describe("renderSourcesFooter", () => {
  it("lists sources sorted", () => {
    expect(renderSourcesFooter(1234, new Set(["b.html", "a.html"]), "x")).toBe(
      "\n\n--- \nTempo de resposta: **1.23 segundos**\n\n**Fontes Recuperadas:**\n- a.html\n- b.html",
    );
  });

  it("explains the absence of sources", () => {
    expect(renderSourcesFooter(500, new Set(), "A informação não foi encontrada nos documentos.")).toBe(
      "\n\n--- \nTempo de resposta: **0.50 segundos**\n\n**Fontes Recuperadas:** Nenhuma fonte no corpus foi utilizada.",
    );
    expect(renderSourcesFooter(500, new Set(), "Erro")).toBe(
      "\n\n--- \nTempo de resposta: **0.50 segundos**\n\n**Fontes Recuperadas:** Nenhuma fonte foi citada (possível erro).",
    );
  });
});

describe("runChat", () => {
  it("streams the answer followed by the footer and records both turns", async () => {
    const { output, text } = captureOutput();
    const now = vi.fn().mockReturnValueOnce(1000).mockReturnValueOnce(2500);
    const ctx = buildContext({ llm: scriptedLlm({ extraction: "DECRETO_9_2019" }).client });

    const session = await runChat(ctx, {
      input: Readable.from(["Quais os objetivos do Decreto 9 de 2019?\n/sair\n"]),
      output,
      now,
    });

    const footer = "\n\n--- \nTempo de resposta: **1.50 segundos**\n\n**Fontes Recuperadas:**\n- DECRETO 9.html";
    expect(text()).toBe(
      `${GREETING_TEXT}\n(/limpar limpa o historico, /sair encerra)\n> Resposta final.${footer}\n> `,
    );
    expect(session.turns()).toEqual([
      { role: "assistant", content: GREETING_TEXT },
      { role: "user", content: "Quais os objetivos do Decreto 9 de 2019?" },
      { role: "assistant", content: `Resposta final.${footer}` },
    ]);
  });

  it("clears the history on /limpar", async () => {
    const { output, text } = captureOutput();
    const ctx = buildContext({ llm: scriptedLlm({ intent: "NAO_JURIDICA" }).client });

    const session = await runChat(ctx, {
      input: Readable.from(["Qual a capital da Franca?\n/limpar\n"]),
      output,
      now: () => 0,
    });

    expect(text()).toContain(REFUSAL_TEXT);
    expect(text()).toContain("Nenhuma fonte no corpus foi utilizada.");
    expect(text().endsWith(`${GREETING_TEXT}\n> `)).toBe(true);
    expect(session.turns()).toEqual([{ role: "assistant", content: GREETING_TEXT }]);
  });
});
