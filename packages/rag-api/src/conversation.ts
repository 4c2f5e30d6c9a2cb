import type { ConversationRole, ConversationTurn } from "@lexsc/core/types";
import { GREETING_TEXT, NOT_FOUND_ANSWER_MARKER } from "./prompts";

const NON_LEGAL_MARKER = "não-jurídica";

export class ConversationSession {
  private history: ConversationTurn[] = [];

  constructor(private readonly greeting: string = GREETING_TEXT) {
    this.reset();
  }

  append(role: ConversationRole, content: string): void {
    this.history.push({ role, content });
  }

  /** Drops every turn and re-seeds the greeting. */
  reset(): void {
    this.history = [{ role: "assistant", content: this.greeting }];
  }

  turns(): readonly ConversationTurn[] {
    return this.history;
  }

  /** Turns before the pending user question, if the last turn is one. */
  priorTurns(): readonly ConversationTurn[] {
    const last = this.history[this.history.length - 1];
    return last?.role === "user" ? this.history.slice(0, -1) : this.history;
  }
}

export function renderSourcesFooter(
  elapsedMs: number,
  sources: ReadonlySet<string>,
  responseText: string,
): string {
  let footer = `\n\n--- \nTempo de resposta: **${(elapsedMs / 1000).toFixed(2)} segundos**`;

  if (sources.size > 0) {
    const list = [...sources]
      .sort()
      .map((source) => `- ${source}`)
      .join("\n");
    footer += `\n\n**Fontes Recuperadas:**\n${list}`;
  } else if (responseText.includes(NOT_FOUND_ANSWER_MARKER) || responseText.includes(NON_LEGAL_MARKER)) {
    footer += "\n\n**Fontes Recuperadas:** Nenhuma fonte no corpus foi utilizada.";
  } else {
    footer += "\n\n**Fontes Recuperadas:** Nenhuma fonte foi citada (possível erro).";
  }

  return footer;
}
