import { errorMessage } from "@lexsc/core/errors";
import type { ConversationTurn } from "@lexsc/core/types";
import type { RagContext } from "../context";
import { buildClassificationPrompt } from "../prompts";

export const INTENT_LABELS = ["JURIDICA", "NAO_JURIDICA"] as const;

export type IntentLabel = (typeof INTENT_LABELS)[number];

/** Prefixes the previous user question, when there is one, so follow-ups classify with their topic. */
export function contextualizeQuery(query: string, history: readonly ConversationTurn[]): string {
  const previous = [...history].reverse().find((turn) => turn.role === "user" && turn.content !== query);
  if (!previous) {
    return query;
  }
  return `Com base na pergunta anterior ('${previous.content}'), a nova pergunta é: '${query}'`;
}

export function parseIntentLabel(raw: string): IntentLabel {
  const normalized = raw.trim().toUpperCase();
  return INTENT_LABELS.find((label) => label === normalized) ?? "JURIDICA";
}

/** Fails open: any classifier error or unexpected label counts as JURIDICA. */
export async function classifyIntent(
  ctx: Pick<RagContext, "llm" | "logger">,
  query: string,
  history: readonly ConversationTurn[],
): Promise<IntentLabel> {
  try {
    const raw = await ctx.llm.complete(
      [{ role: "user", content: buildClassificationPrompt(contextualizeQuery(query, history)) }],
      { temperature: 0 },
    );
    return parseIntentLabel(raw);
  } catch (error) {
    ctx.logger.warn({ err: errorMessage(error) }, "intent classification failed; assuming JURIDICA");
    return "JURIDICA";
  }
}
