import { errorMessage } from "@lexsc/core/errors";
import type { ConversationTurn } from "@lexsc/core/types";
import type { RagContext } from "../context";
import { buildRewritePrompt } from "../prompts";

export const REWRITE_HISTORY_TURNS = 4;

export function formatRewriteHistory(history: readonly ConversationTurn[]): string {
  return history
    .slice(-REWRITE_HISTORY_TURNS)
    .map((turn) => `[${turn.role}]: ${turn.content}`)
    .join("\n");
}

/**
 * Turns a follow-up question into a self-contained search phrase using the
 * last prior turns. Falls back to the original query on any failure.
 */
export async function rewriteQuery(
  ctx: Pick<RagContext, "llm" | "logger">,
  query: string,
  history: readonly ConversationTurn[],
): Promise<string> {
  try {
    const rewritten = await ctx.llm.complete(
      [{ role: "user", content: buildRewritePrompt(formatRewriteHistory(history), query) }],
      { temperature: 0 },
    );
    const singleLine = rewritten.trim().replace(/\n/g, " ");
    ctx.logger.debug({ query, rewritten: singleLine }, "query rewritten");
    return singleLine.length > 0 ? singleLine : query;
  } catch (error) {
    ctx.logger.warn({ err: errorMessage(error) }, "query rewrite failed; using original query");
    return query;
  }
}
