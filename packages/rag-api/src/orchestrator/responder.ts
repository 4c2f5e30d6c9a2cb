import type { Logger } from "pino";
import { errorMessage } from "@lexsc/core/errors";
import type { ConversationTurn } from "@lexsc/core/types";
import type { RagContext } from "../context";
import {
  REFUSAL_TEXT,
  RETRIEVAL_ERROR_TEXT,
  SYSTEM_INSTRUCTION,
  buildRagPrompt,
  generationErrorText,
} from "../prompts";
import { resolveContext } from "../retrieval/hybridRetriever";
import { classifyIntent } from "./intent";

export type RagResponse =
  | { kind: "refusal"; text: string }
  | { kind: "error"; text: string; sources: Set<string> }
  | { kind: "stream"; fragments: AsyncIterable<string>; sources: Set<string> };

/**
 * Re-yields generation fragments; a failure while reading ends the stream
 * with the generation error text instead of throwing at the consumer.
 */
export async function* guardFragments(fragments: AsyncIterable<string>, logger: Logger): AsyncGenerator<string> {
  try {
    for await (const fragment of fragments) {
      yield fragment;
    }
  } catch (error) {
    logger.error({ err: errorMessage(error) }, "generation stream interrupted");
    yield `\n\n${generationErrorText(errorMessage(error))}`;
  }
}

/**
 * One query through intent check, retrieval and generation. `history` holds
 * the turns before `query`.
 */
export async function getResponse(
  ctx: RagContext,
  query: string,
  history: readonly ConversationTurn[],
): Promise<RagResponse> {
  const intent = await classifyIntent(ctx, query, history);
  if (intent === "NAO_JURIDICA") {
    ctx.logger.info({ intent }, "query refused as non-legal");
    return { kind: "refusal", text: REFUSAL_TEXT };
  }

  const outcome = await resolveContext(ctx, query, history);
  if (!outcome.ok) {
    ctx.logger.warn({ reason: outcome.reason }, "retrieval returned no context");
    return { kind: "error", text: RETRIEVAL_ERROR_TEXT, sources: new Set() };
  }

  try {
    const fragments = await ctx.llm.stream(
      [
        { role: "system", content: SYSTEM_INSTRUCTION },
        { role: "user", content: buildRagPrompt(outcome.context, query) },
      ],
      { temperature: ctx.generationTemperature },
    );
    return { kind: "stream", fragments: guardFragments(fragments, ctx.logger), sources: outcome.sources };
  } catch (error) {
    ctx.logger.error({ err: errorMessage(error) }, "generation failed");
    return { kind: "error", text: generationErrorText(errorMessage(error)), sources: outcome.sources };
  }
}
