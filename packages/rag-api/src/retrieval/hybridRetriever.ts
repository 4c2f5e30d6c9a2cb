import path from "node:path";
import { errorMessage } from "@lexsc/core/errors";
import type { ConversationTurn, IndexedChunkRecord } from "@lexsc/core/types";
import { sleep, withRetry } from "@lexsc/core/utils/retry";
import type { VectorSearchHit } from "@lexsc/core/vector/flatIndex";
import type { RagContext } from "../context";
import { buildFocusPrefix } from "../prompts";
import { extractLawNumberFromQuery, extractUniqueId } from "./identifiers";
import { rewriteQuery } from "./queryRewrite";

export const CONTEXT_SEPARATOR = "\n\n---\n\n";
const UNKNOWN_SOURCE = "Fonte Desconhecida";

export type SearchKey =
  | { kind: "exact"; value: string }
  | { kind: "fuzzy"; value: string };

export type RetrievalStrategy = "forced_exact" | "forced_fuzzy" | "vector";

export type EmptyContextReason = "index_not_ready" | "embedding_failed" | "search_failed" | "no_hits";

export type ContextOutcome =
  | {
      ok: true;
      context: string;
      sources: Set<string>;
      strategy: RetrievalStrategy;
      searchKey: SearchKey | null;
    }
  | {
      ok: false;
      reason: EmptyContextReason;
      error?: unknown;
    };

export interface RetrievedContext {
  context: string;
  sources: Set<string>;
}

export function sourceName(record: IndexedChunkRecord): string {
  const fonte = record.metadata.fonte;
  return fonte ? path.basename(fonte) : UNKNOWN_SOURCE;
}

/**
 * Exact keys match only an identical `ID_UNICO`; article-level ids
 * (`LC_715_2018_ART_4`) do not match `LC_715_2018`. Fuzzy keys are bare
 * numbers matched as substrings, so `715` also matches `LC_17150_2019`.
 */
export function matchesSearchKey(uniqueId: string, key: SearchKey): boolean {
  if (key.kind === "exact") {
    return uniqueId === key.value;
  }
  return uniqueId.includes(key.value);
}

export async function resolveSearchKey(
  ctx: Pick<RagContext, "llm" | "logger">,
  query: string,
): Promise<SearchKey | null> {
  const uniqueId = await extractUniqueId(ctx, query);
  if (uniqueId) {
    return { kind: "exact", value: uniqueId };
  }

  const lawNumber = extractLawNumberFromQuery(query);
  return lawNumber ? { kind: "fuzzy", value: lawNumber } : null;
}

function forcedLookup(
  records: readonly IndexedChunkRecord[],
  key: SearchKey,
): (RetrievedContext & { matched: number }) | null {
  const parts: string[] = [];
  const sources = new Set<string>();

  for (const record of records) {
    if (!matchesSearchKey(record.metadata.ID_UNICO, key)) {
      continue;
    }
    const source = sourceName(record);
    sources.add(source);
    parts.push(`[Contexto Forçado (${source})]: ${record.text.trim()}`);
  }

  return parts.length > 0 ? { context: parts.join(CONTEXT_SEPARATOR), sources, matched: parts.length } : null;
}

/**
 * Identifier lookup over the document map first; vector search over a
 * rewritten query only when no identifier was found or nothing matched it.
 */
export async function resolveContext(
  ctx: RagContext,
  query: string,
  history: readonly ConversationTurn[],
  k: number = ctx.topK,
): Promise<ContextOutcome> {
  const { index, documents } = ctx;
  if (!index || !documents) {
    return { ok: false, reason: "index_not_ready" };
  }

  const searchKey = await resolveSearchKey(ctx, query);

  if (searchKey) {
    const forced = forcedLookup(documents.records(), searchKey);
    if (forced) {
      ctx.logger.info(
        { searchKey, chunks: forced.matched, sources: forced.sources.size },
        "forced lookup matched; skipping vector search",
      );
      return {
        ok: true,
        context: forced.context,
        sources: forced.sources,
        strategy: searchKey.kind === "exact" ? "forced_exact" : "forced_fuzzy",
        searchKey,
      };
    }
    ctx.logger.info({ searchKey }, "forced lookup matched nothing; falling back to vector search");
  }

  const rewritten = await rewriteQuery(ctx, query, history);
  const finalQuery = searchKey ? buildFocusPrefix(searchKey.value) + rewritten : rewritten;

  let vector: number[];
  try {
    vector = await ctx.embedder.embed(finalQuery);
  } catch (error) {
    ctx.logger.error({ err: errorMessage(error) }, "query embedding failed");
    return { ok: false, reason: "embedding_failed", error };
  }

  let hits: VectorSearchHit[];
  try {
    hits = await withRetry(async () => index.search(vector, k), {
      policy: ctx.searchRetry,
      label: "vector search",
      logger: ctx.logger,
      sleep: ctx.sleep ?? sleep,
    });
  } catch (error) {
    ctx.logger.error({ err: errorMessage(error) }, "vector search failed after retries");
    return { ok: false, reason: "search_failed", error };
  }

  const parts: string[] = [];
  const sources = new Set<string>();

  for (const [position, hit] of hits.entries()) {
    const record = documents.atRow(hit.row);
    if (!record) {
      continue;
    }
    const source = sourceName(record);
    sources.add(source);
    parts.push(`[Contexto ${position + 1} (${source})]: ${record.text.trim()}`);
  }

  if (parts.length === 0) {
    return { ok: false, reason: "no_hits" };
  }

  ctx.logger.debug({ finalQuery, hits: hits.length, sources: sources.size }, "vector search completed");

  return {
    ok: true,
    context: parts.join(CONTEXT_SEPARATOR),
    sources,
    strategy: "vector",
    searchKey,
  };
}

/** Flattened form of {@link resolveContext}: every empty outcome becomes `("", ∅)`. */
export async function getContext(
  ctx: RagContext,
  query: string,
  history: readonly ConversationTurn[],
  k: number = ctx.topK,
): Promise<RetrievedContext> {
  const outcome = await resolveContext(ctx, query, history, k);
  if (!outcome.ok) {
    return { context: "", sources: new Set() };
  }
  return { context: outcome.context, sources: outcome.sources };
}
