import { Readable } from "node:stream";
import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import type { ConversationTurn } from "@lexsc/core/types";
import type { RagContext } from "../context";
import { getResponse } from "../orchestrator/responder";
import { resolveContext } from "../retrieval/hybridRetriever";

const conversationTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

const ragContextBodySchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  history: z.array(conversationTurnSchema).default([]),
  k: z.coerce.number().int().min(1).max(50).optional(),
});

const ragChatBodySchema = ragContextBodySchema.omit({ k: true });

export interface ParsedRagContextRequest {
  query: string;
  history: ConversationTurn[];
  k?: number;
}

export interface RagRouteDependencies {
  context: RagContext;
}

export function parseRagContextRequest(input: unknown): ParsedRagContextRequest {
  return ragContextBodySchema.parse(input);
}

function sortedSources(sources: ReadonlySet<string>): string[] {
  return [...sources].sort();
}

/** Source names are file names with accents; the header carries them URI-encoded. */
export function encodeSourcesHeader(sources: ReadonlySet<string>): string {
  return encodeURIComponent(JSON.stringify(sortedSources(sources)));
}

function sendInvalid(reply: FastifyReply, error: unknown): FastifyReply {
  const message = error instanceof z.ZodError ? error.issues.map((issue) => issue.message).join("; ") : String(error);
  return reply.status(400).send({
    error: "Invalid request",
    message,
  });
}

export async function registerRagRoutes(
  app: FastifyInstance,
  dependencies: RagRouteDependencies,
): Promise<void> {
  const ctx = dependencies.context;

  app.post("/rag/context", async (request, reply) => {
    let parsed: ParsedRagContextRequest;
    try {
      parsed = parseRagContextRequest(request.body);
    } catch (error) {
      return sendInvalid(reply, error);
    }

    try {
      const outcome = await resolveContext(ctx, parsed.query, parsed.history, parsed.k ?? ctx.topK);
      if (!outcome.ok) {
        return reply.send({
          context: "",
          sources: [],
          strategy: null,
          reason: outcome.reason,
        });
      }

      return reply.send({
        context: outcome.context,
        sources: sortedSources(outcome.sources),
        strategy: outcome.strategy,
      });
    } catch (error) {
      request.log.error({ err: error }, "rag-context failed");
      return reply.status(500).send({
        error: "RAG_CONTEXT_ERROR",
      });
    }
  });

  app.post("/rag/chat", async (request, reply) => {
    let parsed: { query: string; history: ConversationTurn[] };
    try {
      parsed = ragChatBodySchema.parse(request.body);
    } catch (error) {
      return sendInvalid(reply, error);
    }

    try {
      const response = await getResponse(ctx, parsed.query, parsed.history);
      const sources = response.kind === "refusal" ? new Set<string>() : response.sources;

      reply
        .header("content-type", "text/plain; charset=utf-8")
        .header("x-rag-kind", response.kind)
        .header("x-rag-sources", encodeSourcesHeader(sources));

      if (response.kind === "stream") {
        return reply.send(Readable.from(response.fragments));
      }
      return reply.send(response.text);
    } catch (error) {
      request.log.error({ err: error }, "rag-chat failed");
      return reply.status(500).send({
        error: "RAG_CHAT_ERROR",
      });
    }
  });
}
