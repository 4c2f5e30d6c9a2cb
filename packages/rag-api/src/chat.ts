import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { RagContext } from "./context";
import { ConversationSession, renderSourcesFooter } from "./conversation";
import { getResponse, type RagResponse } from "./orchestrator/responder";

export const RESET_COMMAND = "/limpar";
export const EXIT_COMMAND = "/sair";

export interface ChatIo {
  input: Readable;
  output: Writable;
  now?: () => number;
}

async function writeResponse(response: RagResponse, output: Writable): Promise<string> {
  if (response.kind !== "stream") {
    output.write(response.text);
    return response.text;
  }

  let text = "";
  for await (const fragment of response.fragments) {
    output.write(fragment);
    text += fragment;
  }
  return text;
}

/**
 * Terminal conversation: one question per line, answers streamed to
 * `output` followed by the timing and sources footer.
 */
export async function runChat(ctx: RagContext, io: ChatIo, session = new ConversationSession()): Promise<ConversationSession> {
  const now = io.now ?? Date.now;
  const rl = readline.createInterface({ input: io.input, output: io.output, terminal: false });

  io.output.write(`${session.turns()[0]?.content ?? ""}\n`);
  io.output.write(`(${RESET_COMMAND} limpa o historico, ${EXIT_COMMAND} encerra)\n> `);

  for await (const line of rl) {
    const query = line.trim();

    if (query === EXIT_COMMAND) {
      break;
    }
    if (query === RESET_COMMAND) {
      session.reset();
      io.output.write(`${session.turns()[0]?.content ?? ""}\n> `);
      continue;
    }
    if (query.length === 0) {
      io.output.write("> ");
      continue;
    }

    session.append("user", query);
    const startedAt = now();
    const response = await getResponse(ctx, query, session.priorTurns());
    const text = await writeResponse(response, io.output);
    const footer = renderSourcesFooter(
      now() - startedAt,
      response.kind === "refusal" ? new Set<string>() : response.sources,
      text,
    );

    io.output.write(`${footer}\n> `);
    session.append("assistant", text + footer);
  }

  rl.close();
  return session;
}
