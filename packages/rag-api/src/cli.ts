import "dotenv/config";
import { Command } from "commander";
import { runChat } from "./chat";
import { loadApiConfigFromEnv } from "./config";
import { createRuntimeContext, startServer } from "./server";

export interface CliOptions {
  verbose: boolean;
}

export interface CliActions {
  serve(options: CliOptions): Promise<void>;
  chat(options: CliOptions): Promise<void>;
}

const defaultActions: CliActions = {
  serve: async ({ verbose }) => {
    await startServer({ verbose });
  },
  chat: async ({ verbose }) => {
    const context = await createRuntimeContext(loadApiConfigFromEnv(), { verbose, logToStderr: true });
    await runChat(context, { input: process.stdin, output: process.stdout });
  },
};

export function buildProgram(actions: CliActions = defaultActions): Command {
  const program = new Command();

  program
    .name("lexsc-rag")
    .description("Assistente juridico sobre as leis de Santa Catarina")
    .option("-v, --verbose", "Ativa logs debug");

  const cliOptions = (): CliOptions => ({ verbose: program.opts<{ verbose?: boolean }>().verbose ?? false });

  program
    .command("serve")
    .description("Inicia a API HTTP")
    .action(async () => {
      await actions.serve(cliOptions());
    });

  program
    .command("chat")
    .description("Conversa no terminal")
    .action(async () => {
      await actions.chat(cliOptions());
    });

  return program;
}

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((error) => {
    const message = error instanceof Error ? error.stack ?? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  });
}
