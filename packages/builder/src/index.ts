import "dotenv/config";
import { Command } from "commander";
import { loadConfig } from "@lexsc/core/config";
import { createEmbedderFromEnv } from "@lexsc/core/embeddings/index";
import { createLogger } from "@lexsc/core/logger";
import { CorpusStore } from "@lexsc/core/storage/corpusStore";
import { registerIngestCommand } from "./commands/ingest";
import { registerInspectCommand } from "./commands/inspect";
import type { AppServices } from "./services";

async function main(): Promise<void> {
  const verbose = process.argv.includes("--verbose") || process.argv.includes("-v");
  const dryRun = process.argv.includes("--dry-run");

  const logger = createLogger(verbose);
  const config = loadConfig();
  let services: AppServices | null = null;

  async function getServices(): Promise<AppServices> {
    if (services) {
      return services;
    }

    services = {
      config,
      logger,
      embedder: createEmbedderFromEnv(),
      store: new CorpusStore(config.dataDir),
      dryRun,
    };
    return services;
  }

  const program = new Command();

  program
    .name("lexsc-builder")
    .description("CLI de ingestao do corpus de leis de Santa Catarina")
    .option("--dry-run", "Lista arquivos e chunks sem apagar, gravar ou gerar embeddings")
    .option("-v, --verbose", "Ativa logs debug");

  registerIngestCommand(program, getServices);
  registerInspectCommand(program, getServices);

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
