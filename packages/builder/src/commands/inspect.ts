import { Command } from "commander";
import type { AppServices } from "../services";

export interface InspectReport {
  dimension: number;
  rows: number;
  documents: number;
  sources: number;
  firstChunk: {
    id: string;
    fonte: string;
    ID_UNICO: string;
    preview: string;
  } | null;
}

export async function runInspect(services: AppServices): Promise<InspectReport> {
  const { index, documents } = await services.store.load();
  const records = documents.records();
  const first = records[0];

  const report: InspectReport = {
    dimension: index.dimension,
    rows: index.size,
    documents: documents.size,
    sources: new Set(records.map((record) => record.metadata.fonte)).size,
    firstChunk: first
      ? {
          id: first.id,
          fonte: first.metadata.fonte,
          ID_UNICO: first.metadata.ID_UNICO,
          preview: first.text.slice(0, 100),
        }
      : null,
  };

  services.logger.info(report, "inspect");
  return report;
}

export function registerInspectCommand(
  program: Command,
  getServices: () => Promise<AppServices>,
): void {
  program
    .command("inspect")
    .description("Mostra dimensao, numero de vetores e o primeiro chunk do indice persistido")
    .action(async () => {
      const services = await getServices();
      await runInspect(services);
    });
}
