import { errorMessage } from "@lexsc/core/errors";
import type { RagContext } from "../context";
import { buildExtractionPrompt } from "../prompts";

const UNIQUE_ID_PREFIXES = ["LC_", "LEI_", "DECRETO_"] as const;

const LAW_NUMBER_RE = /(LC|LEI|DECRETO)\s*(?:[^\d]+)?\s*([\d.]+)/i;
const NUMBER_MARKER_RE = /Nº?\s*([\d.]{4,})/i;

/** Accepts `TYPE_NUMBER_YEAR` for LC, LEI and DECRETO; anything else (including NULO) is null. */
export function parseExtractedUniqueId(raw: string): string | null {
  const candidate = raw.trim().toUpperCase();
  if (!UNIQUE_ID_PREFIXES.some((prefix) => candidate.startsWith(prefix))) {
    return null;
  }
  return candidate.split("_").length === 3 ? candidate : null;
}

export async function extractUniqueId(
  ctx: Pick<RagContext, "llm" | "logger">,
  query: string,
): Promise<string | null> {
  try {
    const raw = await ctx.llm.complete([{ role: "user", content: buildExtractionPrompt(query) }], {
      temperature: 0,
    });
    const uniqueId = parseExtractedUniqueId(raw);
    ctx.logger.debug({ raw, uniqueId }, "unique id extraction");
    return uniqueId;
  } catch (error) {
    ctx.logger.warn({ err: errorMessage(error) }, "unique id extraction failed; continuing without identifier");
    return null;
  }
}

function digitsOnly(value: string): string {
  return value.replace(/[^0-9]/g, "");
}

/**
 * Bare law number mentioned in the query, digits only. Tries `LC|LEI|DECRETO`
 * followed by a number first, then a `Nº` marker with at least four digits.
 */
export function extractLawNumberFromQuery(query: string): string | null {
  const typed = LAW_NUMBER_RE.exec(query);
  if (typed) {
    const number = digitsOnly(typed[2]);
    if (number.length > 0) {
      return number;
    }
  }

  const marked = NUMBER_MARKER_RE.exec(query);
  if (marked) {
    const number = digitsOnly(marked[1]);
    if (number.length > 0) {
      return number;
    }
  }

  return null;
}
