import type { LawIdentifier, LawType } from "./types";

export interface NormalizedLawId {
  id: string;
  year: number;
  identifier: LawIdentifier;
}

export const DEFAULT_LAW_NUMBER = "0000";

const LC_MARKER_RE = /lc\s*nº?/;
const NUMBER_RE = /(nº|n°|no|numero)?\s*([\d.]*\d[\d.]*)/;
const YEAR_RE = /19\d{2}|20\d{2}/g;
const ARTICLE_MARKER_RE = /Art\.\s*\d+º?|§\s*\d+º?|Parágrafo\s*único|Caput/iu;

function classifyLawType(nameLower: string): LawType {
  if (nameLower.includes("complementar") || LC_MARKER_RE.test(nameLower)) {
    return "LC";
  }
  if (nameLower.includes("decreto")) {
    return "DECRETO";
  }
  if (
    nameLower.includes("lei") ||
    nameLower.includes("promulgada") ||
    nameLower.includes("ordinária")
  ) {
    return "LEI";
  }
  return "DOC";
}

function extractLawNumber(nameLower: string): string {
  const match = NUMBER_RE.exec(nameLower);
  return match ? match[2].replace(/\D/g, "") : DEFAULT_LAW_NUMBER;
}

function extractLawYear(nameLower: string): number {
  const years = nameLower.match(YEAR_RE) ?? [];
  if (years.length === 0) {
    return 0;
  }
  // Texto consolidado: o ano mais recente prevalece.
  return Math.max(...years.map((year) => Number.parseInt(year, 10)));
}

export function formatLawId(identifier: LawIdentifier): string {
  return `${identifier.type}_${identifier.number}_${identifier.year}`;
}

export function normalizeLawId(fileName: string): NormalizedLawId {
  const nameLower = fileName.toLowerCase();
  const identifier: LawIdentifier = {
    type: classifyLawType(nameLower),
    number: extractLawNumber(nameLower),
    year: extractLawYear(nameLower),
  };

  return {
    id: formatLawId(identifier),
    year: identifier.year,
    identifier,
  };
}

function normalizeArticleToken(token: string): string {
  return token
    .replace(/ /g, "_")
    .replace(/\./g, "")
    .replace(/º/g, "")
    .toUpperCase()
    .replace(/[^\p{L}\p{N}_]/gu, "");
}

/**
 * Refines a law id with the first article/paragraph marker of the chunk,
 * e.g. LC_715_2018 + "Art. 4º" -> LC_715_2018_ART_4.
 */
export function extractArticleId(chunkText: string, baseId: string): string {
  const match = ARTICLE_MARKER_RE.exec(chunkText);
  if (!match) {
    return baseId;
  }

  return `${baseId}_${normalizeArticleToken(match[0])}`;
}
