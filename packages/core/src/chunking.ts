import { splitSentences } from "./sentences";

export const CHUNK_SIZE_LIMIT = 1500;
export const MIN_CHUNK_CONTENT_SIZE = 256;

export function buildChunkHeader(fileName: string, lawYear: number): string {
  return `LEI JURÍDICA: ${fileName} (Publicada em ${lawYear}). CONTEÚDO: `;
}

/**
 * Groups sentences into chunks of at most `maxChunkSize` characters
 * (header included) once the running content passes the minimum size.
 * A short trailing remainder is merged into the previous chunk.
 */
export function chunkLawText(
  text: string,
  fileName: string,
  lawYear: number,
  maxChunkSize: number = CHUNK_SIZE_LIMIT,
): string[] {
  const header = buildChunkHeader(fileName, lawYear);
  const contentLimit = maxChunkSize - header.length;
  const chunks: string[] = [];
  let current = "";

  for (const sentence of splitSentences(text)) {
    const overflows = current.length + sentence.length + 1 > contentLimit;
    if (overflows && current.length > MIN_CHUNK_CONTENT_SIZE) {
      chunks.push(header + current.trim());
      current = sentence;
      continue;
    }

    current += ` ${sentence}`;
  }

  const finalContent = current.trim();
  if (finalContent.length === 0) {
    return chunks;
  }

  if (finalContent.length > MIN_CHUNK_CONTENT_SIZE || chunks.length === 0) {
    chunks.push(header + finalContent);
  } else {
    chunks[chunks.length - 1] += ` ${finalContent}`;
  }

  return chunks;
}
