import { describe, expect, it } from "vitest";
import { buildChunkHeader, chunkLawText } from "../src/chunking";
import { splitSentences } from "../src/sentences";

const FILE_NAME = "lei_teste.html";

describe("chunkLawText", () => {
  const s1 = `Alfa ${"a".repeat(294)}.`;
  const s2 = `Beta ${"b".repeat(294)}.`;
  const s3 = `Gama ${"c".repeat(44)}.`;

  it("merges a short trailing sentence into the last chunk", () => {
    const header = buildChunkHeader(FILE_NAME, 2020);
    const chunks = chunkLawText([s1, s2, s3].join(" "), FILE_NAME, 2020, 400);

    expect(s1).toHaveLength(300);
    expect(s3).toHaveLength(50);
    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toBe(`${header}${s1}`);
    expect(chunks[1]).toBe(`${header}${s2} ${s3}`);
  });

  it("starts every chunk with the provenance header", () => {
    expect(buildChunkHeader(FILE_NAME, 2020)).toBe(
      "LEI JURÍDICA: lei_teste.html (Publicada em 2020). CONTEÚDO: ",
    );
  });

  it("keeps a short text as a single chunk", () => {
    expect(chunkLawText("Esta lei entra em vigor na data de sua publicação.", FILE_NAME, 2019)).toEqual([
      "LEI JURÍDICA: lei_teste.html (Publicada em 2019). CONTEÚDO: Esta lei entra em vigor na data de sua publicação.",
    ]);
  });

  it("returns no chunks for empty text", () => {
    expect(chunkLawText("   ", FILE_NAME, 2019)).toEqual([]);
  });
});

describe("splitSentences", () => {
  it("does not break after article abbreviations", () => {
    expect(splitSentences("Conforme o Art. Quinto da norma. Segunda frase.")).toEqual([
      "Conforme o Art. Quinto da norma.",
      "Segunda frase.",
    ]);
  });

  it("splits plain sentences", () => {
    expect(splitSentences("Primeira frase. Segunda frase! Terceira?")).toEqual([
      "Primeira frase.",
      "Segunda frase!",
      "Terceira?",
    ]);
  });
});
