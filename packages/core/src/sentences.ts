const SENTENCE_LOCALE = "pt-BR";

// Abreviaturas comuns em textos normativos que nao encerram frase.
const NON_TERMINAL_ABBREVIATIONS = new Set([
  "art",
  "arts",
  "inc",
  "incs",
  "al",
  "n",
  "nº",
  "n°",
  "dr",
  "dra",
  "sr",
  "sra",
  "prof",
  "p",
  "pág",
  "fl",
  "fls",
  "cap",
  "ltda",
]);

const segmenter = new Intl.Segmenter(SENTENCE_LOCALE, { granularity: "sentence" });

function endsWithAbbreviation(sentence: string): boolean {
  const match = /(?:^|[\s(])([\p{L}º°]+)\.$/u.exec(sentence);
  if (!match) {
    return false;
  }
  return NON_TERMINAL_ABBREVIATIONS.has(match[1].toLowerCase());
}

export function splitSentences(text: string): string[] {
  const sentences: string[] = [];

  for (const { segment } of segmenter.segment(text)) {
    const sentence = segment.trim();
    if (sentence.length === 0) {
      continue;
    }

    const previous = sentences[sentences.length - 1];
    if (previous !== undefined && endsWithAbbreviation(previous)) {
      sentences[sentences.length - 1] = `${previous} ${sentence}`;
      continue;
    }

    sentences.push(sentence);
  }

  return sentences;
}
