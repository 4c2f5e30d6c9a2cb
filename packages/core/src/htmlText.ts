import * as cheerio from "cheerio";
import { isTag, isText, type AnyNode } from "domhandler";

export type HtmlExtractionOutcome =
  | { ok: true; text: string }
  | { ok: false; reason: "no_body" }
  | { ok: false; reason: "parse_error"; error: unknown };

const NON_CONTENT_SELECTOR = "script, style, header, footer, nav";
// Texto tachado = redacao revogada.
const REVOKED_SELECTOR = "del, strike, s";
const TEXT_BLOCK_SELECTOR = "p, div, h1, h2, h3, h4, h5, h6";

function collectTextParts(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const value = node.data.trim();
    if (value.length > 0) {
      parts.push(value);
    }
    return;
  }

  if (isTag(node)) {
    for (const child of node.children) {
      collectTextParts(child, parts);
    }
  }
}

function blockText(node: AnyNode): string {
  const parts: string[] = [];
  collectTextParts(node, parts);
  return parts.join(" ");
}

export function extractHtmlText(html: string): HtmlExtractionOutcome {
  try {
    const $ = cheerio.load(html);

    $(NON_CONTENT_SELECTOR).remove();
    $(REVOKED_SELECTOR).remove();

    let container = $("main").first();
    if (container.length === 0) {
      container = $("body").first();
    }
    if (container.length === 0) {
      return { ok: false, reason: "no_body" };
    }

    const blocks = container
      .find(TEXT_BLOCK_SELECTOR)
      .toArray()
      .map((element) => blockText(element));

    const text = blocks.join(" ").replace(/\s+/g, " ").trim();
    return { ok: true, text };
  } catch (error) {
    return { ok: false, reason: "parse_error", error };
  }
}

export function extractPlainTextFromHtml(html: string): string {
  const outcome = extractHtmlText(html);
  return outcome.ok ? outcome.text : "";
}
