import * as cheerio from "cheerio";
import type { TagNode, TagTree } from "./types";

const HIDDEN_SELECTORS = ["script", "style", "noscript", "template", "svg", "iframe"];

const BLOCK_SELECTOR = [
  "address",
  "article",
  "aside",
  "blockquote",
  "br",
  "dd",
  "div",
  "dl",
  "dt",
  "figcaption",
  "figure",
  "footer",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hr",
  "li",
  "main",
  "nav",
  "ol",
  "p",
  "pre",
  "section",
  "table",
  "td",
  "th",
  "tr",
  "ul",
].join(", ");

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Parses raw HTML into a flat, frozen list of element nodes in document order.
 * Blank input yields an empty tree instead of the html/head/body shell cheerio
 * would otherwise synthesize.
 */
export function parseTagTree(html: string): TagTree {
  if (!html.trim()) {
    return Object.freeze({ nodes: Object.freeze([]) });
  }

  const $ = cheerio.load(html);
  const nodes: TagNode[] = [];

  $("*").each((_, el) => {
    const $el = $(el);
    const tagName = $el.prop("tagName");
    if (!tagName) return;
    nodes.push(
      Object.freeze({
        name: tagName.toLowerCase(),
        attributes: Object.freeze({ ...($el.attr() || {}) }),
        text: collapseWhitespace($el.text()),
      })
    );
  });

  return Object.freeze({ nodes: Object.freeze(nodes) });
}

export function extractVisibleText(html: string): string {
  if (!html.trim()) return "";

  const $ = cheerio.load(html);
  const $body = $("body").clone();
  HIDDEN_SELECTORS.forEach((sel) => {
    $body.find(sel).remove();
  });
  $body.find(BLOCK_SELECTOR).before(" ").after(" ");

  return collapseWhitespace($body.text());
}
