import type { PageSnapshot } from "./types";
import { parseTagTree, extractVisibleText } from "./extractor";
import { splitSentences, splitWords } from "./tokenizer";

export interface SnapshotInput {
  url: string;
  statusCode: number;
  html: string;
  headers?: Record<string, string>;
  latencyMs: number;
  robotsTxt?: string | null;
  sitemapPresent?: boolean;
}

function lowerCaseHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name.toLowerCase()] = value;
  }
  return result;
}

export function buildSnapshot(input: SnapshotInput): PageSnapshot {
  const visibleText = extractVisibleText(input.html);

  return Object.freeze({
    url: input.url,
    statusCode: input.statusCode,
    html: input.html,
    tagTree: parseTagTree(input.html),
    headers: Object.freeze(lowerCaseHeaders(input.headers || {})),
    latencyMs: input.latencyMs,
    robotsTxt: input.robotsTxt ?? null,
    sitemapPresent: input.sitemapPresent ?? false,
    visibleText,
    sentences: Object.freeze(splitSentences(visibleText)),
    words: Object.freeze(splitWords(visibleText)),
  });
}
