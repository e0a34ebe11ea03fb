import type { Finding } from "../../../shared/analysis-types";
import type { AnalyzerResult, PageSnapshot, Thresholds } from "../types";
import { MalformedInputError } from "../errors";
import { countMetric, createFinding, ratioMetric } from "../catalog";
import { HEADING_TAGS, findAll, headingLevel } from "../tag-tree";

export const SEMANTIC_TAGS = ["header", "nav", "main", "article", "section", "footer"];

const VOID_ELEMENTS = new Set([
  "area", "base", "br", "col", "embed", "hr", "img", "input",
  "link", "meta", "param", "source", "track", "wbr",
]);

// End tags the HTML parser infers on its own.
const OPTIONAL_END_TAGS = new Set([
  "html", "head", "body", "p", "li", "dt", "dd", "option", "optgroup",
  "tr", "td", "th", "thead", "tbody", "tfoot", "colgroup", "caption",
  "rb", "rt", "rtc", "rp",
]);

const RAW_TEXT_ELEMENTS = new Set(["script", "style", "textarea", "title"]);

const TAG_PATTERN = /<!--[\s\S]*?-->|<![^>]*>|<\?[^>]*>|<(\/?)([a-zA-Z][\w:-]*)([^>]*)>/g;
const ID_ATTRIBUTE = /\sid\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/i;

export interface HtmlValidityReport {
  unclosedTags: number;
  strayEndTags: number;
  duplicateIds: number;
}

export interface HeadingOrderResult {
  violations: number;
  offending: string[];
}

/**
 * Counts structural problems in raw HTML: elements left open that need an end
 * tag, end tags with no matching open element, and repeated `id` values.
 */
export function scanHtmlValidity(html: string): HtmlValidityReport {
  const lower = html.toLowerCase();
  const stack: string[] = [];
  const idCounts = new Map<string, number>();
  let unclosedTags = 0;
  let strayEndTags = 0;

  const pattern = new RegExp(TAG_PATTERN.source, "g");
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(html)) !== null) {
    const [, slash, rawName, rest] = match;
    if (!rawName) continue;

    const name = rawName.toLowerCase();

    if (slash) {
      if (VOID_ELEMENTS.has(name)) continue;
      const openIndex = stack.lastIndexOf(name);
      if (openIndex === -1) {
        strayEndTags++;
        continue;
      }
      unclosedTags += stack.slice(openIndex + 1).filter((open) => !OPTIONAL_END_TAGS.has(open)).length;
      stack.length = openIndex;
      continue;
    }

    const idMatch = rest.match(ID_ATTRIBUTE);
    if (idMatch) {
      const id = idMatch[1] ?? idMatch[2] ?? idMatch[3];
      idCounts.set(id, (idCounts.get(id) || 0) + 1);
    }

    if (VOID_ELEMENTS.has(name) || rest.trimEnd().endsWith("/")) continue;

    if (RAW_TEXT_ELEMENTS.has(name)) {
      const closeIndex = lower.indexOf(`</${name}`, pattern.lastIndex);
      if (closeIndex === -1) {
        unclosedTags++;
        break;
      }
      const closeEnd = lower.indexOf(">", closeIndex);
      pattern.lastIndex = closeEnd === -1 ? html.length : closeEnd + 1;
      continue;
    }

    stack.push(name);
  }

  unclosedTags += stack.filter((open) => !OPTIONAL_END_TAGS.has(open)).length;

  let duplicateIds = 0;
  for (const count of idCounts.values()) {
    if (count > 1) duplicateIds += count - 1;
  }

  return { unclosedTags, strayEndTags, duplicateIds };
}

/**
 * Walks headings in document order starting from level 0. A heading deeper
 * than one level below the previous heading is a violation; going back up or
 * staying level never is.
 */
export function checkHeadingOrder(headings: { level: number; text: string }[]): HeadingOrderResult {
  let currentLevel = 0;
  const offending: string[] = [];

  for (const heading of headings) {
    if (heading.level > currentLevel + 1) {
      offending.push(heading.text);
    }
    currentLevel = heading.level;
  }

  return { violations: offending.length, offending };
}

function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

export function analyzeHeuristics(snapshot: PageSnapshot, thresholds: Thresholds): AnalyzerResult {
  const tree = snapshot.tagTree;
  if (tree.nodes.length === 0) {
    throw new MalformedInputError("Tag tree is empty; structural heuristics cannot be evaluated");
  }

  const findings: Finding[] = [];

  const semanticCount = findAll(tree, ...SEMANTIC_TAGS).length;
  const divCount = findAll(tree, "div").length;
  const sectioningTotal = semanticCount + divCount;
  const semanticRatio = sectioningTotal > 0 ? semanticCount / sectioningTotal : 0;

  if (semanticRatio < thresholds.semanticRatioMin) {
    findings.push(
      createFinding(
        "med",
        "readability_heuristics",
        `Only ${formatPercent(semanticRatio)} of sectioning elements are semantic (${semanticCount} semantic, ${divCount} div).`,
        "semantic_ratio"
      )
    );
  }

  const validity = scanHtmlValidity(snapshot.html);
  const validityIssues = validity.unclosedTags + validity.strayEndTags + validity.duplicateIds;
  if (validityIssues > 0) {
    findings.push(
      createFinding(
        "med",
        "readability_heuristics",
        `${validityIssues} HTML validity issues (${validity.unclosedTags} unclosed tags, ${validity.strayEndTags} stray end tags, ${validity.duplicateIds} duplicate ids).`,
        "html_validity_issues"
      )
    );
  }

  const headings = findAll(tree, ...HEADING_TAGS).flatMap((node) => {
    const level = headingLevel(node);
    return level === null ? [] : [{ level, text: node.text }];
  });
  const order = checkHeadingOrder(headings);
  if (order.violations > 0) {
    findings.push(
      createFinding(
        "med",
        "readability_heuristics",
        `Heading order skips levels at: ${order.offending.map((text) => `"${text}"`).join(", ")}.`,
        "heading_order_violations"
      )
    );
  }

  const wordCount = snapshot.words.length;
  if (wordCount < thresholds.minContentWords) {
    findings.push(
      createFinding(
        "med",
        "readability_heuristics",
        `Only ${wordCount} words of visible content (minimum ${thresholds.minContentWords}).`,
        "content_word_count"
      )
    );
  }

  return {
    metrics: [
      ratioMetric("semantic_ratio", semanticRatio),
      countMetric("html_validity_issues", validityIssues),
      countMetric("heading_order_violations", order.violations),
      countMetric("content_word_count", wordCount),
    ],
    findings,
  };
}
