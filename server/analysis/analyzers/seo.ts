import type { Finding } from "../../../shared/analysis-types";
import type { AnalyzerResult, PageSnapshot, TagTree, Thresholds } from "../types";
import { MalformedInputError } from "../errors";
import { booleanMetric, countMetric, createFinding, ratioMetric } from "../catalog";
import { HEADING_TAGS, attr, findAll, findFirst, hasToken, headingLevel } from "../tag-tree";
import { isHttpUrl, isSameOrigin, normalizeUrl } from "../url-utils";

const NON_NAVIGABLE_HREF = /^(#|mailto:|tel:|javascript:|data:)/i;
const JSON_LD_TYPE = "application/ld+json";

const STOP_WORDS = new Set([
  "the", "be", "to", "of", "and", "a", "in", "that", "have", "i",
  "it", "for", "not", "on", "with", "he", "as", "you", "do", "at",
]);
const TOP_KEYWORD_LIMIT = 10;
// Below this many counted words a single repeated term is not stuffing.
const MIN_WORDS_FOR_DENSITY = 50;

export interface KeywordFrequency {
  keyword: string;
  count: number;
  density: number;
}

export interface KeywordSummary {
  countedWords: number;
  top: KeywordFrequency[];
}

interface LinkInventory {
  internal: number;
  external: number;
}

function metaContent(tree: TagTree, name: string): string | null {
  const node = findFirst(tree, "meta", (n) => attr(n, "name")?.toLowerCase() === name);
  const content = node ? attr(node, "content")?.trim() : undefined;
  return content || null;
}

function hasMetaPrefix(tree: TagTree, prefix: string): boolean {
  return findAll(tree, "meta").some((node) => {
    const key = (attr(node, "property") || attr(node, "name") || "").toLowerCase();
    return key.startsWith(prefix);
  });
}

function urlStructure(url: string): { depth: number; clean: boolean } {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new MalformedInputError(`Page URL cannot be parsed: ${url}`);
  }
  return {
    depth: parsed.pathname.split("/").filter(Boolean).length,
    clean: !parsed.search && !parsed.hash,
  };
}

/**
 * Most frequent words, lower-cased, without stop words or words of two letters
 * or fewer. Density is the share of those counted words; ties keep the order
 * words first appear in.
 */
export function keywordFrequencies(words: readonly string[]): KeywordSummary {
  const counts = new Map<string, number>();
  let total = 0;

  for (const word of words) {
    const keyword = word.toLowerCase();
    if (keyword.length <= 2 || STOP_WORDS.has(keyword)) continue;
    counts.set(keyword, (counts.get(keyword) ?? 0) + 1);
    total++;
  }

  const top = Array.from(counts, ([keyword, count]) => ({ keyword, count, density: count / total }))
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_KEYWORD_LIMIT);

  return { countedWords: total, top };
}

function countLinks(tree: TagTree, pageUrl: string): LinkInventory {
  const inventory: LinkInventory = { internal: 0, external: 0 };

  for (const anchor of findAll(tree, "a")) {
    const href = attr(anchor, "href")?.trim();
    if (!href || NON_NAVIGABLE_HREF.test(href)) continue;

    const resolved = normalizeUrl(href, pageUrl);
    if (!resolved || !isHttpUrl(resolved)) continue;

    if (isSameOrigin(resolved, pageUrl)) {
      inventory.internal++;
    } else {
      inventory.external++;
    }
  }

  return inventory;
}

export function hasSkippedHeadingLevel(levels: number[]): boolean {
  for (let i = 1; i < levels.length; i++) {
    if (levels[i] - levels[i - 1] > 1) return true;
  }
  return false;
}

export function analyzeSeo(snapshot: PageSnapshot, thresholds: Thresholds): AnalyzerResult {
  const tree = snapshot.tagTree;
  if (tree.nodes.length === 0) {
    throw new MalformedInputError("Tag tree is empty; SEO structure cannot be analyzed");
  }

  const findings: Finding[] = [];

  const title = findFirst(tree, "title")?.text || "";
  if (!title) {
    findings.push(createFinding("high", "seo", "Page is missing a title tag.", "title_present"));
  } else if (title.length < thresholds.titleLengthMin || title.length > thresholds.titleLengthMax) {
    findings.push(
      createFinding(
        "low",
        "seo",
        `Title is too ${title.length < thresholds.titleLengthMin ? "short" : "long"} (${title.length} characters, ideal ${thresholds.titleLengthMin}-${thresholds.titleLengthMax}).`,
        "title_length"
      )
    );
  }

  const description = metaContent(tree, "description") || "";
  if (!description) {
    findings.push(createFinding("high", "seo", "Page is missing a meta description.", "meta_description_present"));
  } else if (description.length < thresholds.metaDescriptionMin) {
    findings.push(
      createFinding(
        "med",
        "seo",
        `Meta description is too short (${description.length} characters, minimum ${thresholds.metaDescriptionMin}).`,
        "meta_description_length"
      )
    );
  } else if (description.length > thresholds.metaDescriptionMax) {
    findings.push(
      createFinding(
        "med",
        "seo",
        `Meta description is too long (${description.length} characters, maximum ${thresholds.metaDescriptionMax}).`,
        "meta_description_length"
      )
    );
  }

  const levels = findAll(tree, ...HEADING_TAGS)
    .map(headingLevel)
    .filter((level): level is number => level !== null);
  const h1Count = levels.filter((level) => level === 1).length;

  if (h1Count === 0) {
    findings.push(createFinding("high", "seo", "Page is missing an H1 heading.", "h1_count"));
  } else if (h1Count > 1) {
    findings.push(
      createFinding("med", "seo", `Page has ${h1Count} H1 headings; exactly one is expected.`, "h1_count")
    );
  }

  const hierarchyValid = !hasSkippedHeadingLevel(levels);
  if (!hierarchyValid) {
    findings.push(
      createFinding("low", "seo", "Heading hierarchy skips levels (e.g. H2 followed by H4).", "heading_hierarchy_valid")
    );
  }

  const links = countLinks(tree, snapshot.url);
  const totalLinks = links.internal + links.external;

  const images = findAll(tree, "img");
  const imagesMissingAlt = images.filter((img) => !attr(img, "alt")?.trim()).length;
  if (imagesMissingAlt > 0) {
    findings.push(
      createFinding("med", "seo", `${imagesMissingAlt} images are missing alt text.`, "images_missing_alt")
    );
  }

  const imagesMissingDimensions = images.filter(
    (img) => !attr(img, "width")?.trim() || !attr(img, "height")?.trim()
  ).length;
  if (imagesMissingDimensions > 0) {
    findings.push(
      createFinding(
        "low",
        "seo",
        `${imagesMissingDimensions} images are missing width or height attributes.`,
        "images_missing_dimensions"
      )
    );
  }

  const scripts = findAll(tree, "script");
  const externalScripts = scripts.filter((s) => attr(s, "src")).length;
  const inlineScripts = scripts.filter(
    (s) => !attr(s, "src") && attr(s, "type")?.toLowerCase() !== JSON_LD_TYPE
  ).length;
  if (inlineScripts > thresholds.maxInlineScripts) {
    findings.push(
      createFinding(
        "low",
        "seo",
        `${inlineScripts} inline scripts found; consider moving them to external files.`,
        "inline_script_count"
      )
    );
  }

  const inlineStyles =
    findAll(tree, "style").length + tree.nodes.filter((n) => attr(n, "style") !== undefined).length;
  const externalStylesheets = findAll(tree, "link").filter((l) => hasToken(l, "rel", "stylesheet")).length;

  const viewportPresent = metaContent(tree, "viewport") !== null;
  if (!viewportPresent) {
    findings.push(createFinding("med", "seo", "Page has no viewport meta tag.", "viewport_present"));
  }

  const canonicalPresent = findAll(tree, "link").some(
    (l) => hasToken(l, "rel", "canonical") && Boolean(attr(l, "href")?.trim())
  );
  if (!canonicalPresent) {
    findings.push(createFinding("low", "seo", "Page has no canonical link.", "canonical_present"));
  }

  const structuredDataPresent = scripts.some((s) => attr(s, "type")?.toLowerCase() === JSON_LD_TYPE);

  const openGraphPresent = hasMetaPrefix(tree, "og:");
  if (!openGraphPresent) {
    findings.push(createFinding("low", "seo", "Page has no OpenGraph tags.", "open_graph_present"));
  }

  const twitterCardPresent = hasMetaPrefix(tree, "twitter:");
  if (!twitterCardPresent) {
    findings.push(createFinding("low", "seo", "Page has no Twitter card tags.", "twitter_card_present"));
  }

  const keywords = keywordFrequencies(snapshot.words);
  const topKeyword = keywords.top.length > 0 ? keywords.top[0] : undefined;
  if (
    topKeyword &&
    keywords.countedWords >= MIN_WORDS_FOR_DENSITY &&
    topKeyword.density > thresholds.maxKeywordDensity
  ) {
    findings.push(
      createFinding(
        "med",
        "seo",
        `Keyword "${topKeyword.keyword}" makes up ${(topKeyword.density * 100).toFixed(1)}% of the text (maximum ${(thresholds.maxKeywordDensity * 100).toFixed(1)}%).`,
        "top_keyword_density"
      )
    );
  }

  const url = urlStructure(snapshot.url);
  if (url.depth > thresholds.maxPathDepth) {
    findings.push(
      createFinding(
        "low",
        "seo",
        `URL path is ${url.depth} segments deep (maximum ${thresholds.maxPathDepth}).`,
        "url_path_depth"
      )
    );
  }
  if (!url.clean) {
    findings.push(createFinding("low", "seo", "URL has a query string or fragment.", "clean_url"));
  }

  return {
    metrics: [
      booleanMetric("title_present", title.length > 0),
      countMetric("title_length", title.length),
      booleanMetric("meta_description_present", description.length > 0),
      countMetric("meta_description_length", description.length),
      countMetric("h1_count", h1Count),
      booleanMetric("heading_hierarchy_valid", hierarchyValid),
      countMetric("internal_link_count", links.internal),
      countMetric("external_link_count", links.external),
      ratioMetric("internal_link_ratio", totalLinks > 0 ? links.internal / totalLinks : 0),
      countMetric("images_missing_alt", imagesMissingAlt),
      countMetric("inline_script_count", inlineScripts),
      countMetric("external_script_count", externalScripts),
      countMetric("inline_style_count", inlineStyles),
      countMetric("external_stylesheet_count", externalStylesheets),
      booleanMetric("viewport_present", viewportPresent),
      booleanMetric("canonical_present", canonicalPresent),
      booleanMetric("structured_data_present", structuredDataPresent),
      countMetric("images_missing_dimensions", imagesMissingDimensions),
      booleanMetric("open_graph_present", openGraphPresent),
      booleanMetric("twitter_card_present", twitterCardPresent),
      ratioMetric("top_keyword_density", topKeyword ? topKeyword.density : 0),
      countMetric("url_path_depth", url.depth),
      booleanMetric("clean_url", url.clean),
    ],
    findings,
  };
}
