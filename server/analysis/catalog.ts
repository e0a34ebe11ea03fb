import type {
  CategoryId,
  Finding,
  FindingSeverity,
  MetricKind,
  CountMetric,
  RatioMetric,
  BooleanMetric,
  DurationMetric,
  OrdinalMetric,
} from "../../shared/analysis-types";

interface CatalogEntry {
  category: CategoryId;
  kind: MetricKind;
  label: string;
  scale?: { min: number; max: number };
}

export const CATEGORY_ORDER: readonly CategoryId[] = [
  "seo",
  "readability_heuristics",
  "crawlability",
  "text_readability",
];

export const CATEGORY_NAMES: Record<CategoryId, string> = {
  seo: "SEO",
  readability_heuristics: "Readability heuristics",
  crawlability: "Crawlability",
  text_readability: "Text readability",
};

export function mapCategories<T>(fn: (id: CategoryId) => T): Record<CategoryId, T> {
  return {
    seo: fn("seo"),
    readability_heuristics: fn("readability_heuristics"),
    crawlability: fn("crawlability"),
    text_readability: fn("text_readability"),
  };
}

export const METRIC_CATALOG = {
  title_present: { category: "seo", kind: "boolean", label: "Title present" },
  title_length: { category: "seo", kind: "count", label: "Title length (characters)" },
  meta_description_present: { category: "seo", kind: "boolean", label: "Meta description present" },
  meta_description_length: { category: "seo", kind: "count", label: "Meta description length (characters)" },
  h1_count: { category: "seo", kind: "count", label: "H1 headings" },
  heading_hierarchy_valid: { category: "seo", kind: "boolean", label: "Heading nesting valid" },
  internal_link_count: { category: "seo", kind: "count", label: "Internal links" },
  external_link_count: { category: "seo", kind: "count", label: "External links" },
  internal_link_ratio: { category: "seo", kind: "ratio", label: "Internal link ratio" },
  images_missing_alt: { category: "seo", kind: "count", label: "Images missing alt text" },
  inline_script_count: { category: "seo", kind: "count", label: "Inline scripts" },
  external_script_count: { category: "seo", kind: "count", label: "External scripts" },
  inline_style_count: { category: "seo", kind: "count", label: "Inline styles" },
  external_stylesheet_count: { category: "seo", kind: "count", label: "External stylesheets" },
  viewport_present: { category: "seo", kind: "boolean", label: "Viewport meta tag present" },
  canonical_present: { category: "seo", kind: "boolean", label: "Canonical link present" },
  structured_data_present: { category: "seo", kind: "boolean", label: "JSON-LD structured data present" },
  images_missing_dimensions: { category: "seo", kind: "count", label: "Images without width and height" },
  open_graph_present: { category: "seo", kind: "boolean", label: "OpenGraph tags present" },
  twitter_card_present: { category: "seo", kind: "boolean", label: "Twitter card tags present" },
  top_keyword_density: { category: "seo", kind: "ratio", label: "Top keyword density" },
  url_path_depth: { category: "seo", kind: "count", label: "URL path depth" },
  clean_url: { category: "seo", kind: "boolean", label: "URL without query or fragment" },

  semantic_ratio: { category: "readability_heuristics", kind: "ratio", label: "Semantic element ratio" },
  html_validity_issues: { category: "readability_heuristics", kind: "count", label: "HTML validity issues" },
  heading_order_violations: { category: "readability_heuristics", kind: "count", label: "Heading order violations" },
  content_word_count: { category: "readability_heuristics", kind: "count", label: "Content word count" },

  indexable: { category: "crawlability", kind: "boolean", label: "Indexable per robots.txt" },
  robots_header_indexable: { category: "crawlability", kind: "boolean", label: "Indexable per X-Robots-Tag" },
  meta_robots_indexable: { category: "crawlability", kind: "boolean", label: "Indexable per meta robots" },
  meta_robots_followable: { category: "crawlability", kind: "boolean", label: "Links followable per meta robots" },
  sitemap_present: { category: "crawlability", kind: "boolean", label: "Sitemap present" },
  text_html_ratio: { category: "crawlability", kind: "ratio", label: "Text-to-HTML ratio" },
  load_time: { category: "crawlability", kind: "duration", label: "Load time" },
  llm_bot_directives_present: { category: "crawlability", kind: "boolean", label: "AI crawler directives present" },
  llm_bot_allowed_ratio: { category: "crawlability", kind: "ratio", label: "AI crawlers allowed" },

  flesch_reading_ease: {
    category: "text_readability",
    kind: "ordinal",
    label: "Flesch Reading Ease",
    scale: { min: 0, max: 100 },
  },
  average_sentence_length: {
    category: "text_readability",
    kind: "ordinal",
    label: "Average sentence length (words)",
    scale: { min: 0, max: 60 },
  },
  lexical_complexity: { category: "text_readability", kind: "ratio", label: "Lexical complexity" },
} as const satisfies Record<string, CatalogEntry>;

export type MetricId = keyof typeof METRIC_CATALOG;

type MetricIdOfKind<K extends MetricKind> = {
  [M in MetricId]: (typeof METRIC_CATALOG)[M]["kind"] extends K ? M : never;
}[MetricId];

export function isMetricId(value: string): value is MetricId {
  return Object.prototype.hasOwnProperty.call(METRIC_CATALOG, value);
}

export function countMetric(id: MetricIdOfKind<"count">, value: number): CountMetric<MetricId> {
  const { category, label } = METRIC_CATALOG[id];
  return { id, category, label, kind: "count", value };
}

export function ratioMetric(id: MetricIdOfKind<"ratio">, value: number): RatioMetric<MetricId> {
  const { category, label } = METRIC_CATALOG[id];
  return { id, category, label, kind: "ratio", value };
}

export function booleanMetric(id: MetricIdOfKind<"boolean">, value: boolean): BooleanMetric<MetricId> {
  const { category, label } = METRIC_CATALOG[id];
  return { id, category, label, kind: "boolean", value };
}

export function durationMetric(id: MetricIdOfKind<"duration">, value: number): DurationMetric<MetricId> {
  const { category, label } = METRIC_CATALOG[id];
  return { id, category, label, kind: "duration", value, unit: "ms" };
}

export function ordinalMetric(id: MetricIdOfKind<"ordinal">, value: number): OrdinalMetric<MetricId> {
  const { category, label, scale } = METRIC_CATALOG[id];
  return { id, category, label, kind: "ordinal", value, scale: { ...scale } };
}

export function createFinding(
  severity: FindingSeverity,
  category: CategoryId,
  message: string,
  metric?: MetricId
): Finding {
  return metric ? { severity, category, metric, message } : { severity, category, message };
}
