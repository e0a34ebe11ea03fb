import type { MetricKind } from "../../shared/analysis-types";
import type { MetricId } from "./catalog";
import type { Metric, NormalizationRule, Score } from "./types";
import { ConfigurationError } from "./errors";

export type RuleTable = Record<MetricId, NormalizationRule>;

export const DEFAULT_RULES: RuleTable = {
  title_present: { curve: "boolean", expected: true },
  title_length: { curve: "target-range", floor: 0, min: 50, max: 60, ceiling: 120 },
  meta_description_present: { curve: "boolean", expected: true },
  meta_description_length: { curve: "target-range", floor: 0, min: 50, max: 160, ceiling: 320 },
  h1_count: { curve: "target-range", floor: 0, min: 1, max: 1, ceiling: 3 },
  heading_hierarchy_valid: { curve: "boolean", expected: true },
  internal_link_count: { curve: "linear", zero: 0, full: 3 },
  external_link_count: { curve: "linear", zero: 0, full: 1 },
  internal_link_ratio: { curve: "linear", zero: 0, full: 0.5 },
  images_missing_alt: { curve: "penalty", perOccurrence: 10 },
  inline_script_count: { curve: "penalty", perOccurrence: 5 },
  external_script_count: { curve: "penalty", perOccurrence: 2 },
  inline_style_count: { curve: "penalty", perOccurrence: 2 },
  external_stylesheet_count: { curve: "penalty", perOccurrence: 2 },
  viewport_present: { curve: "boolean", expected: true },
  canonical_present: { curve: "boolean", expected: true },
  structured_data_present: { curve: "boolean", expected: true },
  images_missing_dimensions: { curve: "penalty", perOccurrence: 5 },
  open_graph_present: { curve: "boolean", expected: true },
  twitter_card_present: { curve: "boolean", expected: true },
  top_keyword_density: { curve: "target-range", floor: 0, min: 0, max: 0.06, ceiling: 0.2 },
  url_path_depth: { curve: "target-range", floor: 0, min: 0, max: 3, ceiling: 8 },
  clean_url: { curve: "boolean", expected: true },

  semantic_ratio: { curve: "linear", zero: 0, full: 0.5 },
  html_validity_issues: { curve: "penalty", perOccurrence: 10 },
  heading_order_violations: { curve: "penalty", perOccurrence: 25 },
  content_word_count: { curve: "linear", zero: 0, full: 300 },

  indexable: { curve: "boolean", expected: true },
  robots_header_indexable: { curve: "boolean", expected: true },
  meta_robots_indexable: { curve: "boolean", expected: true },
  meta_robots_followable: { curve: "boolean", expected: true },
  sitemap_present: { curve: "boolean", expected: true },
  text_html_ratio: { curve: "target-range", floor: 0, min: 0.25, max: 0.7, ceiling: 1 },
  load_time: { curve: "latency", fast: 2000, slow: 6000 },
  llm_bot_directives_present: { curve: "boolean", expected: true },
  llm_bot_allowed_ratio: { curve: "linear", zero: 0, full: 1 },

  flesch_reading_ease: { curve: "linear", zero: 0, full: 60 },
  average_sentence_length: { curve: "linear", zero: 30, full: 14 },
  lexical_complexity: { curve: "linear", zero: 0.4, full: 0.15 },
};

const COMPATIBLE_KINDS: Record<NormalizationRule["curve"], readonly MetricKind[]> = {
  boolean: ["boolean"],
  "target-range": ["count", "ratio", "duration", "ordinal"],
  linear: ["count", "ratio", "duration", "ordinal"],
  penalty: ["count"],
  latency: ["duration"],
};

export function isRuleCompatible(rule: NormalizationRule, kind: MetricKind): boolean {
  return COMPATIBLE_KINDS[rule.curve].includes(kind);
}

/** Returns a reason the rule's parameters are unusable, or null. */
export function ruleParameterProblem(rule: NormalizationRule): string | null {
  switch (rule.curve) {
    case "target-range":
      return rule.floor <= rule.min && rule.min <= rule.max && rule.max <= rule.ceiling
        ? null
        : "target-range needs floor <= min <= max <= ceiling";
    case "linear":
      return rule.zero !== rule.full ? null : "linear needs zero and full to differ";
    case "latency":
      return rule.slow > rule.fast ? null : "latency needs slow > fast";
    case "boolean":
    case "penalty":
      return null;
  }
}

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

function numericCurve(rule: Exclude<NormalizationRule, { curve: "boolean" }>, value: number): number {
  switch (rule.curve) {
    case "target-range": {
      if (value >= rule.min && value <= rule.max) return 100;
      if (value < rule.min) {
        return value <= rule.floor ? 0 : ((value - rule.floor) / (rule.min - rule.floor)) * 100;
      }
      return value >= rule.ceiling ? 0 : ((rule.ceiling - value) / (rule.ceiling - rule.max)) * 100;
    }
    case "linear":
      return ((value - rule.zero) / (rule.full - rule.zero)) * 100;
    case "penalty":
      return 100 - Math.min(100, Math.max(0, value) * rule.perOccurrence);
    case "latency": {
      if (value <= rule.fast) return 100;
      if (value >= rule.slow) return 0;
      return ((rule.slow - value) / (rule.slow - rule.fast)) * 100;
    }
  }
}

export function applyRule(rule: NormalizationRule, metric: Metric): number {
  if (!isRuleCompatible(rule, metric.kind)) {
    throw new ConfigurationError(`Curve "${rule.curve}" cannot score ${metric.kind} metric "${metric.id}"`);
  }

  if (metric.kind === "boolean") {
    return rule.curve === "boolean" && metric.value === rule.expected ? 100 : 0;
  }
  if (rule.curve === "boolean") return 0;

  return clampScore(numericCurve(rule, metric.value));
}

export function normalizeMetric(metric: Metric, rules: RuleTable): Score {
  const rule = rules[metric.id];
  return {
    metric: metric.id,
    category: metric.category,
    score: roundScore(applyRule(rule, metric)),
    rule: rule.curve,
  };
}

export function normalizeMetrics(metrics: readonly Metric[], rules: RuleTable): Score[] {
  return metrics.map((metric) => normalizeMetric(metric, rules));
}
