import type { CategoryId } from "../../shared/analysis-types";
import type { Thresholds } from "./types";
import { ScoringConfigSchema } from "./types";
import { CATEGORY_ORDER, METRIC_CATALOG, isMetricId, type MetricId } from "./catalog";
import { ConfigurationError } from "./errors";
import { DEFAULT_RULES, isRuleCompatible, ruleParameterProblem, type RuleTable } from "./normalizer";

export const WEIGHT_TOLERANCE = 1e-6;

export type MetricWeights = Partial<Record<MetricId, number>>;

export interface ScoringConfig {
  categoryWeights: Record<CategoryId, number>;
  metricWeights: Record<CategoryId, MetricWeights>;
  rules: RuleTable;
  thresholds: Thresholds;
}

export const DEFAULT_CATEGORY_WEIGHTS: Record<CategoryId, number> = {
  seo: 0.25,
  readability_heuristics: 0.25,
  crawlability: 0.25,
  text_readability: 0.25,
};

export const DEFAULT_METRIC_WEIGHTS: Record<CategoryId, MetricWeights> = {
  seo: {
    title_present: 0.08,
    title_length: 0.08,
    meta_description_present: 0.08,
    meta_description_length: 0.08,
    h1_count: 0.13,
    heading_hierarchy_valid: 0.05,
    internal_link_count: 0.04,
    external_link_count: 0,
    internal_link_ratio: 0.04,
    images_missing_alt: 0.08,
    inline_script_count: 0.03,
    external_script_count: 0.02,
    inline_style_count: 0.02,
    external_stylesheet_count: 0.02,
    viewport_present: 0.05,
    canonical_present: 0.03,
    structured_data_present: 0.02,
    images_missing_dimensions: 0.03,
    open_graph_present: 0.03,
    twitter_card_present: 0.02,
    top_keyword_density: 0.03,
    url_path_depth: 0.02,
    clean_url: 0.02,
  },
  readability_heuristics: {
    semantic_ratio: 0.3,
    html_validity_issues: 0.25,
    heading_order_violations: 0.3,
    content_word_count: 0.15,
  },
  crawlability: {
    indexable: 0.2,
    robots_header_indexable: 0.05,
    meta_robots_indexable: 0.1,
    meta_robots_followable: 0.05,
    sitemap_present: 0.15,
    text_html_ratio: 0.15,
    load_time: 0.15,
    llm_bot_directives_present: 0.05,
    llm_bot_allowed_ratio: 0.1,
  },
  text_readability: {
    flesch_reading_ease: 0.4,
    average_sentence_length: 0.3,
    lexical_complexity: 0.3,
  },
};

function sumWeights(weights: Iterable<number | undefined>): number {
  let total = 0;
  for (const weight of weights) total += weight ?? 0;
  return total;
}

function sumsToOne(total: number): boolean {
  return Math.abs(total - 1) <= WEIGHT_TOLERANCE;
}

/**
 * Validates a scoring configuration and merges it over the defaults. Any
 * problem raises ConfigurationError so nothing is analyzed with bad weights.
 */
export function resolveScoringConfig(input: unknown = {}): ScoringConfig {
  const parsed = ScoringConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid scoring configuration",
      parsed.error.errors.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const issues: string[] = [];
  const overrides = parsed.data;

  const categoryWeights: Record<CategoryId, number> = { ...DEFAULT_CATEGORY_WEIGHTS, ...overrides.categoryWeights };
  const categoryTotal = sumWeights(Object.values(categoryWeights));
  if (!sumsToOne(categoryTotal)) {
    issues.push(`category weights sum to ${categoryTotal}, expected 1`);
  }

  const metricWeights: Record<CategoryId, MetricWeights> = { ...DEFAULT_METRIC_WEIGHTS };
  for (const category of CATEGORY_ORDER) {
    const override = overrides.metricWeights[category];
    if (!override) continue;

    const weights: MetricWeights = {};
    for (const [metric, weight] of Object.entries(override)) {
      if (!isMetricId(metric)) {
        issues.push(`metricWeights.${category}: unknown metric "${metric}"`);
      } else if (METRIC_CATALOG[metric].category !== category) {
        issues.push(`metricWeights.${category}: metric "${metric}" belongs to ${METRIC_CATALOG[metric].category}`);
      } else {
        weights[metric] = weight;
      }
    }
    metricWeights[category] = weights;
  }

  for (const category of CATEGORY_ORDER) {
    const total = sumWeights(Object.values(metricWeights[category]));
    if (!sumsToOne(total)) {
      issues.push(`metric weights for ${category} sum to ${total}, expected 1`);
    }
  }

  const rules: RuleTable = { ...DEFAULT_RULES };
  for (const [metric, rule] of Object.entries(overrides.rules)) {
    if (!isMetricId(metric)) {
      issues.push(`rules: unknown metric "${metric}"`);
      continue;
    }
    const kind = METRIC_CATALOG[metric].kind;
    if (!isRuleCompatible(rule, kind)) {
      issues.push(`rules.${metric}: curve "${rule.curve}" cannot score a ${kind} metric`);
      continue;
    }
    const problem = ruleParameterProblem(rule);
    if (problem) {
      issues.push(`rules.${metric}: ${problem}`);
      continue;
    }
    rules[metric] = rule;
  }

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid scoring configuration", issues);
  }

  return {
    categoryWeights,
    metricWeights,
    rules,
    thresholds: overrides.thresholds,
  };
}
