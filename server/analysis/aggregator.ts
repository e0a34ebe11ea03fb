import type {
  CategoryId,
  CategoryReport,
  Finding,
  FindingSeverity,
} from "../../shared/analysis-types";
import type { MetricId } from "./catalog";
import type { Metric, Report, Score } from "./types";
import { CATEGORY_NAMES, CATEGORY_ORDER } from "./catalog";
import { clampScore, roundScore } from "./normalizer";
import type { MetricWeights } from "./scoring-config";

export type CategoryOutcome =
  | { status: "computed" }
  | { status: "unavailable"; reason: string };

export interface AggregateInput {
  url: string;
  statusCode: number;
  metrics: readonly Metric[];
  scores: readonly Score[];
  findings: readonly Finding[];
  outcomes: Record<CategoryId, CategoryOutcome>;
  categoryWeights: Record<CategoryId, number>;
  metricWeights: Record<CategoryId, MetricWeights>;
}

const SEVERITY_ORDER: Record<FindingSeverity, number> = { high: 0, med: 1, low: 2 };

/**
 * Weighted mean of the scores present, so a category whose weight vector sums
 * to 1 yields a plain weighted sum. Returns 0 when no weighted score exists.
 */
export function categoryScore(scores: readonly Score[], weights: MetricWeights): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const score of scores) {
    const weight = weights[score.metric] ?? 0;
    weighted += weight * score.score;
    totalWeight += weight;
  }
  if (totalWeight === 0) return 0;
  return roundScore(clampScore(weighted / totalWeight));
}

export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
}

function freezeMetric(metric: Metric): Metric {
  if (metric.kind === "ordinal") {
    return Object.freeze({ ...metric, scale: Object.freeze({ ...metric.scale }) });
  }
  return Object.freeze({ ...metric });
}

/**
 * Builds the report from frozen copies of its inputs. Score objects are shared
 * between `scores` and each category's `scores`, which is safe once frozen.
 */
export function aggregate(input: AggregateInput): Report {
  const computedWeight = CATEGORY_ORDER.reduce(
    (sum, id) => (input.outcomes[id].status === "computed" ? sum + input.categoryWeights[id] : sum),
    0
  );

  const allScores = Object.freeze(input.scores.map((score) => Object.freeze({ ...score })));

  let composite = 0;
  const categories = CATEGORY_ORDER.map((id): CategoryReport<MetricId> => {
    const outcome = input.outcomes[id];
    const weight = input.categoryWeights[id];

    if (outcome.status === "unavailable") {
      return Object.freeze({
        id,
        name: CATEGORY_NAMES[id],
        status: "unavailable",
        reason: outcome.reason,
        weight,
        effectiveWeight: 0,
      });
    }

    const scores = Object.freeze(allScores.filter((score) => score.category === id));
    const score = categoryScore(scores, input.metricWeights[id]);
    const effectiveWeight = computedWeight > 0 ? weight / computedWeight : 0;
    composite += effectiveWeight * score;

    return Object.freeze({
      id,
      name: CATEGORY_NAMES[id],
      status: "computed",
      score,
      weight,
      effectiveWeight: roundScore(effectiveWeight * 100) / 100,
      scores,
    });
  });

  return Object.freeze({
    url: input.url,
    statusCode: input.statusCode,
    compositeScore: computedWeight > 0 ? roundScore(clampScore(composite)) : null,
    categories: Object.freeze(categories),
    metrics: Object.freeze(input.metrics.map(freezeMetric)),
    scores: allScores,
    findings: Object.freeze(sortFindings(input.findings).map((finding) => Object.freeze({ ...finding }))),
  });
}
