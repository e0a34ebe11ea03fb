import type { CategoryId, Finding } from "../../shared/analysis-types";
import type { Analyzer, AnalyzerResult, Metric, PageSnapshot, Report } from "./types";
import { CATEGORY_NAMES, CATEGORY_ORDER, createFinding, mapCategories } from "./catalog";
import { errorMessage } from "./errors";
import { normalizeMetrics } from "./normalizer";
import { aggregate, type CategoryOutcome } from "./aggregator";
import { resolveScoringConfig, type ScoringConfig } from "./scoring-config";
import { analyzeSeo } from "./analyzers/seo";
import { analyzeHeuristics } from "./analyzers/heuristics";
import { analyzeCrawlability } from "./analyzers/crawlability";
import { analyzeTextReadability } from "./analyzers/text-readability";

export const ANALYZERS: Record<CategoryId, Analyzer> = {
  seo: analyzeSeo,
  readability_heuristics: analyzeHeuristics,
  crawlability: analyzeCrawlability,
  text_readability: analyzeTextReadability,
};

type AnalyzerRun =
  | { status: "computed"; result: AnalyzerResult }
  | { status: "unavailable"; reason: string };

export interface ScoringPipeline {
  readonly config: ScoringConfig;
  analyze(snapshot: PageSnapshot): Report;
}

function runIsolated(analyzer: Analyzer, snapshot: PageSnapshot, config: ScoringConfig): AnalyzerRun {
  try {
    return { status: "computed", result: analyzer(snapshot, config.thresholds) };
  } catch (error) {
    return { status: "unavailable", reason: errorMessage(error) };
  }
}

/**
 * Validates the configuration up front (throwing ConfigurationError) and
 * returns a pipeline whose `analyze` is a pure function of the snapshot.
 */
export function createScoringPipeline(
  scoring?: unknown,
  analyzers: Record<CategoryId, Analyzer> = ANALYZERS
): ScoringPipeline {
  const config = resolveScoringConfig(scoring);

  const analyze = (snapshot: PageSnapshot): Report => {
    const runs = mapCategories((id) => runIsolated(analyzers[id], snapshot, config));

    const metrics: Metric[] = [];
    const findings: Finding[] = [];

    for (const id of CATEGORY_ORDER) {
      const run = runs[id];
      if (run.status === "computed") {
        metrics.push(...run.result.metrics);
        findings.push(...run.result.findings);
      } else {
        findings.push(createFinding("high", id, `${CATEGORY_NAMES[id]} unavailable: ${run.reason}`));
      }
    }

    const outcomes = mapCategories((id): CategoryOutcome => {
      const run = runs[id];
      return run.status === "computed" ? { status: "computed" } : { status: "unavailable", reason: run.reason };
    });

    return aggregate({
      url: snapshot.url,
      statusCode: snapshot.statusCode,
      metrics,
      scores: normalizeMetrics(metrics, config.rules),
      findings,
      outcomes,
      categoryWeights: config.categoryWeights,
      metricWeights: config.metricWeights,
    });
  };

  return { config, analyze };
}
