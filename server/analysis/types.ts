import { z } from "zod";
import type { Finding, RawMetric, NormalizedScore, AnalysisReport } from "../../shared/analysis-types";
import type { MetricId } from "./catalog";

export const CategoryIdSchema = z.enum([
  "seo",
  "readability_heuristics",
  "crawlability",
  "text_readability",
]);

const Weight = z.number().finite().nonnegative();

export const NormalizationRuleSchema = z.discriminatedUnion("curve", [
  z.object({ curve: z.literal("boolean"), expected: z.boolean().default(true) }).strict(),
  z
    .object({
      curve: z.literal("target-range"),
      floor: z.number().finite(),
      min: z.number().finite(),
      max: z.number().finite(),
      ceiling: z.number().finite(),
    })
    .strict(),
  z.object({ curve: z.literal("linear"), zero: z.number().finite(), full: z.number().finite() }).strict(),
  z.object({ curve: z.literal("penalty"), perOccurrence: z.number().finite().positive() }).strict(),
  z
    .object({ curve: z.literal("latency"), fast: z.number().finite().nonnegative(), slow: z.number().finite() })
    .strict(),
]);

export type NormalizationRule = z.infer<typeof NormalizationRuleSchema>;

export const ThresholdsSchema = z
  .object({
    titleLengthMin: z.number().int().nonnegative().default(50),
    titleLengthMax: z.number().int().positive().default(60),
    metaDescriptionMin: z.number().int().nonnegative().default(50),
    metaDescriptionMax: z.number().int().positive().default(160),
    thinContentRatio: z.number().min(0).max(1).default(0.1),
    slowLoadMs: z.number().nonnegative().default(3000),
    semanticRatioMin: z.number().min(0).max(1).default(0.5),
    minContentWords: z.number().int().nonnegative().default(300),
    maxInlineScripts: z.number().int().nonnegative().default(5),
    maxKeywordDensity: z.number().min(0).max(1).default(0.06),
    maxPathDepth: z.number().int().nonnegative().default(3),
    maxAverageSentenceLength: z.number().positive().default(20),
    maxComplexWordRatio: z.number().min(0).max(1).default(0.15),
    minFleschScore: z.number().default(30),
  })
  .strict();

export type Thresholds = z.infer<typeof ThresholdsSchema>;

export const ScoringConfigSchema = z
  .object({
    categoryWeights: z.record(CategoryIdSchema, Weight).default({}),
    metricWeights: z.record(CategoryIdSchema, z.record(z.string(), Weight)).default({}),
    rules: z.record(z.string(), NormalizationRuleSchema).default({}),
    thresholds: ThresholdsSchema.default({}),
  })
  .strict();

export type ScoringConfigInput = z.input<typeof ScoringConfigSchema>;

export const AnalyzeOptionsSchema = z.object({
  url: z.string().url(),
  timeoutMs: z.number().int().positive().default(12000),
  userAgent: z.string().min(1).default("pagescope/1.0"),
  scoring: z.unknown().optional(),
});

export type AnalyzeOptions = z.infer<typeof AnalyzeOptionsSchema>;

export interface TagNode {
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly text: string;
}

export interface TagTree {
  readonly nodes: readonly TagNode[];
}

export interface PageSnapshot {
  readonly url: string;
  readonly statusCode: number;
  readonly html: string;
  readonly tagTree: TagTree;
  readonly headers: Readonly<Record<string, string>>;
  readonly latencyMs: number;
  readonly robotsTxt: string | null;
  readonly sitemapPresent: boolean;
  readonly visibleText: string;
  readonly sentences: readonly string[];
  readonly words: readonly string[];
}

export type Metric = RawMetric<MetricId>;
export type Score = NormalizedScore<MetricId>;
export type Report = AnalysisReport<MetricId>;

export interface AnalyzerResult {
  metrics: Metric[];
  findings: Finding[];
}

export type Analyzer = (snapshot: PageSnapshot, thresholds: Thresholds) => AnalyzerResult;
