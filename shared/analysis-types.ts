export type CategoryId =
  | "seo"
  | "readability_heuristics"
  | "crawlability"
  | "text_readability";

export type FindingSeverity = "low" | "med" | "high";

export interface Finding {
  readonly severity: FindingSeverity;
  readonly category: CategoryId;
  readonly metric?: string;
  readonly message: string;
}

export type MetricKind = "count" | "ratio" | "boolean" | "duration" | "ordinal";

interface MetricBase<Id extends string> {
  readonly id: Id;
  readonly category: CategoryId;
  readonly label: string;
}

export interface CountMetric<Id extends string = string> extends MetricBase<Id> {
  readonly kind: "count";
  readonly value: number;
}

export interface RatioMetric<Id extends string = string> extends MetricBase<Id> {
  readonly kind: "ratio";
  readonly value: number;
}

export interface BooleanMetric<Id extends string = string> extends MetricBase<Id> {
  readonly kind: "boolean";
  readonly value: boolean;
}

export interface DurationMetric<Id extends string = string> extends MetricBase<Id> {
  readonly kind: "duration";
  readonly value: number;
  readonly unit: "ms";
}

export interface OrdinalMetric<Id extends string = string> extends MetricBase<Id> {
  readonly kind: "ordinal";
  readonly value: number;
  readonly scale: { readonly min: number; readonly max: number };
}

export type RawMetric<Id extends string = string> =
  | CountMetric<Id>
  | RatioMetric<Id>
  | BooleanMetric<Id>
  | DurationMetric<Id>
  | OrdinalMetric<Id>;

export type CurveName = "boolean" | "target-range" | "linear" | "penalty" | "latency";

export interface NormalizedScore<Id extends string = string> {
  readonly metric: Id;
  readonly category: CategoryId;
  readonly score: number;
  readonly rule: CurveName;
}

export interface ComputedCategory<Id extends string = string> {
  readonly id: CategoryId;
  readonly name: string;
  readonly status: "computed";
  readonly score: number;
  readonly weight: number;
  readonly effectiveWeight: number;
  readonly scores: readonly NormalizedScore<Id>[];
}

export interface UnavailableCategory {
  readonly id: CategoryId;
  readonly name: string;
  readonly status: "unavailable";
  readonly reason: string;
  readonly weight: number;
  readonly effectiveWeight: 0;
}

export type CategoryReport<Id extends string = string> = ComputedCategory<Id> | UnavailableCategory;

export interface AnalysisReport<Id extends string = string> {
  readonly url: string;
  readonly statusCode: number;
  readonly compositeScore: number | null;
  readonly categories: readonly CategoryReport<Id>[];
  readonly metrics: readonly RawMetric<Id>[];
  readonly scores: readonly NormalizedScore<Id>[];
  readonly findings: readonly Finding[];
}

export interface AnalyzeRequest {
  url: string;
  timeoutMs?: number;
  userAgent?: string;
  scoring?: unknown;
  format?: "json" | "markdown";
}
