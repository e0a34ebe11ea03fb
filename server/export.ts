import type { AnalysisReport, Finding, FindingSeverity, RawMetric } from "../shared/analysis-types";

const SEVERITY_HEADINGS: Record<FindingSeverity, string> = {
  high: "High priority",
  med: "Medium priority",
  low: "Low priority",
};

function formatScore(score: number | null): string {
  return score === null ? "n/a" : score.toFixed(1);
}

export function formatMetricValue(metric: RawMetric): string {
  switch (metric.kind) {
    case "boolean":
      return metric.value ? "yes" : "no";
    case "ratio":
      return metric.value.toFixed(3);
    case "duration":
      return `${Math.round(metric.value)} ${metric.unit}`;
    case "ordinal":
      return metric.value.toFixed(2);
    case "count":
      return String(metric.value);
  }
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

function findingsSection(findings: readonly Finding[]): string[] {
  if (findings.length === 0) return ["## Findings", "", "No issues found.", ""];

  const lines = ["## Findings", ""];
  for (const severity of ["high", "med", "low"] as const) {
    const group = findings.filter((f) => f.severity === severity);
    if (group.length === 0) continue;
    lines.push(`### ${SEVERITY_HEADINGS[severity]}`, "");
    for (const finding of group) {
      lines.push(`- ${finding.message}`);
    }
    lines.push("");
  }
  return lines;
}

export function generateMarkdown(report: AnalysisReport): string {
  const lines: string[] = [
    `# Page analysis: ${report.url}`,
    "",
    `**Composite score:** ${formatScore(report.compositeScore)} / 100`,
    "",
    "## Categories",
    "",
    "| Category | Score | Weight |",
    "| --- | --- | --- |",
  ];

  for (const category of report.categories) {
    const score =
      category.status === "computed" ? formatScore(category.score) : `unavailable: ${escapeCell(category.reason)}`;
    lines.push(`| ${category.name} | ${score} | ${category.weight} |`);
  }
  lines.push("");

  lines.push(...findingsSection(report.findings));

  const scoreByMetric = new Map(report.scores.map((s) => [s.metric, s.score]));
  lines.push("## Metrics", "", "| Metric | Value | Score |", "| --- | --- | --- |");
  for (const metric of report.metrics) {
    lines.push(
      `| ${escapeCell(metric.label)} | ${formatMetricValue(metric)} | ${formatScore(scoreByMetric.get(metric.id) ?? null)} |`
    );
  }

  return lines.join("\n") + "\n";
}

export type BatchEntry = { url: string; report: AnalysisReport } | { url: string; error: string };

/**
 * Renders CLI results. A single URL prints its bare report (or error object);
 * several URLs print an array of `{ url, report }` / `{ url, error }` entries.
 */
export function renderBatch(entries: BatchEntry[], format: "json" | "markdown"): string {
  if (format === "markdown") {
    return entries
      .map((entry) =>
        "report" in entry
          ? generateMarkdown(entry.report)
          : `# Page analysis: ${entry.url}\n\nAnalysis failed: ${entry.error}\n`
      )
      .join("\n---\n\n");
  }

  if (entries.length === 1) {
    const [entry] = entries;
    return JSON.stringify("report" in entry ? entry.report : { error: true, message: entry.error }, null, 2);
  }
  return JSON.stringify(entries, null, 2);
}
