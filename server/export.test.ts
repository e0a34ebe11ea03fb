import { describe, expect, it } from "vitest";
import { formatMetricValue, generateMarkdown, renderBatch } from "./export";
import { booleanMetric, countMetric, durationMetric, ordinalMetric, ratioMetric } from "./analysis/catalog";
import type { Report } from "./analysis/types";

const REPORT: Report = {
  url: "https://example.com/",
  statusCode: 200,
  compositeScore: 72.456,
  categories: [
    {
      id: "seo",
      name: "SEO",
      status: "computed",
      score: 80,
      weight: 0.25,
      effectiveWeight: 0.5,
      scores: [],
    },
    {
      id: "text_readability",
      name: "Text readability",
      status: "unavailable",
      reason: "No text | at all",
      weight: 0.25,
      effectiveWeight: 0,
    },
  ],
  metrics: [
    booleanMetric("title_present", true),
    ratioMetric("internal_link_ratio", 0.6667),
    durationMetric("load_time", 1234.6),
  ],
  scores: [{ metric: "title_present", category: "seo", score: 100, rule: "boolean" }],
  findings: [
    { severity: "high", category: "seo", message: "Page is missing a meta description." },
    { severity: "low", category: "seo", message: "Page has no canonical link." },
  ],
};

describe("formatMetricValue", () => {
  it("formats each metric kind", () => {
    expect(formatMetricValue(booleanMetric("viewport_present", false))).toBe("no");
    expect(formatMetricValue(countMetric("h1_count", 2))).toBe("2");
    expect(formatMetricValue(ratioMetric("semantic_ratio", 0.5))).toBe("0.500");
    expect(formatMetricValue(durationMetric("load_time", 999.5))).toBe("1000 ms");
    expect(formatMetricValue(ordinalMetric("flesch_reading_ease", 65.5))).toBe("65.50");
  });
});

describe("generateMarkdown", () => {
  it("renders scores, findings and metrics", () => {
    expect(generateMarkdown(REPORT)).toBe(
      [
        "# Page analysis: https://example.com/",
        "",
        "**Composite score:** 72.5 / 100",
        "",
        "## Categories",
        "",
        "| Category | Score | Weight |",
        "| --- | --- | --- |",
        "| SEO | 80.0 | 0.25 |",
        "| Text readability | unavailable: No text \\| at all | 0.25 |",
        "",
        "## Findings",
        "",
        "### High priority",
        "",
        "- Page is missing a meta description.",
        "",
        "### Low priority",
        "",
        "- Page has no canonical link.",
        "",
        "## Metrics",
        "",
        "| Metric | Value | Score |",
        "| --- | --- | --- |",
        "| Title present | yes | 100.0 |",
        "| Internal link ratio | 0.667 | n/a |",
        "| Load time | 1235 ms | n/a |",
        "",
      ].join("\n")
    );
  });

  it("handles a report without a composite or findings", () => {
    const markdown = generateMarkdown({ ...REPORT, compositeScore: null, findings: [] });
    expect(markdown).toContain("**Composite score:** n/a / 100\n");
    expect(markdown).toContain("## Findings\n\nNo issues found.\n");
  });
});

describe("renderBatch", () => {
  it("prints a single report as-is", () => {
    expect(JSON.parse(renderBatch([{ url: REPORT.url, report: REPORT }], "json"))).toEqual(REPORT);
  });

  it("prints a single failure as an error object", () => {
    expect(JSON.parse(renderBatch([{ url: "https://example.com/", error: "HTTP 500" }], "json"))).toEqual({
      error: true,
      message: "HTTP 500",
    });
  });

  it("prints several results as an array", () => {
    const entries = [
      { url: REPORT.url, report: REPORT },
      { url: "https://example.org/", error: "Request timeout" },
    ];
    expect(JSON.parse(renderBatch(entries, "json"))).toEqual(entries);
  });

  it("separates markdown reports", () => {
    const markdown = renderBatch(
      [
        { url: REPORT.url, report: REPORT },
        { url: "https://example.org/", error: "Request timeout" },
      ],
      "markdown"
    );
    expect(markdown.endsWith("\n---\n\n# Page analysis: https://example.org/\n\nAnalysis failed: Request timeout\n")).toBe(
      true
    );
  });
});
