import { describe, expect, it } from "vitest";
import { analyzeSeo, hasSkippedHeadingLevel, keywordFrequencies } from "./seo";
import { buildSnapshot } from "../snapshot";
import { ThresholdsSchema, type Metric } from "../types";
import { MalformedInputError } from "../errors";

const thresholds = ThresholdsSchema.parse({});

function analyze(html: string, url = "https://example.com/page") {
  return analyzeSeo(
    buildSnapshot({ url, statusCode: 200, html, latencyMs: 100 }),
    thresholds
  );
}

function valueOf(metrics: Metric[], id: Metric["id"]): Metric["value"] | undefined {
  return metrics.find((metric) => metric.id === id)?.value;
}

const PAGE = `<html><head>
<title>Pagescope test page for structure</title>
<meta name="description" content="Short description">
<meta name="viewport" content="width=device-width">
<meta property="og:title" content="Pagescope test page">
<meta name="twitter:card" content="summary">
<link rel="canonical" href="https://example.com/page">
<link rel="stylesheet" href="/main.css">
<script src="/app.js"></script>
<script type="application/ld+json">{"@type":"WebPage"}</script>
<script>window.ready = true;</script>
<style>body { margin: 0 }</style>
</head><body>
<h1>Main</h1><h2>Sub</h2><h4>Deep</h4>
<a href="/about">About</a>
<a href="https://example.com/contact">Contact</a>
<a href="https://other.example.org/">Other</a>
<a href="#top">Top</a>
<a href="mailto:team@example.com">Mail</a>
<img src="a.png" alt="A" width="40" height="30"><img src="b.png"><img src="c.png" alt=" ">
<p style="color: red">Text</p>
</body></html>`;

describe("analyzeSeo", () => {
  const { metrics, findings } = analyze(PAGE);

  it("measures title and meta description", () => {
    expect(valueOf(metrics, "title_present")).toBe(true);
    expect(valueOf(metrics, "title_length")).toBe(33);
    expect(valueOf(metrics, "meta_description_present")).toBe(true);
    expect(valueOf(metrics, "meta_description_length")).toBe(17);
  });

  it("counts headings and detects skipped levels", () => {
    expect(valueOf(metrics, "h1_count")).toBe(1);
    expect(valueOf(metrics, "heading_hierarchy_valid")).toBe(false);
  });

  it("classifies navigable links by origin", () => {
    expect(valueOf(metrics, "internal_link_count")).toBe(2);
    expect(valueOf(metrics, "external_link_count")).toBe(1);
    expect(valueOf(metrics, "internal_link_ratio")).toBeCloseTo(2 / 3, 10);
  });

  it("inventories images, scripts and styles", () => {
    expect(valueOf(metrics, "images_missing_alt")).toBe(2);
    expect(valueOf(metrics, "external_script_count")).toBe(1);
    expect(valueOf(metrics, "inline_script_count")).toBe(1);
    expect(valueOf(metrics, "inline_style_count")).toBe(2);
    expect(valueOf(metrics, "external_stylesheet_count")).toBe(1);
  });

  it("detects viewport, canonical, structured data and social tags", () => {
    expect(valueOf(metrics, "viewport_present")).toBe(true);
    expect(valueOf(metrics, "canonical_present")).toBe(true);
    expect(valueOf(metrics, "structured_data_present")).toBe(true);
    expect(valueOf(metrics, "open_graph_present")).toBe(true);
    expect(valueOf(metrics, "twitter_card_present")).toBe(true);
  });

  it("counts images without explicit dimensions", () => {
    expect(valueOf(metrics, "images_missing_dimensions")).toBe(2);
  });

  it("measures the URL structure", () => {
    expect(valueOf(metrics, "url_path_depth")).toBe(1);
    expect(valueOf(metrics, "clean_url")).toBe(true);
  });

  it("reports what needs fixing", () => {
    expect(findings).toEqual([
      {
        severity: "low",
        category: "seo",
        metric: "title_length",
        message: "Title is too short (33 characters, ideal 50-60).",
      },
      {
        severity: "med",
        category: "seo",
        metric: "meta_description_length",
        message: "Meta description is too short (17 characters, minimum 50).",
      },
      {
        severity: "low",
        category: "seo",
        metric: "heading_hierarchy_valid",
        message: "Heading hierarchy skips levels (e.g. H2 followed by H4).",
      },
      {
        severity: "med",
        category: "seo",
        metric: "images_missing_alt",
        message: "2 images are missing alt text.",
      },
      {
        severity: "low",
        category: "seo",
        metric: "images_missing_dimensions",
        message: "2 images are missing width or height attributes.",
      },
    ]);
  });

  it("flags a bare page", () => {
    const result = analyze("<html><body><p>Hi</p></body></html>");
    expect(result.findings.map((f) => f.message)).toEqual([
      "Page is missing a title tag.",
      "Page is missing a meta description.",
      "Page is missing an H1 heading.",
      "Page has no viewport meta tag.",
      "Page has no canonical link.",
      "Page has no OpenGraph tags.",
      "Page has no Twitter card tags.",
    ]);
    expect(valueOf(result.metrics, "open_graph_present")).toBe(false);
    expect(valueOf(result.metrics, "twitter_card_present")).toBe(false);
    expect(valueOf(result.metrics, "internal_link_ratio")).toBe(0);
    expect(valueOf(result.metrics, "heading_hierarchy_valid")).toBe(true);
  });

  it("flags multiple H1s, long titles and long descriptions", () => {
    const title = "t".repeat(70);
    const description = "a".repeat(170);
    const result = analyze(
      `<html><head><title>${title}</title><meta name="description" content="${description}"></head><body><h1>One</h1><h1>Two</h1></body></html>`
    );
    const messages = result.findings.map((f) => f.message);
    expect(messages).toContain("Title is too long (70 characters, ideal 50-60).");
    expect(messages).toContain("Meta description is too long (170 characters, maximum 160).");
    expect(messages).toContain("Page has 2 H1 headings; exactly one is expected.");
  });

  it("flags a keyword that dominates the text", () => {
    const result = analyze(`<html><body><p>${"compost soil ".repeat(25)}</p></body></html>`);
    expect(valueOf(result.metrics, "top_keyword_density")).toBe(0.5);
    expect(result.findings).toContainEqual({
      severity: "med",
      category: "seo",
      metric: "top_keyword_density",
      message: 'Keyword "compost" makes up 50.0% of the text (maximum 6.0%).',
    });
  });

  it("leaves keyword density unflagged on short texts", () => {
    const result = analyze(`<html><body><p>${"compost soil ".repeat(24)}</p></body></html>`);
    expect(valueOf(result.metrics, "top_keyword_density")).toBe(0.5);
    expect(result.findings.some((f) => f.metric === "top_keyword_density")).toBe(false);
  });

  it("flags deep and parameterized URLs", () => {
    const result = analyze("<html><body><p>Hi</p></body></html>", "https://example.com/a/b/c/d?ref=1");
    expect(valueOf(result.metrics, "url_path_depth")).toBe(4);
    expect(valueOf(result.metrics, "clean_url")).toBe(false);
    const messages = result.findings.map((f) => f.message);
    expect(messages).toContain("URL path is 4 segments deep (maximum 3).");
    expect(messages).toContain("URL has a query string or fragment.");
  });

  it("rejects an empty document", () => {
    expect(() => analyze("")).toThrow(MalformedInputError);
  });
});

describe("hasSkippedHeadingLevel", () => {
  it("only flags a jump of more than one level downwards", () => {
    expect(hasSkippedHeadingLevel([1, 2, 3])).toBe(false);
    expect(hasSkippedHeadingLevel([3, 1, 2])).toBe(false);
    expect(hasSkippedHeadingLevel([2, 4])).toBe(true);
    expect(hasSkippedHeadingLevel([])).toBe(false);
  });
});

describe("keywordFrequencies", () => {
  it("counts lower-cased words without stop words or short words", () => {
    expect(keywordFrequencies(["The", "Garden", "garden", "is", "at", "compost", "Garden"])).toEqual({
      countedWords: 4,
      top: [
        { keyword: "garden", count: 3, density: 0.75 },
        { keyword: "compost", count: 1, density: 0.25 },
      ],
    });
  });

  it("keeps the ten most frequent words", () => {
    const words = Array.from({ length: 12 }, (_, i) => `word${i}`);
    expect(keywordFrequencies(words).top).toHaveLength(10);
    expect(keywordFrequencies([]).top).toEqual([]);
  });
});
