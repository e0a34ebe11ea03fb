import { describe, expect, it } from "vitest";
import { booleanMetric, countMetric, durationMetric, ordinalMetric, ratioMetric } from "./catalog";
import { ConfigurationError } from "./errors";
import { DEFAULT_RULES, applyRule, clampScore, normalizeMetric, normalizeMetrics, roundScore } from "./normalizer";

describe("target-range curve", () => {
  const rule = DEFAULT_RULES.title_length;

  it("scores 100 inside the band", () => {
    expect(applyRule(rule, countMetric("title_length", 55))).toBe(100);
    expect(applyRule(rule, countMetric("title_length", 50))).toBe(100);
    expect(applyRule(rule, countMetric("title_length", 60))).toBe(100);
  });

  it("ramps down linearly on either side", () => {
    expect(applyRule(rule, countMetric("title_length", 25))).toBe(50);
    expect(applyRule(rule, countMetric("title_length", 90))).toBe(50);
  });

  it("scores 0 at and beyond the floor and ceiling", () => {
    expect(applyRule(rule, countMetric("title_length", 0))).toBe(0);
    expect(applyRule(rule, countMetric("title_length", 120))).toBe(0);
    expect(applyRule(rule, countMetric("title_length", 500))).toBe(0);
  });
});

describe("linear curve", () => {
  it("interpolates between zero and full", () => {
    expect(normalizeMetric(countMetric("internal_link_count", 1), DEFAULT_RULES).score).toBe(33.33);
  });

  it("clamps past full", () => {
    expect(applyRule(DEFAULT_RULES.internal_link_count, countMetric("internal_link_count", 40))).toBe(100);
  });

  it("supports inverted ranges where lower values are better", () => {
    expect(normalizeMetric(ratioMetric("lexical_complexity", 0.275), DEFAULT_RULES).score).toBe(50);
    expect(applyRule(DEFAULT_RULES.lexical_complexity, ratioMetric("lexical_complexity", 0.1))).toBe(100);
    expect(applyRule(DEFAULT_RULES.average_sentence_length, ordinalMetric("average_sentence_length", 45))).toBe(0);
  });
});

describe("penalty curve", () => {
  it("subtracts a fixed amount per occurrence", () => {
    expect(applyRule(DEFAULT_RULES.images_missing_alt, countMetric("images_missing_alt", 3))).toBe(70);
    expect(applyRule(DEFAULT_RULES.images_missing_alt, countMetric("images_missing_alt", 0))).toBe(100);
  });

  it("never goes below zero", () => {
    expect(applyRule(DEFAULT_RULES.images_missing_alt, countMetric("images_missing_alt", 12))).toBe(0);
  });
});

describe("latency curve", () => {
  const rule = DEFAULT_RULES.load_time;

  it("scores fast responses fully and slow ones at zero", () => {
    expect(applyRule(rule, durationMetric("load_time", 1000))).toBe(100);
    expect(applyRule(rule, durationMetric("load_time", 7000))).toBe(0);
  });

  it("interpolates in between", () => {
    expect(applyRule(rule, durationMetric("load_time", 4000))).toBe(50);
  });
});

describe("boolean curve", () => {
  it("scores the expected value as 100", () => {
    expect(applyRule(DEFAULT_RULES.title_present, booleanMetric("title_present", true))).toBe(100);
    expect(applyRule(DEFAULT_RULES.title_present, booleanMetric("title_present", false))).toBe(0);
  });

  it("honours an inverted expectation", () => {
    expect(applyRule({ curve: "boolean", expected: false }, booleanMetric("title_present", false))).toBe(100);
  });
});

describe("applyRule", () => {
  it("rejects a curve that cannot score the metric kind", () => {
    expect(() => applyRule({ curve: "penalty", perOccurrence: 5 }, ratioMetric("semantic_ratio", 0.5))).toThrow(
      ConfigurationError
    );
    expect(() => applyRule({ curve: "latency", fast: 1, slow: 2 }, countMetric("h1_count", 1))).toThrow(
      'Curve "latency" cannot score count metric "h1_count"'
    );
  });
});

describe("clampScore and roundScore", () => {
  it("keeps scores within [0, 100]", () => {
    expect(clampScore(150)).toBe(100);
    expect(clampScore(-5)).toBe(0);
    expect(clampScore(Number.NaN)).toBe(0);
  });

  it("rounds to two decimals", () => {
    expect(roundScore(33.33333)).toBe(33.33);
    expect(roundScore(66.666)).toBe(66.67);
  });
});

describe("normalizeMetrics", () => {
  it("keeps the metric's id, category and curve name", () => {
    const [score] = normalizeMetrics([durationMetric("load_time", 4000)], DEFAULT_RULES);
    expect(score).toEqual({ metric: "load_time", category: "crawlability", score: 50, rule: "latency" });
  });

  it("always produces scores in [0, 100]", () => {
    const scores = normalizeMetrics(
      [
        countMetric("title_length", -10),
        countMetric("inline_script_count", 10_000),
        ratioMetric("text_html_ratio", 4),
        durationMetric("load_time", -1),
        ordinalMetric("flesch_reading_ease", -250),
        ordinalMetric("average_sentence_length", 0),
      ],
      DEFAULT_RULES
    );
    for (const { score } of scores) {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(100);
    }
  });
});
