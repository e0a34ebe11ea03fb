import { describe, expect, it } from "vitest";
import { buildSnapshot } from "./snapshot";

describe("buildSnapshot", () => {
  const snapshot = buildSnapshot({
    url: "https://example.com/",
    statusCode: 200,
    html: "<html><head><title>T</title></head><body><p>First one. Second one!</p></body></html>",
    headers: { "X-Robots-Tag": "noindex", "Content-Type": "text/html" },
    latencyMs: 420,
  });

  it("derives text, sentences and words from the HTML", () => {
    expect(snapshot.visibleText).toBe("First one. Second one!");
    expect(snapshot.sentences).toEqual(["First one.", "Second one!"]);
    expect(snapshot.words).toEqual(["First", "one", "Second", "one"]);
  });

  it("lower-cases header names", () => {
    expect(snapshot.headers).toEqual({ "x-robots-tag": "noindex", "content-type": "text/html" });
  });

  it("defaults the site files", () => {
    expect(snapshot.robotsTxt).toBeNull();
    expect(snapshot.sitemapPresent).toBe(false);
  });

  it("is immutable", () => {
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.words)).toBe(true);
    expect(Object.isFrozen(snapshot.headers)).toBe(true);
  });
});
