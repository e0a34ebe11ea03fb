import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, FetchError, runAnalysis } from "./index";

const ORIGIN = "http://93.184.216.34";

const PAGE = `<html><head><title>Notes on composting at home</title></head>
<body><main><h1>Composting</h1><p>Mix green and brown material. Turn the pile every week.</p></main></body></html>`;

function serve(routes: Record<string, Response>) {
  const fetchMock = vi.fn<typeof fetch>(async (input) => {
    return routes[String(input)] ?? new Response("not found", { status: 404 });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("runAnalysis", () => {
  it("fetches the page and its site files and scores them", async () => {
    serve({
      [`${ORIGIN}/notes`]: new Response(PAGE, { status: 200, headers: { "content-type": "text/html" } }),
      [`${ORIGIN}/robots.txt`]: new Response("User-agent: *\nAllow: /\n", { status: 200 }),
      [`${ORIGIN}/sitemap.xml`]: new Response("<urlset></urlset>", { status: 200 }),
    });
    const log = vi.fn();

    const report = await runAnalysis({ url: `${ORIGIN}/notes` }, { log });

    expect(report.url).toBe(`${ORIGIN}/notes`);
    expect(report.statusCode).toBe(200);
    expect(report.categories.every((c) => c.status === "computed")).toBe(true);
    expect(report.metrics.find((m) => m.id === "sitemap_present")?.value).toBe(true);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[analysis\] http:\/\/93\.184\.216\.34\/notes scored /);
  });

  it("reads site files from the origin a redirect lands on", async () => {
    const target = "http://93.184.216.35";
    const fetchMock = serve({
      [`${ORIGIN}/page`]: new Response(null, { status: 301, headers: { location: `${target}/page` } }),
      [`${target}/page`]: new Response(PAGE, { status: 200, headers: { "content-type": "text/html" } }),
      [`${ORIGIN}/robots.txt`]: new Response("User-agent: *\nAllow: /\n", { status: 200 }),
      [`${target}/robots.txt`]: new Response("User-agent: *\nDisallow: /\n", { status: 200 }),
    });

    const report = await runAnalysis({ url: `${ORIGIN}/page` }, { log: () => undefined });
    const requested = fetchMock.mock.calls.map(([input]) => String(input));

    expect(report.url).toBe(`${target}/page`);
    expect(report.metrics.find((m) => m.id === "indexable")?.value).toBe(false);
    expect(requested).toContain(`${target}/robots.txt`);
    expect(requested).not.toContain(`${ORIGIN}/robots.txt`);
    expect(requested.filter((url) => url.startsWith(ORIGIN))).toEqual([`${ORIGIN}/page`]);
  });

  it("validates the scoring configuration before any request", async () => {
    const fetchMock = serve({});

    await expect(
      runAnalysis({ url: `${ORIGIN}/notes`, scoring: { categoryWeights: { seo: 3 } } }, { log: () => undefined })
    ).rejects.toThrow(ConfigurationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("raises FetchError when the page cannot be retrieved", async () => {
    serve({});

    const failure = runAnalysis({ url: `${ORIGIN}/missing` }, { log: () => undefined });

    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toMatchObject({
      message: `Failed to fetch ${ORIGIN}/missing: HTTP 404`,
      statusCode: 404,
    });
  });
});
