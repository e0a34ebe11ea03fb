import type { Report } from "./types";
import { AnalyzeOptionsSchema } from "./types";
import { createScoringPipeline } from "./pipeline";
import { fetchPage, isFetchFailure } from "./fetcher";
import { fetchSiteFiles } from "./site-files";
import { buildSnapshot } from "./snapshot";
import { FetchError } from "./errors";
import type { z } from "zod";

export type AnalyzeInput = z.input<typeof AnalyzeOptionsSchema>;

export interface RunAnalysisHooks {
  log?: (message: string) => void;
}

const consoleLog = (message: string): void => {
  console.log(message);
};

export async function runAnalysis(input: AnalyzeInput, hooks: RunAnalysisHooks = {}): Promise<Report> {
  const log = hooks.log || consoleLog;
  const startTime = Date.now();
  const options = AnalyzeOptionsSchema.parse(input);

  // Configuration problems surface before any request is made.
  const pipeline = createScoringPipeline(options.scoring);
  const fetchOptions = { timeoutMs: options.timeoutMs, userAgent: options.userAgent };

  const page = await fetchPage(options.url, fetchOptions);
  if (isFetchFailure(page)) {
    throw new FetchError(`Failed to fetch ${options.url}: ${page.error}`, page.statusCode);
  }

  // robots.txt and the sitemap belong to the origin the page was served from.
  const siteFiles = await fetchSiteFiles(page.finalUrl, fetchOptions);

  const snapshot = buildSnapshot({
    url: page.finalUrl,
    statusCode: page.statusCode,
    html: page.html,
    headers: page.headers,
    latencyMs: page.latencyMs,
    robotsTxt: siteFiles.robotsTxt,
    sitemapPresent: siteFiles.sitemapPresent,
  });

  const report = pipeline.analyze(snapshot);

  for (const category of report.categories) {
    if (category.status === "unavailable") {
      log(`[analysis] ${category.name} unavailable for ${report.url}: ${category.reason}`);
    }
  }
  log(`[analysis] ${report.url} scored ${report.compositeScore ?? "n/a"} in ${Date.now() - startTime}ms`);

  return report;
}

export { createScoringPipeline } from "./pipeline";
export { buildSnapshot } from "./snapshot";
export { AnalyzeOptionsSchema, ScoringConfigSchema } from "./types";
export type { AnalyzeOptions, PageSnapshot, Report } from "./types";
export {
  AnalysisError,
  ConfigurationError,
  FetchError,
  InsufficientTextError,
  MalformedInputError,
} from "./errors";
