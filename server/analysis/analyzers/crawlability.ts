import type { Finding } from "../../../shared/analysis-types";
import type { AnalyzerResult, PageSnapshot, TagTree, Thresholds } from "../types";
import { booleanMetric, createFinding, durationMetric, ratioMetric } from "../catalog";
import { AI_CRAWLER_USER_AGENTS, groupsNamed, isAllowedFor, isPathAllowed, parseRobotsTxt } from "../robots";
import { attr, findFirst } from "../tag-tree";
import { getRobotsPath } from "../url-utils";

export interface MetaRobots {
  indexable: boolean;
  followable: boolean;
}

export interface RobotsVerdict {
  indexable: boolean;
  blockedForDefault: boolean;
  directivesPresent: boolean;
  blockedCrawlers: string[];
  allowedRatio: number;
}

/**
 * Evaluates robots.txt for one page path. Without a robots.txt every crawler
 * is allowed and no AI crawler directives exist.
 */
export function evaluateRobots(robotsTxt: string | null, path: string): RobotsVerdict {
  if (robotsTxt === null) {
    return {
      indexable: true,
      blockedForDefault: false,
      directivesPresent: false,
      blockedCrawlers: [],
      allowedRatio: 1,
    };
  }

  const robots = parseRobotsTxt(robotsTxt);

  const defaultGroups = groupsNamed(robots, "*");
  const blockedForDefault = defaultGroups.length > 0 && !isPathAllowed(defaultGroups, path);

  const namedAndBlocked = AI_CRAWLER_USER_AGENTS.filter((agent) => {
    const groups = groupsNamed(robots, agent);
    return groups.length > 0 && !isPathAllowed(groups, path);
  });

  const directivesPresent = AI_CRAWLER_USER_AGENTS.some((agent) => groupsNamed(robots, agent).length > 0);
  const blockedCrawlers = AI_CRAWLER_USER_AGENTS.filter((agent) => !isAllowedFor(robots, agent, path));

  return {
    indexable: !blockedForDefault && namedAndBlocked.length === 0,
    blockedForDefault,
    directivesPresent,
    blockedCrawlers,
    allowedRatio: (AI_CRAWLER_USER_AGENTS.length - blockedCrawlers.length) / AI_CRAWLER_USER_AGENTS.length,
  };
}

export function textToHtmlRatio(textLength: number, htmlLength: number): number {
  if (htmlLength <= 0) return 0;
  return Math.min(1, Math.max(0, textLength / htmlLength));
}

export function headerAllowsIndexing(headers: Readonly<Record<string, string>>): boolean {
  const directive = headers["x-robots-tag"];
  if (!directive) return true;
  return !/\b(noindex|none)\b/i.test(directive);
}

/** Reads `<meta name="robots">`; `none` counts as both noindex and nofollow. */
export function metaRobotsDirectives(tree: TagTree): MetaRobots {
  const node = findFirst(tree, "meta", (n) => attr(n, "name")?.trim().toLowerCase() === "robots");
  const directives = (node ? attr(node, "content") || "" : "")
    .toLowerCase()
    .split(",")
    .map((directive) => directive.trim());

  return {
    indexable: !directives.includes("noindex") && !directives.includes("none"),
    followable: !directives.includes("nofollow") && !directives.includes("none"),
  };
}

export function analyzeCrawlability(snapshot: PageSnapshot, thresholds: Thresholds): AnalyzerResult {
  const findings: Finding[] = [];

  const verdict = evaluateRobots(snapshot.robotsTxt, getRobotsPath(snapshot.url));
  if (!verdict.indexable) {
    findings.push(
      createFinding(
        "high",
        "crawlability",
        verdict.blockedForDefault
          ? "robots.txt disallows this page for all crawlers."
          : "robots.txt disallows this page for named AI crawlers.",
        "indexable"
      )
    );
  }
  if (verdict.blockedCrawlers.length > 0) {
    findings.push(
      createFinding(
        "med",
        "crawlability",
        `AI crawlers blocked from this page: ${verdict.blockedCrawlers.join(", ")}.`,
        "llm_bot_allowed_ratio"
      )
    );
  }
  if (snapshot.robotsTxt !== null && !verdict.directivesPresent) {
    findings.push(
      createFinding("low", "crawlability", "robots.txt has no directives for AI crawlers.", "llm_bot_directives_present")
    );
  }

  const headerIndexable = headerAllowsIndexing(snapshot.headers);
  if (!headerIndexable) {
    findings.push(
      createFinding("high", "crawlability", "X-Robots-Tag header prevents indexing.", "robots_header_indexable")
    );
  }

  const metaRobots = metaRobotsDirectives(snapshot.tagTree);
  if (!metaRobots.indexable) {
    findings.push(
      createFinding("high", "crawlability", "Meta robots tag prevents indexing.", "meta_robots_indexable")
    );
  }
  if (!metaRobots.followable) {
    findings.push(
      createFinding(
        "med",
        "crawlability",
        "Meta robots tag tells crawlers not to follow links.",
        "meta_robots_followable"
      )
    );
  }

  if (!snapshot.sitemapPresent) {
    findings.push(createFinding("med", "crawlability", "No sitemap.xml found.", "sitemap_present"));
  }

  const ratio = textToHtmlRatio(snapshot.visibleText.length, snapshot.html.length);
  if (ratio < thresholds.thinContentRatio) {
    findings.push(
      createFinding(
        "med",
        "crawlability",
        `Thin content: text-to-HTML ratio is ${ratio.toFixed(2)} (below ${thresholds.thinContentRatio}).`,
        "text_html_ratio"
      )
    );
  }

  if (snapshot.latencyMs > thresholds.slowLoadMs) {
    findings.push(
      createFinding(
        "med",
        "crawlability",
        `Slow page load: ${(snapshot.latencyMs / 1000).toFixed(2)}s (threshold ${(thresholds.slowLoadMs / 1000).toFixed(2)}s).`,
        "load_time"
      )
    );
  }

  return {
    metrics: [
      booleanMetric("indexable", verdict.indexable),
      booleanMetric("robots_header_indexable", headerIndexable),
      booleanMetric("meta_robots_indexable", metaRobots.indexable),
      booleanMetric("meta_robots_followable", metaRobots.followable),
      booleanMetric("sitemap_present", snapshot.sitemapPresent),
      ratioMetric("text_html_ratio", ratio),
      durationMetric("load_time", snapshot.latencyMs),
      booleanMetric("llm_bot_directives_present", verdict.directivesPresent),
      ratioMetric("llm_bot_allowed_ratio", verdict.allowedRatio),
    ],
    findings,
  };
}
