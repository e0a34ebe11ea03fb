import { fetchTextFile, type FetchOptions } from "./fetcher";
import { parseRobotsTxt } from "./robots";
import { getRobotsUrl, getSitemapUrls } from "./url-utils";

export interface SiteFiles {
  robotsTxt: string | null;
  sitemapPresent: boolean;
}

export function looksLikeSitemap(content: string): boolean {
  return /<(urlset|sitemapindex)[\s>]/i.test(content);
}

async function sitemapExists(candidates: string[], options: FetchOptions): Promise<boolean> {
  for (const candidate of candidates) {
    const content = await fetchTextFile(candidate, options);
    if (content && looksLikeSitemap(content)) return true;
  }
  return false;
}

/**
 * Retrieves robots.txt for the page's origin and checks for a sitemap, trying
 * the `Sitemap:` entries robots.txt declares before the conventional paths.
 */
export async function fetchSiteFiles(pageUrl: string, options: FetchOptions): Promise<SiteFiles> {
  const robotsUrl = getRobotsUrl(pageUrl);
  const robotsTxt = robotsUrl ? await fetchTextFile(robotsUrl, options) : null;

  const declared = robotsTxt ? parseRobotsTxt(robotsTxt).sitemaps : [];
  const candidates = Array.from(new Set([...declared, ...getSitemapUrls(pageUrl)]));

  return {
    robotsTxt,
    sitemapPresent: await sitemapExists(candidates, options),
  };
}
