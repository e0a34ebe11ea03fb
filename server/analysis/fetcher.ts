import { isSSRFSafe } from "./url-utils";

const MAX_REDIRECTS = 5;

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
}

export interface FetchedPage {
  url: string;
  finalUrl: string;
  statusCode: number;
  headers: Record<string, string>;
  html: string;
  latencyMs: number;
}

export interface FetchFailure {
  error: string;
  kind: "network" | "status" | "content-type";
  statusCode?: number;
}

export type FetchOutcome = FetchedPage | FetchFailure;

export function isFetchFailure(outcome: FetchOutcome): outcome is FetchFailure {
  return "error" in outcome;
}

function headersToRecord(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

function describeFetchError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === "AbortError" ? "Request timeout" : error.message || "Unknown fetch error";
  }
  return String(error);
}

/**
 * Fetches an HTML page, following redirects by hand so every hop passes the
 * SSRF check. Latency adds up the network time of every hop and the body
 * read; the SSRF checks (and their DNS lookups) are not counted.
 */
export async function fetchPage(url: string, options: FetchOptions): Promise<FetchOutcome> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
  let latencyMs = 0;

  try {
    let currentUrl = url;

    for (let redirectCount = 0; redirectCount <= MAX_REDIRECTS; redirectCount++) {
      const ssrfCheck = await isSSRFSafe(currentUrl);
      if (!ssrfCheck.safe) {
        return { error: `SSRF protection: ${ssrfCheck.reason}`, kind: "network" };
      }

      const requestStart = Date.now();
      const response = await fetch(currentUrl, {
        signal: controller.signal,
        headers: {
          "User-Agent": options.userAgent,
          Accept: "text/html,application/xhtml+xml",
        },
        redirect: "manual",
      });
      latencyMs += Date.now() - requestStart;

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get("location");
        if (!location) {
          return { error: "Redirect without location header", kind: "status", statusCode: response.status };
        }
        currentUrl = new URL(location, currentUrl).toString();
        continue;
      }

      if (!response.ok) {
        return { error: `HTTP ${response.status}`, kind: "status", statusCode: response.status };
      }

      const contentType = response.headers.get("content-type") || "";
      if (!contentType.includes("text/html") && !contentType.includes("application/xhtml")) {
        return {
          error: `Non-HTML content type: ${contentType || "unknown"}`,
          kind: "content-type",
          statusCode: response.status,
        };
      }

      const bodyStart = Date.now();
      const html = await response.text();
      latencyMs += Date.now() - bodyStart;

      return {
        url,
        finalUrl: currentUrl,
        statusCode: response.status,
        headers: headersToRecord(response.headers),
        html,
        latencyMs,
      };
    }

    return { error: "Too many redirects", kind: "network" };
  } catch (error) {
    return { error: describeFetchError(error), kind: "network" };
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Body of a successful response, or null for any failure. */
export async function fetchTextFile(url: string, options: FetchOptions): Promise<string | null> {
  const ssrfCheck = await isSSRFSafe(url);
  if (!ssrfCheck.safe) return null;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: { "User-Agent": options.userAgent },
    });
    if (!response.ok) return null;
    return await response.text();
  } catch {
    return null;
  } finally {
    clearTimeout(timeoutId);
  }
}
