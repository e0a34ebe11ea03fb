import { lookup } from "node:dns/promises";
import { isIP } from "node:net";

const PRIVATE_IP_RANGES = [
  /^127\./,
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[01])\./,
  /^192\.168\./,
  /^169\.254\./,
  /^0\./,
  /^::1$/,
  /^::ffff:(127|10|192\.168|169\.254)\./i,
  /^fe80:/i,
  /^fc00:/i,
  /^fd00:/i,
];

const BLOCKED_HOSTS = ["localhost", "127.0.0.1", "0.0.0.0", "::1", "[::1]"];

export function isPrivateIP(ip: string): boolean {
  return PRIVATE_IP_RANGES.some((regex) => regex.test(ip));
}

export function isBlockedHost(hostname: string): boolean {
  const lower = hostname.toLowerCase();
  return BLOCKED_HOSTS.includes(lower) || lower.endsWith(".local") || lower.endsWith(".localhost");
}

async function resolveHostToIPs(hostname: string): Promise<string[]> {
  try {
    const addresses = await lookup(hostname, { all: true });
    return addresses.map((a) => a.address);
  } catch {
    return [];
  }
}

export async function isSSRFSafe(urlString: string): Promise<{ safe: boolean; reason?: string }> {
  let parsed: URL;
  try {
    parsed = new URL(urlString);
  } catch (e) {
    return { safe: false, reason: `Invalid URL: ${e}` };
  }

  if (!["http:", "https:"].includes(parsed.protocol)) {
    return { safe: false, reason: `Blocked protocol: ${parsed.protocol}` };
  }

  const hostname = parsed.hostname.replace(/^\[|\]$/g, "");

  if (isBlockedHost(hostname)) {
    return { safe: false, reason: `Blocked host: ${hostname}` };
  }

  if (isIP(hostname)) {
    if (isPrivateIP(hostname)) {
      return { safe: false, reason: `Private IP blocked: ${hostname}` };
    }
    return { safe: true };
  }

  const ips = await resolveHostToIPs(hostname);
  for (const ip of ips) {
    if (isPrivateIP(ip)) {
      return { safe: false, reason: `Hostname resolves to private IP: ${ip}` };
    }
  }

  return { safe: true };
}

export function normalizeUrl(urlString: string, baseUrl?: string): string | null {
  try {
    const url = baseUrl ? new URL(urlString, baseUrl) : new URL(urlString);
    url.hash = "";
    return url.toString();
  } catch {
    return null;
  }
}

export function isSameOrigin(url1: string, url2: string): boolean {
  try {
    return new URL(url1).origin === new URL(url2).origin;
  } catch {
    return false;
  }
}

export function isHttpUrl(urlString: string): boolean {
  try {
    const { protocol } = new URL(urlString);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/** Path plus query, the part of a URL robots.txt rules are matched against. */
export function getRobotsPath(urlString: string): string {
  try {
    const parsed = new URL(urlString);
    return `${parsed.pathname || "/"}${parsed.search}`;
  } catch {
    return "/";
  }
}

export function getOrigin(urlString: string): string | null {
  try {
    return new URL(urlString).origin;
  } catch {
    return null;
  }
}

export function getSitemapUrls(pageUrl: string): string[] {
  const origin = getOrigin(pageUrl);
  if (!origin) return [];
  return [`${origin}/sitemap.xml`, `${origin}/sitemap_index.xml`, `${origin}/sitemap/sitemap.xml`];
}

export function getRobotsUrl(pageUrl: string): string | null {
  const origin = getOrigin(pageUrl);
  return origin ? `${origin}/robots.txt` : null;
}
