export const AI_CRAWLER_USER_AGENTS = [
  "GPTBot",
  "ChatGPT-User",
  "OAI-SearchBot",
  "ClaudeBot",
  "Claude-Web",
  "anthropic-ai",
  "Google-Extended",
  "CCBot",
  "PerplexityBot",
  "Amazonbot",
  "Applebot-Extended",
  "Bytespider",
  "YouBot",
  "Meta-ExternalAgent",
  "cohere-ai",
] as const;

export interface RobotsRule {
  type: "allow" | "disallow";
  path: string;
}

export interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
}

export interface ParsedRobots {
  groups: RobotsGroup[];
  sitemaps: string[];
}

/**
 * Parses robots.txt into user-agent groups. Consecutive `User-agent` lines
 * share one group; a `User-agent` line after a rule starts a new one.
 */
export function parseRobotsTxt(content: string): ParsedRobots {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, "").trim();
    if (!line) continue;

    const separator = line.indexOf(":");
    if (separator === -1) continue;

    const field = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (field === "user-agent") {
      if (!current || !collectingAgents) {
        current = { agents: [], rules: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      collectingAgents = true;
      continue;
    }

    if (field === "sitemap") {
      if (value) sitemaps.push(value);
      continue;
    }

    collectingAgents = false;
    if (!current) continue;

    if (field === "allow" || field === "disallow") {
      current.rules.push({ type: field, path: value });
    }
  }

  return { groups, sitemaps };
}

export function groupsNamed(robots: ParsedRobots, agent: string): RobotsGroup[] {
  const needle = agent.toLowerCase();
  return robots.groups.filter((group) => group.agents.includes(needle));
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith("$");
  const body = (anchored ? pattern.slice(0, -1) : pattern)
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}${anchored ? "$" : ""}`);
}

/** Longest matching rule wins; `Allow` wins a tie. Empty paths match nothing. */
export function isPathAllowed(groups: RobotsGroup[], path: string): boolean {
  let best: RobotsRule | null = null;

  for (const rule of groups.flatMap((group) => group.rules)) {
    if (!rule.path) continue;
    if (!patternToRegExp(rule.path).test(path)) continue;

    if (
      !best ||
      rule.path.length > best.path.length ||
      (rule.path.length === best.path.length && rule.type === "allow")
    ) {
      best = rule;
    }
  }

  return !best || best.type === "allow";
}

/** Applies the agent's own groups, falling back to `*` as crawlers do. */
export function isAllowedFor(robots: ParsedRobots, agent: string, path: string): boolean {
  const specific = groupsNamed(robots, agent);
  if (specific.length > 0) return isPathAllowed(specific, path);
  return isPathAllowed(groupsNamed(robots, "*"), path);
}
