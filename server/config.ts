import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./analysis/errors";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  PAGESCOPE_TIMEOUT_MS: z.coerce.number().int().positive().default(12000),
  PAGESCOPE_USER_AGENT: z.string().min(1).default("pagescope/1.0"),
  PAGESCOPE_SCORING_CONFIG: z.string().min(1).optional(),
});

export interface RuntimeConfig {
  port: number;
  timeoutMs: number;
  userAgent: string;
  scoring: unknown;
}

export function loadLocalEnvFiles(): void {
  // process.loadEnvFile only exists from Node 20.12.
  if (typeof process.loadEnvFile !== "function") {
    return;
  }

  for (const envPath of [".env.local", ".env"]) {
    try {
      process.loadEnvFile(envPath);
    } catch (error) {
      const code = error instanceof Error && "code" in error ? error.code : undefined;
      if (code !== "ENOENT") {
        console.warn(`[config] Failed to load ${envPath}:`, error);
      }
    }
  }
}

export function readScoringFile(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read scoring configuration ${path}`, [errorMessage(error)]);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Scoring configuration ${path} is not valid JSON`, [errorMessage(error)]);
  }
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid environment",
      parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const { PORT, PAGESCOPE_TIMEOUT_MS, PAGESCOPE_USER_AGENT, PAGESCOPE_SCORING_CONFIG } = parsed.data;

  return {
    port: PORT,
    timeoutMs: PAGESCOPE_TIMEOUT_MS,
    userAgent: PAGESCOPE_USER_AGENT,
    scoring: PAGESCOPE_SCORING_CONFIG ? readScoringFile(PAGESCOPE_SCORING_CONFIG) : undefined,
  };
}
