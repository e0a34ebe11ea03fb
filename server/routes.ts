import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { runAnalysis, AnalysisError } from "./analysis";
import { errorMessage } from "./analysis/errors";
import { generateMarkdown } from "./export";
import type { RuntimeConfig } from "./config";
import type { AnalyzeRequest } from "../shared/analysis-types";

const AnalyzeRequestSchema = z.object({
  url: z.string().url(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  userAgent: z.string().min(1).optional(),
  scoring: z.unknown().optional(),
  format: z.enum(["json", "markdown"]).default("json"),
});

export function statusForError(error: unknown): number {
  if (error instanceof z.ZodError) return 400;
  if (error instanceof AnalysisError) {
    switch (error.code) {
      case "CONFIGURATION":
        return 400;
      case "FETCH":
        return 502;
      default:
        return 500;
    }
  }
  return 500;
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  config: RuntimeConfig
): Promise<Server> {
  app.post("/api/analyze", async (req: Request, res: Response) => {
    const parsed = AnalyzeRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: true,
        message: "Invalid request body",
        details: parsed.error.errors,
      });
      return;
    }

    const request: AnalyzeRequest = parsed.data;

    try {
      const report = await runAnalysis({
        url: request.url,
        timeoutMs: request.timeoutMs ?? config.timeoutMs,
        userAgent: request.userAgent ?? config.userAgent,
        scoring: request.scoring ?? config.scoring,
      });

      if (request.format === "markdown") {
        res.setHeader("Content-Type", "text/markdown");
        res.send(generateMarkdown(report));
        return;
      }

      res.json(report);
    } catch (error) {
      const statusCode = statusForError(error);
      if (statusCode === 500) {
        console.error(`[routes] Analysis of ${request.url} failed:`, error);
      }

      res.status(statusCode).json({
        error: true,
        message: errorMessage(error) || "An error occurred during the analysis",
      });
    }
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  return httpServer;
}
