#!/usr/bin/env node
import { writeFileSync } from "node:fs";
import { Command } from "commander";
import pLimit from "p-limit";
import { z } from "zod";
import { runAnalysis } from "./analysis";
import { errorMessage } from "./analysis/errors";
import { renderBatch, type BatchEntry } from "./export";
import { loadLocalEnvFiles, loadRuntimeConfig, readScoringFile } from "./config";

const CliOptionsSchema = z.object({
  timeoutMs: z.coerce.number().int().positive().optional(),
  userAgent: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().positive(),
  format: z.enum(["json", "markdown"]),
  config: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

const program = new Command();

program
  .name("pagescope")
  .description("Score web pages on SEO structure, structural heuristics, crawlability and text readability")
  .version("1.0.0")
  .argument("<urls...>", "One or more page URLs to analyze")
  .option("--timeoutMs <number>", "Request timeout in milliseconds")
  .option("--userAgent <string>", "User agent string")
  .option("--concurrency <number>", "Number of pages analyzed at once", "2")
  .option("--format <format>", "Output format: json or markdown", "json")
  .option("--config <file>", "Scoring configuration JSON file (weights, curves, thresholds)")
  .option("--output <file>", "Write the result to a file instead of stdout")
  .option("--verbose", "Log progress to stderr")
  .action(async (urls: string[], rawOptions: Record<string, unknown>) => {
    try {
      loadLocalEnvFiles();
      const runtime = loadRuntimeConfig();
      const options = CliOptionsSchema.parse(rawOptions);
      const scoring = options.config ? readScoringFile(options.config) : runtime.scoring;

      const log = options.verbose ? (message: string) => console.error(message) : () => undefined;
      const limit = pLimit(options.concurrency);

      const entries = await Promise.all(
        urls.map((url) =>
          limit(async (): Promise<BatchEntry> => {
            try {
              const report = await runAnalysis(
                {
                  url,
                  timeoutMs: options.timeoutMs ?? runtime.timeoutMs,
                  userAgent: options.userAgent ?? runtime.userAgent,
                  scoring,
                },
                { log }
              );
              return { url, report };
            } catch (error) {
              if (urls.length === 1) throw error;
              return { url, error: errorMessage(error) };
            }
          })
        )
      );

      const rendered = renderBatch(entries, options.format);
      if (options.output) {
        writeFileSync(options.output, rendered.endsWith("\n") ? rendered : `${rendered}\n`, "utf8");
        log(`[cli] Results saved to ${options.output}`);
      } else {
        console.log(rendered);
      }

      process.exitCode = entries.some((entry) => "error" in entry) ? 1 : 0;
    } catch (error) {
      console.error(
        JSON.stringify(
          {
            error: true,
            message: errorMessage(error) || "Unknown error occurred",
          },
          null,
          2
        )
      );
      process.exit(1);
    }
  });

await program.parseAsync(process.argv);
