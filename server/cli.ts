#!/usr/bin/env node
import { Command } from "commander";
import { PageAnalyzer, AnalyzerConfigSchema, summarizeLinks, isAnalysisError } from "./analyzer";
import { describeError } from "./analyzer/errors";
import { createLogger } from "./logger";

const program = new Command();

program
  .name("page-inspector")
  .description("Analyze a single web page: HTML version, title, headings, links and login forms")
  .version("1.0.0")
  .argument("<url>", "Absolute http(s) URL of the page to analyze")
  .option("--timeoutMs <number>", "Per-request timeout in milliseconds", "10000")
  .option("--concurrency <number>", "Maximum concurrent link checks", "10")
  .option("--retries <number>", "Attempts for the page fetch and each link check", "3")
  .option("--maxLinks <number>", "Maximum distinct links to check", "100")
  .option("--userAgent <string>", "User agent string", "Mozilla/5.0 (compatible; PageInspector/1.0)")
  .option("--loginPolicy <policy>", "Login form heuristic: permissive or strict", "permissive")
  .option("--logLevel <level>", "Log level written to stderr", "warn")
  .action(async (url: string, options: Record<string, string>) => {
    const logger = createLogger({ level: options.logLevel, stderr: true });

    try {
      const config = AnalyzerConfigSchema.parse({
        timeoutMs: parseInt(options.timeoutMs, 10),
        maxConcurrentLinks: parseInt(options.concurrency, 10),
        retryAttempts: parseInt(options.retries, 10),
        maxLinksPerPage: parseInt(options.maxLinks, 10),
        userAgent: options.userAgent,
        loginFormPolicy: options.loginPolicy,
        enableMetrics: false,
      });

      const analyzer = new PageAnalyzer({ config, logger });

      const controller = new AbortController();
      process.once("SIGINT", () => controller.abort());

      const result = await analyzer.analyze(url, { signal: controller.signal });

      console.log(JSON.stringify({ ...result, summary: summarizeLinks(result) }, null, 2));

      process.exit(0);
    } catch (error) {
      console.error(
        JSON.stringify(
          {
            error: true,
            code: isAnalysisError(error) ? error.code : "INTERNAL",
            message: describeError(error),
          },
          null,
          2
        )
      );
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
