import type { Express, Request, Response } from "express";
import type { Server } from "http";
import type { Logger } from "pino";
import { z } from "zod";
import { isAnalysisError, summarizeLinks } from "./analyzer";
import type { AnalysisErrorCode, PageAnalyzer } from "./analyzer";
import { describeError } from "./analyzer/errors";
import { withDeadline } from "./analyzer/retry";
import type { MemoryMetricsSink } from "./metrics";

const AnalyzeRequestSchema = z.object({
  url: z.string().trim().min(1, "URL cannot be empty"),
});

const STATUS_BY_CODE: Record<AnalysisErrorCode, number> = {
  INVALID_URL: 400,
  FETCH_FAILED: 502,
  PARSE_FAILED: 422,
  TIMEOUT: 504,
  MAX_LINKS_REACHED: 500,
  MAX_DEPTH_REACHED: 500,
};

export interface RouteDeps {
  analyzer: PageAnalyzer;
  metrics: MemoryMetricsSink;
  logger: Logger;
  requestTimeoutMs: number;
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  { analyzer, metrics, logger, requestTimeoutMs }: RouteDeps
): Promise<Server> {
  app.post("/api/analyze", async (req: Request, res: Response) => {
    const parsed = AnalyzeRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: true,
        code: "INVALID_URL",
        message: "Invalid request body",
        details: parsed.error.errors,
      });
      return;
    }

    const deadline = withDeadline(undefined, requestTimeoutMs);
    const abortOnDisconnect = () => {
      if (!res.writableEnded) {
        deadline.abort();
      }
    };
    res.on("close", abortOnDisconnect);

    try {
      const result = await analyzer.analyze(parsed.data.url, { signal: deadline.signal });
      res.json({ ...result, summary: summarizeLinks(result) });
    } catch (error) {
      if (isAnalysisError(error)) {
        res.status(STATUS_BY_CODE[error.code]).json({
          error: true,
          code: error.code,
          message: error.message,
        });
        return;
      }

      logger.error({ error: describeError(error) }, "unexpected error while analyzing");
      res.status(500).json({
        error: true,
        code: "INTERNAL",
        message: "An error occurred during the analysis",
      });
    } finally {
      res.off("close", abortOnDisconnect);
      deadline.dispose();
    }
  });

  app.get("/api/metrics", (_req: Request, res: Response) => {
    res.json(metrics.getSnapshot());
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: "page-inspector" });
  });

  return httpServer;
}
