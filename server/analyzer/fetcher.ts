import type { Logger } from "pino";
import type { AnalyzerConfig, FetchLike } from "./types";
import { AnalysisError, describeError, isAbortError } from "./errors";
import { retryWithBackoff, withDeadline } from "./retry";

export interface FetchPageOptions {
  fetch: FetchLike;
  logger: Logger;
  config: Pick<AnalyzerConfig, "timeoutMs" | "userAgent" | "retryAttempts" | "backoffBaseMs">;
  signal?: AbortSignal;
}

class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP error: ${status}${statusText ? ` ${statusText}` : ""}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

function toAnalysisError(error: unknown, url: string, signal?: AbortSignal): AnalysisError {
  if (signal?.aborted) {
    return new AnalysisError("TIMEOUT", `Analysis of ${url} was cancelled`, { cause: error });
  }
  if (isAbortError(error)) {
    return new AnalysisError("TIMEOUT", `Timed out fetching ${url}`, { cause: error });
  }
  if (error instanceof HttpStatusError) {
    return new AnalysisError("FETCH_FAILED", error.message, { cause: error });
  }
  return new AnalysisError("FETCH_FAILED", `Error fetching ${url}: ${describeError(error)}`, { cause: error });
}

/**
 * GETs the page body. Transport failures and non-2xx answers are retried
 * with exponential backoff; whatever the last attempt produced decides the
 * error.
 */
export async function fetchPage(url: string, { fetch, logger, config, signal }: FetchPageOptions): Promise<string> {
  try {
    return await retryWithBackoff(
      async (attempt) => {
        const deadline = withDeadline(signal, config.timeoutMs);

        try {
          const response = await fetch(url, {
            method: "GET",
            signal: deadline.signal,
            headers: {
              "User-Agent": config.userAgent,
              Accept: "text/html,application/xhtml+xml",
            },
          });

          if (!response.ok) {
            await response.body?.cancel();
            throw new HttpStatusError(response.status, response.statusText);
          }

          return await response.text();
        } catch (error) {
          logger.warn({ url, attempt: attempt + 1, error: describeError(error) }, "page fetch attempt failed");
          throw error;
        } finally {
          deadline.dispose();
        }
      },
      { attempts: config.retryAttempts, baseDelayMs: config.backoffBaseMs, signal }
    );
  } catch (error) {
    throw toAnalysisError(error, url, signal);
  }
}
