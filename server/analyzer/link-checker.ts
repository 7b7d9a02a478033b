import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AnalyzerConfig, FetchLike } from "./types";
import { describeError } from "./errors";
import { retryWithBackoff, withDeadline } from "./retry";
import { isProbeableUrl } from "./url-utils";

export type LinkCheckerConfig = Pick<
  AnalyzerConfig,
  "timeoutMs" | "userAgent" | "retryAttempts" | "backoffBaseMs" | "maxConcurrentLinks"
>;

export interface LinkCheckerDeps {
  fetch: FetchLike;
  logger: Logger;
  config: LinkCheckerConfig;
}

type ProbeMethod = "HEAD" | "GET";

/**
 * Probes links with HEAD, falling back to GET. Redirects are not followed:
 * a 3xx answer to HEAD counts as accessible, to GET it does not.
 */
export class LinkChecker {
  private readonly fetch: FetchLike;
  private readonly logger: Logger;
  private readonly config: LinkCheckerConfig;

  constructor({ fetch, logger, config }: LinkCheckerDeps) {
    this.fetch = fetch;
    this.logger = logger;
    this.config = config;
  }

  private async probe(url: string, method: ProbeMethod, signal?: AbortSignal): Promise<number> {
    const deadline = withDeadline(signal, this.config.timeoutMs);

    try {
      const response = await this.fetch(url, {
        method,
        signal: deadline.signal,
        redirect: "manual",
        headers: { "User-Agent": this.config.userAgent },
      });
      const status = response.status;
      await response.body?.cancel();
      return status;
    } finally {
      deadline.dispose();
    }
  }

  async checkAccessibility(url: string, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted || !isProbeableUrl(url)) return false;

    try {
      const status = await this.probe(url, "HEAD", signal);
      if (status >= 200 && status < 400) return true;
      this.logger.debug({ url, status }, "HEAD probe unsuccessful, falling back to GET");
    } catch (error) {
      if (signal?.aborted) return false;
      this.logger.debug({ url, error: describeError(error) }, "HEAD probe failed, falling back to GET");
    }

    try {
      const status = await this.probe(url, "GET", signal);
      return status >= 200 && status < 300;
    } catch (error) {
      this.logger.debug({ url, error: describeError(error) }, "GET probe failed");
      return false;
    }
  }

  async checkWithRetry(url: string, signal?: AbortSignal): Promise<boolean> {
    try {
      return await retryWithBackoff(
        async () => {
          if (await this.checkAccessibility(url, signal)) return true;
          throw new Error(`Link not accessible: ${url}`);
        },
        {
          attempts: this.config.retryAttempts,
          baseDelayMs: this.config.backoffBaseMs,
          signal,
          shouldRetry: () => isProbeableUrl(url),
        }
      );
    } catch (error) {
      this.logger.debug({ url, error: describeError(error) }, "link check gave up");
      return false;
    }
  }

  /**
   * Checks every distinct URL with at most `maxConcurrentLinks` checks in
   * flight. Each check reports its own outcome; the map is built from the
   * collected outcomes once all have settled.
   */
  async checkAll(urls: readonly string[], signal?: AbortSignal): Promise<Map<string, boolean>> {
    const limit = pLimit(this.config.maxConcurrentLinks);
    const unique = Array.from(new Set(urls));

    const outcomes = await Promise.all(
      unique.map((url) =>
        limit(async (): Promise<[string, boolean]> => {
          const isAccessible = signal?.aborted ? false : await this.checkWithRetry(url, signal);
          this.logger.debug({ url, isAccessible }, "link checked");
          return [url, isAccessible];
        })
      )
    );

    return new Map(outcomes);
  }
}
