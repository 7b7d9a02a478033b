import { load } from "cheerio";
import type { Logger } from "pino";
import type { AnalysisResult, AnalysisState, AnalyzerConfig, FetchLike, LinkRecord } from "./types";
import type { MetricsSink } from "../metrics";
import { noopMetrics } from "../metrics";
import { AnalysisError, describeError, isAnalysisError } from "./errors";
import { extractPageFacts, parseHtml } from "./extractor";
import type { ExtractedLink, PageFacts } from "./extractor";
import { fetchPage } from "./fetcher";
import { hasLoginForm } from "./forms";
import { LinkChecker } from "./link-checker";
import { parseTargetUrl, targetAuthority } from "./url-utils";

export const ANALYSIS_TRANSITIONS: Record<AnalysisState, readonly AnalysisState[]> = {
  Created: ["Fetching", "Failed"],
  Fetching: ["Parsing", "Failed"],
  Parsing: ["Extracting", "Failed"],
  Extracting: ["CheckingLinks", "Failed"],
  CheckingLinks: ["ClassifyingForms", "Failed"],
  ClassifyingForms: ["Assembled", "Failed"],
  Assembled: [],
  Failed: [],
};

export interface PageAnalyzerDeps {
  config: AnalyzerConfig;
  logger: Logger;
  metrics?: MetricsSink;
  fetch?: FetchLike;
}

export interface AnalyzeOptions {
  /** Cancels the page fetch, every link probe and every backoff wait. */
  signal?: AbortSignal;
  onStateChange?: (state: AnalysisState) => void;
}

class AnalysisRun {
  private current: AnalysisState = "Created";

  constructor(
    private readonly logger: Logger,
    private readonly onStateChange?: (state: AnalysisState) => void
  ) {}

  get state(): AnalysisState {
    return this.current;
  }

  advance(next: AnalysisState): void {
    if (!ANALYSIS_TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal analysis state transition: ${this.current} -> ${next}`);
    }
    this.logger.debug({ from: this.current, to: next }, "analysis state changed");
    this.current = next;
    this.onStateChange?.(next);
  }

  fail(): void {
    if (ANALYSIS_TRANSITIONS[this.current].includes("Failed")) {
      this.advance("Failed");
    }
  }
}

function cancelled(url: string, signal: AbortSignal): AnalysisError {
  return new AnalysisError("TIMEOUT", `Analysis of ${url} was cancelled`, { cause: signal.reason });
}

function assemble(
  url: string,
  facts: PageFacts,
  accessibility: Map<string, boolean>,
  loginForm: boolean
): AnalysisResult {
  const links = facts.links.map(
    (link): Readonly<LinkRecord> =>
      Object.freeze({
        url: link.href,
        isInternal: link.isInternal,
        isAccessible: accessibility.get(link.resolvedUrl) ?? false,
      })
  );

  return Object.freeze({
    url,
    htmlVersion: facts.htmlVersion,
    title: facts.title,
    headings: Object.freeze({ ...facts.headings }),
    links: Object.freeze(links),
    accessibleLinks: links.filter((link) => link.isAccessible).length,
    hasLoginForm: loginForm,
  });
}

export class PageAnalyzer {
  private readonly config: AnalyzerConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsSink;
  private readonly fetch: FetchLike;
  private readonly linkChecker: LinkChecker;

  constructor({ config, logger, metrics, fetch }: PageAnalyzerDeps) {
    this.config = config;
    this.logger = logger;
    this.metrics = config.enableMetrics && metrics ? metrics : noopMetrics;
    this.fetch = fetch ?? ((url, init) => globalThis.fetch(url, init));
    this.linkChecker = new LinkChecker({ fetch: this.fetch, logger, config });
  }

  async analyze(url: string, { signal, onStateChange }: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const startTime = Date.now();
    const log = this.logger.child({ url });
    const run = new AnalysisRun(log, onStateChange);

    this.record((sink) => sink.recordRequest());
    log.info("analysis started");

    try {
      const result = await this.execute(url, run, log, signal);
      log.info(
        { durationMs: Date.now() - startTime, links: result.links.length, accessibleLinks: result.accessibleLinks },
        "analysis completed"
      );
      this.record((sink) => sink.recordResult(result));
      return result;
    } catch (error) {
      run.fail();
      const code = isAnalysisError(error) ? error.code : "INTERNAL";
      log.error({ code, state: run.state, error: describeError(error) }, "analysis failed");
      this.record((sink) => sink.recordError(code));
      throw error;
    } finally {
      const durationMs = Date.now() - startTime;
      this.record((sink) => sink.recordDuration(durationMs));
    }
  }

  private async execute(url: string, run: AnalysisRun, log: Logger, signal?: AbortSignal): Promise<AnalysisResult> {
    const baseUrl = parseTargetUrl(url);
    if (signal?.aborted) throw cancelled(url, signal);

    run.advance("Fetching");
    const html = await fetchPage(url, { fetch: this.fetch, logger: log, config: this.config, signal });

    run.advance("Parsing");
    const document = parseHtml(html);

    run.advance("Extracting");
    const facts = extractPageFacts(document, baseUrl, targetAuthority(url, baseUrl));

    run.advance("CheckingLinks");
    const accessibility = this.checkLinks(facts.links, log, signal);

    run.advance("ClassifyingForms");
    const [outcomes, loginForm] = await Promise.all([
      accessibility,
      Promise.resolve(hasLoginForm(load(document), facts.forms, this.config.loginFormPolicy)),
    ]);

    // Probes that observed cancellation report false; that is not a result.
    if (signal?.aborted) throw cancelled(url, signal);

    run.advance("Assembled");
    return assemble(url, facts, outcomes, loginForm);
  }

  private checkLinks(links: readonly ExtractedLink[], log: Logger, signal?: AbortSignal): Promise<Map<string, boolean>> {
    const distinct = Array.from(new Set(links.map((link) => link.resolvedUrl)));
    const { maxLinksPerPage } = this.config;

    if (distinct.length > maxLinksPerPage) {
      log.warn(
        { code: "MAX_LINKS_REACHED", distinctUrls: distinct.length, maxLinksPerPage },
        "link check cap reached, unchecked links are reported inaccessible"
      );
    }

    return this.linkChecker.checkAll(distinct.slice(0, maxLinksPerPage), signal);
  }

  private record(emit: (sink: MetricsSink) => void): void {
    try {
      emit(this.metrics);
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, "metrics sink failed");
    }
  }
}

export { AnalyzerConfigSchema, summarizeLinks } from "./types";
export type { AnalysisResult, AnalyzerConfig, LinkRecord, HtmlVersion, AnalysisState } from "./types";
export { AnalysisError, isAnalysisError } from "./errors";
export type { AnalysisErrorCode } from "./errors";
