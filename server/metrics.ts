import { HEADING_LEVELS, summarizeLinks } from "./analyzer/types";
import type { AnalysisResult, HeadingLevel, HtmlVersion, LinkSummary } from "./analyzer/types";

export interface MetricsSink {
  recordRequest(): void;
  recordDuration(durationMs: number): void;
  /** `code` is an analysis error code, or INTERNAL for anything untyped. */
  recordError(code: string): void;
  recordResult(result: AnalysisResult): void;
}

export interface DurationStats {
  count: number;
  totalMs: number;
  avgMs: number;
  maxMs: number;
}

export interface MetricsSnapshot {
  analysisRequests: number;
  analysisErrors: number;
  errorsByCode: Record<string, number>;
  duration: DurationStats;
  links: LinkSummary;
  headings: Record<HeadingLevel, number>;
  loginForms: number;
  htmlVersions: Record<HtmlVersion, number>;
}

/** In-process counters; the snapshot is what `/api/metrics` serves. */
export class MemoryMetricsSink implements MetricsSink {
  private requests = 0;
  private errors: Record<string, number> = {};
  private duration = { count: 0, totalMs: 0, maxMs: 0 };
  private links: LinkSummary = { internal: 0, external: 0, inaccessible: 0 };
  private headings: Record<HeadingLevel, number> = { h1: 0, h2: 0, h3: 0, h4: 0, h5: 0, h6: 0 };
  private loginForms = 0;
  private htmlVersions: Record<HtmlVersion, number> = {
    HTML5: 0,
    "HTML4.01": 0,
    "XHTML1.0": 0,
    "XHTML1.1": 0,
    Unknown: 0,
  };

  recordRequest(): void {
    this.requests += 1;
  }

  recordDuration(durationMs: number): void {
    this.duration = {
      count: this.duration.count + 1,
      totalMs: this.duration.totalMs + durationMs,
      maxMs: Math.max(this.duration.maxMs, durationMs),
    };
  }

  recordError(code: string): void {
    this.errors[code] = (this.errors[code] ?? 0) + 1;
  }

  recordResult(result: AnalysisResult): void {
    const summary = summarizeLinks(result);
    this.links = {
      internal: this.links.internal + summary.internal,
      external: this.links.external + summary.external,
      inaccessible: this.links.inaccessible + summary.inaccessible,
    };

    for (const level of HEADING_LEVELS) {
      this.headings[level] += result.headings[level] ?? 0;
    }

    if (result.hasLoginForm) {
      this.loginForms += 1;
    }

    this.htmlVersions[result.htmlVersion] += 1;
  }

  getSnapshot(): MetricsSnapshot {
    const { count, totalMs, maxMs } = this.duration;

    return {
      analysisRequests: this.requests,
      analysisErrors: Object.values(this.errors).reduce((sum, n) => sum + n, 0),
      errorsByCode: { ...this.errors },
      duration: {
        count,
        totalMs,
        avgMs: count === 0 ? 0 : Math.round(totalMs / count),
        maxMs,
      },
      links: { ...this.links },
      headings: { ...this.headings },
      loginForms: this.loginForms,
      htmlVersions: { ...this.htmlVersions },
    };
  }
}

export const noopMetrics: MetricsSink = {
  recordRequest: () => undefined,
  recordDuration: () => undefined,
  recordError: () => undefined,
  recordResult: () => undefined,
};
