import { z } from "zod";

export const LoginFormPolicySchema = z.enum(["permissive", "strict"]);

export const AnalyzerConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(10000),
  maxConcurrentLinks: z.number().int().positive().default(10),
  userAgent: z.string().min(1).default("Mozilla/5.0 (compatible; PageInspector/1.0)"),
  retryAttempts: z.number().int().positive().default(3),
  backoffBaseMs: z.number().int().nonnegative().default(1000),
  maxLinksPerPage: z.number().int().positive().default(100),
  loginFormPolicy: LoginFormPolicySchema.default("permissive"),
  enableMetrics: z.boolean().default(true),
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;
export type LoginFormPolicy = z.infer<typeof LoginFormPolicySchema>;

const HTML_VERSIONS = ["HTML5", "HTML4.01", "XHTML1.0", "XHTML1.1", "Unknown"] as const;
export type HtmlVersion = (typeof HTML_VERSIONS)[number];

export const HEADING_LEVELS = ["h1", "h2", "h3", "h4", "h5", "h6"] as const;
export type HeadingLevel = (typeof HEADING_LEVELS)[number];

export type HeadingCounts = Partial<Record<HeadingLevel, number>>;

export interface LinkRecord {
  /** The href exactly as written in the markup. */
  url: string;
  isInternal: boolean;
  isAccessible: boolean;
}

export interface AnalysisResult {
  url: string;
  htmlVersion: HtmlVersion;
  title: string;
  headings: Readonly<HeadingCounts>;
  links: ReadonlyArray<Readonly<LinkRecord>>;
  accessibleLinks: number;
  hasLoginForm: boolean;
}

export interface LinkSummary {
  internal: number;
  external: number;
  inaccessible: number;
}

export interface FormDescriptor {
  hasPasswordInput: boolean;
  hasUsernameLikeInput: boolean;
  hasSubmitControl: boolean;
  actionSuggestsLogin: boolean;
}

export type AnalysisState =
  | "Created"
  | "Fetching"
  | "Parsing"
  | "Extracting"
  | "CheckingLinks"
  | "ClassifyingForms"
  | "Assembled"
  | "Failed";

/** Minimal shape of the WHATWG fetch the analyzer depends on. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export function summarizeLinks(result: Pick<AnalysisResult, "links" | "accessibleLinks">): LinkSummary {
  const internal = result.links.filter((link) => link.isInternal).length;
  return {
    internal,
    external: result.links.length - internal,
    inaccessible: result.links.length - result.accessibleLinks,
  };
}
