import { parseDocument } from "htmlparser2";
import { isDirective, isTag, isText, hasChildren } from "domhandler";
import type { AnyNode, Document, Element } from "domhandler";
import type { HeadingCounts, HeadingLevel, HtmlVersion } from "./types";
import { AnalysisError } from "./errors";
import { isInternalHref, isSkippableHref, resolveHref } from "./url-utils";

const HEADING_TAG = /^h[1-6]$/;

export interface ExtractedLink {
  href: string;
  /** Absolute form without the fragment; links are probed under this key. */
  resolvedUrl: string;
  isInternal: boolean;
}

export interface PageFacts {
  htmlVersion: HtmlVersion;
  title: string;
  headings: HeadingCounts;
  links: ExtractedLink[];
  forms: Element[];
}

export function parseHtml(html: string): Document {
  try {
    return parseDocument(html);
  } catch (e) {
    throw new AnalysisError("PARSE_FAILED", "Failed to parse HTML", { cause: e });
  }
}

export function classifyDoctype(doctype: string | null): HtmlVersion {
  if (doctype === null) return "Unknown";

  const text = doctype.toLowerCase();
  if (text.includes("html 5") || text === "html") return "HTML5";
  if (text.includes("html 4.01")) return "HTML4.01";
  if (text.includes("xhtml 1.0")) return "XHTML1.0";
  if (text.includes("xhtml 1.1")) return "XHTML1.1";
  return "Unknown";
}

function isHeadingTag(name: string): name is HeadingLevel {
  return HEADING_TAG.test(name);
}

function doctypeText(data: string): string {
  return data.replace(/^!?doctype\s*/i, "").trim();
}

function titleText(element: Element): string | null {
  const first = element.firstChild;
  return first && isText(first) ? first.data.trim() : null;
}

function linkOf(element: Element, baseUrl: URL, baseAuthority: string): ExtractedLink | null {
  const href = element.attribs.href;
  if (typeof href !== "string" || isSkippableHref(href)) return null;

  const resolved = resolveHref(href, baseUrl);
  if (!resolved) return null;
  resolved.hash = "";

  return {
    href,
    resolvedUrl: resolved.toString(),
    isInternal: isInternalHref(href, baseAuthority),
  };
}

/**
 * Walks the tree once in document order. `baseAuthority` is the page's
 * host and port as written, used for the internal/external split.
 */
export function extractPageFacts(
  document: Document,
  baseUrl: URL,
  baseAuthority: string = baseUrl.host
): PageFacts {
  let doctype: string | null = null;
  let title: string | null = null;
  const headings: HeadingCounts = {};
  const links: ExtractedLink[] = [];
  const forms: Element[] = [];

  // Explicit stack: nesting depth is bounded only by the document.
  const pending: AnyNode[] = [document];
  let node = pending.pop();

  while (node !== undefined) {
    if (isDirective(node)) {
      if (doctype === null && node.name.toLowerCase() === "!doctype") {
        doctype = doctypeText(node.data);
      }
    } else if (isTag(node)) {
      const name = node.name;

      if (isHeadingTag(name)) {
        headings[name] = (headings[name] ?? 0) + 1;
      } else if (name === "title") {
        if (title === null) title = titleText(node);
      } else if (name === "a") {
        const link = linkOf(node, baseUrl, baseAuthority);
        if (link) links.push(link);
      } else if (name === "form") {
        forms.push(node);
      }
    }

    if (hasChildren(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        pending.push(node.children[i]);
      }
    }
    node = pending.pop();
  }

  return {
    htmlVersion: classifyDoctype(doctype),
    title: title ?? "",
    headings,
    links,
    forms,
  };
}
