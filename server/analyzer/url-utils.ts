import { AnalysisError } from "./errors";

const ALLOWED_PROTOCOLS = ["http:", "https:"];

export function parseTargetUrl(urlString: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(urlString);
  } catch (e) {
    throw new AnalysisError("INVALID_URL", `Invalid URL: ${urlString}`, { cause: e });
  }

  if (!ALLOWED_PROTOCOLS.includes(parsed.protocol)) {
    throw new AnalysisError(
      "INVALID_URL",
      `Unsupported URL scheme ${parsed.protocol} (expected http or https)`
    );
  }

  return parsed;
}

export function isSkippableHref(href: string): boolean {
  return href === "" || href.startsWith("javascript:") || href.startsWith("#");
}

export function resolveHref(href: string, baseUrl: URL): URL | null {
  try {
    return new URL(href, baseUrl);
  } catch {
    return null;
  }
}

const SCHEME_PREFIX = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

/**
 * Host and port exactly as written in `ref`, without userinfo. Returns `""`
 * for a scheme with no authority (`mailto:`) and `null` for a reference that
 * inherits the base URL's authority.
 */
export function rawAuthority(ref: string): string | null {
  let rest = ref.trim();

  const scheme = SCHEME_PREFIX.exec(rest);
  if (scheme) {
    rest = rest.slice(scheme[0].length);
    if (!rest.startsWith("//")) return "";
  } else if (!rest.startsWith("//")) {
    return null;
  }

  const authority = rest.slice(2).split(/[/?#]/, 1)[0];
  return authority.slice(authority.lastIndexOf("@") + 1);
}

/** The analyzed page's authority as the caller wrote it. */
export function targetAuthority(raw: string, parsed: URL): string {
  return rawAuthority(raw) || parsed.host;
}

// Case-sensitive; an explicit port, even the default one, makes a different host.
export function isInternalHref(href: string, baseAuthority: string): boolean {
  const authority = rawAuthority(href);
  return authority === null || authority === "" || authority === baseAuthority;
}

export function isProbeableUrl(urlString: string): boolean {
  try {
    return ALLOWED_PROTOCOLS.includes(new URL(urlString).protocol);
  } catch {
    return false;
  }
}
