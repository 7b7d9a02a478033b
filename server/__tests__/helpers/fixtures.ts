import pino from "pino";
import { AnalyzerConfigSchema } from "../../analyzer/types";
import type { AnalyzerConfig } from "../../analyzer/types";

export const silentLogger = pino({ level: "silent" });

export function testConfig(overrides: Partial<AnalyzerConfig> = {}): AnalyzerConfig {
  return AnalyzerConfigSchema.parse({
    timeoutMs: 1000,
    backoffBaseMs: 1,
    userAgent: "page-inspector-test/1.0",
    ...overrides,
  });
}

export const SITE_URL = "http://site.test/";

export const SAMPLE_PAGE = `<!DOCTYPE html>
<html>
<head>
  <title>Test Page</title>
</head>
<body>
  <h1>Heading 1</h1>
  <h2>Heading 2</h2>
  <h2>Heading 2-2</h2>
  <h3>Heading 3</h3>
  <a href="/">Home</a>
  <a href="/about">About</a>
  <a href="https://external.test/">External</a>
  <form action="/login">
    <input type="text" name="username">
    <input type="password" name="password">
    <button type="submit">Login</button>
  </form>
</body>
</html>`;
