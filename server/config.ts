import { existsSync, readFileSync } from "fs";
import * as dotenv from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { AnalyzerConfigSchema } from "./analyzer/types";
import { describeError } from "./analyzer/errors";

export const DEFAULT_CONFIG_PATH = "config/application.yaml";

export const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  requestTimeoutMs: z.number().int().positive().default(30000),
});

export const AppConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  analyzer: AnalyzerConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

function readConfigFile(configPath: string): unknown {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    return parseYaml(readFileSync(configPath, "utf-8")) ?? {};
  } catch (error) {
    throw new Error(`Error parsing config file ${configPath}: ${describeError(error)}`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Loads `.env`, then the YAML file named by CONFIG_PATH (optional), and
 * validates the result. PORT overrides server.port.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  dotenv.config();

  const configPath = env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const raw = readConfigFile(configPath);

  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid configuration in ${configPath}: ${formatIssues(parsed.error)}`);
  }

  if (!env.PORT) {
    return parsed.data;
  }

  const port = ServerConfigSchema.shape.port.safeParse(env.PORT);
  if (!port.success) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return { ...parsed.data, server: { ...parsed.data.server, port: port.data } };
}
