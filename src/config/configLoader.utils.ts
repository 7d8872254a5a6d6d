import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { ZodError } from "zod";
import { ConfigError } from "./ConfigError.js";
import {
  DEFAULTS,
  EnvironmentSchema,
  type FileConfig,
  FileConfigSchema,
  type RuntimeConfig,
} from "./Config.schemas.js";

/**
 * Supported config file name, looked up in the working directory.
 */
export const CONFIG_FILE_NAME = "graph-janitor.config.json" as const;

/**
 * Find a config file in the given directory.
 *
 * @returns Path to config file, or null if not found
 */
export const findConfigFile = (directory: string): string | null => {
  const configPath = join(directory, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
};

const describeIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

/**
 * Parse and validate config content.
 * Pure function - unit tested.
 *
 * @param content - Raw JSON string from config file
 * @throws Error if JSON is invalid or config structure is invalid
 */
export const parseConfig = (content: string): FileConfig => {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }

  return FileConfigSchema.parse(rawConfig);
};

/**
 * Load and validate a JSON config file.
 * Thin I/O wrapper around parseConfig.
 */
export const loadConfig = (configPath: string): FileConfig => {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return parseConfig(content);
  } catch (e) {
    if (e instanceof Error && e.message === "Invalid JSON") {
      throw new ConfigError(`Failed to parse JSON config: ${configPath}`);
    }
    if (e instanceof ZodError) {
      throw new ConfigError(`Invalid config ${configPath}: ${describeIssues(e)}`, { cause: e });
    }
    throw e;
  }
};

/**
 * Load the explicit config file when one is given, otherwise the one in
 * the directory, otherwise an empty config.
 */
export const loadConfigOrDefault = (
  directory: string,
  explicitPath?: string,
): FileConfig => {
  if (explicitPath !== undefined) {
    return loadConfig(explicitPath);
  }
  const configPath = findConfigFile(directory);
  return configPath ? loadConfig(configPath) : {};
};

export interface ConfigSources {
  fileConfig: FileConfig;
  env: Record<string, string | undefined>;
  flags: { graphId?: string };
}

const nonEmpty = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === "" ? undefined : value.trim();

/**
 * Merge file, environment and flags into the settings of a run.
 * Precedence: flag > environment > config file > default.
 * Pure function - unit tested.
 *
 * @throws ConfigError when the API key is missing or a variable is invalid
 */
export const resolveRuntimeConfig = (sources: ConfigSources): RuntimeConfig => {
  const { fileConfig, flags } = sources;
  const parsed = EnvironmentSchema.safeParse({
    GRAPH_JANITOR_API_KEY: nonEmpty(sources.env.GRAPH_JANITOR_API_KEY),
    GRAPH_JANITOR_GRAPH_ID: nonEmpty(sources.env.GRAPH_JANITOR_GRAPH_ID),
    GRAPH_JANITOR_BASE_URL: nonEmpty(sources.env.GRAPH_JANITOR_BASE_URL),
  });
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error), { cause: parsed.error });
  }
  const env = parsed.data;

  const apiKey = env.GRAPH_JANITOR_API_KEY;
  if (apiKey === undefined) {
    throw new ConfigError("GRAPH_JANITOR_API_KEY is not set");
  }

  return {
    apiKey,
    baseUrl: env.GRAPH_JANITOR_BASE_URL ?? fileConfig.api?.baseUrl ?? DEFAULTS.baseUrl,
    requestTimeoutMs: fileConfig.api?.requestTimeoutMs ?? DEFAULTS.requestTimeoutMs,
    defaultGraphId: nonEmpty(flags.graphId) ?? env.GRAPH_JANITOR_GRAPH_ID ?? fileConfig.graphId,
    pageSize: fileConfig.pageSize ?? DEFAULTS.pageSize,
    retry: {
      maxAttempts: fileConfig.retry?.maxAttempts ?? DEFAULTS.retry.maxAttempts,
      baseDelayMs: fileConfig.retry?.baseDelayMs ?? DEFAULTS.retry.baseDelayMs,
      maxDelayMs: fileConfig.retry?.maxDelayMs ?? DEFAULTS.retry.maxDelayMs,
    },
  };
};
