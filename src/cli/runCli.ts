import { resolve } from "node:path";
import { type ExitCode, EXIT_CODES, runAction } from "../actions/runAction.js";
import { formatOutcome } from "../actions/formatReport.js";
import { createHttpGraphApi } from "../api/createHttpGraphApi.js";
import { createGraphClient } from "../client/createGraphClient.js";
import { ConfigError } from "../config/ConfigError.js";
import type { RuntimeConfig } from "../config/Config.schemas.js";
import { loadConfigOrDefault, resolveRuntimeConfig } from "../config/configLoader.utils.js";
import { createConsoleConfirmer } from "../deletion/createConsoleConfirmer.js";
import { createConsoleJanitorLogger } from "../logging/ConsoleJanitorLogger.js";
import { type CliOptions, parseCliArgs, USAGE } from "./parseCliArgs.js";

/**
 * Process state the CLI runs against.
 */
export interface CliEnvironment {
  /** Arguments after the script path */
  args: string[];
  env: Record<string, string | undefined>;
  cwd: string;
  stdin: NodeJS.ReadableStream;
  /** Reports and the outcome line */
  stdout: NodeJS.WritableStream;
  /** Logs, usage errors */
  stderr: NodeJS.WritableStream;
  /** Aborted on user interrupt */
  signal?: AbortSignal;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

const SINGLE_ITEM_ACTIONS: ReadonlySet<CliOptions["action"]> = new Set([
  "delete_node",
  "delete_edge",
]);

/**
 * Run graph-janitor with the given arguments and return the exit code.
 */
export const runCli = async (environment: CliEnvironment): Promise<ExitCode> => {
  const out = (line: string): void => {
    environment.stdout.write(`${line}\n`);
  };
  const usageError = (message: string): ExitCode => {
    environment.stderr.write(`${message}\n\n${USAGE}\n`);
    out(formatOutcome({ status: "aborted", reason: "usage error" }));
    return EXIT_CODES.usage;
  };

  const parsed = parseCliArgs(environment.args);
  if (parsed.kind === "help") {
    out(USAGE);
    return EXIT_CODES.ok;
  }
  if (parsed.kind === "usage-error") {
    return usageError(parsed.message);
  }
  const { options } = parsed;
  const logger = createConsoleJanitorLogger({
    verbose: options.verbose,
    stream: environment.stderr,
  });

  let config: RuntimeConfig;
  try {
    const fileConfig = loadConfigOrDefault(
      environment.cwd,
      options.configPath === undefined ? undefined : resolve(environment.cwd, options.configPath),
    );
    config = resolveRuntimeConfig({
      fileConfig,
      env: environment.env,
      flags: { graphId: options.graphId },
    });
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    logger.error(error.message);
    out(formatOutcome({ status: "aborted", reason: error.message }));
    return EXIT_CODES.failed;
  }

  if (config.defaultGraphId === undefined && !SINGLE_ITEM_ACTIONS.has(options.action)) {
    return usageError(
      `--graph_id is required for ${options.action} (or set GRAPH_JANITOR_GRAPH_ID)`,
    );
  }
  logger.debug(
    `Using ${config.baseUrl}${config.defaultGraphId === undefined ? "" : `, graph "${config.defaultGraphId}"`}`,
  );

  const api = createHttpGraphApi({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    requestTimeoutMs: config.requestTimeoutMs,
    fetch: environment.fetch,
  });
  const client = createGraphClient({
    api,
    config: {
      defaultGraphId: config.defaultGraphId,
      pageSize: config.pageSize,
      retry: config.retry,
    },
    logger,
  });

  const result = await runAction(
    {
      action: options.action,
      graphId: config.defaultGraphId,
      uuid: options.uuid,
      outputPath: options.output === undefined ? undefined : resolve(environment.cwd, options.output),
      keepPartial: options.keepPartial,
    },
    {
      client,
      confirm: options.noConfirm
        ? null
        : createConsoleConfirmer({ input: environment.stdin, output: environment.stdout }),
      logger,
      out,
      signal: environment.signal,
    },
  );
  return result.exitCode;
};
