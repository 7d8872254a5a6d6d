import { parseArgs } from "node:util";

export const ACTIONS = [
  "find_isolated_nodes",
  "find_isolated_edges",
  "delete_node",
  "delete_edge",
  "delete_isolated_nodes",
  "delete_isolated_edges",
  "export",
] as const;

export type Action = (typeof ACTIONS)[number];

/**
 * Parsed command-line arguments.
 */
export interface CliOptions {
  action: Action;
  graphId?: string;
  /** Target of delete_node / delete_edge */
  uuid?: string;
  /** Skip the confirmation gate */
  noConfirm: boolean;
  /** Export file path */
  output?: string;
  verbose: boolean;
  /** Write a partial export file when the read fails midway */
  keepPartial: boolean;
  /** Config file path (default: graph-janitor.config.json in the working directory) */
  configPath?: string;
}

export type CliParseResult =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "usage-error"; message: string };

export const USAGE = `Usage: graph-janitor --action <action> [options]

Actions:
  find_isolated_nodes     List nodes referenced by no edge
  find_isolated_edges     List edges whose source or target node is missing
  delete_node             Delete the node given by --uuid
  delete_edge             Delete the edge given by --uuid
  delete_isolated_nodes   Delete every isolated node
  delete_isolated_edges   Delete every dangling edge
  export                  Write all nodes and edges to the --output file

Options:
  --graph_id <id>         Graph to work on (default: GRAPH_JANITOR_GRAPH_ID or config graphId)
  --uuid <uuid>           Node or edge uuid for delete_node / delete_edge
  --no-confirm            Delete without asking for confirmation
  --output <path>         Export file path
  --keep-partial          Keep a partial export file when reading fails
  --config <path>         Config file (default: ./graph-janitor.config.json)
  -v, --verbose           Print debug output
  -h, --help              Show this help

Environment:
  GRAPH_JANITOR_API_KEY   API key (required)
  GRAPH_JANITOR_GRAPH_ID  Default graph id
  GRAPH_JANITOR_BASE_URL  API base URL`;

const isAction = (value: string): value is Action =>
  ACTIONS.some((action) => action === value);

const isParseArgsError = (error: unknown): error is Error & { code: string } =>
  error instanceof Error &&
  "code" in error &&
  typeof error.code === "string" &&
  error.code.startsWith("ERR_PARSE_ARGS");

const readArgs = (args: string[]) =>
  parseArgs({
    args,
    strict: true,
    allowPositionals: false,
    options: {
      action: { type: "string" },
      graph_id: { type: "string" },
      uuid: { type: "string" },
      "no-confirm": { type: "boolean" },
      output: { type: "string" },
      verbose: { type: "boolean", short: "v" },
      "keep-partial": { type: "boolean" },
      config: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

/**
 * Parse and validate command-line arguments (without the node and script
 * entries of process.argv).
 * Pure function - unit tested.
 */
export const parseCliArgs = (args: string[]): CliParseResult => {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(args);
  } catch (error) {
    if (isParseArgsError(error)) {
      return { kind: "usage-error", message: error.message };
    }
    throw error;
  }
  const { values } = parsed;

  if (values.help === true) {
    return { kind: "help" };
  }

  const action = values.action;
  if (action === undefined) {
    return { kind: "usage-error", message: "--action is required" };
  }
  if (!isAction(action)) {
    return {
      kind: "usage-error",
      message: `Unknown action "${action}". Expected one of: ${ACTIONS.join(", ")}`,
    };
  }
  if ((action === "delete_node" || action === "delete_edge") && !values.uuid) {
    return { kind: "usage-error", message: `--uuid is required for ${action}` };
  }
  if (action === "export" && !values.output) {
    return { kind: "usage-error", message: "--output is required for export" };
  }

  return {
    kind: "run",
    options: {
      action,
      graphId: values.graph_id || undefined,
      uuid: values.uuid || undefined,
      noConfirm: values["no-confirm"] === true,
      output: values.output || undefined,
      verbose: values.verbose === true,
      keepPartial: values["keep-partial"] === true,
      configPath: values.config || undefined,
    },
  };
};
