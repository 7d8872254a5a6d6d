#!/usr/bin/env node

/**
 * graph-janitor entry point
 *
 * Usage:
 *   graph-janitor --action find_isolated_nodes --graph_id support-kb
 *   graph-janitor --action delete_isolated_edges --graph_id support-kb --no-confirm
 *   graph-janitor --action export --graph_id support-kb --output backup.json
 */

import { runCli } from "./src/cli/runCli.js";

// First interrupt stops a deletion run between items; a second one kills the process
const interrupt = new AbortController();
process.once("SIGINT", () => {
  process.stderr.write("\nInterrupted; finishing the current item\n");
  interrupt.abort();
});

runCli({
  args: process.argv.slice(2),
  env: process.env,
  cwd: process.cwd(),
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  signal: interrupt.signal,
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[graph-janitor] Fatal error: ${message}\n`);
    if (error instanceof Error && error.stack) {
      process.stderr.write(`${error.stack}\n`);
    }
    process.stdout.write(`Outcome: ABORTED (${message})\n`);
    process.exitCode = 1;
  });
