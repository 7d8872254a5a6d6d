import { createInterface } from "node:readline/promises";
import type { Confirmer, ConfirmationRequest } from "./DeletionTypes.js";

const AFFIRMATIVE = new Set(["yes", "y"]);

export interface ConsoleConfirmerOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Render the preview shown before a deletion.
 *
 * @example
 * formatConfirmationPreview({ kind: "node", scope: "isolated", total: 7, examples })
 * // "Found 7 isolated nodes to delete.\nExample nodes:\n  1. UUID=…"
 */
export const formatConfirmationPreview = (request: ConfirmationRequest): string[] => {
  if (request.scope === "single") {
    return [];
  }
  const noun = request.kind === "node" ? "isolated nodes" : "dangling edges";
  const lines = [`Found ${request.total} ${noun} to delete.`, `Example ${request.kind}s:`];
  const field = request.kind === "node" ? "Name" : "Fact";
  request.examples.forEach((candidate, index) => {
    lines.push(`  ${index + 1}. UUID=${candidate.uuid}, ${field}=${candidate.label}`);
  });
  if (request.total > request.examples.length) {
    lines.push(`  ... and ${request.total - request.examples.length} more`);
  }
  return lines;
};

export const formatConfirmationQuestion = (request: ConfirmationRequest): string => {
  if (request.scope === "single") {
    const uuid = request.examples[0]?.uuid ?? "";
    return `Do you want to delete ${request.kind} ${uuid}? (yes/no): `;
  }
  return `Do you want to delete these ${request.kind}s? (yes/no): `;
};

/**
 * Confirmer that prints the preview and reads a yes/no answer.
 * Only "yes" and "y" (any case) approve; end of input declines.
 */
export const createConsoleConfirmer = (
  options: ConsoleConfirmerOptions = {},
): Confirmer => {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  return async (request) => {
    for (const line of formatConfirmationPreview(request)) {
      output.write(`${line}\n`);
    }
    const rl = createInterface({ input, output });
    let inputEnded = false;
    const closed = new Promise<string>((resolve) => {
      rl.once("close", () => {
        inputEnded = true;
        resolve("");
      });
    });
    try {
      // End of input counts as no answer, whether or not the pending
      // question is rejected when the interface closes
      const answer = await Promise.race([
        rl.question(formatConfirmationQuestion(request)).catch((error: unknown) => {
          if (inputEnded) {
            return "";
          }
          throw error;
        }),
        closed,
      ]);
      return AFFIRMATIVE.has(answer.trim().toLowerCase());
    } finally {
      rl.close();
    }
  };
};
