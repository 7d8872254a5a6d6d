import { describeError } from "../api/GraphApiError.js";
import type { GraphClient } from "../client/ClientTypes.js";
import { SnapshotFetchError } from "../client/SnapshotFetchError.js";
import type { GraphSnapshot } from "../graph/Types.js";
import type { JanitorLogger } from "../logging/JanitorLogger.js";
import { ExportFailedError } from "./ExportFailedError.js";
import { buildExportDocument, writeExportFile } from "./exportFile.js";

export interface ExportGraphOptions {
  client: GraphClient;
  /** Graph to export (default: the client's configured graph) */
  graphId?: string;
  outputPath: string;
  /** Write what was collected when the read fails midway (default: false) */
  keepPartial?: boolean;
  logger: JanitorLogger;
  /** Clock for `exported_at` (default: current time) */
  now?: () => Date;
}

export interface ExportSummary {
  graphId: string;
  outputPath: string;
  nodeCount: number;
  edgeCount: number;
}

/**
 * Read a full snapshot of a graph and write it to a JSON file.
 * Nothing in the graph is modified.
 *
 * @throws ExportFailedError when the read fails midway
 *
 * @example
 * const summary = await exportGraph({ client, graphId: "kb", outputPath: "kb.json", logger });
 * console.log(`Exported ${summary.nodeCount} nodes`);
 */
export const exportGraph = async (options: ExportGraphOptions): Promise<ExportSummary> => {
  const { client, outputPath, logger } = options;
  const now = options.now ?? (() => new Date());

  let snapshot: GraphSnapshot;
  try {
    snapshot = await client.fetchSnapshot(options.graphId);
  } catch (error) {
    if (!(error instanceof SnapshotFetchError)) {
      throw error;
    }
    const counts = { nodeCount: error.nodes.length, edgeCount: error.edges.length };
    if (!options.keepPartial) {
      throw new ExportFailedError(error.graphId, counts, error.cause);
    }
    const partial = buildExportDocument({
      graphId: error.graphId,
      nodes: error.nodes,
      edges: error.edges,
      exportedAt: now(),
      partial: true,
    });
    try {
      await writeExportFile(outputPath, partial);
    } catch (writeError) {
      logger.error(`Could not write partial export to ${outputPath}: ${describeError(writeError)}`);
      throw new ExportFailedError(error.graphId, counts, error.cause);
    }
    logger.warn(`Partial export written to ${outputPath}`);
    throw new ExportFailedError(
      error.graphId,
      { ...counts, partialPath: outputPath },
      error.cause,
    );
  }

  await writeExportFile(
    outputPath,
    buildExportDocument({
      graphId: snapshot.graphId,
      nodes: snapshot.nodes,
      edges: snapshot.edges,
      exportedAt: now(),
      partial: false,
    }),
  );
  logger.success(
    `Wrote ${snapshot.nodes.length} nodes and ${snapshot.edges.length} edges to ${outputPath}`,
  );
  return {
    graphId: snapshot.graphId,
    outputPath,
    nodeCount: snapshot.nodes.length,
    edgeCount: snapshot.edges.length,
  };
};
