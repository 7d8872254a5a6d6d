import { rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { z } from "zod";
import type { GraphEdge, GraphNode } from "../graph/Types.js";

// --- Schemas ---

export const ExportedNodeSchema = z.object({
  uuid: z.string(),
  name: z.string(),
  labels: z.array(z.string()),
  attributes: z.record(z.unknown()),
});

export const ExportedEdgeSchema = z.object({
  uuid: z.string(),
  source_uuid: z.string(),
  target_uuid: z.string(),
  fact: z.string(),
  attributes: z.record(z.unknown()),
});

export const ExportDocumentSchema = z.object({
  graph_id: z.string().min(1),
  /** ISO-8601 timestamp of the export */
  exported_at: z.string().datetime({ offset: true }),
  /** True when the read failed midway and only the records collected are present */
  partial: z.boolean(),
  nodes: z.array(ExportedNodeSchema),
  edges: z.array(ExportedEdgeSchema),
});

// --- Types (inferred from schemas) ---

export type ExportedNode = z.infer<typeof ExportedNodeSchema>;
export type ExportedEdge = z.infer<typeof ExportedEdgeSchema>;
export type ExportDocument = z.infer<typeof ExportDocumentSchema>;

export interface ExportContent {
  graphId: string;
  nodes: readonly GraphNode[];
  edges: readonly GraphEdge[];
  exportedAt: Date;
  partial: boolean;
}

export const buildExportDocument = (content: ExportContent): ExportDocument => ({
  graph_id: content.graphId,
  exported_at: content.exportedAt.toISOString(),
  partial: content.partial,
  nodes: content.nodes.map((node) => ({
    uuid: node.uuid,
    name: node.name,
    labels: [...node.labels],
    attributes: node.attributes,
  })),
  edges: content.edges.map((edge) => ({
    uuid: edge.uuid,
    source_uuid: edge.sourceUuid,
    target_uuid: edge.targetUuid,
    fact: edge.fact,
    attributes: edge.attributes,
  })),
});

/**
 * Write an export document atomically: a temp file in the target directory,
 * then a rename over the target. A failed write leaves no file behind.
 */
export const writeExportFile = async (
  outputPath: string,
  document: ExportDocument,
): Promise<void> => {
  const tempPath = join(
    dirname(outputPath),
    `.${basename(outputPath)}.${process.pid}.${Date.now()}.tmp`,
  );
  try {
    await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
    await rename(tempPath, outputPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
};

/**
 * Parse and validate the content of an export file.
 * Pure function - unit tested.
 *
 * @throws Error if JSON is invalid or the document structure is invalid
 */
export const parseExportDocument = (content: string): ExportDocument => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }
  return ExportDocumentSchema.parse(raw);
};
