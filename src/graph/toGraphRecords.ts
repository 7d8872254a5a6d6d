import { readRecord, readString, readStringArray } from "./readField.js";
import type { GraphEdge, GraphNode } from "./Types.js";

/**
 * Receives a description of a record that did not have the expected shape.
 * Processing continues with defaults; the report exists for diagnosis.
 */
export type AnomalyReporter = (message: string) => void;

const UUID_FIELDS = ["uuid", "uuid_", "id"] as const;
const SOURCE_FIELDS = ["source_node_uuid", "source_uuid", "sourceNodeUuid"] as const;
const TARGET_FIELDS = ["target_node_uuid", "target_uuid", "targetNodeUuid"] as const;

/**
 * Convert a raw remote node record into a GraphNode.
 * Returns null (and reports) when the record has no usable identifier.
 */
export const toGraphNode = (
  raw: unknown,
  report: AnomalyReporter,
): GraphNode | null => {
  const uuid = readString(raw, UUID_FIELDS, "");
  if (uuid === "") {
    report("Node record without uuid dropped");
    return null;
  }
  return {
    uuid,
    name: readString(raw, ["name"], ""),
    labels: readStringArray(raw, "labels"),
    attributes: readRecord(raw, "attributes"),
  };
};

/**
 * Convert a raw remote edge record into a GraphEdge.
 *
 * A record with no identifier is dropped: it could never be deleted. A
 * missing endpoint is kept as an empty string, which no node matches, so the
 * edge is classified as dangling.
 */
export const toGraphEdge = (
  raw: unknown,
  report: AnomalyReporter,
): GraphEdge | null => {
  const uuid = readString(raw, UUID_FIELDS, "");
  if (uuid === "") {
    report("Edge record without uuid dropped");
    return null;
  }
  const sourceUuid = readString(raw, SOURCE_FIELDS, "");
  const targetUuid = readString(raw, TARGET_FIELDS, "");
  const missing = [
    sourceUuid === "" ? "source" : null,
    targetUuid === "" ? "target" : null,
  ].filter((side) => side !== null);
  if (missing.length > 0) {
    report(`Edge ${uuid} has no ${missing.join(" or ")} node uuid`);
  }
  return {
    uuid,
    sourceUuid,
    targetUuid,
    fact: readString(raw, ["fact", "name"], ""),
    attributes: readRecord(raw, "attributes"),
  };
};
