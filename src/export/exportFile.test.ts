import { describe, expect, it } from "vitest";
import { buildExportDocument, parseExportDocument } from "./exportFile.js";

describe(buildExportDocument.name, () => {
  it("uses the export field names", () => {
    const document = buildExportDocument({
      graphId: "kb",
      nodes: [{ uuid: "n1", name: "Alice", labels: ["Person"], attributes: {} }],
      edges: [
        { uuid: "e1", sourceUuid: "n1", targetUuid: "n2", fact: "Alice knows Bob", attributes: { weight: 2 } },
      ],
      exportedAt: new Date("2026-01-02T03:04:05.000Z"),
      partial: false,
    });

    expect(document).toEqual({
      graph_id: "kb",
      exported_at: "2026-01-02T03:04:05.000Z",
      partial: false,
      nodes: [{ uuid: "n1", name: "Alice", labels: ["Person"], attributes: {} }],
      edges: [
        {
          uuid: "e1",
          source_uuid: "n1",
          target_uuid: "n2",
          fact: "Alice knows Bob",
          attributes: { weight: 2 },
        },
      ],
    });
  });
});

describe(parseExportDocument.name, () => {
  const valid = {
    graph_id: "kb",
    exported_at: "2026-01-02T03:04:05.000Z",
    partial: false,
    nodes: [],
    edges: [],
  };

  it("parses a valid document", () => {
    expect(parseExportDocument(JSON.stringify(valid))).toEqual(valid);
  });

  it("throws on invalid JSON", () => {
    expect(() => parseExportDocument("{ nodes: ")).toThrow("Invalid JSON");
  });

  it("rejects an edge without endpoints", () => {
    const content = JSON.stringify({
      ...valid,
      edges: [{ uuid: "e1", fact: "", attributes: {} }],
    });

    expect(() => parseExportDocument(content)).toThrow();
  });

  it("rejects a timestamp that is not ISO-8601", () => {
    expect(() =>
      parseExportDocument(JSON.stringify({ ...valid, exported_at: "yesterday" })),
    ).toThrow();
  });
});
