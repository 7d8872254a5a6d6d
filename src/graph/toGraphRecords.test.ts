import { describe, expect, it } from "vitest";
import { toGraphEdge, toGraphNode } from "./toGraphRecords.js";

const collect = () => {
  const messages: string[] = [];
  return { messages, report: (message: string) => messages.push(message) };
};

describe(toGraphNode.name, () => {
  it("converts a complete node record", () => {
    const { messages, report } = collect();

    const node = toGraphNode(
      {
        uuid: "n1",
        name: "Alice",
        labels: ["Entity", "Person"],
        attributes: { age: 30 },
        summary: "ignored",
      },
      report,
    );

    expect(node).toEqual({
      uuid: "n1",
      name: "Alice",
      labels: ["Entity", "Person"],
      attributes: { age: 30 },
    });
    expect(messages).toEqual([]);
  });

  it("accepts the uuid_ alias and defaults missing fields", () => {
    const { report } = collect();

    expect(toGraphNode({ uuid_: "n2" }, report)).toEqual({
      uuid: "n2",
      name: "",
      labels: [],
      attributes: {},
    });
  });

  it("drops and reports a record without identifier", () => {
    const { messages, report } = collect();

    expect(toGraphNode({ name: "ghost" }, report)).toBeNull();
    expect(messages).toEqual(["Node record without uuid dropped"]);
  });
});

describe(toGraphEdge.name, () => {
  it("converts a remote edge record", () => {
    const { messages, report } = collect();

    const edge = toGraphEdge(
      {
        uuid: "e1",
        source_node_uuid: "a",
        target_node_uuid: "b",
        fact: "Alice knows Bob",
        name: "KNOWS",
      },
      report,
    );

    expect(edge).toEqual({
      uuid: "e1",
      sourceUuid: "a",
      targetUuid: "b",
      fact: "Alice knows Bob",
      attributes: {},
    });
    expect(messages).toEqual([]);
  });

  it("falls back to the id field and the relation name", () => {
    const { report } = collect();

    const edge = toGraphEdge(
      new Map<string, unknown>([
        ["id", "e2"],
        ["source_uuid", "a"],
        ["target_uuid", "b"],
        ["name", "KNOWS"],
      ]),
      report,
    );

    expect(edge?.uuid).toBe("e2");
    expect(edge?.sourceUuid).toBe("a");
    expect(edge?.fact).toBe("KNOWS");
  });

  it("keeps an edge with a missing endpoint and reports it", () => {
    const { messages, report } = collect();

    const edge = toGraphEdge({ uuid: "e3", source_node_uuid: "a" }, report);

    expect(edge?.targetUuid).toBe("");
    expect(messages).toEqual(["Edge e3 has no target node uuid"]);
  });

  it("reports both endpoints when neither is present", () => {
    const { messages, report } = collect();

    toGraphEdge({ uuid: "e4" }, report);

    expect(messages).toEqual(["Edge e4 has no source or target node uuid"]);
  });

  it("drops an edge without identifier", () => {
    const { messages, report } = collect();

    expect(toGraphEdge({ source_node_uuid: "a", target_node_uuid: "b" }, report)).toBeNull();
    expect(messages).toEqual(["Edge record without uuid dropped"]);
  });
});
