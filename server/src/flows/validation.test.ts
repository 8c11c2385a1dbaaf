import { describe, expect, it } from "vitest";
import { parseFlowDefinition, validateFlowDefinition } from "./validation.js";

describe("parseFlowDefinition", () => {
  it("keeps well-formed nodes and normalizes ids", () => {
    const definition = parseFlowDefinition({
      nodes: [
        { id: 1, type: "Message", content: "Hello", next: 2 },
        { id: "2", type: "question", content: "Name?", variable: " name ", next: null },
      ],
    });
    expect(definition.nodes).toEqual([
      { id: "1", type: "message", content: "Hello", next: "2" },
      { id: "2", type: "question", content: "Name?", variable: "name", next: null },
    ]);
  });

  it("drops unknown node types and repeated ids", () => {
    const definition = parseFlowDefinition({
      nodes: [
        { id: "a", type: "message", content: "first" },
        { id: "a", type: "message", content: "second" },
        { id: "b", type: "webhook" },
        "garbage",
      ],
    });
    expect(definition.nodes.map((node) => node.content)).toEqual(["first"]);
    expect(definition.nodes[0]?.next).toBeNull();
  });

  it("returns an empty graph for malformed input", () => {
    expect(parseFlowDefinition(null).nodes).toEqual([]);
    expect(parseFlowDefinition({ nodes: "nope" }).nodes).toEqual([]);
  });
});

describe("validateFlowDefinition", () => {
  it("accepts a linear question flow", () => {
    const errors = validateFlowDefinition({
      nodes: [
        { id: "start", type: "question", content: "Name?", variable: "name", next: "end" },
        { id: "end", type: "message", content: "Hi {name}", next: null },
      ],
    });
    expect(errors).toEqual([]);
  });

  it("reports a question node without variable", () => {
    const errors = validateFlowDefinition({
      nodes: [{ id: "q", type: "question", content: "?", next: null }],
    });
    expect(errors).toEqual([{ nodeId: "q", message: "Question node needs a 'variable'." }]);
  });

  it("reports dangling next pointers", () => {
    const errors = validateFlowDefinition({
      nodes: [{ id: "a", type: "message", content: "A", next: "zzz" }],
    });
    expect(errors).toEqual([
      { nodeId: "a", message: "Next node 'zzz' does not exist; the flow ends here." },
    ]);
  });

  it("reports a message-only cycle once", () => {
    const errors = validateFlowDefinition({
      nodes: [
        { id: "a", type: "message", content: "A", next: "b" },
        { id: "b", type: "message", content: "B", next: "a" },
      ],
    });
    expect(errors).toEqual([{ nodeId: "a", message: "Cycle without a question node." }]);
  });

  it("rejects an empty flow", () => {
    expect(validateFlowDefinition({ nodes: [] })).toEqual([{ message: "Flow has no nodes." }]);
  });
});
