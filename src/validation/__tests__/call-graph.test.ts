import { describe, expect, it } from "vitest";
import { InvariantViolation } from "../../diagnostics/index.js";
import { FuncletCallGraph, REGION_ENTRY, type CallEdgeInput } from "../call-graph.js";

const edge = (from: number, to: number, overrides: Partial<CallEdgeInput> = {}): CallEdgeInput => ({
  from,
  to,
  args: [],
  polymorphic: false,
  offset: 0,
  kind: "funclet_call",
  ...overrides,
});

describe("FuncletCallGraph", () => {
  it("seals a funclet without declared backward predecessors on entry", () => {
    const graph = new FuncletCallGraph(2);
    graph.recordEdge(edge(REGION_ENTRY, 0, { kind: "region-entry" }));

    expect(graph.enter(0, 0)).toBe(true);
    expect(graph.isSealed(0)).toBe(true);
    expect(graph.isComplete(0)).toBe(true);
  });

  it("seals a loop header once its last backward edge is seen", () => {
    const graph = new FuncletCallGraph(1);
    expect(graph.enter(0, 1)).toBe(false);
    expect(graph.isSealed(0)).toBe(false);
    expect(graph.isComplete(0)).toBe(false);

    const { edge: recorded, sealReady } = graph.recordEdge(
      edge(0, 0, { kind: "funclet_call_if" })
    );
    expect(recorded.direction).toBe("backward");
    expect(sealReady).toBe(true);
    expect(graph.isSealed(0)).toBe(true);
    expect(graph.backwardPredecessors(0)).toHaveLength(1);
  });

  it("keeps edges in an append-only list", () => {
    const graph = new FuncletCallGraph(3);
    graph.recordEdge(edge(REGION_ENTRY, 0, { kind: "region-entry" }));
    graph.enter(0, 0);
    graph.recordEdge(edge(0, 2, { args: ["i32"] }));
    graph.recordEdge(edge(0, 1, { kind: "end" }));

    expect(graph.edges.map(({ from, to }) => [from, to])).toEqual([
      [-1, 0],
      [0, 2],
      [0, 1],
    ]);
    expect(graph.forwardPredecessors(2)).toEqual([
      {
        from: 0,
        to: 2,
        args: ["i32"],
        polymorphic: false,
        offset: 0,
        kind: "funclet_call",
        direction: "forward",
      },
    ]);
    expect(graph.edgesTo(1)).toHaveLength(1);
  });

  it("asserts that a sealed funclet gains no predecessor", () => {
    const graph = new FuncletCallGraph(2);
    graph.enter(0, 0);
    graph.enter(1, 0);
    expect(() => graph.recordEdge(edge(1, 0))).toThrow(InvariantViolation);
  });

  it("asserts that funclets are entered in order", () => {
    const graph = new FuncletCallGraph(3);
    expect(() => graph.enter(1, 0)).toThrow(InvariantViolation);
  });

  it("asserts that edge targets exist", () => {
    const graph = new FuncletCallGraph(1);
    expect(() => graph.recordEdge(edge(0, 1))).toThrow(
      "internal invariant violated: edge target 1 outside of 1 funclet(s)"
    );
  });
});
