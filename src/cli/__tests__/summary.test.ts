import { describe, expect, it } from "vitest";
import type { ValidatedBody } from "../../validation/context.js";
import { summarizeBody } from "../summary.js";

const body: ValidatedBody = {
  name: "loop.hex",
  params: ["i32"],
  results: ["i32", "f64"],
  locals: ["i64"],
  regions: [
    {
      id: 0,
      offset: 3,
      depth: 1,
      params: ["i32"],
      results: [],
      funclets: [
        {
          index: 0,
          offset: 8,
          params: ["i32"],
          signatureSource: "explicit",
          declaredBackwardPreds: 1,
          forwardPreds: 1,
          backwardPreds: 1,
          entryBlock: 3,
        },
        {
          index: 1,
          offset: 14,
          params: [],
          signatureSource: "inferred",
          declaredBackwardPreds: 0,
          forwardPreds: 1,
          backwardPreds: 0,
          entryBlock: 4,
        },
      ],
      edges: [
        { from: -1, to: 0, args: ["i32"], polymorphic: false, offset: 3, kind: "region-entry", direction: "forward" },
        { from: 0, to: 1, args: [], polymorphic: false, offset: 12, kind: "funclet_call", direction: "forward" },
        { from: 1, to: 0, args: ["i32"], polymorphic: false, offset: 17, kind: "funclet_call", direction: "backward" },
      ],
      exitBlock: 2,
    },
  ],
  ssa: { entry: 0, exit: 1, blocks: [], values: [] },
  instructionCount: 9,
  byteLength: 21,
};

describe("summarizeBody", () => {
  it("lists the signature, regions and funclets", () => {
    expect(summarizeBody(body).split("\n")).toEqual([
      "loop.hex: 21 byte(s), 9 instruction(s)",
      "signature [i32] -> [i32 f64]",
      "locals [i64]",
      "region 0 @3 depth 1: [i32] -> [], 2 funclet(s), 3 edge(s)",
      "  funclet 0 @8 [i32] (explicit) preds: 1 forward, 1/1 backward",
      "  funclet 1 @14 [] (inferred) preds: 1 forward, 0/0 backward",
      "ssa: 0 block(s), 0 value(s)",
    ]);
  });

  it("omits region lines for bodies without regions", () => {
    const lines = summarizeBody({ ...body, regions: [] }).split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[3]).toBe("ssa: 0 block(s), 0 value(s)");
  });
});
