import { describe, expect, it } from "vitest";
import { BodyWriter } from "../../binary/writer.js";
import { validateFunctionBody } from "../../validation/function-body.js";
import type { SsaFunction } from "../ir.js";
import { printSsa } from "../printer.js";

describe("printSsa", () => {
  it("prints a validated body", () => {
    const bytes = new BodyWriter().localGet(0).i32Const(1).op("i32.add").end().finish();
    const result = validateFunctionBody(bytes, {
      signature: { params: ["i32"], results: ["i32"] },
    });
    if (!result.ok) throw new Error(result.diagnostic.message);

    expect(printSsa(result.body.ssa)).toBe(
      [
        "%0: i32 = param 0",
        "%1: i32 = const 1",
        "b0 entry:",
        "  %2: i32 = i32.add %0 %1",
        "  jump b1 (end)",
        "b1 exit: preds=[b0]",
        "  return %2",
      ].join("\n")
    );
  });

  it("prints every value and terminator form", () => {
    const fn: SsaFunction = {
      entry: 0,
      exit: 1,
      values: [
        { id: 0, kind: "const", type: "i64", value: 7n },
        { id: 1, kind: "const", type: "externref", value: null },
        { id: 2, kind: "undef", type: "f32" },
        {
          id: 3,
          kind: "op",
          op: "call",
          block: 0,
          operands: [0],
          results: ["i32", "f64"],
          immediates: [4],
        },
        { id: 4, kind: "extract", block: 0, source: 3, index: 0, type: "i32" },
        { id: 5, kind: "phi", block: 2, slot: "local:0", type: "i32", operands: [4, 4] },
        {
          id: 6,
          kind: "op",
          op: "global.set",
          block: 2,
          operands: [2],
          results: [],
          immediates: [0],
        },
      ],
      blocks: [
        {
          id: 0,
          kind: "entry",
          label: "entry",
          preds: [],
          sealed: true,
          phis: [],
          instructions: [3, 4],
          terminator: { kind: "branch", condition: 4, then: 2, else: 3, via: "br_if" },
        },
        {
          id: 1,
          kind: "exit",
          label: "exit",
          preds: [2],
          sealed: true,
          phis: [],
          instructions: [],
          terminator: { kind: "return", values: [] },
        },
        {
          id: 2,
          kind: "join",
          label: "join",
          preds: [0, 2],
          sealed: true,
          phis: [5],
          instructions: [6],
          terminator: { kind: "table", index: 5, targets: [1, 2], default: 1, via: "br_table" },
        },
        {
          id: 3,
          kind: "continue",
          label: "continue",
          preds: [0],
          sealed: true,
          phis: [],
          instructions: [],
          terminator: { kind: "unreachable" },
        },
        {
          id: 4,
          kind: "dead",
          label: "dead",
          preds: [],
          sealed: true,
          phis: [],
          instructions: [],
        },
      ],
    };

    expect(printSsa(fn).split("\n")).toEqual([
      "%0: i64 = const 7n",
      "%1: externref = const null",
      "%2: f32 = undef",
      "b0 entry:",
      "  %3: (i32 f64) = call 4 %0",
      "  %4: i32 = extract %3.0",
      "  branch %4 b2 b3 (br_if)",
      "b1 exit: preds=[b2]",
      "  return",
      "b2 join: preds=[b0, b2]",
      "  %5: i32 = phi local:0 [%4, %4]",
      "  global.set 0 %2",
      "  table %5 [b1, b2] default b1 (br_table)",
      "b3 continue: preds=[b0]",
      "  unreachable",
      "b4 dead:",
      "  <open>",
    ]);
  });
});
