import { describe, expect, it } from "vitest";
import { InvariantViolation } from "../../diagnostics/index.js";
import { SsaBuilder } from "../builder.js";
import { argSlot, localSlot, type SsaValue } from "../ir.js";

const valueOf = (values: readonly SsaValue[], id: number) =>
  values.find((value) => value.id === id);

describe("SsaBuilder", () => {
  it("collapses a phi whose operands agree", () => {
    const ssa = new SsaBuilder({ params: ["i32"], locals: ["i32"] });
    const left = ssa.createBlock("then");
    const right = ssa.createBlock("else");
    const join = ssa.createBlock("join");
    [left, right].forEach((arm) => {
      ssa.addPredecessor(arm, ssa.entry);
      ssa.sealBlock(arm);
      ssa.addPredecessor(join, arm);
    });
    ssa.sealBlock(join);

    expect(ssa.readVariable(localSlot(0), join, "i32")).toBe(ssa.param(0));

    ssa.sealBlock(ssa.exit);
    const fn = ssa.finish();
    expect(fn.values.filter((value) => value.kind === "phi")).toEqual([]);
  });

  it("keeps a phi for a loop-carried local", () => {
    const ssa = new SsaBuilder({ params: [], locals: ["i32"] });
    const header = ssa.createBlock("loop");
    ssa.addEdge({ from: ssa.entry, to: header, args: [] });

    const before = ssa.readVariable(localSlot(0), header, "i32");
    const [next] = ssa.emitOp({
      block: header,
      op: "i32.add",
      operands: [before, ssa.constant("i32", 1)],
      results: ["i32"],
    });
    ssa.writeVariable(localSlot(0), header, next);
    ssa.addEdge({ from: header, to: header, args: [] });
    ssa.sealBlock(header);

    ssa.sealBlock(ssa.exit);
    const fn = ssa.finish();
    const phi = valueOf(fn.values, before);
    expect(phi?.kind).toBe("phi");
    if (phi?.kind !== "phi") return;

    expect(phi.slot).toBe("local:0");
    expect(phi.operands.map((id) => valueOf(fn.values, id))).toMatchObject([
      { kind: "const", type: "i32", value: 0 },
      { kind: "op", op: "i32.add" },
    ]);
    expect(fn.blocks.find((block) => block.id === header)?.phis).toEqual([before]);
  });

  it("removes a loop phi that only refers to itself and one value", () => {
    const ssa = new SsaBuilder({ params: [], locals: ["i64"] });
    const header = ssa.createBlock("loop");
    ssa.addEdge({ from: ssa.entry, to: header, args: [] });
    const placeholder = ssa.readVariable(localSlot(0), header, "i64");
    ssa.addEdge({ from: header, to: header, args: [] });
    ssa.sealBlock(header);

    const resolved = ssa.resolve(placeholder);
    expect(resolved).not.toBe(placeholder);
    expect(ssa.readVariable(localSlot(0), header, "i64")).toBe(resolved);

    ssa.sealBlock(ssa.exit);
    const fn = ssa.finish();
    expect(valueOf(fn.values, resolved)).toEqual({
      id: resolved,
      kind: "const",
      type: "i64",
      value: 0n,
    });
    expect(fn.values.some((value) => value.kind === "phi")).toBe(false);
  });

  it("forwards a single predecessor's value without a phi", () => {
    const ssa = new SsaBuilder({ params: ["f64"], locals: ["f64"] });
    let block = ssa.entry;
    for (let index = 0; index < 100; index += 1) {
      const next = ssa.createBlock("continue");
      ssa.addPredecessor(next, block);
      ssa.sealBlock(next);
      block = next;
    }

    expect(ssa.readVariable(localSlot(0), block, "f64")).toBe(ssa.param(0));
  });

  it("carries block arguments along edges", () => {
    const ssa = new SsaBuilder({ params: [], locals: [] });
    const target = ssa.createBlock("funclet");
    const value = ssa.constant("f32", 1.5);
    expect(ssa.addEdge({ from: ssa.entry, to: target, args: [value] })).toBe(true);
    ssa.sealBlock(target);

    expect(ssa.readVariable(argSlot(target, 0), target, "f32")).toBe(value);
  });

  it("ignores edges out of dead blocks", () => {
    const ssa = new SsaBuilder({ params: [], locals: [] });
    const dead = ssa.createDeadBlock();
    const target = ssa.createBlock("join");

    expect(ssa.isDead(dead)).toBe(true);
    expect(ssa.addEdge({ from: dead, to: target, args: [] })).toBe(false);
    expect(ssa.predecessors(target)).toEqual([]);
  });

  it("seals idempotently and rejects predecessors after sealing", () => {
    const ssa = new SsaBuilder({ params: [], locals: [] });
    const block = ssa.createBlock("funclet");
    ssa.addPredecessor(block, ssa.entry);
    ssa.sealBlock(block);
    ssa.sealBlock(block);

    expect(ssa.isSealed(block)).toBe(true);
    expect(() => ssa.addPredecessor(block, ssa.entry)).toThrow(InvariantViolation);
  });

  it("refuses to finish with an unsealed block", () => {
    const ssa = new SsaBuilder({ params: [], locals: [] });
    ssa.createBlock("join");
    ssa.sealBlock(ssa.exit);
    expect(() => ssa.finish()).toThrow(InvariantViolation);
  });

  it("extracts each result of a multi-value operation", () => {
    const ssa = new SsaBuilder({ params: [], locals: [] });
    const values = ssa.emitOp({
      block: ssa.entry,
      op: "call",
      operands: [],
      results: ["i32", "i64"],
      immediates: [0],
    });

    expect(values).toHaveLength(2);
    expect(values.map((value) => ssa.valueType(value))).toEqual(["i32", "i64"]);
  });

  it("removes a phi that becomes trivial once a phi it uses is removed", () => {
    const ssa = new SsaBuilder({ params: ["i32"], locals: ["i32"] });
    const header = ssa.createBlock("loop");
    ssa.addPredecessor(header, ssa.entry);
    const arm = ssa.createBlock("then");
    ssa.addPredecessor(arm, ssa.entry);
    ssa.sealBlock(arm);
    const join = ssa.createBlock("join");
    ssa.addPredecessor(join, header);
    ssa.addPredecessor(join, arm);
    ssa.sealBlock(join);

    const joined = ssa.readVariable(localSlot(0), join, "i32");
    expect(joined).not.toBe(ssa.param(0));

    ssa.sealBlock(header);
    expect(ssa.resolve(joined)).toBe(ssa.param(0));

    ssa.sealBlock(ssa.exit);
    expect(ssa.finish().values.filter((value) => value.kind === "phi")).toEqual([]);
  });

  it("records each predecessor once", () => {
    const ssa = new SsaBuilder({ params: [], locals: [] });
    const join = ssa.createBlock("join");
    const arms = Array.from({ length: 64 }, () => {
      const arm = ssa.createBlock("then");
      ssa.addPredecessor(arm, ssa.entry);
      ssa.sealBlock(arm);
      return arm;
    });
    [...arms, ...arms].forEach((arm) => ssa.addPredecessor(join, arm));

    expect(ssa.predecessors(join)).toEqual(arms);
  });
});

