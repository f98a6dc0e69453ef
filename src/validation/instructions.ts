import { MISC_OPS, Opcode, SIMPLE_OPS, type SimpleOp } from "../binary/opcodes.js";
import {
  formatTypes,
  isReferenceType,
  operandMatches,
  sameTypes,
  valueTypeFromCode,
  type OperandType,
  type ValueType,
} from "../binary/value-types.js";
import { localSlot, type TransferVia } from "../ssa/ir.js";
import { labelTypes, type ControlFrame } from "./control-frames.js";
import type { StackEntry } from "./operand-stack.js";
import {
  closeFunclet,
  endFunclet,
  openRegion,
  recordFuncletCall,
  rejectFuncletSig,
} from "./region.js";
import type { BodyValidator } from "./validator.js";

/** Validates one instruction whose opcode byte has just been read. */
export const validateInstruction = (v: BodyValidator, opcode: number): void => {
  const top = v.frames.top();

  switch (opcode) {
    case Opcode.Unreachable:
      v.ssa.terminate(v.current, { kind: "unreachable" });
      v.markUnreachable();
      return closeAtRegionLevel(v, top);
    case Opcode.Nop:
      return;
    case Opcode.Block:
      return beginBlock(v);
    case Opcode.Loop:
      return beginLoop(v);
    case Opcode.If:
      return beginIf(v);
    case Opcode.Else:
      return beginElse(v);
    case Opcode.End:
      return end(v);
    case Opcode.Br:
      branch(v, v.reader.varuint32("label"), "br");
      return closeAtRegionLevel(v, top);
    case Opcode.BrIf:
      return branchIf(v);
    case Opcode.BrTable:
      branchTable(v);
      return closeAtRegionLevel(v, top);
    case Opcode.Return:
      branch(v, v.frames.depth - 1, "return");
      return closeAtRegionLevel(v, top);
    case Opcode.Call:
      return call(v);
    case Opcode.FuncletRegion:
      return openRegion(v);
    case Opcode.FuncletSig:
      return rejectFuncletSig(v);
    case Opcode.FuncletCall:
      return recordFuncletCall(v, "funclet_call");
    case Opcode.FuncletCallIf:
      return recordFuncletCall(v, "funclet_call_if");
    case Opcode.FuncletCallTable:
      return recordFuncletCall(v, "funclet_call_table");
    case Opcode.Drop:
      v.pop("drop");
      return;
    case Opcode.Select:
      return select(v);
    case Opcode.SelectTyped:
      return select(v, typedSelectType(v));
    case Opcode.LocalGet:
    case Opcode.LocalSet:
    case Opcode.LocalTee:
      return localOp(v, opcode);
    case Opcode.GlobalGet:
    case Opcode.GlobalSet:
      return globalOp(v, opcode);
    case Opcode.MemorySize:
    case Opcode.MemoryGrow:
      return memoryOp(v, opcode);
    case Opcode.I32Const:
      return pushConstant(v, "i32", v.reader.varint32("i32 constant"));
    case Opcode.I64Const:
      return pushConstant(v, "i64", v.reader.varint64("i64 constant"));
    case Opcode.F32Const:
      return pushConstant(v, "f32", v.reader.f32());
    case Opcode.F64Const:
      return pushConstant(v, "f64", v.reader.f64());
    case Opcode.RefNull:
      return refNull(v);
    case Opcode.RefIsNull:
      return refIsNull(v);
    case Opcode.RefFunc:
      return refFunc(v);
    case Opcode.MiscPrefix: {
      const sub = v.reader.varuint32("instruction");
      const op = MISC_OPS.get(sub);
      if (!op) {
        return v.fail("DC0003", { kind: "unknown-opcode", opcode: sub, prefix: opcode });
      }
      return simple(v, op);
    }
  }

  const op = SIMPLE_OPS.get(opcode);
  if (!op) return v.fail("DC0003", { kind: "unknown-opcode", opcode });
  simple(v, op);
};

/** A transfer at region level ends the current funclet. */
const closeAtRegionLevel = (v: BodyValidator, top: ControlFrame) => {
  if (top.kind === "region" && top.region) closeFunclet(v, top.region);
};

const beginBlock = (v: BodyValidator) => {
  const { params, results } = v.blockType();
  const entries = v.popTypes("block", params);
  const join = v.ssa.createBlock("join");
  v.frames.push({
    kind: "block",
    params,
    results,
    height: v.stack.height,
    unreachable: false,
    labelBlock: join,
    endBlock: join,
    entryValues: [],
    offset: v.instructionStart,
  });
  v.pushEntries(entries);
};

const beginLoop = (v: BodyValidator) => {
  const { params, results } = v.blockType();
  const entries = v.popTypes("loop", params);
  const header = v.ssa.isDead(v.current)
    ? v.ssa.createDeadBlock()
    : v.ssa.createBlock("loop");
  const after = v.ssa.createBlock("join", "loop exit");
  v.jump(header, entries, "loop");
  v.frames.push({
    kind: "loop",
    params,
    results,
    height: v.stack.height,
    unreachable: false,
    labelBlock: header,
    endBlock: after,
    entryValues: [],
    offset: v.instructionStart,
  });
  v.current = header;
  v.pushEntries(v.blockArguments(header, params));
};

const beginIf = (v: BodyValidator) => {
  const { params, results } = v.blockType();
  const condition = v.pop("if", "i32");
  const entries = v.popTypes("if", params);
  const source = v.current;
  const thenBlock = v.successor("then");
  const elseBlock = v.successor("else");
  v.ssa.terminate(source, {
    kind: "branch",
    condition: condition.value,
    then: thenBlock,
    else: elseBlock,
    via: "if",
  });
  const join = v.ssa.createBlock("join");
  v.frames.push({
    kind: "if",
    params,
    results,
    height: v.stack.height,
    unreachable: false,
    labelBlock: join,
    endBlock: join,
    elseBlock,
    entryValues: entries,
    offset: v.instructionStart,
  });
  v.current = thenBlock;
  v.pushEntries(entries);
};

const beginElse = (v: BodyValidator) => {
  const frame = v.frames.top();
  if (frame.kind === "region") return v.fail("ST0005", { kind: "else-in-region" });
  if (frame.kind !== "if") return v.fail("ST0005", { kind: "else-without-if" });

  const values = v.frameExitValues(frame, frame.results, "block-end");
  v.jump(frame.endBlock, values, "end");
  v.stack.truncate(frame.height);
  frame.kind = "else";
  frame.unreachable = false;
  v.current = frame.elseBlock ?? v.ssa.createDeadBlock();
  v.pushEntries(frame.entryValues);
};

const end = (v: BodyValidator) => {
  const frame = v.frames.top();
  switch (frame.kind) {
    case "region":
      if (frame.region) endFunclet(v, frame.region);
      return;
    case "function":
      return endFunction(v, frame);
    case "if": {
      if (!sameTypes(frame.params, frame.results)) {
        return v.fail("TY0007", {
          kind: "if-without-else",
          params: formatTypes(frame.params),
          results: formatTypes(frame.results),
        });
      }
      const values = v.frameExitValues(frame, frame.results, "block-end");
      v.jump(frame.endBlock, values, "end");
      v.current = frame.elseBlock ?? v.ssa.createDeadBlock();
      v.jump(frame.endBlock, frame.entryValues, "else");
      return finishJoin(v);
    }
    case "loop": {
      const values = v.frameExitValues(frame, frame.results, "block-end");
      v.jump(frame.endBlock, values, "end");
      v.ssa.sealBlock(frame.labelBlock);
      return finishJoin(v);
    }
    case "block":
    case "else": {
      const values = v.frameExitValues(frame, frame.results, "block-end");
      v.jump(frame.endBlock, values, "end");
      return finishJoin(v);
    }
  }
};

/** Pops a structured frame and continues in its join block with its results. */
const finishJoin = (v: BodyValidator) => {
  const frame = v.frames.pop();
  v.stack.truncate(frame.height);
  v.ssa.sealBlock(frame.endBlock);
  v.current = frame.endBlock;
  v.pushEntries(v.blockArguments(frame.endBlock, frame.results));
};

const endFunction = (v: BodyValidator, frame: ControlFrame) => {
  const values = v.frameExitValues(frame, frame.results, "function-end");
  v.jump(v.ssa.exit, values, "end");
  v.ssa.sealBlock(v.ssa.exit);
  v.frames.pop();
  v.stack.truncate(0);
  v.current = v.ssa.exit;
  const returned = v.blockArguments(v.ssa.exit, frame.results);
  v.ssa.terminate(v.ssa.exit, {
    kind: "return",
    values: returned.map((entry) => entry.value),
  });
};

/** `br` and `return`: an unconditional transfer to a label. */
const branch = (v: BodyValidator, depth: number, via: TransferVia) => {
  const frame = v.branchTarget(depth);
  const values = v.popLabelValues(via, frame);
  v.jump(frame.labelBlock, values, via);
  v.markUnreachable();
};

const branchIf = (v: BodyValidator) => {
  const depth = v.reader.varuint32("label");
  const frame = v.branchTarget(depth);
  const condition = v.pop("br_if", "i32");
  const values = v.popLabelValues("br_if", frame);
  const source = v.current;
  const next = v.successor("continue");
  v.transfer(frame.labelBlock, values);
  v.ssa.terminate(source, {
    kind: "branch",
    condition: condition.value,
    then: frame.labelBlock,
    else: next,
    via: "br_if",
  });
  v.current = next;
  v.pushEntries(values);
};

const branchTable = (v: BodyValidator) => {
  const count = v.reader.varuint32("branch table size");
  const labels: number[] = [];
  for (let index = 0; index < count; index += 1) {
    labels.push(v.reader.varuint32("label"));
  }
  const defaultLabel = v.reader.varuint32("label");

  const defaultFrame = v.branchTarget(defaultLabel);
  const arity = labelTypes(defaultFrame).length;
  const frames = labels.map((label) => {
    const frame = v.branchTarget(label);
    const actual = labelTypes(frame).length;
    if (actual !== arity) {
      return v.fail("TY0006", {
        kind: "branch-table-arity",
        label,
        expected: arity,
        actual,
      });
    }
    return frame;
  });

  const index = v.pop("br_table", "i32");
  const values = v.popLabelValues("br_table", defaultFrame);
  const types = values.map((entry) => entry.type);
  frames.forEach((frame) => {
    if (!sameTypes(types, labelTypes(frame))) {
      v.fail("TY0001", {
        kind: "operand-mismatch",
        instruction: "br_table",
        expected: formatTypes(labelTypes(frame)),
        actual: formatTypes(types),
      });
    }
  });

  const targets = frames.map((frame) => frame.labelBlock);
  new Set([...targets, defaultFrame.labelBlock]).forEach((target) =>
    v.transfer(target, values)
  );
  v.ssa.terminate(v.current, {
    kind: "table",
    index: index.value,
    targets,
    default: defaultFrame.labelBlock,
    via: "br_table",
  });
  v.markUnreachable();
};

const call = (v: BodyValidator) => {
  const index = v.reader.varuint32("function index");
  const callee = v.context.functions?.[index];
  if (!callee) {
    return v.fail("ST0007", {
      kind: "index-out-of-range",
      space: "function",
      index,
      count: v.context.functions?.length ?? 0,
    });
  }
  const args = v.popTypes("call", callee.params);
  pushResults(v, callee.results, {
    op: "call",
    operands: args,
    immediates: [index],
  });
};

const typedSelectType = (v: BodyValidator): ValueType => {
  const count = v.reader.varuint32("select type count");
  if (count !== 1) {
    return v.fail("DC0002", {
      kind: "integer-out-of-range",
      encoding: "select type count",
    });
  }
  return v.reader.valueType();
};

const select = (v: BodyValidator, declared?: ValueType) => {
  const condition = v.pop("select", "i32");
  const second = v.pop("select", declared);
  const first = v.pop("select", declared);

  if (!declared) {
    [first, second].forEach(({ type }) => {
      if (isReferenceType(type)) {
        v.fail("TY0001", {
          kind: "operand-mismatch",
          instruction: "select",
          expected: "a numeric operand",
          actual: formatTypes([type]),
        });
      }
    });
    if (!operandMatches(first.type, second.type)) {
      v.fail("TY0001", {
        kind: "operand-mismatch",
        instruction: "select",
        expected: formatTypes([first.type]),
        actual: formatTypes([second.type]),
      });
    }
  }

  const type: OperandType =
    declared ?? (first.type === "unknown" ? second.type : first.type);
  pushResults(v, [type], {
    op: "select",
    operands: [first, second, condition],
  });
};

const localOp = (v: BodyValidator, opcode: number) => {
  const index = v.reader.varuint32("local index");
  const type = v.localType(index);
  const slot = localSlot(index);

  if (opcode === Opcode.LocalGet) {
    v.push(type, v.ssa.readVariable(slot, v.current, type));
    return;
  }

  const name = opcode === Opcode.LocalSet ? "local.set" : "local.tee";
  const entry = v.pop(name, type);
  v.ssa.writeVariable(slot, v.current, entry.value);
  if (opcode === Opcode.LocalTee) v.push(type, entry.value);
};

const globalOp = (v: BodyValidator, opcode: number) => {
  const index = v.reader.varuint32("global index");
  const declared = v.context.globals?.[index];
  if (!declared) {
    return v.fail("ST0007", {
      kind: "index-out-of-range",
      space: "global",
      index,
      count: v.context.globals?.length ?? 0,
    });
  }

  if (opcode === Opcode.GlobalGet) {
    return pushResults(v, [declared.type], {
      op: "global.get",
      operands: [],
      immediates: [index],
    });
  }

  if (!declared.mutable) {
    return v.fail("ST0008", { kind: "immutable-global", index });
  }
  const entry = v.pop("global.set", declared.type);
  pushResults(v, [], {
    op: "global.set",
    operands: [entry],
    immediates: [index],
  });
};

const requireMemory = (v: BodyValidator, index = 0) => {
  const count = v.context.hasMemory ? 1 : 0;
  if (index >= count) {
    v.fail("ST0007", { kind: "index-out-of-range", space: "memory", index, count });
  }
};

const memoryOp = (v: BodyValidator, opcode: number) => {
  const memory = v.reader.varuint32("memory index");
  requireMemory(v, memory);
  if (opcode === Opcode.MemorySize) {
    return pushResults(v, ["i32"], {
      op: "memory.size",
      operands: [],
      immediates: [memory],
    });
  }
  const delta = v.pop("memory.grow", "i32");
  pushResults(v, ["i32"], {
    op: "memory.grow",
    operands: [delta],
    immediates: [memory],
  });
};

const simple = (v: BodyValidator, op: SimpleOp) => {
  const immediates: number[] = [];
  if (op.immediate === "memarg") {
    immediates.push(v.reader.varuint32("alignment"), v.reader.varuint32("offset"));
    requireMemory(v);
  }
  const operands = v.popTypes(op.name, op.params);
  pushResults(v, op.results, { op: op.name, operands, immediates });
};

const pushConstant = (
  v: BodyValidator,
  type: ValueType,
  value: number | bigint
) => v.push(type, v.ssa.constant(type, value));

const refNull = (v: BodyValidator) => {
  const start = v.reader.offset;
  const byte = v.reader.u8("reference type");
  const type = valueTypeFromCode(byte);
  if (!type || !isReferenceType(type)) {
    return v.fail("DC0004", { kind: "reference-type", byte }, { start });
  }
  v.push(type, v.ssa.constant(type, null));
};

const refIsNull = (v: BodyValidator) => {
  const entry = v.pop("ref.is_null");
  if (entry.type !== "unknown" && !isReferenceType(entry.type)) {
    return v.fail("TY0001", {
      kind: "operand-mismatch",
      instruction: "ref.is_null",
      expected: "a reference operand",
      actual: formatTypes([entry.type]),
    });
  }
  pushResults(v, ["i32"], { op: "ref.is_null", operands: [entry] });
};

const refFunc = (v: BodyValidator) => {
  const index = v.reader.varuint32("function index");
  const count = v.context.functions?.length ?? 0;
  if (index >= count) {
    return v.fail("ST0007", {
      kind: "index-out-of-range",
      space: "function",
      index,
      count,
    });
  }
  pushResults(v, ["funcref"], {
    op: "ref.func",
    operands: [],
    immediates: [index],
  });
};

/** Emits an operation into the current block and pushes its results. */
const pushResults = (
  v: BodyValidator,
  results: readonly OperandType[],
  {
    op,
    operands,
    immediates = [],
  }: {
    op: string;
    operands: readonly StackEntry[];
    immediates?: readonly (number | bigint)[];
  }
) => {
  const values = v.ssa.emitOp({
    block: v.current,
    op,
    operands: operands.map((entry) => entry.value),
    results,
    immediates,
  });
  values.forEach((value, index) => v.push(results[index] ?? "unknown", value));
};
