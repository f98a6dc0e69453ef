import type { NumericType, ValueType } from "./value-types.js";

export const Opcode = {
  Unreachable: 0x00,
  Nop: 0x01,
  Block: 0x02,
  Loop: 0x03,
  If: 0x04,
  Else: 0x05,
  End: 0x0b,
  Br: 0x0c,
  BrIf: 0x0d,
  BrTable: 0x0e,
  Return: 0x0f,
  Call: 0x10,
  FuncletRegion: 0x16,
  FuncletSig: 0x17,
  Drop: 0x1a,
  Select: 0x1b,
  SelectTyped: 0x1c,
  FuncletCall: 0x1d,
  FuncletCallIf: 0x1e,
  FuncletCallTable: 0x1f,
  LocalGet: 0x20,
  LocalSet: 0x21,
  LocalTee: 0x22,
  GlobalGet: 0x23,
  GlobalSet: 0x24,
  MemorySize: 0x3f,
  MemoryGrow: 0x40,
  I32Const: 0x41,
  I64Const: 0x42,
  F32Const: 0x43,
  F64Const: 0x44,
  RefNull: 0xd0,
  RefIsNull: 0xd1,
  RefFunc: 0xd2,
  MiscPrefix: 0xfc,
} as const;

export type OpcodeName = keyof typeof Opcode;

const instructionNames: Record<number, string> = {
  [Opcode.Unreachable]: "unreachable",
  [Opcode.Nop]: "nop",
  [Opcode.Block]: "block",
  [Opcode.Loop]: "loop",
  [Opcode.If]: "if",
  [Opcode.Else]: "else",
  [Opcode.End]: "end",
  [Opcode.Br]: "br",
  [Opcode.BrIf]: "br_if",
  [Opcode.BrTable]: "br_table",
  [Opcode.Return]: "return",
  [Opcode.Call]: "call",
  [Opcode.FuncletRegion]: "funclet_region",
  [Opcode.FuncletSig]: "funclet_sig",
  [Opcode.Drop]: "drop",
  [Opcode.Select]: "select",
  [Opcode.SelectTyped]: "select",
  [Opcode.FuncletCall]: "funclet_call",
  [Opcode.FuncletCallIf]: "funclet_call_if",
  [Opcode.FuncletCallTable]: "funclet_call_table",
  [Opcode.LocalGet]: "local.get",
  [Opcode.LocalSet]: "local.set",
  [Opcode.LocalTee]: "local.tee",
  [Opcode.GlobalGet]: "global.get",
  [Opcode.GlobalSet]: "global.set",
  [Opcode.MemorySize]: "memory.size",
  [Opcode.MemoryGrow]: "memory.grow",
  [Opcode.I32Const]: "i32.const",
  [Opcode.I64Const]: "i64.const",
  [Opcode.F32Const]: "f32.const",
  [Opcode.F64Const]: "f64.const",
  [Opcode.RefNull]: "ref.null",
  [Opcode.RefIsNull]: "ref.is_null",
  [Opcode.RefFunc]: "ref.func",
};

/**
 * An instruction whose typing is a fixed `[params] -> [results]` rule.
 * Memory accesses additionally carry a `memarg` immediate.
 */
export interface SimpleOp {
  opcode: number;
  name: string;
  params: readonly ValueType[];
  results: readonly ValueType[];
  immediate?: "memarg";
}

const INT_COMPARE = ["eq", "ne", "lt_s", "lt_u", "gt_s", "gt_u", "le_s", "le_u", "ge_s", "ge_u"];
const FLOAT_COMPARE = ["eq", "ne", "lt", "gt", "le", "ge"];
const INT_UNARY = ["clz", "ctz", "popcnt"];
const INT_BINARY = [
  "add", "sub", "mul", "div_s", "div_u", "rem_s", "rem_u",
  "and", "or", "xor", "shl", "shr_s", "shr_u", "rotl", "rotr",
];
const FLOAT_UNARY = ["abs", "neg", "ceil", "floor", "trunc", "nearest", "sqrt"];
const FLOAT_BINARY = ["add", "sub", "mul", "div", "min", "max", "copysign"];

// 0xa7..0xc4 in opcode order; operand types are read off the name.
const CONVERSIONS = [
  "i32.wrap_i64",
  "i32.trunc_f32_s", "i32.trunc_f32_u", "i32.trunc_f64_s", "i32.trunc_f64_u",
  "i64.extend_i32_s", "i64.extend_i32_u",
  "i64.trunc_f32_s", "i64.trunc_f32_u", "i64.trunc_f64_s", "i64.trunc_f64_u",
  "f32.convert_i32_s", "f32.convert_i32_u", "f32.convert_i64_s", "f32.convert_i64_u",
  "f32.demote_f64",
  "f64.convert_i32_s", "f64.convert_i32_u", "f64.convert_i64_s", "f64.convert_i64_u",
  "f64.promote_f32",
  "i32.reinterpret_f32", "i64.reinterpret_f64", "f32.reinterpret_i32", "f64.reinterpret_i64",
  "i32.extend8_s", "i32.extend16_s", "i64.extend8_s", "i64.extend16_s", "i64.extend32_s",
];

const SATURATING_TRUNCATIONS = [
  "i32.trunc_sat_f32_s", "i32.trunc_sat_f32_u", "i32.trunc_sat_f64_s", "i32.trunc_sat_f64_u",
  "i64.trunc_sat_f32_s", "i64.trunc_sat_f32_u", "i64.trunc_sat_f64_s", "i64.trunc_sat_f64_u",
];

const LOADS = [
  "i32.load", "i64.load", "f32.load", "f64.load",
  "i32.load8_s", "i32.load8_u", "i32.load16_s", "i32.load16_u",
  "i64.load8_s", "i64.load8_u", "i64.load16_s", "i64.load16_u",
  "i64.load32_s", "i64.load32_u",
];

const STORES = [
  "i32.store", "i64.store", "f32.store", "f64.store",
  "i32.store8", "i32.store16", "i64.store8", "i64.store16", "i64.store32",
];

const numericPrefix = (name: string): NumericType => {
  const prefix = name.slice(0, 3);
  switch (prefix) {
    case "i32":
    case "i64":
    case "f32":
    case "f64":
      return prefix;
  }
  throw new Error(`instruction ${name} has no numeric type prefix`);
};

const conversionSource = (name: string): NumericType => {
  const match = /_(i32|i64|f32|f64)/.exec(name);
  return match ? numericPrefix(match[1] ?? name) : numericPrefix(name);
};

const family = ({
  start,
  type,
  names,
  arity,
  result,
}: {
  start: number;
  type: NumericType;
  names: readonly string[];
  arity: 1 | 2;
  result?: NumericType;
}): SimpleOp[] =>
  names.map((name, index) => ({
    opcode: start + index,
    name: `${type}.${name}`,
    params: arity === 1 ? [type] : [type, type],
    results: [result ?? type],
  }));

const conversions = (start: number, names: readonly string[]): SimpleOp[] =>
  names.map((name, index) => ({
    opcode: start + index,
    name,
    params: [conversionSource(name)],
    results: [numericPrefix(name)],
  }));

const memoryAccesses = (
  start: number,
  names: readonly string[],
  kind: "load" | "store"
): SimpleOp[] =>
  names.map((name, index) => {
    const type = numericPrefix(name);
    return {
      opcode: start + index,
      name,
      params: kind === "load" ? ["i32"] : ["i32", type],
      results: kind === "load" ? [type] : [],
      immediate: "memarg",
    };
  });

const indexByOpcode = (ops: readonly SimpleOp[]): ReadonlyMap<number, SimpleOp> =>
  new Map(ops.map((op) => [op.opcode, op]));

export const SIMPLE_OPS = indexByOpcode([
  ...memoryAccesses(0x28, LOADS, "load"),
  ...memoryAccesses(0x36, STORES, "store"),
  { opcode: 0x45, name: "i32.eqz", params: ["i32"], results: ["i32"] },
  ...family({ start: 0x46, type: "i32", names: INT_COMPARE, arity: 2, result: "i32" }),
  { opcode: 0x50, name: "i64.eqz", params: ["i64"], results: ["i32"] },
  ...family({ start: 0x51, type: "i64", names: INT_COMPARE, arity: 2, result: "i32" }),
  ...family({ start: 0x5b, type: "f32", names: FLOAT_COMPARE, arity: 2, result: "i32" }),
  ...family({ start: 0x61, type: "f64", names: FLOAT_COMPARE, arity: 2, result: "i32" }),
  ...family({ start: 0x67, type: "i32", names: INT_UNARY, arity: 1 }),
  ...family({ start: 0x6a, type: "i32", names: INT_BINARY, arity: 2 }),
  ...family({ start: 0x79, type: "i64", names: INT_UNARY, arity: 1 }),
  ...family({ start: 0x7c, type: "i64", names: INT_BINARY, arity: 2 }),
  ...family({ start: 0x8b, type: "f32", names: FLOAT_UNARY, arity: 1 }),
  ...family({ start: 0x92, type: "f32", names: FLOAT_BINARY, arity: 2 }),
  ...family({ start: 0x99, type: "f64", names: FLOAT_UNARY, arity: 1 }),
  ...family({ start: 0xa0, type: "f64", names: FLOAT_BINARY, arity: 2 }),
  ...conversions(0xa7, CONVERSIONS),
]);

/** Sub-opcodes after the 0xfc prefix. */
export const MISC_OPS = indexByOpcode(conversions(0, SATURATING_TRUNCATIONS));

const simpleOpsByName = new Map(
  [...SIMPLE_OPS.values()].map((op) => [op.name, op])
);

export const simpleOpByName = (name: string): SimpleOp | undefined =>
  simpleOpsByName.get(name);

export const miscOpByName = (name: string): SimpleOp | undefined =>
  [...MISC_OPS.values()].find((op) => op.name === name);

export const instructionName = (opcode: number): string =>
  instructionNames[opcode] ??
  SIMPLE_OPS.get(opcode)?.name ??
  `0x${opcode.toString(16).padStart(2, "0")}`;
