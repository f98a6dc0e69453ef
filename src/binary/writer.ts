import {
  EMPTY_BLOCK_TYPE,
  VALUE_TYPE_CODES,
  type ValueType,
} from "./value-types.js";
import { Opcode, miscOpByName, simpleOpByName } from "./opcodes.js";

/** `empty`, a single result type, or an index into the function types. */
export type BlockType = "empty" | ValueType | { typeIndex: number };

export type LocalGroup = { count: number; type: ValueType };

export type MemArg = { align?: number; offset?: number };

/**
 * Encodes function bodies, including the funclet opcodes. Every instruction
 * helper appends one instruction and returns the writer for chaining.
 */
export class BodyWriter {
  #locals: LocalGroup[];
  #code: number[] = [];
  #instructions = 0;

  constructor({ locals = [] }: { locals?: LocalGroup[] } = {}) {
    this.#locals = locals;
  }

  /** Instructions appended so far. */
  get instructionCount(): number {
    return this.#instructions;
  }

  finish(): Uint8Array {
    const header: number[] = [];
    pushUnsigned(header, this.#locals.length);
    this.#locals.forEach(({ count, type }) => {
      pushUnsigned(header, count);
      header.push(VALUE_TYPE_CODES[type]);
    });
    return Uint8Array.from([...header, ...this.#code]);
  }

  /** Appends raw bytes without counting an instruction. */
  raw(...bytes: number[]): this {
    this.#code.push(...bytes);
    return this;
  }

  unreachable = () => this.#instr(Opcode.Unreachable);
  nop = () => this.#instr(Opcode.Nop);
  end = () => this.#instr(Opcode.End);
  else = () => this.#instr(Opcode.Else);
  return = () => this.#instr(Opcode.Return);
  drop = () => this.#instr(Opcode.Drop);
  refIsNull = () => this.#instr(Opcode.RefIsNull);

  block = (type: BlockType = "empty") =>
    this.#instr(Opcode.Block, ...encodeBlockType(type));
  loop = (type: BlockType = "empty") =>
    this.#instr(Opcode.Loop, ...encodeBlockType(type));
  if = (type: BlockType = "empty") =>
    this.#instr(Opcode.If, ...encodeBlockType(type));

  br = (depth: number) => this.#instr(Opcode.Br, ...unsigned(depth));
  brIf = (depth: number) => this.#instr(Opcode.BrIf, ...unsigned(depth));
  brTable = (labels: number[], defaultLabel: number) =>
    this.#instr(
      Opcode.BrTable,
      ...unsigned(labels.length),
      ...labels.flatMap(unsigned),
      ...unsigned(defaultLabel)
    );

  call = (index: number) => this.#instr(Opcode.Call, ...unsigned(index));

  select = (type?: ValueType) =>
    type
      ? this.#instr(Opcode.SelectTyped, 1, VALUE_TYPE_CODES[type])
      : this.#instr(Opcode.Select);

  localGet = (index: number) => this.#instr(Opcode.LocalGet, ...unsigned(index));
  localSet = (index: number) => this.#instr(Opcode.LocalSet, ...unsigned(index));
  localTee = (index: number) => this.#instr(Opcode.LocalTee, ...unsigned(index));
  globalGet = (index: number) =>
    this.#instr(Opcode.GlobalGet, ...unsigned(index));
  globalSet = (index: number) =>
    this.#instr(Opcode.GlobalSet, ...unsigned(index));

  memorySize = () => this.#instr(Opcode.MemorySize, 0);
  memoryGrow = () => this.#instr(Opcode.MemoryGrow, 0);

  i32Const = (value: number) =>
    this.#instr(Opcode.I32Const, ...signed(BigInt(value)));
  i64Const = (value: bigint | number) =>
    this.#instr(Opcode.I64Const, ...signed(BigInt(value)));
  f32Const = (value: number) => this.#instr(Opcode.F32Const, ...float(value, 4));
  f64Const = (value: number) => this.#instr(Opcode.F64Const, ...float(value, 8));

  refNull = (type: "funcref" | "externref") =>
    this.#instr(Opcode.RefNull, VALUE_TYPE_CODES[type]);
  refFunc = (index: number) => this.#instr(Opcode.RefFunc, ...unsigned(index));

  /** Any fixed-typing instruction by name, e.g. `i32.add` or `f64.load`. */
  op = (name: string, memarg: MemArg = {}) => {
    const simple = simpleOpByName(name);
    if (simple) {
      return simple.immediate === "memarg"
        ? this.#instr(
            simple.opcode,
            ...unsigned(memarg.align ?? 0),
            ...unsigned(memarg.offset ?? 0)
          )
        : this.#instr(simple.opcode);
    }

    const misc = miscOpByName(name);
    if (misc) {
      return this.#instr(Opcode.MiscPrefix, ...unsigned(misc.opcode));
    }

    throw new Error(`unknown instruction ${name}`);
  };

  funcletRegion = ({
    params = [],
    results = [],
    funclets,
  }: {
    params?: ValueType[];
    results?: ValueType[];
    funclets: number;
  }) =>
    this.#instr(
      Opcode.FuncletRegion,
      ...typeVector(params),
      ...typeVector(results),
      ...unsigned(funclets)
    );

  funcletSig = ({
    params = [],
    preds = 0,
  }: {
    params?: ValueType[];
    preds?: number;
  } = {}) =>
    this.#instr(Opcode.FuncletSig, ...typeVector(params), ...unsigned(preds));

  funcletCall = (delta: number) =>
    this.#instr(Opcode.FuncletCall, ...signed(BigInt(delta)));
  funcletCallIf = (delta: number) =>
    this.#instr(Opcode.FuncletCallIf, ...signed(BigInt(delta)));
  funcletCallTable = (deltas: number[], defaultDelta: number) =>
    this.#instr(
      Opcode.FuncletCallTable,
      ...unsigned(deltas.length),
      ...deltas.flatMap((delta) => signed(BigInt(delta))),
      ...signed(BigInt(defaultDelta))
    );

  #instr(...bytes: number[]): this {
    this.#code.push(...bytes);
    this.#instructions += 1;
    return this;
  }
}

const pushUnsigned = (out: number[], value: number) => {
  let rest = value >>> 0;
  do {
    const byte = rest & 0x7f;
    rest >>>= 7;
    out.push(rest === 0 ? byte : byte | 0x80);
  } while (rest !== 0);
};

export const unsigned = (value: number): number[] => {
  const out: number[] = [];
  pushUnsigned(out, value);
  return out;
};

export const signed = (value: bigint): number[] => {
  const out: number[] = [];
  let rest = value;
  for (;;) {
    const byte = Number(rest & 0x7fn);
    rest >>= 7n;
    const done =
      (rest === 0n && (byte & 0x40) === 0) ||
      (rest === -1n && (byte & 0x40) !== 0);
    out.push(done ? byte : byte | 0x80);
    if (done) return out;
  }
};

const float = (value: number, width: 4 | 8): number[] => {
  const view = new DataView(new ArrayBuffer(width));
  if (width === 4) view.setFloat32(0, value, true);
  else view.setFloat64(0, value, true);
  return [...new Uint8Array(view.buffer)];
};

const typeVector = (types: ValueType[]): number[] => [
  ...unsigned(types.length),
  ...types.map((type) => VALUE_TYPE_CODES[type]),
];

const encodeBlockType = (type: BlockType): number[] => {
  if (type === "empty") return [EMPTY_BLOCK_TYPE];
  if (typeof type === "string") return [VALUE_TYPE_CODES[type]];
  return signed(BigInt(type.typeIndex));
};
