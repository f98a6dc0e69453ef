import { ByteReader } from "../binary/reader.js";
import {
  EMPTY_BLOCK_TYPE,
  formatTypes,
  operandMatches,
  sameTypes,
  valueTypeFromCode,
  type FuncType,
  type OperandType,
  type ValueType,
} from "../binary/value-types.js";
import type {
  DiagnosticCode,
  DiagnosticDetails,
  DiagnosticParams,
} from "../diagnostics/index.js";
import { SsaBuilder } from "../ssa/builder.js";
import {
  argSlot,
  type BlockId,
  type BlockKind,
  type TransferVia,
  type ValueId,
} from "../ssa/ir.js";
import { ControlStack, labelTypes, type ControlFrame } from "./control-frames.js";
import type { EnclosingTypeContext, RegionSummary } from "./context.js";
import { OperandStack, type StackEntry } from "./operand-stack.js";

/** Upper bound on declared locals, matching common engine limits. */
export const MAX_LOCALS = 50_000;

export type FrameExitKind = "block-end" | "region-exit" | "function-end";

/**
 * Mutable state of one function body's single decoding pass, plus the typing
 * helpers shared by host instructions and funclet regions.
 */
export class BodyValidator {
  readonly reader: ByteReader;
  readonly context: EnclosingTypeContext;
  readonly stack = new OperandStack();
  readonly frames = new ControlStack();
  readonly ssa: SsaBuilder;
  readonly params: readonly ValueType[];
  readonly results: readonly ValueType[];
  /** Declared locals, parameters excluded. */
  readonly declaredLocals: readonly ValueType[];
  readonly regions: RegionSummary[] = [];
  current: BlockId;
  instructionCount = 0;
  /** Byte offset of the instruction being validated. */
  instructionStart = 0;
  #locals: readonly ValueType[];

  constructor({
    bytes,
    context,
  }: {
    bytes: Uint8Array;
    context: EnclosingTypeContext;
  }) {
    this.context = context;
    this.reader = new ByteReader({ bytes, file: context.name ?? "<body>" });
    this.params = context.signature.params;
    this.results = context.signature.results;
    this.declaredLocals = this.#readLocals();
    this.#locals = [...this.params, ...this.declaredLocals];
    this.ssa = new SsaBuilder({ params: this.params, locals: this.#locals });
    this.current = this.ssa.entry;
    this.frames.push({
      kind: "function",
      params: [],
      results: this.results,
      height: 0,
      unreachable: false,
      labelBlock: this.ssa.exit,
      endBlock: this.ssa.exit,
      entryValues: [],
      offset: this.reader.offset,
    });
  }

  get file(): string {
    return this.reader.file;
  }

  /** Index of the funclet being decoded in the innermost region, if any. */
  currentFunclet(): number | undefined {
    const depth = this.frames.innermostRegionDepth();
    const current = depth < 0 ? undefined : this.frames.label(depth)?.region?.current;
    return current === undefined || current < 0 ? undefined : current;
  }

  /** Raises `code`; inside a region the details name the current funclet. */
  fail<K extends DiagnosticCode>(
    code: K,
    params: DiagnosticParams<K>,
    options: { start?: number; details?: DiagnosticDetails } = {}
  ): never {
    const funclet = this.currentFunclet();
    const details =
      funclet === undefined ? options.details : { funclet, ...options.details };
    return this.reader.fail({
      code,
      params,
      start: options.start ?? this.instructionStart,
      details,
    });
  }

  localType(index: number): ValueType {
    const type = this.#locals[index];
    if (type === undefined) {
      return this.fail("ST0007", {
        kind: "index-out-of-range",
        space: "local",
        index,
        count: this.#locals.length,
      });
    }
    return type;
  }

  push(type: OperandType, value: ValueId): void {
    this.stack.push({ type, value });
  }

  pushEntries(entries: readonly StackEntry[]): void {
    entries.forEach((entry) => this.stack.push(entry));
  }

  /**
   * Pops one operand. Under an unreachable frame an empty stack yields an
   * `unknown` operand instead of underflowing.
   */
  pop(instruction: string, expected?: ValueType): StackEntry {
    const frame = this.frames.top();
    const entry = this.stack.pop(frame.height);
    if (!entry) {
      if (frame.unreachable) {
        const type = expected ?? "unknown";
        return { type, value: this.ssa.undef(type) };
      }
      return this.fail("TY0002", {
        kind: "stack-underflow",
        instruction,
        floor: frame.kind === "region" ? "region" : "frame",
      });
    }

    if (expected === undefined) return entry;
    if (!operandMatches(entry.type, expected)) {
      return this.fail(
        "TY0001",
        {
          kind: "operand-mismatch",
          instruction,
          expected: formatTypes([expected]),
          actual: formatTypes([entry.type]),
        },
        { details: { expected: [expected], actual: [entry.type] } }
      );
    }
    return entry.type === "unknown" ? { type: expected, value: entry.value } : entry;
  }

  /** Pops `types` (last type on top); entries come back bottom to top. */
  popTypes(instruction: string, types: readonly ValueType[]): StackEntry[] {
    const entries: StackEntry[] = [];
    for (let index = types.length - 1; index >= 0; index -= 1) {
      entries.unshift(this.pop(instruction, types[index]));
    }
    return entries;
  }

  /**
   * Checks the values a frame leaves behind when it exits through `end` and
   * returns them, padding a polymorphic stack with undefined values.
   */
  frameExitValues(
    frame: ControlFrame,
    expected: readonly ValueType[],
    kind: FrameExitKind
  ): StackEntry[] {
    const actual = this.stack.valuesAbove(frame.height);
    const actualTypes = actual.map((entry) => entry.type);
    const missing = expected.length - actual.length;
    const matches = frame.unreachable
      ? missing >= 0 &&
        actualTypes.every((type, index) =>
          operandMatches(type, expected[index + missing] ?? "unknown")
        )
      : sameTypes(actualTypes, expected);

    if (!matches) {
      return this.fail(
        "TY0004",
        {
          kind,
          expected: formatTypes(expected),
          actual: formatTypes(actualTypes),
        },
        { details: { expected, actual: actualTypes } }
      );
    }

    return expected.map((type, index) => {
      const entry = actual[index - missing];
      return entry && index >= missing
        ? { type, value: entry.value }
        : { type, value: this.ssa.undef(type) };
    });
  }

  /** The frame `depth` labels out, or a structural error. */
  branchTarget(depth: number): ControlFrame {
    const frame = this.frames.label(depth);
    if (!frame) {
      return this.fail("ST0006", {
        kind: "label-out-of-range",
        depth,
        available: this.frames.depth,
      });
    }
    return frame;
  }

  /** Pops the operands a branch to `frame` carries. */
  popLabelValues(instruction: string, frame: ControlFrame): StackEntry[] {
    return this.popTypes(instruction, labelTypes(frame));
  }

  /**
   * Records a control transfer from the current block into `target`, carrying
   * `values` as the target's arguments.
   */
  transfer(target: BlockId, values: readonly StackEntry[]): void {
    this.ssa.addEdge({
      from: this.current,
      to: target,
      args: values.map((entry) => entry.value),
    });
  }

  jump(target: BlockId, values: readonly StackEntry[], via: TransferVia): void {
    this.transfer(target, values);
    this.ssa.terminate(this.current, { kind: "jump", target, via });
  }

  /** A sealed block entered only from the current block, or a dead block. */
  successor(kind: BlockKind, label?: string): BlockId {
    if (this.ssa.isDead(this.current)) return this.ssa.createDeadBlock();
    const block = this.ssa.createBlock(kind, label);
    this.ssa.addPredecessor(block, this.current);
    this.ssa.sealBlock(block);
    return block;
  }

  /** Reads the values carried into `block` on its edges. */
  blockArguments(block: BlockId, types: readonly ValueType[]): StackEntry[] {
    return types.map((type, index) => ({
      type,
      value: this.ssa.readVariable(argSlot(block, index), block, type),
    }));
  }

  /** After an unconditional transfer: drop the frame's operands and go dead. */
  markUnreachable(): void {
    const frame = this.frames.top();
    this.stack.truncate(frame.height);
    frame.unreachable = true;
    this.current = this.ssa.createDeadBlock();
  }

  /** Decodes a block type into a function type. */
  blockType(): FuncType {
    const byte = this.reader.peekU8();
    if (byte === EMPTY_BLOCK_TYPE) {
      this.reader.u8("block type");
      return { params: [], results: [] };
    }

    const single = byte === undefined ? undefined : valueTypeFromCode(byte);
    if (single) {
      this.reader.u8("block type");
      return { params: [], results: [single] };
    }

    const start = this.reader.offset;
    const index = this.reader.s33();
    if (index < 0) {
      return this.reader.fail({
        code: "DC0004",
        params: { kind: "value-type", byte: byte ?? 0 },
        start,
      });
    }

    const type = this.context.types?.[index];
    if (!type) {
      return this.reader.fail({
        code: "DC0004",
        params: { kind: "block-type", index },
        start,
      });
    }
    return type;
  }

  #readLocals(): ValueType[] {
    const groups = this.reader.varuint32("local declaration count");
    const locals: ValueType[] = [];
    for (let group = 0; group < groups; group += 1) {
      const start = this.reader.offset;
      const count = this.reader.varuint32("local count");
      const type = this.reader.valueType();
      if (locals.length + this.params.length + count > MAX_LOCALS) {
        return this.reader.fail({
          code: "DC0007",
          params: {
            kind: "too-many-locals",
            count: locals.length + this.params.length + count,
            limit: MAX_LOCALS,
          },
          start,
        });
      }
      for (let index = 0; index < count; index += 1) locals.push(type);
    }
    return locals;
  }
}
