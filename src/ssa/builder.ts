import { assertInvariant, InvariantViolation } from "../diagnostics/index.js";
import type { OperandType, ValueType } from "../binary/value-types.js";
import {
  argSlot,
  type BlockId,
  type BlockKind,
  type ConstValue,
  type Slot,
  type SsaBlock,
  type SsaFunction,
  type SsaValue,
  type Terminator,
  type ValueId,
} from "./ir.js";

/**
 * One entry of a block's definition table. A placeholder is the phi created
 * for a read in a block that was not sealed yet; sealing turns it into a
 * final definition unless the block overwrote the slot in the meantime.
 */
type Definition =
  | { kind: "final"; value: ValueId }
  | { kind: "placeholder"; phi: ValueId };

type PhiValue = Extract<SsaValue, { kind: "phi" }>;

export type SsaBuilderOptions = {
  params: readonly ValueType[];
  /** Types of every local, parameters first. */
  locals: readonly ValueType[];
};

/**
 * On-the-fly SSA construction after Braun et al., "Simple and Efficient
 * Construction of Static Single Assignment Form". Blocks are created as the
 * decoder discovers them and sealed once their last predecessor is known.
 */
export class SsaBuilder {
  readonly entry: BlockId;
  readonly exit: BlockId;
  #blocks: SsaBlock[] = [];
  #values: SsaValue[] = [];
  #defs = new Map<BlockId, Map<Slot, Definition>>();
  #pending = new Map<BlockId, Map<Slot, ValueId>>();
  #replacements = new Map<ValueId, ValueId>();
  #phiUsers = new Map<ValueId, Set<ValueId>>();
  #removed = new Set<ValueId>();
  #params: ValueId[];
  #locals: readonly ValueType[];
  #zeroes = new Map<number, ValueId>();
  #predSets = new Map<BlockId, Set<BlockId>>();

  constructor({ params, locals }: SsaBuilderOptions) {
    this.#locals = locals;
    this.entry = this.createBlock("entry", "entry");
    this.#block(this.entry).sealed = true;
    this.exit = this.createBlock("exit", "exit");
    this.#params = params.map((type, index) =>
      this.#push({ id: this.#values.length, kind: "param", index, type })
    );
  }

  createBlock(kind: BlockKind, label: string = kind): BlockId {
    const id = this.#blocks.length;
    this.#blocks.push({
      id,
      kind,
      label,
      preds: [],
      sealed: kind === "dead",
      phis: [],
      instructions: [],
    });
    return id;
  }

  /** A sealed block without predecessors, for code after an unconditional transfer. */
  createDeadBlock(): BlockId {
    return this.createBlock("dead");
  }

  isSealed(block: BlockId): boolean {
    return this.#block(block).sealed;
  }

  /** Sealed with no predecessors: nothing can reach it. */
  isDead(block: BlockId): boolean {
    const state = this.#block(block);
    return block !== this.entry && state.sealed && state.preds.length === 0;
  }

  predecessors(block: BlockId): readonly BlockId[] {
    return this.#block(block).preds;
  }

  addPredecessor(block: BlockId, pred: BlockId): void {
    const state = this.#block(block);
    if (state.sealed) {
      throw new InvariantViolation(
        `block ${block} is sealed and cannot gain predecessor ${pred}`
      );
    }
    const known = this.#predSets.get(block) ?? new Set<BlockId>();
    this.#predSets.set(block, known);
    if (known.has(pred)) return;
    known.add(pred);
    state.preds.push(pred);
  }

  /**
   * Carries `args` from `from` into `to`. Returns false without recording
   * anything when `from` is dead.
   */
  addEdge({
    from,
    to,
    args,
  }: {
    from: BlockId;
    to: BlockId;
    args: readonly ValueId[];
  }): boolean {
    if (this.isDead(from)) return false;
    args.forEach((value, index) =>
      this.writeVariable(argSlot(to, index), from, value)
    );
    this.addPredecessor(to, from);
    return true;
  }

  terminate(block: BlockId, terminator: Terminator): void {
    if (this.isDead(block)) return;
    const state = this.#block(block);
    assertInvariant(
      state.terminator === undefined,
      `block ${block} is already terminated`
    );
    state.terminator = terminator;
  }

  /** Idempotent. Resolves every placeholder phi recorded for `block`. */
  sealBlock(block: BlockId): void {
    const state = this.#block(block);
    if (state.sealed) return;
    state.sealed = true;

    const pending = this.#pending.get(block);
    this.#pending.delete(block);
    pending?.forEach((phi, slot) => {
      const value = this.#addPhiOperands(slot, phi);
      const defs = this.#definitions(block);
      const current = defs.get(slot);
      if (current?.kind === "placeholder" && current.phi === phi) {
        defs.set(slot, { kind: "final", value });
      }
    });
  }

  writeVariable(slot: Slot, block: BlockId, value: ValueId): void {
    this.#definitions(block).set(slot, { kind: "final", value });
  }

  readVariable(slot: Slot, block: BlockId, type: OperandType): ValueId {
    const local = this.#defs.get(block)?.get(slot);
    if (local) {
      return this.resolve(local.kind === "final" ? local.value : local.phi);
    }

    // Walk single-predecessor chains iteratively; they can be long.
    const visited: BlockId[] = [];
    let current = block;
    for (;;) {
      const state = this.#block(current);
      const def = current === block ? undefined : this.#defs.get(current)?.get(slot);
      if (def) {
        const value = this.resolve(def.kind === "final" ? def.value : def.phi);
        visited.forEach((id) => this.writeVariable(slot, id, value));
        return value;
      }
      const [pred] = state.preds;
      if (
        current === this.entry ||
        !state.sealed ||
        state.preds.length !== 1 ||
        pred === undefined
      ) {
        break;
      }
      visited.push(current);
      current = pred;
    }

    const value = this.#readAtMerge(slot, current, type);
    visited.forEach((id) => this.writeVariable(slot, id, value));
    return value;
  }

  /** Follows trivial-phi replacements to the surviving value. */
  resolve(value: ValueId): ValueId {
    let current = value;
    for (;;) {
      const next = this.#replacements.get(current);
      if (next === undefined) break;
      current = next;
    }
    if (current !== value) this.#replacements.set(value, current);
    return current;
  }

  param(index: number): ValueId {
    const value = this.#params[index];
    if (value === undefined) {
      throw new InvariantViolation(`parameter ${index} does not exist`);
    }
    return value;
  }

  constant(type: ValueType, value: ConstValue): ValueId {
    return this.#push({ id: this.#values.length, kind: "const", type, value });
  }

  undef(type: OperandType): ValueId {
    return this.#push({ id: this.#values.length, kind: "undef", type });
  }

  /** Appends an operation to `block`; returns one value per result. */
  emitOp({
    block,
    op,
    operands,
    results = [],
    immediates = [],
  }: {
    block: BlockId;
    op: string;
    operands: readonly ValueId[];
    results?: readonly OperandType[];
    immediates?: readonly (number | bigint)[];
  }): ValueId[] {
    const state = this.#block(block);
    const id = this.#push({
      id: this.#values.length,
      kind: "op",
      op,
      block,
      operands: [...operands],
      results,
      immediates,
    });
    state.instructions.push(id);
    if (results.length <= 1) return results.length === 1 ? [id] : [];

    return results.map((type, index) => {
      const extract = this.#push({
        id: this.#values.length,
        kind: "extract",
        block,
        source: id,
        index,
        type,
      });
      state.instructions.push(extract);
      return extract;
    });
  }

  valueType(value: ValueId): OperandType {
    const entry = this.#value(this.resolve(value));
    return entry.kind === "op" ? entry.results[0] ?? "unknown" : entry.type;
  }

  /** Snapshot of the finished function with every operand resolved. */
  finish(): SsaFunction {
    const blocks = this.#blocks
      .filter((block) => this.#isLive(block))
      .map((block): SsaBlock => {
        assertInvariant(block.sealed, `block ${block.id} was never sealed`);
        return {
          ...block,
          preds: [...block.preds],
          phis: block.phis.filter((phi) => !this.#removed.has(phi)),
          instructions: [...block.instructions],
          terminator: block.terminator && this.#resolveTerminator(block.terminator),
        };
      });

    const values = this.#values
      .filter((value) => !this.#removed.has(value.id))
      .map((value): SsaValue => {
        switch (value.kind) {
          case "op":
            return { ...value, operands: value.operands.map((id) => this.resolve(id)) };
          case "phi":
            return { ...value, operands: value.operands.map((id) => this.resolve(id)) };
          case "extract":
            return { ...value, source: this.resolve(value.source) };
          default:
            return value;
        }
      });

    return { entry: this.entry, exit: this.exit, blocks, values };
  }

  #readAtMerge(slot: Slot, block: BlockId, type: OperandType): ValueId {
    const state = this.#block(block);
    const def = this.#defs.get(block)?.get(slot);
    if (def) return this.resolve(def.kind === "final" ? def.value : def.phi);

    if (block === this.entry) {
      const value = this.#entryDefault(slot, type);
      this.writeVariable(slot, block, value);
      return value;
    }

    if (!state.sealed) {
      const phi = this.#newPhi(block, slot, type);
      const pending = this.#pending.get(block) ?? new Map<Slot, ValueId>();
      pending.set(slot, phi);
      this.#pending.set(block, pending);
      this.#definitions(block).set(slot, { kind: "placeholder", phi });
      return phi;
    }

    if (state.preds.length === 0) {
      const value = this.undef(type);
      this.writeVariable(slot, block, value);
      return value;
    }

    // Break cycles: the phi is the definition while its operands are read.
    const phi = this.#newPhi(block, slot, type);
    this.writeVariable(slot, block, phi);
    const value = this.#addPhiOperands(slot, phi);
    this.writeVariable(slot, block, value);
    return value;
  }

  #entryDefault(slot: Slot, type: OperandType): ValueId {
    const match = /^local:(\d+)$/.exec(slot);
    if (!match) return this.undef(type);

    const index = Number(match[1]);
    if (index < this.#params.length) return this.param(index);

    const cached = this.#zeroes.get(index);
    if (cached !== undefined) return cached;

    const localType = this.#locals[index];
    if (localType === undefined) {
      throw new InvariantViolation(`local ${index} does not exist`);
    }
    const zero = this.constant(localType, zeroOf(localType));
    this.#zeroes.set(index, zero);
    return zero;
  }

  #newPhi(block: BlockId, slot: Slot, type: OperandType): ValueId {
    const phi = this.#push({
      id: this.#values.length,
      kind: "phi",
      block,
      slot,
      type,
      operands: [],
    });
    this.#block(block).phis.push(phi);
    return phi;
  }

  #addPhiOperands(slot: Slot, phi: ValueId): ValueId {
    const value = this.#phi(phi);
    this.#block(value.block).preds.forEach((pred) => {
      const operand = this.readVariable(slot, pred, value.type);
      value.operands.push(operand);
      this.#trackUser(operand, phi);
    });
    return this.#tryRemoveTrivialPhi(phi);
  }

  #tryRemoveTrivialPhi(phi: ValueId): ValueId {
    const value = this.#phi(phi);
    let same: ValueId | undefined;
    for (const operand of value.operands) {
      const resolved = this.resolve(operand);
      if (resolved === same || resolved === phi) continue;
      if (same !== undefined) return phi;
      same = resolved;
    }

    const replacement = same ?? this.undef(value.type);
    this.#replacements.set(phi, replacement);
    this.#removed.add(phi);

    const users = this.#phiUsers.get(phi) ?? new Set<ValueId>();
    this.#phiUsers.delete(phi);
    users.forEach((user) => this.#trackUser(replacement, user));
    users.forEach((user) => {
      if (user !== phi && !this.#removed.has(user)) {
        this.#tryRemoveTrivialPhi(user);
      }
    });

    return this.resolve(replacement);
  }

  #trackUser(operand: ValueId, phi: ValueId) {
    const resolved = this.resolve(operand);
    if (resolved === phi || this.#value(resolved).kind !== "phi") return;
    const users = this.#phiUsers.get(resolved) ?? new Set<ValueId>();
    users.add(phi);
    this.#phiUsers.set(resolved, users);
  }

  #resolveTerminator(terminator: Terminator): Terminator {
    switch (terminator.kind) {
      case "branch":
        return { ...terminator, condition: this.resolve(terminator.condition) };
      case "table":
        return { ...terminator, index: this.resolve(terminator.index) };
      case "return":
        return { ...terminator, values: terminator.values.map((id) => this.resolve(id)) };
      default:
        return terminator;
    }
  }

  #isLive(block: SsaBlock): boolean {
    if (block.id === this.entry || block.id === this.exit) return true;
    const unreachable = block.sealed && block.preds.length === 0;
    return !unreachable || block.instructions.length > 0 || block.phis.length > 0;
  }

  #definitions(block: BlockId): Map<Slot, Definition> {
    const existing = this.#defs.get(block);
    if (existing) return existing;
    const defs = new Map<Slot, Definition>();
    this.#defs.set(block, defs);
    return defs;
  }

  #block(id: BlockId): SsaBlock {
    const block = this.#blocks[id];
    if (!block) throw new InvariantViolation(`unknown block ${id}`);
    return block;
  }

  #value(id: ValueId): SsaValue {
    const value = this.#values[id];
    if (!value) throw new InvariantViolation(`unknown value ${id}`);
    return value;
  }

  #phi(id: ValueId): PhiValue {
    const value = this.#value(id);
    if (value.kind !== "phi") {
      throw new InvariantViolation(`value ${id} is not a phi`);
    }
    return value;
  }

  #push<T extends SsaValue>(value: T): ValueId {
    this.#values.push(value);
    return value.id;
  }
}

const zeroOf = (type: ValueType): ConstValue => {
  switch (type) {
    case "i64":
      return 0n;
    case "funcref":
    case "externref":
      return null;
    default:
      return 0;
  }
};
