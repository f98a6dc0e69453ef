import type { OperandType } from "../binary/value-types.js";
import type { ValueId } from "../ssa/ir.js";

/** A stack slot: the value's type and the SSA value that produced it. */
export interface StackEntry {
  type: OperandType;
  value: ValueId;
}

/**
 * Typed operand stack with height marks. Floors are enforced by the caller:
 * `pop` refuses to go below the floor it is handed and reports underflow as
 * `undefined`.
 */
export class OperandStack {
  #entries: StackEntry[] = [];

  get height(): number {
    return this.#entries.length;
  }

  push(entry: StackEntry): void {
    this.#entries.push(entry);
  }

  pop(floor = 0): StackEntry | undefined {
    if (this.#entries.length <= floor) return undefined;
    return this.#entries.pop();
  }

  peek(): StackEntry | undefined {
    return this.#entries[this.#entries.length - 1];
  }

  mark(): number {
    return this.#entries.length;
  }

  /** Entries above `height`, bottom to top. */
  valuesAbove(height: number): StackEntry[] {
    return this.#entries.slice(height);
  }

  truncate(height: number): void {
    if (height < this.#entries.length) this.#entries.length = height;
  }
}
