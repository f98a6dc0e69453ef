import { InvariantViolation } from "../diagnostics/index.js";
import type { ValueType } from "../binary/value-types.js";
import type { BlockId } from "../ssa/ir.js";
import type { StackEntry } from "./operand-stack.js";
import type { RegionState } from "./region.js";

export type FrameKind = "function" | "block" | "loop" | "if" | "else" | "region";

export interface ControlFrame {
  kind: FrameKind;
  params: readonly ValueType[];
  results: readonly ValueType[];
  /** Operand stack height below the frame; for a region this is its mark. */
  height: number;
  /** Set after an unconditional transfer; the stack is polymorphic below. */
  unreachable: boolean;
  /** Where a branch to this frame's label goes. */
  labelBlock: BlockId;
  /** Where control falls through at `end`. */
  endBlock: BlockId;
  /** `if` only: the arm taken when the condition is zero. */
  elseBlock?: BlockId;
  /** `if` only: parameter values, replayed at the start of the else arm. */
  entryValues: readonly StackEntry[];
  offset: number;
  region?: RegionState;
}

/** A loop's label takes its parameters; every other label its results. */
export const labelTypes = (frame: ControlFrame): readonly ValueType[] =>
  frame.kind === "loop" ? frame.params : frame.results;

export class ControlStack {
  #frames: ControlFrame[] = [];

  get depth(): number {
    return this.#frames.length;
  }

  push(frame: ControlFrame): void {
    this.#frames.push(frame);
  }

  pop(): ControlFrame {
    const frame = this.#frames.pop();
    if (!frame) throw new InvariantViolation("control stack is empty");
    return frame;
  }

  top(): ControlFrame {
    const frame = this.#frames[this.#frames.length - 1];
    if (!frame) throw new InvariantViolation("control stack is empty");
    return frame;
  }

  /** The frame a branch of `depth` targets, counting outward from the top. */
  label(depth: number): ControlFrame | undefined {
    return this.#frames[this.#frames.length - 1 - depth];
  }

  /** Depth of the innermost region frame, or -1 outside any region. */
  innermostRegionDepth(): number {
    for (let index = this.#frames.length - 1; index >= 0; index -= 1) {
      if (this.#frames[index]?.kind === "region") {
        return this.#frames.length - 1 - index;
      }
    }
    return -1;
  }

  /** Frames stacked above the label at `depth`, innermost first. */
  framesAbove(depth: number): ControlFrame[] {
    return this.#frames.slice(this.#frames.length - depth).reverse();
  }
}
