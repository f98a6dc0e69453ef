import { assertInvariant, InvariantViolation } from "../diagnostics/index.js";
import type { OperandType } from "../binary/value-types.js";

export type EdgeKind =
  | "region-entry"
  | "end"
  | "funclet_call"
  | "funclet_call_if"
  | "funclet_call_table";

export type EdgeDirection = "forward" | "backward";

/** Source index of the edge that enters a region's first funclet. */
export const REGION_ENTRY = -1;

export interface CallEdge {
  from: number;
  to: number;
  /** Types above the region mark at the transfer. */
  args: readonly OperandType[];
  /** Taken from unreachable code; `args` is only the known suffix. */
  polymorphic: boolean;
  offset: number;
  kind: EdgeKind;
  direction: EdgeDirection;
}

export type CallEdgeInput = Omit<CallEdge, "direction">;

type FuncletState = {
  entered: boolean;
  declaredBackwardPreds: number;
  forwardObserved: number;
  backwardObserved: number;
  sealed: boolean;
  edges: number[];
};

/**
 * Per-region call graph. Funclets are addressed by dense index and edges are
 * kept as an append-only list of index pairs.
 */
export class FuncletCallGraph {
  readonly size: number;
  #edges: CallEdge[] = [];
  #funclets = new Map<number, FuncletState>();
  #lastEntered = -1;

  constructor(size: number) {
    this.size = size;
  }

  get edges(): readonly CallEdge[] {
    return this.#edges;
  }

  get lastEntered(): number {
    return this.#lastEntered;
  }

  /**
   * Marks `index` as the current funclet. Returns true when it can be sealed
   * right away, which is the case when it expects no backward predecessors.
   */
  enter(index: number, declaredBackwardPreds: number): boolean {
    assertInvariant(
      index === this.#lastEntered + 1,
      `funclet ${index} entered after funclet ${this.#lastEntered}`
    );
    const state = this.#state(index);
    assertInvariant(
      state.backwardObserved === 0,
      `funclet ${index} has backward edges before it was entered`
    );
    state.entered = true;
    state.declaredBackwardPreds = declaredBackwardPreds;
    this.#lastEntered = index;
    return declaredBackwardPreds === 0 ? this.#seal(index, state) : false;
  }

  /**
   * Appends an edge. Returns true when the edge was the last declared
   * backward predecessor of its target, which makes the target seal-ready.
   */
  recordEdge(input: CallEdgeInput): { edge: CallEdge; sealReady: boolean } {
    assertInvariant(
      input.to >= 0 && input.to < this.size,
      `edge target ${input.to} outside of ${this.size} funclet(s)`
    );
    const state = this.#state(input.to);
    if (state.sealed) {
      throw new InvariantViolation(
        `funclet ${input.to} is sealed and cannot gain an edge from funclet ${input.from}`
      );
    }

    const edge: CallEdge = {
      ...input,
      args: [...input.args],
      direction: input.to > input.from ? "forward" : "backward",
    };
    state.edges.push(this.#edges.length);
    this.#edges.push(edge);

    if (edge.direction === "forward") {
      state.forwardObserved += 1;
      return { edge, sealReady: false };
    }

    assertInvariant(state.entered, `backward edge to unentered funclet ${input.to}`);
    state.backwardObserved += 1;
    assertInvariant(
      state.backwardObserved <= state.declaredBackwardPreds,
      `funclet ${input.to} exceeded its declared backward predecessors`
    );
    const sealReady =
      state.backwardObserved === state.declaredBackwardPreds &&
      this.#seal(input.to, state);
    return { edge, sealReady };
  }

  edgesTo(index: number): CallEdge[] {
    return (this.#funclets.get(index)?.edges ?? []).flatMap((edgeIndex) => {
      const edge = this.#edges[edgeIndex];
      return edge ? [edge] : [];
    });
  }

  forwardPredecessors(index: number): CallEdge[] {
    return this.edgesTo(index).filter((edge) => edge.direction === "forward");
  }

  backwardPredecessors(index: number): CallEdge[] {
    return this.edgesTo(index).filter((edge) => edge.direction === "backward");
  }

  forwardCount(index: number): number {
    return this.#funclets.get(index)?.forwardObserved ?? 0;
  }

  backwardCount(index: number): number {
    return this.#funclets.get(index)?.backwardObserved ?? 0;
  }

  /**
   * Whether no further edge can target `index`: forward edges all precede its
   * entry, so only the declared backward count is outstanding.
   */
  isComplete(index: number): boolean {
    const state = this.#funclets.get(index);
    return (
      !!state?.entered &&
      state.backwardObserved === state.declaredBackwardPreds
    );
  }

  isSealed(index: number): boolean {
    return this.#funclets.get(index)?.sealed ?? false;
  }

  #seal(index: number, state: FuncletState): true {
    if (state.sealed) {
      throw new InvariantViolation(`funclet ${index} sealed twice`);
    }
    state.sealed = true;
    return true;
  }

  #state(index: number): FuncletState {
    const existing = this.#funclets.get(index);
    if (existing) return existing;
    const state: FuncletState = {
      entered: false,
      declaredBackwardPreds: 0,
      forwardObserved: 0,
      backwardObserved: 0,
      sealed: false,
      edges: [],
    };
    this.#funclets.set(index, state);
    return state;
  }
}
