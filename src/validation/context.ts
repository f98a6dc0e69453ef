import type { FuncType, ValueType } from "../binary/value-types.js";
import type { Diagnostic } from "../diagnostics/index.js";
import type { BlockId, SsaFunction } from "../ssa/ir.js";
import type { CallEdge } from "./call-graph.js";

export type GlobalType = { type: ValueType; mutable: boolean };

/** What the surrounding module knows about the body being validated. */
export interface EnclosingTypeContext {
  signature: FuncType;
  /** Function types, addressed by block-type indices. */
  types?: readonly FuncType[];
  /** Callee signatures, addressed by `call` and `ref.func`. */
  functions?: readonly FuncType[];
  globals?: readonly GlobalType[];
  hasMemory?: boolean;
  /** Label reported as the `file` of diagnostic spans. */
  name?: string;
}

export type SignatureSource = "explicit" | "inferred" | "default";

export interface FuncletSummary {
  index: number;
  offset: number;
  params: readonly ValueType[];
  signatureSource: SignatureSource;
  declaredBackwardPreds: number;
  forwardPreds: number;
  backwardPreds: number;
  entryBlock: BlockId;
}

export interface RegionSummary {
  id: number;
  offset: number;
  /** Control-frame depth the region frame occupies, counted from the function frame. */
  depth: number;
  params: readonly ValueType[];
  results: readonly ValueType[];
  funclets: FuncletSummary[];
  edges: readonly CallEdge[];
  exitBlock: BlockId;
}

export interface ValidatedBody {
  name: string;
  params: readonly ValueType[];
  results: readonly ValueType[];
  /** Declared locals, parameters excluded. */
  locals: readonly ValueType[];
  regions: RegionSummary[];
  ssa: SsaFunction;
  instructionCount: number;
  byteLength: number;
}

export type ValidationResult =
  | { ok: true; body: ValidatedBody }
  | { ok: false; diagnostic: Diagnostic };
