import type { OperandType, ValueType } from "../binary/value-types.js";

export type ValueId = number;
export type BlockId = number;

/**
 * A variable tracked across blocks: `local:<n>` for a function local or
 * `arg:<block>:<n>` for the n-th value carried into a block on its edges.
 */
export type Slot = `local:${number}` | `arg:${number}:${number}`;

export const localSlot = (index: number): Slot => `local:${index}`;
export const argSlot = (block: BlockId, index: number): Slot =>
  `arg:${block}:${index}`;

export type ConstValue = number | bigint | null;

export type SsaValue =
  | { id: ValueId; kind: "param"; index: number; type: ValueType }
  | { id: ValueId; kind: "const"; type: ValueType; value: ConstValue }
  | { id: ValueId; kind: "undef"; type: OperandType }
  | {
      id: ValueId;
      kind: "op";
      op: string;
      block: BlockId;
      operands: ValueId[];
      results: readonly OperandType[];
      immediates: readonly (number | bigint)[];
    }
  | {
      id: ValueId;
      kind: "extract";
      block: BlockId;
      source: ValueId;
      index: number;
      type: OperandType;
    }
  | {
      id: ValueId;
      kind: "phi";
      block: BlockId;
      slot: Slot;
      type: OperandType;
      operands: ValueId[];
    };

export type SsaValueKind = SsaValue["kind"];

export type BlockKind =
  | "entry"
  | "exit"
  | "loop"
  | "join"
  | "then"
  | "else"
  | "continue"
  | "funclet"
  | "region-exit"
  | "dead";

/** The instruction (or implicit transfer) that produced an edge. */
export type TransferVia =
  | "end"
  | "else"
  | "br"
  | "br_if"
  | "br_table"
  | "return"
  | "if"
  | "loop"
  | "region-entry"
  | "funclet_call"
  | "funclet_call_if"
  | "funclet_call_table";

export type Terminator =
  | { kind: "jump"; target: BlockId; via: TransferVia }
  | {
      kind: "branch";
      condition: ValueId;
      then: BlockId;
      else: BlockId;
      via: TransferVia;
    }
  | {
      kind: "table";
      index: ValueId;
      targets: BlockId[];
      default: BlockId;
      via: TransferVia;
    }
  | { kind: "return"; values: ValueId[] }
  | { kind: "unreachable" };

export interface SsaBlock {
  id: BlockId;
  kind: BlockKind;
  label: string;
  preds: BlockId[];
  sealed: boolean;
  phis: ValueId[];
  instructions: ValueId[];
  terminator?: Terminator;
}

export interface SsaFunction {
  entry: BlockId;
  exit: BlockId;
  blocks: SsaBlock[];
  values: SsaValue[];
}
