import type { ValueType } from "../../binary/value-types.js";

export type FuncletsConfig = {
  /** Path of the function body to validate */
  input: string;
  /** Input is hex text rather than raw bytes */
  hex?: boolean;
  /** Parameter types of the function signature */
  params: ValueType[];
  /** Result types of the function signature */
  results: ValueType[];
  /** Declare a linear memory in the enclosing module */
  memory?: boolean;
  /** Write the SSA listing to stdout */
  emitSsa?: boolean;
  /** Write the validated body as JSON to stdout */
  emitJson?: boolean;
  /** Write the validated body as MessagePack to stdout */
  emitMsgpack?: boolean;
  /** Colorize diagnostics */
  color: boolean;
  /** Write progress lines to stderr */
  verbose?: boolean;
};
