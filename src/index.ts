export {
  validateFunctionBody,
  validateFunctionBodies,
  type FunctionBodyEntry,
} from "./validation/function-body.js";
export type {
  EnclosingTypeContext,
  FuncletSummary,
  GlobalType,
  RegionSummary,
  SignatureSource,
  ValidatedBody,
  ValidationResult,
} from "./validation/context.js";
export {
  FuncletCallGraph,
  REGION_ENTRY,
  type CallEdge,
  type EdgeDirection,
  type EdgeKind,
} from "./validation/call-graph.js";
export { OperandStack, type StackEntry } from "./validation/operand-stack.js";
export { SsaBuilder } from "./ssa/builder.js";
export * from "./ssa/ir.js";
export { printSsa } from "./ssa/printer.js";
export { BodyWriter, type BlockType, type LocalGroup } from "./binary/writer.js";
export { ByteReader } from "./binary/reader.js";
export { Opcode, instructionName } from "./binary/opcodes.js";
export * from "./binary/value-types.js";
export * from "./diagnostics/index.js";
export {
  deserializeResult,
  serializeResult,
  serializeValidatedBody,
  snapshotBody,
  snapshotResult,
  toJson,
  type BodySnapshot,
  type ResultSnapshot,
} from "./serialize.js";
