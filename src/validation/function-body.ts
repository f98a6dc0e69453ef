import { DiagnosticError } from "../diagnostics/index.js";
import type {
  EnclosingTypeContext,
  ValidatedBody,
  ValidationResult,
} from "./context.js";
import { validateInstruction } from "./instructions.js";
import { BodyValidator } from "./validator.js";

export type FunctionBodyEntry = {
  bytes: Uint8Array;
  context: EnclosingTypeContext;
};

/**
 * Decodes and validates one function body in a single forward pass and
 * builds its SSA form along the way. A rejected body yields its first
 * diagnostic; internal invariant violations are rethrown.
 */
export const validateFunctionBody = (
  bytes: Uint8Array,
  context: EnclosingTypeContext
): ValidationResult => {
  try {
    return { ok: true, body: decodeBody(new BodyValidator({ bytes, context })) };
  } catch (error) {
    if (error instanceof DiagnosticError) {
      return { ok: false, diagnostic: error.diagnostic };
    }
    throw error;
  }
};

/** Validates independent bodies; each gets its own validator state. */
export const validateFunctionBodies = (
  entries: readonly FunctionBodyEntry[]
): ValidationResult[] =>
  entries.map(({ bytes, context }) => validateFunctionBody(bytes, context));

const decodeBody = (v: BodyValidator): ValidatedBody => {
  while (v.frames.depth > 0) {
    v.instructionStart = v.reader.offset;
    const opcode = v.reader.u8("opcode");
    v.instructionCount += 1;
    validateInstruction(v, opcode);
  }

  if (!v.reader.eof()) {
    v.reader.fail({
      code: "DC0006",
      params: { kind: "trailing-bytes", remaining: v.reader.remaining },
      end: v.reader.length,
    });
  }

  return {
    name: v.file,
    params: v.params,
    results: v.results,
    locals: v.declaredLocals,
    regions: v.regions,
    ssa: v.ssa.finish(),
    instructionCount: v.instructionCount,
    byteLength: v.reader.length,
  };
};
