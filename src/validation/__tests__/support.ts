import type { BodyWriter } from "../../binary/writer.js";
import { formatDiagnostic, type Diagnostic } from "../../diagnostics/index.js";
import type {
  EnclosingTypeContext,
  ValidatedBody,
  ValidationResult,
} from "../context.js";
import { validateFunctionBody } from "../function-body.js";

export const validate = (
  writer: BodyWriter,
  context: Partial<EnclosingTypeContext> = {}
): ValidationResult =>
  validateFunctionBody(writer.finish(), {
    signature: { params: [], results: [] },
    ...context,
  });

export const expectValid = (result: ValidationResult): ValidatedBody => {
  if (!result.ok) throw new Error(formatDiagnostic(result.diagnostic));
  return result.body;
};

export const expectInvalid = (result: ValidationResult): Diagnostic => {
  if (result.ok) throw new Error("expected the body to be rejected");
  return result.diagnostic;
};
