export * from "./types.js";
export * from "./registry.js";

import {
  type Diagnostic,
  type DiagnosticCategory,
  type DiagnosticDetails,
  type DiagnosticHint,
  type DiagnosticInput,
  type DiagnosticPhase,
  type DiagnosticSeverity,
  type SourceSpan,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

const codePrefixes: Record<
  string,
  { phase: DiagnosticPhase; category: DiagnosticCategory }
> = {
  DC: { phase: "decoding", category: "MalformedEncoding" },
  ST: { phase: "validation", category: "StructuralError" },
  TY: { phase: "validation", category: "TypeMismatch" },
  PD: { phase: "call-graph", category: "PredecessorCountError" },
  SG: { phase: "call-graph", category: "UnresolvedSignature" },
};

const inferFromCode = (code: string) =>
  codePrefixes[code.slice(0, 2).toUpperCase()];

export const createDiagnostic = ({
  severity,
  phase,
  category,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  phase: phase ?? inferFromCode(input.code)?.phase,
  category: category ?? inferFromCode(input.code)?.category,
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
  details?: DiagnosticDetails;
  related?: readonly Diagnostic[];
  severity?: DiagnosticSeverity;
  hints?: readonly DiagnosticHint[];
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>,
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    span: options.span,
    details: options.details,
    related: options.related,
    severity: options.severity ?? definition.severity,
    phase: definition.phase,
    category: definition.category,
    hints: options.hints ?? definition.hints,
  });
};

type DiagnosticsCarrier = DiagnosticEmitter | { diagnostics: DiagnosticEmitter };

export type EmitDiagnosticOptions<K extends DiagnosticCode> =
  RegistryDiagnosticOptions<K> & { ctx: DiagnosticsCarrier };

const getEmitter = (carrier: DiagnosticsCarrier): DiagnosticEmitter =>
  "report" in carrier ? carrier : carrier.diagnostics;

export const emitDiagnostic = <K extends DiagnosticCode>(
  options: EmitDiagnosticOptions<K>,
): never => {
  const { ctx, ...rest } = options;
  return getEmitter(ctx).error(diagnosticFromCode(rest));
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const location = `${diagnostic.span.file}:${diagnostic.span.start}-${diagnostic.span.end}`;
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  return `${location} ${severity} ${phase}${diagnostic.code}: ${diagnostic.message}`;
};

export class DiagnosticError extends Error {
  diagnostic: Diagnostic;
  diagnostics: readonly Diagnostic[];

  constructor(diagnostic: Diagnostic, diagnostics?: readonly Diagnostic[]) {
    super(formatDiagnostic(diagnostic));
    this.diagnostic = diagnostic;
    this.diagnostics =
      diagnostics && diagnostics.length > 0 ? [...diagnostics] : [diagnostic];
  }
}

export class DiagnosticEmitter {
  #diagnostics: Diagnostic[] = [];

  report(input: DiagnosticInput): Diagnostic {
    const diagnostic = createDiagnostic(input);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  error(input: DiagnosticInput): never {
    const diagnostic = this.report(input);
    throw new DiagnosticError(diagnostic, this.#diagnostics);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }
}

/**
 * Thrown when the validator's own bookkeeping is inconsistent. Unlike
 * {@link DiagnosticError} this never describes the input program.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`internal invariant violated: ${message}`);
    this.name = "InvariantViolation";
  }
}

export function assertInvariant(
  condition: boolean,
  message: string,
): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}
