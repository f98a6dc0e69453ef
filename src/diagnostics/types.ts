export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "decoding" | "validation" | "call-graph";

/**
 * Taxonomy every validation failure falls into. A caller can branch on the
 * category without knowing individual diagnostic codes.
 */
export type DiagnosticCategory =
  | "MalformedEncoding"
  | "StructuralError"
  | "TypeMismatch"
  | "PredecessorCountError"
  | "UnresolvedSignature";

/** Byte range inside the function body named by `file`. */
export interface SourceSpan {
  file: string;
  start: number;
  end: number;
}

export interface DiagnosticHint {
  message: string;
}

export interface DiagnosticDetails {
  funclet?: number;
  expected?: readonly string[];
  actual?: readonly string[];
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  category?: DiagnosticCategory;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
  details?: DiagnosticDetails;
}

export type DiagnosticInput = {
  code: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  category?: DiagnosticCategory;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
  details?: DiagnosticDetails;
};
