import type {
  DiagnosticCategory,
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  category: DiagnosticCategory;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const backwardCallHint: DiagnosticHint = {
  message:
    "Start the called funclet with funclet_sig and count every later funclet call that targets it in num_preds.",
};

type IndexSpace = "local" | "global" | "function" | "type" | "memory";

type DiagnosticParamsMap = {
  DC0001: { kind: "truncated"; reading: string };
  DC0002: {
    kind: "integer-too-long" | "integer-out-of-range";
    encoding: string;
  };
  DC0003: { kind: "unknown-opcode"; opcode: number; prefix?: number };
  DC0004:
    | { kind: "value-type"; byte: number }
    | { kind: "reference-type"; byte: number }
    | { kind: "block-type"; index: number };
  DC0005: { kind: "zero-funclets" };
  DC0006: { kind: "trailing-bytes"; remaining: number };
  DC0007: { kind: "too-many-locals"; count: number; limit: number };
  ST0001:
    | { kind: "not-first"; funclet: number }
    | { kind: "duplicate"; funclet: number }
    | { kind: "outside-region" };
  ST0002: {
    kind: "target-out-of-range";
    funclet: number;
    delta: number;
    target: number;
    count: number;
  };
  ST0003: { kind: "region-incomplete"; produced: number; declared: number };
  ST0004: { kind: "outside-region"; instruction: string };
  ST0005: { kind: "else-without-if" } | { kind: "else-in-region" };
  ST0006: { kind: "label-out-of-range"; depth: number; available: number };
  ST0007: {
    kind: "index-out-of-range";
    space: IndexSpace;
    index: number;
    count: number;
  };
  ST0008: { kind: "immutable-global"; index: number };
  TY0001: {
    kind: "operand-mismatch";
    instruction: string;
    expected: string;
    actual: string;
  };
  TY0002: {
    kind: "stack-underflow";
    instruction: string;
    floor: "frame" | "region";
  };
  TY0003: {
    kind: "funclet-arguments";
    from: number;
    to: number;
    expected: string;
    actual: string;
  };
  TY0004: {
    kind: "block-end" | "region-exit" | "function-end";
    expected: string;
    actual: string;
  };
  TY0005: {
    kind: "region-entry";
    regionParams: string;
    funcletParams: string;
  };
  TY0006: {
    kind: "branch-table-arity";
    label: number;
    expected: number;
    actual: number;
  };
  TY0007: { kind: "if-without-else"; params: string; results: string };
  PD0001: { kind: "undeclared-backward-call"; funclet: number; from: number };
  PD0002: { kind: "excess-backward-calls"; funclet: number; declared: number };
  PD0003: {
    kind: "missing-backward-calls";
    funclet: number;
    declared: number;
    observed: number;
  };
  SG0001: { kind: "unresolved-signature"; funclet: number };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const hex = (value: number): string =>
  `0x${value.toString(16).padStart(2, "0")}`;

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  DC0001: {
    code: "DC0001",
    message: (params) => `unexpected end of input while reading ${params.reading}`,
    category: "MalformedEncoding",
    phase: "decoding",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0001"]>,
  DC0002: {
    code: "DC0002",
    message: (params) =>
      params.kind === "integer-too-long"
        ? `${params.encoding} representation is too long`
        : `${params.encoding} value is out of range`,
    category: "MalformedEncoding",
    phase: "decoding",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0002"]>,
  DC0003: {
    code: "DC0003",
    message: (params) =>
      params.prefix === undefined
        ? `unknown opcode ${hex(params.opcode)}`
        : `unknown opcode ${hex(params.prefix)} ${params.opcode}`,
    category: "MalformedEncoding",
    phase: "decoding",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0003"]>,
  DC0004: {
    code: "DC0004",
    message: (params) => {
      switch (params.kind) {
        case "value-type":
          return `invalid value type ${hex(params.byte)}`;
        case "reference-type":
          return `invalid reference type ${hex(params.byte)}`;
        case "block-type":
          return `block type index ${params.index} does not name a function type`;
      }
      return exhaustive(params);
    },
    category: "MalformedEncoding",
    phase: "decoding",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0004"]>,
  DC0005: {
    code: "DC0005",
    message: () => "funclet_region must declare at least one funclet",
    category: "MalformedEncoding",
    phase: "decoding",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0005"]>,
  DC0006: {
    code: "DC0006",
    message: (params) =>
      `${params.remaining} byte(s) follow the end of the function body`,
    category: "MalformedEncoding",
    phase: "decoding",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0006"]>,
  DC0007: {
    code: "DC0007",
    message: (params) =>
      `function declares ${params.count} locals (limit ${params.limit})`,
    category: "MalformedEncoding",
    phase: "decoding",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0007"]>,
  ST0001: {
    code: "ST0001",
    message: (params) => {
      switch (params.kind) {
        case "not-first":
          return `funclet_sig must be the first instruction of funclet ${params.funclet}`;
        case "duplicate":
          return `funclet ${params.funclet} already has a funclet_sig`;
        case "outside-region":
          return "funclet_sig appears outside of a funclet region";
      }
      return exhaustive(params);
    },
    category: "StructuralError",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0001"]>,
  ST0002: {
    code: "ST0002",
    message: (params) =>
      `funclet ${params.funclet} calls delta ${params.delta} (funclet ${params.target}), but the region has ${params.count} funclet(s)`,
    category: "StructuralError",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0002"]>,
  ST0003: {
    code: "ST0003",
    message: (params) =>
      `function body ends after ${params.produced} of ${params.declared} funclet(s)`,
    category: "StructuralError",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0003"]>,
  ST0004: {
    code: "ST0004",
    message: (params) =>
      `${params.instruction} is only valid inside a funclet region`,
    category: "StructuralError",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0004"]>,
  ST0005: {
    code: "ST0005",
    message: (params) =>
      params.kind === "else-without-if"
        ? "else does not close an if"
        : "else cannot appear at the top level of a funclet",
    category: "StructuralError",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0005"]>,
  ST0006: {
    code: "ST0006",
    message: (params) =>
      `branch depth ${params.depth} exceeds the ${params.available} enclosing label(s)`,
    category: "StructuralError",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0006"]>,
  ST0007: {
    code: "ST0007",
    message: (params) =>
      `${params.space} index ${params.index} is out of range (${params.count} defined)`,
    category: "StructuralError",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0007"]>,
  ST0008: {
    code: "ST0008",
    message: (params) => `global ${params.index} is immutable`,
    category: "StructuralError",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0008"]>,
  TY0001: {
    code: "TY0001",
    message: (params) =>
      `${params.instruction} expected ${params.expected}, found ${params.actual}`,
    category: "TypeMismatch",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0001"]>,
  TY0002: {
    code: "TY0002",
    message: (params) =>
      params.floor === "region"
        ? `${params.instruction} pops below the funclet region's stack mark`
        : `${params.instruction} pops below the enclosing block's stack height`,
    category: "TypeMismatch",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0002"]>,
  TY0003: {
    code: "TY0003",
    message: (params) =>
      `funclet ${params.from} passes ${params.actual} to funclet ${params.to}, which expects ${params.expected}`,
    category: "TypeMismatch",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0003"]>,
  TY0004: {
    code: "TY0004",
    message: (params) => {
      switch (params.kind) {
        case "block-end":
          return `block ends with ${params.actual} on the stack, expected ${params.expected}`;
        case "region-exit":
          return `funclet region exits with ${params.actual}, expected ${params.expected}`;
        case "function-end":
          return `function ends with ${params.actual} on the stack, expected ${params.expected}`;
      }
      return exhaustive(params.kind);
    },
    category: "TypeMismatch",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0004"]>,
  TY0005: {
    code: "TY0005",
    message: (params) =>
      `funclet region takes ${params.regionParams}, but funclet 0 expects ${params.funcletParams}`,
    category: "TypeMismatch",
    phase: "validation",
    hints: [
      {
        message:
          "Funclet 0 without funclet_sig takes no arguments; declare funclet_sig with the region's parameter types.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0005"]>,
  TY0006: {
    code: "TY0006",
    message: (params) =>
      `branch table label ${params.label} carries ${params.actual} value(s), the default label carries ${params.expected}`,
    category: "TypeMismatch",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0006"]>,
  TY0007: {
    code: "TY0007",
    message: (params) =>
      `if without else must produce its parameters ${params.params}, declared ${params.results}`,
    category: "TypeMismatch",
    phase: "validation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0007"]>,
  PD0001: {
    code: "PD0001",
    message: (params) =>
      `funclet ${params.from} calls funclet ${params.funclet} from below, but funclet ${params.funclet} declares no predecessors`,
    category: "PredecessorCountError",
    phase: "call-graph",
    hints: [backwardCallHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PD0001"]>,
  PD0002: {
    code: "PD0002",
    message: (params) =>
      `funclet ${params.funclet} declares ${params.declared} backward predecessor(s) but is called from below again`,
    category: "PredecessorCountError",
    phase: "call-graph",
    hints: [backwardCallHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PD0002"]>,
  PD0003: {
    code: "PD0003",
    message: (params) =>
      `funclet ${params.funclet} declares ${params.declared} backward predecessor(s), found ${params.observed}`,
    category: "PredecessorCountError",
    phase: "call-graph",
    hints: [backwardCallHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PD0003"]>,
  SG0001: {
    code: "SG0001",
    message: (params) =>
      `funclet ${params.funclet} has no funclet_sig and is not called from an earlier funclet`,
    category: "UnresolvedSignature",
    phase: "call-graph",
    hints: [
      {
        message:
          "Add funclet_sig as its first instruction, or call it from an earlier funclet.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0001"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (value: string): value is DiagnosticCode =>
  value in diagnosticsRegistry;

const exhaustive = (_value: never): never => _value;
