import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  DiagnosticError,
  InvariantViolation,
  assertInvariant,
  createDiagnostic,
  diagnosticCodes,
  diagnosticFromCode,
  formatDiagnostic,
} from "../index.js";

describe("diagnostic utilities", () => {
  it("formats diagnostics with the inferred phase", () => {
    const diagnostic = createDiagnostic({
      code: "ST0002",
      message: "test diagnostic",
      span: { file: "body.bin", start: 1, end: 3 },
    });

    expect(diagnostic.category).toBe("StructuralError");
    expect(formatDiagnostic(diagnostic)).toBe(
      "body.bin:1-3 ERROR [validation] ST0002: test diagnostic"
    );
  });

  it("builds messages and hints from the registry", () => {
    const diagnostic = diagnosticFromCode({
      code: "PD0003",
      params: {
        kind: "missing-backward-calls",
        funclet: 2,
        declared: 3,
        observed: 1,
      },
      span: { file: "<body>", start: 10, end: 12 },
    });

    expect(diagnostic.message).toBe(
      "funclet 2 declares 3 backward predecessor(s), found 1"
    );
    expect(diagnostic.phase).toBe("call-graph");
    expect(diagnostic.category).toBe("PredecessorCountError");
    expect(diagnostic.hints).toHaveLength(1);
  });

  it("formats prefixed opcodes", () => {
    const diagnostic = diagnosticFromCode({
      code: "DC0003",
      params: { kind: "unknown-opcode", opcode: 9, prefix: 0xfc },
      span: { file: "<body>", start: 0, end: 2 },
    });
    expect(diagnostic.message).toBe("unknown opcode 0xfc 9");
  });

  it("throws DiagnosticError from the emitter and keeps what was reported", () => {
    const emitter = new DiagnosticEmitter();
    const span = { file: "<body>", start: 0, end: 0 };

    expect(() =>
      emitter.error({ code: "DC0005", message: "no funclets", span })
    ).toThrow(DiagnosticError);
    expect(emitter.diagnostics).toHaveLength(1);
    expect(emitter.diagnostics[0]?.phase).toBe("decoding");
  });

  it("keeps internal invariant failures apart from diagnostics", () => {
    expect(() => assertInvariant(false, "broken")).toThrow(InvariantViolation);
    expect(() => assertInvariant(false, "broken")).toThrow(
      "internal invariant violated: broken"
    );
    expect(() => assertInvariant(true, "fine")).not.toThrow();
  });

  it("lists every registered code", () => {
    const codes = diagnosticCodes();
    expect(codes).toContain("SG0001");
    expect(codes).toHaveLength(26);
  });
});
