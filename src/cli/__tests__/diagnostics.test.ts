import { describe, expect, it } from "vitest";
import type { Diagnostic } from "../../diagnostics/index.js";
import { formatCliDiagnostic } from "../diagnostics.js";

const diagnostic: Diagnostic = {
  code: "PD0001",
  message: "x",
  severity: "error",
  phase: "call-graph",
  span: { file: "body.bin", start: 17, end: 19 },
};

const bytes = Uint8Array.from({ length: 20 }, (_, index) => index);

describe("formatCliDiagnostic", () => {
  it("prints a header without color", () => {
    expect(formatCliDiagnostic(diagnostic, { color: false })).toBe(
      "body.bin:17-19 ERROR [call-graph] PD0001: x"
    );
  });

  it("marks the spanned bytes in a hex excerpt", () => {
    expect(formatCliDiagnostic(diagnostic, { color: false, bytes }).split("\n")).toEqual([
      "body.bin:17-19 ERROR [call-graph] PD0001: x",
      "         |",
      "00000010 | 10 11 12 13",
      "         |    ^^ ^^ x",
    ]);
  });

  it("marks the start byte of an empty span and appends hints", () => {
    const lines = formatCliDiagnostic(
      {
        ...diagnostic,
        span: { file: "body.bin", start: 1, end: 1 },
        hints: [{ message: "declare it" }],
      },
      { color: false, bytes: Uint8Array.from([0xaa, 0xbb, 0xcc]) }
    ).split("\n");

    expect(lines.slice(2)).toEqual([
      "00000000 | aa bb cc",
      "         |    ^^ x",
      "         = hint: declare it",
    ]);
  });

  it("colors the severity and code", () => {
    const header = formatCliDiagnostic(diagnostic, { color: true }).split("\n")[0];
    expect(header).toBe(
      "body.bin:17-19 \u001B[1m\u001B[31mERROR\u001B[0m\u001B[0m [call-graph] \u001B[35mPD0001\u001B[0m: x"
    );
  });
});
