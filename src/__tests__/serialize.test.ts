import { describe, expect, it } from "vitest";
import { BodyWriter } from "../binary/writer.js";
import {
  deserializeResult,
  serializeResult,
  serializeValidatedBody,
  snapshotResult,
  toJson,
} from "../serialize.js";
import { validateFunctionBody } from "../validation/function-body.js";

const validI64Body = () =>
  validateFunctionBody(
    new BodyWriter({ locals: [{ count: 1, type: "i64" }] })
      .localGet(0)
      .i64Const(5n)
      .op("i64.add")
      .end()
      .finish(),
    { signature: { params: [], results: ["i64"] }, name: "add.bin" }
  );

describe("snapshots", () => {
  it("turns 64-bit constants into strings", () => {
    const snapshot = snapshotResult(validI64Body());
    if (!snapshot.ok) throw new Error(snapshot.diagnostic.message);

    const constants = snapshot.body.ssa.values.flatMap((value) =>
      value.kind === "const" ? [value.value] : []
    );
    expect(constants).toEqual(["0", "5"]);
    expect(snapshot.body.name).toBe("add.bin");
    expect(snapshot.body.locals).toEqual(["i64"]);
  });

  it("keeps floats JSON cannot represent as strings", () => {
    const result = validateFunctionBody(
      new BodyWriter()
        .f64Const(Number.NaN)
        .drop()
        .f64Const(Number.NEGATIVE_INFINITY)
        .drop()
        .f32Const(-0)
        .drop()
        .f64Const(1.5)
        .drop()
        .end()
        .finish(),
      { signature: { params: [], results: [] } }
    );
    const parsed: unknown = JSON.parse(toJson(result));
    expect(parsed).toMatchObject({
      ok: true,
      body: {
        ssa: {
          values: [
            { kind: "const", type: "f64", value: "NaN" },
            { kind: "const", type: "f64", value: "-Infinity" },
            { kind: "const", type: "f32", value: "-0" },
            { kind: "const", type: "f64", value: 1.5 },
          ],
        },
      },
    });
  });

  it("renders JSON", () => {
    const parsed: unknown = JSON.parse(toJson(validI64Body()));
    expect(parsed).toMatchObject({
      ok: true,
      body: { name: "add.bin", params: [], results: ["i64"], byteLength: 9 },
    });
  });

  it("passes rejected results through unchanged", () => {
    const result = validateFunctionBody(new BodyWriter().drop().end().finish(), {
      signature: { params: [], results: [] },
    });
    expect(snapshotResult(result)).toBe(result);
  });
});

describe("MessagePack", () => {
  it("round-trips a validated body", () => {
    const result = validI64Body();
    if (!result.ok) throw new Error(result.diagnostic.message);

    const decoded = deserializeResult(serializeValidatedBody(result.body));
    expect(decoded).toMatchObject({
      name: "add.bin",
      results: ["i64"],
      instructionCount: result.body.instructionCount,
    });
  });

  it("encodes diagnostics", () => {
    const result = validateFunctionBody(new BodyWriter().drop().end().finish(), {
      signature: { params: [], results: [] },
    });
    expect(deserializeResult(serializeResult(result))).toMatchObject({
      ok: false,
      diagnostic: { code: "TY0002", span: { file: "<body>", start: 1, end: 2 } },
    });
  });
});
