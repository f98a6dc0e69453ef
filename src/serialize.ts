import { decode, encode } from "@msgpack/msgpack";
import type { Diagnostic } from "./diagnostics/index.js";
import type { ConstValue, SsaValue } from "./ssa/ir.js";
import type { ValidatedBody, ValidationResult } from "./validation/context.js";

/**
 * Constants as they survive JSON and MessagePack: 64-bit integers and the
 * floats JSON cannot hold (NaN, the infinities, negative zero) become strings.
 */
type PlainConst = number | string | null;

type PlainValue =
  | Exclude<SsaValue, { kind: "const" } | { kind: "op" }>
  | (Omit<Extract<SsaValue, { kind: "const" }>, "value"> & { value: PlainConst })
  | (Omit<Extract<SsaValue, { kind: "op" }>, "immediates"> & {
      immediates: PlainConst[];
    });

export type BodySnapshot = Omit<ValidatedBody, "ssa"> & {
  ssa: Omit<ValidatedBody["ssa"], "values"> & { values: PlainValue[] };
};

export type ResultSnapshot =
  | { ok: true; body: BodySnapshot }
  | { ok: false; diagnostic: Diagnostic };

const plainConst = (value: ConstValue): PlainConst => {
  if (typeof value === "bigint") return value.toString();
  if (typeof value !== "number") return value;
  if (Object.is(value, -0)) return "-0";
  return Number.isFinite(value) ? value : `${value}`;
};

const plainValue = (value: SsaValue): PlainValue => {
  switch (value.kind) {
    case "const":
      return { ...value, value: plainConst(value.value) };
    case "op":
      return { ...value, immediates: value.immediates.map(plainConst) };
    default:
      return value;
  }
};

/** A copy of `body` that holds only JSON-compatible data. */
export const snapshotBody = (body: ValidatedBody): BodySnapshot => ({
  ...body,
  ssa: { ...body.ssa, values: body.ssa.values.map(plainValue) },
});

export const snapshotResult = (result: ValidationResult): ResultSnapshot =>
  result.ok ? { ok: true, body: snapshotBody(result.body) } : result;

export const toJson = (result: ValidationResult, indent = 2): string =>
  JSON.stringify(snapshotResult(result), null, indent);

export const serializeValidatedBody = (body: ValidatedBody): Uint8Array =>
  encode(snapshotBody(body), { ignoreUndefined: true });

export const serializeResult = (result: ValidationResult): Uint8Array =>
  encode(snapshotResult(result), { ignoreUndefined: true });

export const deserializeResult = (bytes: Uint8Array): unknown => decode(bytes);
