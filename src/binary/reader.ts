import {
  DiagnosticEmitter,
  emitDiagnostic,
  type DiagnosticCode,
  type DiagnosticDetails,
  type DiagnosticParams,
} from "../diagnostics/index.js";
import { valueTypeFromCode, type ValueType } from "./value-types.js";

export type ByteReaderOptions = {
  bytes: Uint8Array;
  /** Label used as the `file` of every diagnostic span. */
  file?: string;
  diagnostics?: DiagnosticEmitter;
};

/**
 * Forward-only cursor over a function body. Every read advances the cursor;
 * there is no way to seek backwards.
 */
export class ByteReader {
  readonly file: string;
  readonly diagnostics: DiagnosticEmitter;
  #bytes: Uint8Array;
  #view: DataView;
  #offset = 0;

  constructor({ bytes, file = "<body>", diagnostics }: ByteReaderOptions) {
    this.#bytes = bytes;
    this.#view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.file = file;
    this.diagnostics = diagnostics ?? new DiagnosticEmitter();
  }

  get offset(): number {
    return this.#offset;
  }

  get length(): number {
    return this.#bytes.length;
  }

  get remaining(): number {
    return this.#bytes.length - this.#offset;
  }

  eof(): boolean {
    return this.#offset >= this.#bytes.length;
  }

  peekU8(): number | undefined {
    return this.#bytes[this.#offset];
  }

  u8(reading = "byte"): number {
    const byte = this.#bytes[this.#offset];
    if (byte === undefined) {
      return this.fail({
        code: "DC0001",
        params: { kind: "truncated", reading },
      });
    }
    this.#offset += 1;
    return byte;
  }

  varuint32(reading = "varuint32"): number {
    const start = this.#offset;
    const value = this.#leb({ bits: 32, signed: false, reading, start });
    return Number(value);
  }

  varint32(reading = "varint32"): number {
    const start = this.#offset;
    return Number(this.#leb({ bits: 32, signed: true, reading, start }));
  }

  /** Signed 33-bit integer used by block types. */
  s33(reading = "block type"): number {
    const start = this.#offset;
    return Number(this.#leb({ bits: 33, signed: true, reading, start }));
  }

  varint64(reading = "varint64"): bigint {
    const start = this.#offset;
    return this.#leb({ bits: 64, signed: true, reading, start });
  }

  f32(): number {
    this.#require(4, "f32");
    const value = this.#view.getFloat32(this.#offset, true);
    this.#offset += 4;
    return value;
  }

  f64(): number {
    this.#require(8, "f64");
    const value = this.#view.getFloat64(this.#offset, true);
    this.#offset += 8;
    return value;
  }

  valueType(): ValueType {
    const start = this.#offset;
    const byte = this.u8("value type");
    const type = valueTypeFromCode(byte);
    if (!type) {
      return this.fail({
        code: "DC0004",
        params: { kind: "value-type", byte },
        start,
      });
    }
    return type;
  }

  valueTypes(reading = "value type vector"): ValueType[] {
    const count = this.varuint32(reading);
    const types: ValueType[] = [];
    for (let index = 0; index < count; index += 1) {
      types.push(this.valueType());
    }
    return types;
  }

  /**
   * Raises a diagnostic spanning `start` (default: the current offset) to the
   * current offset.
   */
  fail<K extends DiagnosticCode>({
    code,
    params,
    start = this.#offset,
    end,
    details,
  }: {
    code: K;
    params: DiagnosticParams<K>;
    start?: number;
    end?: number;
    details?: DiagnosticDetails;
  }): never {
    return emitDiagnostic({
      ctx: this.diagnostics,
      code,
      params,
      details,
      span: {
        file: this.file,
        start,
        end: Math.max(end ?? this.#offset, start),
      },
    });
  }

  #require(count: number, reading: string) {
    if (this.remaining < count) {
      this.#offset = this.#bytes.length;
      this.fail({ code: "DC0001", params: { kind: "truncated", reading } });
    }
  }

  #leb({
    bits,
    signed,
    reading,
    start,
  }: {
    bits: number;
    signed: boolean;
    reading: string;
    start: number;
  }): bigint {
    const maxBytes = Math.ceil(bits / 7);
    let result = 0n;
    let shift = 0n;

    for (let index = 0; index < maxBytes; index += 1) {
      const byte = this.u8(reading);
      result |= BigInt(byte & 0x7f) << shift;
      shift += 7n;
      if ((byte & 0x80) !== 0) continue;

      if (signed && (byte & 0x40) !== 0) {
        result -= 1n << shift;
      }

      const min = signed ? -(1n << BigInt(bits - 1)) : 0n;
      const max = signed ? (1n << BigInt(bits - 1)) - 1n : (1n << BigInt(bits)) - 1n;
      if (result < min || result > max) {
        return this.fail({
          code: "DC0002",
          params: { kind: "integer-out-of-range", encoding: reading },
          start,
        });
      }
      return result;
    }

    return this.fail({
      code: "DC0002",
      params: { kind: "integer-too-long", encoding: reading },
      start,
    });
  }
}
