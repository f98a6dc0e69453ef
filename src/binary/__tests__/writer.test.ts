import { describe, expect, it } from "vitest";
import { BodyWriter, signed, unsigned } from "../writer.js";

const bytes = (writer: BodyWriter) => Array.from(writer.finish());

describe("BodyWriter", () => {
  it("encodes the locals header before the code", () => {
    const writer = new BodyWriter({
      locals: [
        { count: 2, type: "i32" },
        { count: 1, type: "f64" },
      ],
    }).end();
    expect(bytes(writer)).toEqual([0x02, 0x02, 0x7f, 0x01, 0x7c, 0x0b]);
  });

  it("encodes funclet_region and funclet_sig", () => {
    const writer = new BodyWriter()
      .funcletRegion({ params: ["i32"], results: ["f64"], funclets: 2 })
      .funcletSig({ params: ["i32", "f32"], preds: 1 });
    expect(bytes(writer)).toEqual([
      0x00, 0x16, 0x01, 0x7f, 0x01, 0x7c, 0x02, 0x17, 0x02, 0x7f, 0x7d, 0x01,
    ]);
  });

  it("encodes funclet calls with signed deltas", () => {
    const writer = new BodyWriter()
      .funcletCall(-1)
      .funcletCallIf(2)
      .funcletCallTable([1, -1], 0);
    expect(bytes(writer)).toEqual([
      0x00, 0x1d, 0x7f, 0x1e, 0x02, 0x1f, 0x02, 0x01, 0x7f, 0x00,
    ]);
  });

  it("encodes instructions by name", () => {
    const writer = new BodyWriter()
      .op("i32.load", { align: 2, offset: 8 })
      .op("i32.add")
      .op("i64.trunc_sat_f64_u");
    expect(bytes(writer)).toEqual([0x00, 0x28, 0x02, 0x08, 0x6a, 0xfc, 0x07]);
    expect(() => new BodyWriter().op("i32.frobnicate")).toThrow(
      "unknown instruction i32.frobnicate"
    );
  });

  it("counts instructions but not raw bytes", () => {
    const writer = new BodyWriter().i32Const(-128).block("i32").raw(0x01, 0x02).end();
    expect(writer.instructionCount).toBe(3);
    expect(bytes(writer)).toEqual([0x00, 0x41, 0x80, 0x7f, 0x02, 0x7f, 0x01, 0x02, 0x0b]);
  });

  it("encodes LEB128 integers", () => {
    expect(unsigned(0)).toEqual([0x00]);
    expect(unsigned(624485)).toEqual([0xe5, 0x8e, 0x26]);
    expect(signed(63n)).toEqual([0x3f]);
    expect(signed(64n)).toEqual([0xc0, 0x00]);
    expect(signed(-64n)).toEqual([0x40]);
  });
});
