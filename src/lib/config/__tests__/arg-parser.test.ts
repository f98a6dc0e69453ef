import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { getConfigFromCli, parseTypeList } from "../arg-parser.js";

describe("parseTypeList", () => {
  it("parses comma separated value types", () => {
    expect(parseTypeList("i32, f64,,externref")).toEqual(["i32", "f64", "externref"]);
  });

  it("rejects unknown type names", () => {
    expect(() => parseTypeList("i32,i128")).toThrow(InvalidArgumentError);
    expect(() => parseTypeList("i128")).toThrow('unknown value type "i128"');
  });
});

describe("getConfigFromCli", () => {
  it("reads the input and options", () => {
    const config = getConfigFromCli([
      "node",
      "funclets",
      "body.hex",
      "--hex",
      "--params",
      "i32,f64",
      "--emit-ssa",
      "--no-color",
    ]);

    expect(config).toMatchObject({
      input: "body.hex",
      hex: true,
      params: ["i32", "f64"],
      results: [],
      emitSsa: true,
      color: false,
    });
    expect(config.memory).toBeUndefined();
  });

  it("enables color by default", () => {
    const config = getConfigFromCli(["node", "funclets", "body.bin", "-r", "i64", "--memory"]);
    expect(config).toMatchObject({ color: true, results: ["i64"], memory: true, params: [] });
  });
});
