import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import { parseValueType, type ValueType } from "../../binary/value-types.js";
import type { FuncletsConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../../package.json") as { version: string };

/** Parses a comma separated type list such as `i32,f64`. */
export const parseTypeList = (value: string): ValueType[] =>
  value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
    .map((name) => {
      const type = parseValueType(name);
      if (!type) throw new InvalidArgumentError(`unknown value type "${name}"`);
      return type;
    });

export const getConfigFromCli = (argv: readonly string[] = process.argv): FuncletsConfig => {
  const program = new Command();

  program
    .name("funclets")
    .description("Validate a function body with funclet regions and build its SSA form")
    .version(version, "-v, --version", "display the current version")
    .argument("<input>", "function body file (locals and code)")
    .option("-x, --hex", "read the input as hex text")
    .option("-p, --params <types>", "signature parameter types, e.g. i32,f64", parseTypeList, [])
    .option("-r, --results <types>", "signature result types", parseTypeList, [])
    .option("--memory", "validate against a module that declares a memory")
    .option("--emit-ssa", "write the SSA listing to stdout")
    .option("--emit-json", "write the validated body as JSON to stdout")
    .option("--emit-msgpack", "write the validated body as MessagePack to stdout")
    .option("--no-color", "print diagnostics without ANSI colors")
    .option("--verbose", "write progress lines to stderr")
    .helpOption("-h, --help", "display help for command");

  program.parse([...argv]);
  const opts = program.opts<{
    hex?: boolean;
    params: ValueType[];
    results: ValueType[];
    memory?: boolean;
    emitSsa?: boolean;
    emitJson?: boolean;
    emitMsgpack?: boolean;
    color: boolean;
    verbose?: boolean;
  }>();
  const [input = ""] = program.args;

  return {
    input,
    hex: opts.hex,
    params: opts.params,
    results: opts.results,
    memory: opts.memory,
    emitSsa: opts.emitSsa,
    emitJson: opts.emitJson,
    emitMsgpack: opts.emitMsgpack,
    color: opts.color,
    verbose: opts.verbose,
  };
};
