import type {
  BlockId,
  SsaBlock,
  SsaFunction,
  SsaValue,
  Terminator,
  ValueId,
} from "./ir.js";

const v = (id: ValueId) => `%${id}`;
const b = (id: BlockId) => `b${id}`;

const constText = (value: SsaValue & { kind: "const" }): string => {
  if (value.value === null) return "null";
  return typeof value.value === "bigint" ? `${value.value}n` : `${value.value}`;
};

const valueText = (value: SsaValue): string => {
  switch (value.kind) {
    case "param":
      return `${v(value.id)}: ${value.type} = param ${value.index}`;
    case "const":
      return `${v(value.id)}: ${value.type} = const ${constText(value)}`;
    case "undef":
      return `${v(value.id)}: ${value.type} = undef`;
    case "phi":
      return `${v(value.id)}: ${value.type} = phi ${value.slot} [${value.operands
        .map(v)
        .join(", ")}]`;
    case "extract":
      return `${v(value.id)}: ${value.type} = extract ${v(value.source)}.${value.index}`;
    case "op": {
      const parts = [
        value.op,
        ...value.immediates.map((imm) => `${imm}`),
        ...value.operands.map(v),
      ].join(" ");
      if (value.results.length === 0) return parts;
      const type = value.results.length === 1 ? value.results[0] : `(${value.results.join(" ")})`;
      return `${v(value.id)}: ${type} = ${parts}`;
    }
  }
};

const terminatorText = (terminator: Terminator | undefined): string => {
  if (!terminator) return "<open>";
  switch (terminator.kind) {
    case "jump":
      return `jump ${b(terminator.target)} (${terminator.via})`;
    case "branch":
      return `branch ${v(terminator.condition)} ${b(terminator.then)} ${b(
        terminator.else
      )} (${terminator.via})`;
    case "table":
      return `table ${v(terminator.index)} [${terminator.targets
        .map(b)
        .join(", ")}] default ${b(terminator.default)} (${terminator.via})`;
    case "return":
      return `return ${terminator.values.map(v).join(" ")}`.trimEnd();
    case "unreachable":
      return "unreachable";
  }
};

const blockHeader = (block: SsaBlock): string => {
  const preds = block.preds.length ? ` preds=[${block.preds.map(b).join(", ")}]` : "";
  return `${b(block.id)} ${block.label}:${preds}`;
};

/** Human-readable listing of an SSA function, one block at a time. */
export const printSsa = (fn: SsaFunction): string => {
  const values = new Map(fn.values.map((value) => [value.id, value]));
  const lines: string[] = [];

  const globals = fn.values.filter(
    (value) => value.kind === "param" || value.kind === "const" || value.kind === "undef"
  );
  globals.forEach((value) => lines.push(valueText(value)));

  fn.blocks.forEach((block) => {
    lines.push(blockHeader(block));
    [...block.phis, ...block.instructions].forEach((id) => {
      const value = values.get(id);
      if (value) lines.push(`  ${valueText(value)}`);
    });
    lines.push(`  ${terminatorText(block.terminator)}`);
  });

  return lines.join("\n");
};
