export type NumericType = "i32" | "i64" | "f32" | "f64";
export type ReferenceType = "funcref" | "externref";
export type ValueType = NumericType | ReferenceType;

/** A stack slot type; `unknown` only comes out of a polymorphic (unreachable) stack. */
export type OperandType = ValueType | "unknown";

export interface FuncType {
  params: readonly ValueType[];
  results: readonly ValueType[];
}

export const VALUE_TYPE_CODES = {
  i32: 0x7f,
  i64: 0x7e,
  f32: 0x7d,
  f64: 0x7c,
  funcref: 0x70,
  externref: 0x6f,
} as const satisfies Record<ValueType, number>;

export const EMPTY_BLOCK_TYPE = 0x40;

const valueTypesByCode = new Map<number, ValueType>(
  Object.entries(VALUE_TYPE_CODES).flatMap(([name, code]) =>
    isValueTypeName(name) ? [[code, name] as const] : []
  )
);

function isValueTypeName(name: string): name is ValueType {
  return name in VALUE_TYPE_CODES;
}

export const valueTypeFromCode = (code: number): ValueType | undefined =>
  valueTypesByCode.get(code);

export const parseValueType = (name: string): ValueType | undefined =>
  isValueTypeName(name) ? name : undefined;

export const isReferenceType = (type: OperandType): type is ReferenceType =>
  type === "funcref" || type === "externref";

export const isNumericType = (type: OperandType): type is NumericType =>
  type === "i32" || type === "i64" || type === "f32" || type === "f64";

/** `unknown` matches anything: it stands for a value popped from dead code. */
export const operandMatches = (actual: OperandType, expected: OperandType) =>
  actual === "unknown" || expected === "unknown" || actual === expected;

export const sameTypes = (
  left: readonly OperandType[],
  right: readonly OperandType[]
): boolean =>
  left.length === right.length &&
  left.every((type, index) => operandMatches(type, right[index]));

export const formatTypes = (types: readonly OperandType[]): string =>
  `[${types.join(" ")}]`;
