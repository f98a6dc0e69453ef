import { describe, expect, it } from "vitest";
import { OperandStack } from "../operand-stack.js";

describe("OperandStack", () => {
  it("pops in reverse push order", () => {
    const stack = new OperandStack();
    stack.push({ type: "i32", value: 0 });
    stack.push({ type: "f64", value: 1 });
    expect(stack.peek()).toEqual({ type: "f64", value: 1 });
    expect(stack.pop()).toEqual({ type: "f64", value: 1 });
    expect(stack.pop()).toEqual({ type: "i32", value: 0 });
    expect(stack.pop()).toBeUndefined();
  });

  it("refuses to pop below the floor", () => {
    const stack = new OperandStack();
    stack.push({ type: "i32", value: 0 });
    const mark = stack.mark();
    stack.push({ type: "i64", value: 1 });

    expect(stack.pop(mark)).toEqual({ type: "i64", value: 1 });
    expect(stack.pop(mark)).toBeUndefined();
    expect(stack.height).toBe(1);
  });

  it("lists and truncates the values above a mark", () => {
    const stack = new OperandStack();
    stack.push({ type: "i32", value: 0 });
    const mark = stack.mark();
    stack.push({ type: "f32", value: 1 });
    stack.push({ type: "externref", value: 2 });

    expect(stack.valuesAbove(mark).map((entry) => entry.type)).toEqual([
      "f32",
      "externref",
    ]);
    stack.truncate(mark);
    expect(stack.height).toBe(1);
    expect(stack.valuesAbove(mark)).toEqual([]);
  });
});
