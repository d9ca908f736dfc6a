import { describe, expect, it } from "vitest";
import { safeStringify } from "../json.ts";

describe("safeStringify", () => {
  it("should print scalars as-is", () => {
    expect(safeStringify("text")).toBe("text");
    expect(safeStringify(42)).toBe("42");
    expect(safeStringify(true)).toBe("true");
    expect(safeStringify(null)).toBe("null");
    expect(safeStringify(undefined)).toBe("undefined");
  });

  it("should suffix bigints with n", () => {
    expect(safeStringify(5n)).toBe("5n");
    expect(safeStringify({ n: 5n })).toBe('{"n":"5n"}');
  });

  it("should mark circular references", () => {
    const node: { name: string; self?: unknown } = { name: "a" };
    node.self = node;
    expect(safeStringify(node)).toBe('{"name":"a","self":"[Circular]"}');
  });

  it("should print symbols", () => {
    expect(safeStringify(Symbol("s"))).toBe("Symbol(s)");
  });
});
