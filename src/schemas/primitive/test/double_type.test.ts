import { describe, expect, it } from "vitest";
import { DoubleType } from "../double_type.ts";

describe("DoubleType", () => {
  const type = new DoubleType();

  it("should accept any number", () => {
    expect(type.check(3.5)).toBe(true);
    expect(type.check(NaN)).toBe(true);
    expect(type.check(Infinity)).toBe(true);
    expect(type.check("3.5")).toBe(false);
    expect(type.check(1n)).toBe(false);
  });

  it("should render the shortest form without precision", () => {
    expect(type.format(3.14159)).toBe("3.14159");
    expect(type.format(1)).toBe("1");
  });

  it("should render a fixed number of decimals with precision", () => {
    const fixed = new DoubleType({ precision: 2 });
    expect(fixed.format(3.14159)).toBe("3.14");
    expect(new DoubleType({ precision: 3 }).format(1)).toBe("1.000");
  });

  it("should render non-finite values as-is", () => {
    const fixed = new DoubleType({ precision: 2 });
    expect(fixed.format(NaN)).toBe("NaN");
    expect(fixed.format(-Infinity)).toBe("-Infinity");
  });

  it("should reject an invalid precision", () => {
    expect(() => new DoubleType({ precision: 101 })).toThrow(
      "Invalid double precision: 101",
    );
    expect(() => new DoubleType({ precision: 1.5 })).toThrow(
      "Invalid double precision: 1.5",
    );
  });

  it("should describe itself as JSON", () => {
    expect(type.toJSON()).toBe("double");
    expect(new DoubleType({ precision: 2 }).toJSON()).toEqual({
      type: "double",
      precision: 2,
    });
  });
});
