import { describe, expect, it } from "vitest";
import { PrimitiveType } from "../primitive_type.ts";
import type { JSONType } from "../../type.ts";
import { ValidationError } from "../../error.ts";

/**
 * Minimal primitive type accepting integer percentages.
 */
class PercentType extends PrimitiveType<number> {
  protected override accepts(value: unknown): value is number {
    return typeof value === "number" && Number.isInteger(value) &&
      value >= 0 && value <= 100;
  }

  protected override formatValue(value: number): string {
    return `${value}%`;
  }

  public override toJSON(): JSONType {
    return "percent";
  }
}

describe("PrimitiveType", () => {
  const type = new PercentType();

  it("should report the primitive kind", () => {
    expect(type.getKind()).toBe("primitive");
  });

  it("should validate through accepts", () => {
    expect(type.isValid(50)).toBe(true);
    expect(type.isValid(101)).toBe(false);
    expect(type.is(0)).toBe(true);
  });

  it("should pass the error hook through isValid", () => {
    const seen: unknown[] = [];
    type.isValid(-1, { errorHook: (_path, value) => seen.push(value) });
    expect(seen).toEqual([-1]);
  });

  it("should render with formatValue", () => {
    expect(type.format(75)).toBe("75%");
  });

  it("should prefer the custom format function", () => {
    const ratio = new PercentType({ format: (value) => (value / 100).toString() });
    expect(ratio.format(75)).toBe("0.75");
  });

  it("should validate by default and keep the validate flag", () => {
    expect(type.getValidate()).toBe(true);
    expect(new PercentType({ validate: false }).getValidate()).toBe(false);
  });

  it("should throw ValidationError when cloning invalid values", () => {
    expect(() => type.cloneFromValue(150)).toThrow(ValidationError);
    expect(() => type.cloneFromValue(150)).toThrow(
      "Invalid value: '150' for type: percent",
    );
  });
});
