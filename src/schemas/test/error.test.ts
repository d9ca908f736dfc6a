import { describe, expect, it } from "vitest";
import { throwInvalidError, ValidationError } from "../error.ts";
import { IntType } from "../primitive/int_type.ts";
import { StringType } from "../primitive/string_type.ts";

describe("ValidationError", () => {
  it("should describe the value, the type and the path", () => {
    const type = new StringType();
    const error = new ValidationError(["line", "label"], 5, type);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ValidationError");
    expect(error.message).toBe(
      "Invalid value: '5' for type: string at path: line.label",
    );
    expect(error.path).toEqual(["line", "label"]);
    expect(error.value).toBe(5);
    expect(error.type).toBe(type);
  });

  it("should omit an empty path", () => {
    expect(new ValidationError([], "x", new IntType({ width: 2 })).message)
      .toBe('Invalid value: \'x\' for type: {"type":"int","width":2}');
  });

  it("should render object values as JSON", () => {
    expect(new ValidationError([], { a: 1 }, new IntType()).message).toBe(
      "Invalid value: '{\"a\":1}' for type: int",
    );
  });
});

describe("throwInvalidError", () => {
  it("should throw a ValidationError", () => {
    expect(() => throwInvalidError(["x"], null, new IntType())).toThrow(
      "Invalid value: 'null' for type: int at path: x",
    );
  });

  it("should work as an error hook", () => {
    expect(() => new IntType().check("1", throwInvalidError, ["n"])).toThrow(
      ValidationError,
    );
  });
});
