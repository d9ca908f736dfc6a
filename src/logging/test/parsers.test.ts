import { describe, expect, it } from "vitest";
import { StringType } from "../../schemas/primitive/string_type.ts";
import {
  createLineType,
  createPointType,
} from "../../schemas/complex/test/record_test_utils.ts";
import {
  createRecordParser,
  createTextParser,
  describeKind,
  ParserRegistry,
  parseUnknownDetails,
} from "../parsers.ts";

class FileError {
  constructor(public path: string) {}
}

describe("describeKind", () => {
  it("should name objects by their constructor", () => {
    expect(describeKind({})).toBe("Object");
    expect(describeKind(new Map())).toBe("Map");
    expect(describeKind(new FileError("/tmp/a"))).toBe("FileError");
  });

  it("should fall back to object without a constructor", () => {
    expect(describeKind(Object.create(null))).toBe("object");
  });

  it("should use typeof for everything else", () => {
    expect(describeKind(5)).toBe("number");
    expect(describeKind("s")).toBe("string");
    expect(describeKind(undefined)).toBe("undefined");
  });
});

describe("parseUnknownDetails", () => {
  it("should describe the kind of unhandled details", () => {
    expect(parseUnknownDetails(42)).toEqual([
      { key: "unknown_error_type", value: "unhandled_type_number" },
    ]);
    expect(parseUnknownDetails(new FileError("/tmp/a"))).toEqual([
      { key: "unknown_error_type", value: "unhandled_type_FileError" },
    ]);
  });

  it("should produce nothing for null and undefined", () => {
    expect(parseUnknownDetails(null)).toEqual([]);
    expect(parseUnknownDetails(undefined)).toEqual([]);
  });
});

describe("createRecordParser", () => {
  it("should emit one pair per primitive leaf", () => {
    const line = createLineType(createPointType());
    const parse = createRecordParser(line);
    expect(parse({
      start: { x: 1, y: 2 },
      end: { x: 3, y: 4 },
      label: "a b",
    })).toEqual([
      { key: "start.x", value: "1" },
      { key: "start.y", value: "2" },
      { key: "end.x", value: "3" },
      { key: "end.y", value: "4" },
      { key: "label", value: "a b" },
    ]);
  });
});

describe("createTextParser", () => {
  const point = createPointType();

  it("should emit the rendered record as one pair", () => {
    expect(createTextParser(point)({ x: 1, y: 2 })).toEqual([
      { key: "details", value: "x=1 y=2" },
    ]);
  });

  it("should use the configured key", () => {
    expect(createTextParser(point, { key: "pt" })({ x: 1, y: 2 })).toEqual([
      { key: "pt", value: "x=1 y=2" },
    ]);
  });

  it("should mark text cut at the capacity", () => {
    expect(createTextParser(point, { capacity: 5 })({ x: 1, y: 2 })).toEqual([
      { key: "details", value: "x=1 ...(truncated)" },
    ]);
  });
});

describe("ParserRegistry", () => {
  const point = createPointType();

  function createRegistry(): ParserRegistry {
    return new ParserRegistry()
      .registerRecord(point)
      .register(new StringType(), (reason) => [{ key: "reason", value: reason }]);
  }

  it("should dispatch details to the parser of their type", () => {
    const registry = createRegistry();
    expect(registry.parse({ x: 1, y: 2 })).toEqual([
      { key: "x", value: "1" },
      { key: "y", value: "2" },
    ]);
    expect(registry.parse("disk full")).toEqual([
      { key: "reason", value: "disk full" },
    ]);
    expect(registry.size()).toBe(2);
  });

  it("should use the fallback for unregistered details", () => {
    expect(createRegistry().parse(42)).toEqual([
      { key: "unknown_error_type", value: "unhandled_type_number" },
    ]);
    const custom = new ParserRegistry({
      fallback: () => [{ key: "other", value: "yes" }],
    });
    expect(custom.parse(42)).toEqual([{ key: "other", value: "yes" }]);
  });

  it("should produce nothing for null details", () => {
    expect(createRegistry().parse(null)).toEqual([]);
    expect(createRegistry().parse(undefined)).toEqual([]);
  });

  it("should prefer the first registered type", () => {
    const registry = new ParserRegistry()
      .register(new StringType(), () => [{ key: "first", value: "1" }])
      .register(new StringType(), () => [{ key: "second", value: "2" }]);
    expect(registry.parse("s")).toEqual([{ key: "first", value: "1" }]);
  });

  it("should render registered text parsers", () => {
    const registry = new ParserRegistry().registerText(point, { key: "p" });
    expect(registry.resolve({ x: 5, y: 6 })({ x: 5, y: 6 })).toEqual([
      { key: "p", value: "x=5 y=6" },
    ]);
  });
});
