// Example: declare nested record types and render them as dotted key=value text.
import { defineRecord, IntType, StringType, TextBuffer } from "../src/mod.ts";
import type { InferRecord } from "../src/mod.ts";

export const Point = defineRecord("Point", [
  { name: "x", type: new IntType() },
  { name: "y", type: new IntType() },
]);

export const Line = defineRecord("Line", [
  { name: "start", type: Point },
  { name: "end", type: Point },
  { name: "label", type: new StringType({ quote: true }) },
]);

export type LineValue = InferRecord<
  [
    { name: "start"; type: typeof Point },
    { name: "end"; type: typeof Point },
    { name: "label"; type: StringType },
  ]
>;

/**
 * Renders a line under `prefix`. Returns the text, cut at the last field
 * that fit when `capacity` is too small.
 */
export function renderLine(
  line: LineValue,
  prefix = "line",
  capacity = 128,
): string {
  const buffer = new TextBuffer(capacity);
  Line.toText(line, buffer, prefix);
  return buffer.toString();
}
