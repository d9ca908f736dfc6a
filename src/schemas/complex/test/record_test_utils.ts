import { TextBuffer } from "../../../serialization/buffers/text_buffer.ts";
import { TEXT_OVERFLOW, TextTap } from "../../../serialization/text_tap.ts";
import { IntType } from "../../primitive/int_type.ts";
import { NullableType } from "../../primitive/nullable_type.ts";
import { StringType } from "../../primitive/string_type.ts";
import { qualifyFieldName } from "../field_names.ts";
import {
  type CustomTextSerializer,
  defineRecord,
  type InferRecord,
  type RecordType,
} from "../record_type.ts";
import type { RecordWriterStrategy } from "../record_writer_strategy.ts";

/**
 * Options shared by the fixture factories.
 */
export interface FixtureOptions {
  validate?: boolean;
  writerStrategy?: RecordWriterStrategy;
}

/** Creates `Point { x: int, y: int }`. */
export function createPointType(options: FixtureOptions = {}) {
  return defineRecord("Point", [
    { name: "x", type: new IntType() },
    { name: "y", type: new IntType() },
  ], options);
}

export type Point = InferRecord<
  [{ name: "x"; type: IntType }, { name: "y"; type: IntType }]
>;

/** Creates `Line { start: Point, end: Point, label: string }`. */
export function createLineType(
  point: RecordType<Point>,
  options: FixtureOptions = {},
) {
  return defineRecord("Line", [
    { name: "start", type: point },
    { name: "end", type: point },
    { name: "label", type: new StringType() },
  ], options);
}

export interface SpecialFeature {
  feature_id: number;
  feature_name: string | null;
}

/**
 * Hand-written serializer decorating both fields with ` (custom_fmt)` and
 * the name with backslash-escaped quotes.
 */
export const writeSpecialFeature: CustomTextSerializer<SpecialFeature> = (
  feature,
  buffer,
  prefix,
) => {
  const tap = new TextTap(buffer);
  if (feature === null) {
    tap.terminate();
    return 0;
  }
  const id = `${qualifyFieldName(prefix, "feature_id")}=${feature.feature_id}`;
  const name = `${qualifyFieldName(prefix, "feature_name")}=\\"${
    feature.feature_name ?? "null"
  }\\"`;
  const result = tap.writeFragment(
    `${id} (custom_fmt) ${name} (custom_fmt)`,
  );
  tap.terminate();
  return result.success ? result.data : TEXT_OVERFLOW;
};

/** Creates `SpecialFeature` with {@link writeSpecialFeature} attached. */
export function createSpecialFeatureType() {
  return defineRecord("SpecialFeature", [
    { name: "feature_id", type: new IntType() },
    { name: "feature_name", type: new NullableType(new StringType()) },
  ], { toText: writeSpecialFeature });
}

/** Creates `Product { product_sku, main_feature: SpecialFeature, product_name }`. */
export function createProductType(options: FixtureOptions = {}) {
  return defineRecord("Product", [
    { name: "product_sku", type: new IntType() },
    { name: "main_feature", type: createSpecialFeatureType() },
    { name: "product_name", type: new StringType() },
  ], options);
}

/**
 * Result of rendering a record into a fresh buffer.
 */
export interface RenderResult {
  written: number;
  text: string;
}

/**
 * Renders `record` into a new buffer of `capacity` bytes.
 */
export function render<T extends object>(
  type: RecordType<T>,
  record: T | null,
  capacity: number,
  prefix = "",
): RenderResult {
  const buffer = new TextBuffer(capacity);
  const written = type.toText(record, buffer, prefix);
  return { written, text: buffer.toString() };
}
