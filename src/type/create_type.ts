import { BooleanType } from "../schemas/primitive/boolean_type.ts";
import { DoubleType } from "../schemas/primitive/double_type.ts";
import { IntType } from "../schemas/primitive/int_type.ts";
import { LongType } from "../schemas/primitive/long_type.ts";
import { NullableType } from "../schemas/primitive/nullable_type.ts";
import { PrimitiveType } from "../schemas/primitive/primitive_type.ts";
import { StringType } from "../schemas/primitive/string_type.ts";
import {
  type CustomTextSerializer,
  type RecordFieldParams,
  RecordType,
  type RecordWriterStrategy,
} from "../schemas/complex/record_type.ts";
import { Type } from "../schemas/type.ts";
import { safeStringify } from "../schemas/json.ts";

type PrimitiveTypeName = "boolean" | "int" | "long" | "double" | "string";

/**
 * A schema definition: a pre-constructed Type, a type name (primitive or a
 * registered record), or a schema object.
 */
export type SchemaLike =
  | Type
  | string
  | SchemaObject;

/**
 * A schema object. `type` selects the kind; the other properties carry the
 * record's name and fields or the primitive's format options.
 */
export interface SchemaObject {
  /** `record`, `nullable`, or a primitive name such as `int`. */
  type: unknown;
  /** The record's name. */
  name?: unknown;
  /** Documentation for a record or a field. */
  doc?: unknown;
  /** The fields of a record schema, each with a `name` and a `type`. */
  fields?: unknown;
  /** The wrapped type of a `nullable` schema. */
  of?: unknown;
  /** Allows additional properties such as `radix`, `width` or `quote`. */
  [key: string]: unknown;
}

interface CreateTypeContext {
  registry: Map<string, Type>;
  serializers: ReadonlyMap<string, CustomTextSerializer<Record<string, unknown>>>;
  validate: boolean;
  writerStrategy?: RecordWriterStrategy;
}

/**
 * Options for creating a type from a schema.
 */
export interface CreateTypeOptions {
  /**
   * Registry of named record types. References by name resolve here, and
   * every record the schema defines is added to it. When creation fails,
   * the records it added are removed again.
   */
  registry?: Map<string, Type>;
  /**
   * Hand-written serializers, by record name. A record defined under one of
   * these names uses the serializer instead of a generated writer.
   */
  serializers?: ReadonlyMap<
    string,
    CustomTextSerializer<Record<string, unknown>>
  >;
  /**
   * Whether to validate values before they are rendered.
   *
   * When set to `false`, the generated writers skip runtime type checks.
   * This is only safe when values are already known to match the schema.
   */
  validate?: boolean;
  /**
   * Optional writer strategy for record types.
   *
   * - `CompiledWriterStrategy` (default): precomputes field names and calls
   *   the primitive formatters directly.
   * - `InterpretedWriterStrategy`: delegates every field to its type.
   */
  writerStrategy?: RecordWriterStrategy;
}

/**
 * Constructs a {@link Type} from a schema definition.
 *
 * @example
 * ```typescript
 * const registry = new Map<string, Type>();
 * createType({
 *   type: "record",
 *   name: "Point",
 *   fields: [{ name: "x", type: "int" }, { name: "y", type: "int" }],
 * }, { registry });
 * const line = createType({
 *   type: "record",
 *   name: "Line",
 *   fields: [{ name: "start", type: "Point" }, { name: "end", type: "Point" }],
 * }, { registry });
 * ```
 */
export function createType(
  schema: SchemaLike,
  options: CreateTypeOptions = {},
): Type {
  const context: CreateTypeContext = {
    registry: options.registry ?? new Map<string, Type>(),
    serializers: options.serializers ?? new Map(),
    validate: options.validate ?? true,
    writerStrategy: options.writerStrategy,
  };
  const registered = new Set(context.registry.keys());
  try {
    const type = constructType(schema, context);
    if (type instanceof RecordType) {
      // Surface bad field definitions and self-embedding now, not on first use.
      type.getFields();
    }
    return type;
  } catch (error) {
    // Leave the registry as it was so a corrected schema can be retried.
    for (const name of [...context.registry.keys()]) {
      if (!registered.has(name)) {
        context.registry.delete(name);
      }
    }
    throw error;
  }
}

function constructType(schema: SchemaLike, context: CreateTypeContext): Type {
  if (schema instanceof Type) {
    return schema;
  }

  if (typeof schema === "string") {
    return createFromTypeName(schema, context);
  }

  if (schema === null || typeof schema !== "object" || Array.isArray(schema)) {
    throw new Error(
      `Unsupported schema type: ${safeStringify(schema)}`,
    );
  }

  const { type } = schema;

  if (typeof type === "string") {
    if (type === "record") {
      return createRecordType(schema, context);
    }
    if (type === "nullable") {
      return createNullableType(schema, context);
    }
    if (isPrimitiveTypeName(type)) {
      return createPrimitiveType(type, schema, context.validate);
    }
    if (isUnsupportedTypeName(type)) {
      throw new Error(`Unsupported schema type: ${type}`);
    }
    return createFromTypeName(type, context);
  }

  if (isSchemaObject(type)) {
    return constructType(type, context);
  }

  if (Array.isArray(type)) {
    throw new Error(`Unsupported schema type: ${safeStringify(type)}`);
  }

  throw new Error(
    `Schema is missing a valid "type" property: ${safeStringify(schema)}`,
  );
}

function createPrimitiveType(
  name: PrimitiveTypeName,
  schema: SchemaObject,
  validate: boolean,
): BooleanType | IntType | LongType | DoubleType | StringType {
  switch (name) {
    case "boolean":
      return new BooleanType({ validate });
    case "int":
      return new IntType({
        validate,
        radix: optionalNumber(schema, "radix"),
        width: optionalNumber(schema, "width"),
      });
    case "long":
      return new LongType({ validate, radix: optionalNumber(schema, "radix") });
    case "double":
      return new DoubleType({
        validate,
        precision: optionalNumber(schema, "precision"),
      });
    case "string":
      return new StringType({
        validate,
        quote: optionalBoolean(schema, "quote"),
        escape: optionalBoolean(schema, "escape"),
      });
  }
}

function createNullableType(
  schema: SchemaObject,
  context: CreateTypeContext,
): NullableType<unknown> {
  if (!("of" in schema)) {
    throw new Error(
      `Nullable schema requires an "of" definition: ${safeStringify(schema)}`,
    );
  }
  const inner = isSchemaObject(schema.of) || typeof schema.of === "string"
    ? constructType(schema.of, context)
    : undefined;
  if (!(inner instanceof PrimitiveType)) {
    throw new Error(
      `Nullable schema must wrap a primitive type: ${safeStringify(schema)}`,
    );
  }
  return new NullableType(inner, {
    nullText: optionalString(schema, "nullText"),
  });
}

function createFromTypeName(
  name: string,
  context: CreateTypeContext,
): Type {
  if (isPrimitiveTypeName(name)) {
    return createPrimitiveType(name, { type: name }, context.validate);
  }
  if (isUnsupportedTypeName(name)) {
    throw new Error(`Unsupported schema type: ${name}`);
  }

  const found = context.registry.get(name);
  if (found) {
    return found;
  }
  throw new Error(`Undefined type reference: ${name}`);
}

function createRecordType(
  schema: SchemaObject,
  context: CreateTypeContext,
): RecordType {
  const name = schema.name;
  if (typeof name !== "string" || name.length === 0) {
    throw new Error(
      `Record schema requires a non-empty name: ${safeStringify(schema)}`,
    );
  }

  const fieldsValue = schema.fields;
  if (!Array.isArray(fieldsValue)) {
    throw new Error(
      `Record schema requires a fields array: ${safeStringify(schema)}`,
    );
  }

  const buildFields = (): RecordFieldParams[] => {
    return fieldsValue.map((field: unknown) => {
      if (!isPlainObject(field)) {
        throw new Error(
          `Invalid record field definition: ${safeStringify(field)}`,
        );
      }
      const fieldName = field.name;
      if (typeof fieldName !== "string" || fieldName.length === 0) {
        throw new Error(
          `Record field requires a non-empty name: ${safeStringify(field)}`,
        );
      }
      const fieldSchema = field.type;
      if (fieldSchema === undefined) {
        throw new Error(
          `Record field "${fieldName}" is missing a type definition.`,
        );
      }
      if (!isSchemaLike(fieldSchema)) {
        throw new Error(
          `Unsupported schema type: ${safeStringify(fieldSchema)}`,
        );
      }
      const fieldParams: RecordFieldParams = {
        name: fieldName,
        type: constructType(fieldSchema, context),
      };
      const doc = field.doc;
      if (doc !== undefined && typeof doc !== "string") {
        throw new Error(
          `Schema property "doc" must be a string: ${safeStringify(field)}`,
        );
      }
      if (doc !== undefined) {
        fieldParams.doc = doc;
      }
      return fieldParams;
    });
  };

  if (context.registry.has(name)) {
    throw new Error(`Duplicate type name: ${name}`);
  }

  const record = new RecordType({
    name,
    doc: optionalString(schema, "doc"),
    fields: buildFields,
    validate: context.validate,
    writerStrategy: context.writerStrategy,
    toText: context.serializers.get(name),
  });
  context.registry.set(name, record);
  return record;
}

function isPrimitiveTypeName(value: unknown): value is PrimitiveTypeName {
  return value === "boolean" || value === "int" || value === "long" ||
    value === "double" || value === "string";
}

function isUnsupportedTypeName(value: string): boolean {
  return value === "array" || value === "map" || value === "union" ||
    value === "enum" || value === "fixed" || value === "bytes" ||
    value === "null" || value === "float";
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null &&
    !Array.isArray(value) && !(value instanceof Type);
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return isPlainObject(value) && "type" in value;
}

function isSchemaLike(value: unknown): value is SchemaLike {
  return value instanceof Type || typeof value === "string" ||
    isSchemaObject(value);
}

function optionalNumber(
  schema: SchemaObject,
  key: string,
): number | undefined {
  const value = schema[key];
  if (value === undefined || typeof value === "number") {
    return value;
  }
  throw new Error(
    `Schema property "${key}" must be a number: ${safeStringify(schema)}`,
  );
}

function optionalBoolean(
  schema: SchemaObject,
  key: string,
): boolean | undefined {
  const value = schema[key];
  if (value === undefined || typeof value === "boolean") {
    return value;
  }
  throw new Error(
    `Schema property "${key}" must be a boolean: ${safeStringify(schema)}`,
  );
}

function optionalString(
  schema: SchemaObject,
  key: string,
): string | undefined {
  const value = schema[key];
  if (value === undefined || typeof value === "string") {
    return value;
  }
  throw new Error(
    `Schema property "${key}" must be a string: ${safeStringify(schema)}`,
  );
}
