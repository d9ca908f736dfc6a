import type { TextBuffer } from "../../serialization/buffers/text_buffer.ts";
import { type ErrorHook, throwInvalidError } from "../error.ts";
import { type JSONType, Type, type ValueOf } from "../type.ts";
import { isValidName } from "./field_names.ts";
import {
  type FieldDescriptor,
  isRecordType,
  RecordField,
  type RecordFieldParams,
} from "./record_field.ts";
import { RecordWriterCache } from "./record_writer_cache.ts";
import type { RecordWriterStrategy } from "./record_writer_strategy.ts";

export type { RecordFieldParams } from "./record_field.ts";
export type { RecordWriterStrategy } from "./record_writer_strategy.ts";

/**
 * Hand-written replacement for a record type's generated writer.
 *
 * It must honor the same contract as {@link RecordType.toText}: render
 * `null` as the empty string and return 0, qualify every field name with
 * `prefix` when it is non-empty, keep the buffer NUL-terminated within its
 * capacity, and return `TEXT_OVERFLOW` when the text does not fit.
 */
export type CustomTextSerializer<T> = (
  record: T | null,
  buffer: TextBuffer,
  prefix: string,
) => number;

/**
 * Maps a field descriptor list to the record shape it declares.
 *
 * @example
 * ```typescript
 * type Point = InferRecord<[
 *   { name: "x"; type: IntType },
 *   { name: "y"; type: IntType },
 * ]>; // { x: number; y: number }
 * ```
 */
export type InferRecord<F extends readonly RecordFieldParams[]> = {
  [P in F[number] as P["name"]]: ValueOf<P["type"]>;
};

/**
 * Parameters for creating a RecordType.
 */
export interface RecordTypeParams<T extends object = Record<string, unknown>> {
  /** The record type's name. */
  name: string;
  /**
   * Fields can be provided eagerly as an array or lazily via a thunk (a
   * parameterless function returning the array). The lazy form lets a
   * declaration refer to record types defined later in the same module.
   */
  fields: readonly RecordFieldParams[] | (() => readonly RecordFieldParams[]);
  /** Optional documentation for the record type. */
  doc?: string;
  /**
   * Whether to validate records before they are rendered.
   *
   * When set to `false`, `toText` skips the runtime type checks. Values of
   * the wrong type then render in whatever way their formatter handles them,
   * or throw from inside the formatter.
   */
  validate?: boolean;
  /** Strategy used to compile the generated writer. */
  writerStrategy?: RecordWriterStrategy;
  /** Hand-written writer used instead of the generated one. */
  toText?: CustomTextSerializer<T>;
}

/**
 * A record type: a named, ordered list of fields, each a primitive or a
 * nested record embedded by value.
 *
 * The field list drives both the record's shape (see {@link InferRecord}
 * and {@link RecordType.create}) and its text rendering
 * ({@link RecordType.toText}).
 */
export class RecordType<T extends object = Record<string, unknown>>
  extends Type<T> {
  #name: string;
  #doc?: string;
  #fieldParams:
    | readonly RecordFieldParams[]
    | (() => readonly RecordFieldParams[]);
  #fields?: RecordField[];
  #descriptors: FieldDescriptor[] = [];
  #fieldNameToIndex = new Map<string, number>();
  #resolving = false;
  #customSerializer?: CustomTextSerializer<T>;
  #writerCache: RecordWriterCache;

  /**
   * Creates a new RecordType. Eager field lists are resolved immediately;
   * thunks are resolved on first use.
   */
  constructor(params: RecordTypeParams<T>) {
    super(params.validate ?? true);
    const { name, fields, doc, writerStrategy, toText } = params;
    if (typeof name !== "string" || !isValidName(name)) {
      throw new Error(`Invalid record type name: ${name}`);
    }
    if (!Array.isArray(fields) && typeof fields !== "function") {
      throw new Error(`Invalid fields for record type '${name}'`);
    }
    this.#name = name;
    this.#doc = doc;
    this.#fieldParams = fields;
    this.#customSerializer = toText;
    this.#writerCache = new RecordWriterCache(writerStrategy);

    if (typeof fields !== "function") {
      this.#ensureFields([]);
    }
  }

  /** Gets the record type's name. */
  public getName(): string {
    return this.#name;
  }

  /** Gets the record type's documentation, if any. */
  public getDoc(): string | undefined {
    return this.#doc;
  }

  public override getKind(): "struct" {
    return "struct";
  }

  /** Gets the fields in declaration order. */
  public getFields(): RecordField[] {
    return this.#ensureFields([]).slice();
  }

  /** Gets a field by name. */
  public getField(name: string): RecordField | undefined {
    const fields = this.#ensureFields([]);
    const index = this.#fieldNameToIndex.get(name);
    return index === undefined ? undefined : fields[index];
  }

  /** Gets the writer strategy used for the generated writer. */
  public getWriterStrategy(): RecordWriterStrategy {
    return this.#writerCache.getStrategy();
  }

  /** Returns true if a hand-written serializer replaces the generated one. */
  public hasCustomSerializer(): boolean {
    return this.#customSerializer !== undefined;
  }

  public override check(
    value: unknown,
    errorHook?: ErrorHook,
    path: string[] = [],
  ): boolean {
    this.#ensureFields([]);
    if (!isRecordObject(value)) {
      if (errorHook) {
        errorHook(path.slice(), value, this);
      }
      return false;
    }

    let isValid = true;
    for (const { name, type } of this.#descriptors) {
      const fieldPath = [...path, name];
      if (!type.check(value[name], errorHook, fieldPath)) {
        if (!errorHook) {
          return false;
        }
        isValid = false;
      }
    }
    return isValid;
  }

  /**
   * Builds a validated copy of `value` holding exactly the declared fields,
   * in declaration order.
   */
  public override cloneFromValue(value: unknown): T {
    this.check(value, throwInvalidError, []);
    if (!isRecordObject(value)) {
      throwInvalidError([], value, this);
    }
    const copy: Record<string, unknown> = {};
    for (const { name, type } of this.#descriptors) {
      copy[name] = type.cloneFromValue(value[name]);
    }
    if (!this.is(copy)) {
      throwInvalidError([], copy, this);
    }
    return copy;
  }

  /**
   * Creates a record instance from field values. Nested records are copied
   * too, so the result owns all of its fields.
   */
  public create(values: T): T {
    return this.cloneFromValue(values);
  }

  /**
   * Renders `record` into `buffer` as space-separated `name=value` fragments.
   *
   * Field names are qualified with `prefix` (`prefix.name`) when it is not
   * empty; nested records render their fields inline under their own dotted
   * prefix. The buffer is always NUL-terminated within its capacity.
   *
   * @param record The record, or `null`/`undefined` for the empty text.
   * @param buffer The destination; its capacity bounds the output.
   * @param prefix The name prefix, empty at the top level.
   * @returns The number of bytes written (terminator excluded), or
   * `TEXT_OVERFLOW` when a separator or field does not fit.
   * @throws ValidationError when validation is on and the record does not
   * match the type.
   */
  public toText(
    record: T | null | undefined,
    buffer: TextBuffer,
    prefix = "",
  ): number {
    return this.writeText(record, buffer, prefix, this.validateWrites);
  }

  /**
   * Entry point shared by {@link toText} and the writers of parent records.
   * Dispatches to the custom serializer when there is one, otherwise to the
   * compiled writer for the requested validation mode. With `validate` off
   * nothing below this call is checked, custom serializers included.
   */
  public writeText(
    record: unknown,
    buffer: TextBuffer,
    prefix: string,
    validate: boolean,
  ): number {
    const custom = this.#customSerializer;
    if (custom) {
      if (record === null || record === undefined) {
        return custom(null, buffer, prefix);
      }
      if (!validate) {
        // Unchecked: the caller vouches for the record's shape.
        const written: unknown = Reflect.apply(custom, undefined, [
          record,
          buffer,
          prefix,
        ]);
        if (typeof written !== "number") {
          throw new TypeError(
            `Custom serializer of record type '${this.#name}' returned ${typeof written}`,
          );
        }
        return written;
      }
      if (!this.is(record)) {
        this.check(record, throwInvalidError, []);
        throwInvalidError([], record, this);
      }
      return custom(record, buffer, prefix);
    }

    if (record === null || record === undefined) {
      buffer.terminate(0);
      return 0;
    }
    if (!isRecordObject(record)) {
      throwInvalidError([], record, this);
    }
    const writer = this.#writerCache.getOrCreateWriter({
      fields: this.#ensureFields([]).map((field) => field.getDescriptor()),
      validate,
      recordType: this,
    });
    return writer(record, buffer, prefix);
  }

  /**
   * Returns the schema of this record. Nested record types are written out
   * in full the first time they appear and by name afterwards.
   */
  public override toJSON(): JSONType {
    return this.#toJSON(new Set());
  }

  #toJSON(seen: Set<object>): JSONType {
    seen.add(this);
    const fields = this.#ensureFields([]).map((field) => {
      const type = field.getType();
      let typeJson: JSONType;
      if (type instanceof RecordType) {
        typeJson = seen.has(type) ? type.getName() : type.#toJSON(seen);
      } else {
        typeJson = type.toJSON();
      }
      const fieldJson: { [key: string]: JSONType } = {
        name: field.getName(),
        type: typeJson,
      };
      const doc = field.getDoc();
      if (doc !== undefined) fieldJson.doc = doc;
      return fieldJson;
    });

    const json: { [key: string]: JSONType } = {
      type: "record",
      name: this.#name,
      fields,
    };
    if (this.#doc !== undefined) json.doc = this.#doc;
    return json;
  }

  /**
   * Resolves the field list on first use and rejects record types that
   * embed themselves. `trail` holds the field path walked so far, for the
   * error message.
   */
  #ensureFields(trail: string[]): RecordField[] {
    if (this.#fields) {
      return this.#fields;
    }
    if (this.#resolving) {
      throw new Error(
        `Record type '${this.#name}' embeds itself through field path: ${
          trail.join(" -> ")
        }`,
      );
    }

    this.#resolving = true;
    try {
      const params = typeof this.#fieldParams === "function"
        ? this.#fieldParams()
        : this.#fieldParams;
      const fields: RecordField[] = [];
      const nameToIndex = new Map<string, number>();
      for (const fieldParams of params) {
        const field = new RecordField(fieldParams);
        const name = field.getName();
        if (nameToIndex.has(name)) {
          throw new Error(
            `Duplicate field name '${name}' in record type '${this.#name}'`,
          );
        }
        nameToIndex.set(name, fields.length);
        fields.push(field);

        const type = field.getType();
        if (type instanceof RecordType) {
          type.#ensureFields([...trail, `${this.#name}.${name}`]);
        }
      }

      this.#fields = fields;
      this.#descriptors = fields.map((field) => field.getDescriptor());
      this.#fieldNameToIndex = nameToIndex;
      this.#writerCache.clear();
      return fields;
    } finally {
      this.#resolving = false;
    }
  }
}

/**
 * Options for {@link defineRecord}.
 */
export type DefineRecordOptions<T extends object> = Omit<
  RecordTypeParams<T>,
  "name" | "fields"
>;

/**
 * Declares a record type from a field list and infers its shape.
 *
 * @example
 * ```typescript
 * const Point = defineRecord("Point", [
 *   { name: "x", type: new IntType() },
 *   { name: "y", type: new IntType() },
 * ]);
 * Point.toText({ x: 10, y: 20 }, new TextBuffer(32), "p"); // "p.x=10 p.y=20"
 * ```
 */
export function defineRecord<const F extends readonly RecordFieldParams[]>(
  name: string,
  fields: F,
  options: DefineRecordOptions<InferRecord<F>> = {},
): RecordType<InferRecord<F>> {
  return new RecordType<InferRecord<F>>({ ...options, name, fields });
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export { isRecordType };
