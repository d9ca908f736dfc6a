import { TextBuffer } from "../serialization/buffers/text_buffer.ts";
import { TEXT_OVERFLOW } from "../serialization/text_tap.ts";
import { qualifyFieldName } from "../schemas/complex/field_names.ts";
import type { FieldDescriptor } from "../schemas/complex/record_field.ts";
import type { RecordType } from "../schemas/complex/record_type.ts";
import { throwInvalidError } from "../schemas/error.ts";
import type { Type } from "../schemas/type.ts";
import type { DetailsParser, KeyValuePair } from "./key_value.ts";

/** Key of the pair produced for details no parser is registered for. */
export const UNKNOWN_DETAILS_KEY = "unknown_error_type";

/** Appended to the text of a record that did not fit its buffer. */
export const TRUNCATED_SUFFIX = "...(truncated)";

/**
 * Names the runtime kind of a value: its constructor name for objects, its
 * `typeof` otherwise.
 */
export function describeKind(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    const ctor: unknown = Reflect.get(value, "constructor");
    if (typeof ctor === "function" && ctor.name) {
      return ctor.name;
    }
    return "object";
  }
  return typeof value;
}

/**
 * Fallback parser for details of an unregistered type.
 *
 * @returns A single `unknown_error_type=unhandled_type_<kind>` pair, or no
 * pairs for `null` and `undefined`.
 */
export function parseUnknownDetails(details: unknown): KeyValuePair[] {
  if (details === null || details === undefined) {
    return [];
  }
  return [{
    key: UNKNOWN_DETAILS_KEY,
    value: `unhandled_type_${describeKind(details)}`,
  }];
}

/**
 * Creates a parser producing one pair per primitive leaf of the record.
 * Keys are the dotted field names (`start.x`), values the field type's
 * formatted text. Nested records that are `null` contribute nothing.
 */
export function createRecordParser<T extends object>(
  recordType: RecordType<T>,
): DetailsParser<T> {
  return (details) => {
    if (recordType.getValidate()) {
      recordType.check(details, throwInvalidError, []);
    }
    const pairs: KeyValuePair[] = [];
    collectPairs(recordType, details, "", pairs);
    return pairs;
  };
}

function collectPairs(
  recordType: Pick<RecordType, "getFields">,
  record: object,
  prefix: string,
  pairs: KeyValuePair[],
): void {
  const descriptors: FieldDescriptor[] = recordType.getFields().map((field) =>
    field.getDescriptor()
  );
  for (const descriptor of descriptors) {
    const key = qualifyFieldName(prefix, descriptor.name);
    const value: unknown = Reflect.get(record, descriptor.name);
    if (descriptor.kind === "primitive") {
      pairs.push({ key, value: descriptor.type.format(value) });
    } else if (typeof value === "object" && value !== null) {
      collectPairs(descriptor.type, value, key, pairs);
    }
  }
}

/**
 * Options for {@link createTextParser}.
 */
export interface TextParserOptions {
  /** Key of the produced pair. Defaults to `details`. */
  key?: string;
  /** Capacity of the text buffer, terminator included. Defaults to 512. */
  capacity?: number;
}

/**
 * Creates a parser producing a single pair whose value is the record's
 * `toText` rendering. When the text does not fit, the value is the
 * truncated text followed by `...(truncated)`.
 */
export function createTextParser<T extends object>(
  recordType: RecordType<T>,
  options: TextParserOptions = {},
): DetailsParser<T> {
  const key = options.key ?? "details";
  const capacity = options.capacity ?? 512;
  return (details) => {
    const buffer = new TextBuffer(capacity);
    const written = recordType.toText(details, buffer);
    const text = buffer.toString();
    if (written === TEXT_OVERFLOW) {
      return [{ key, value: `${text}${TRUNCATED_SUFFIX}` }];
    }
    return text.length > 0 ? [{ key, value: text }] : [];
  };
}

interface ParserEntry {
  type: Type;
  parse: DetailsParser<unknown>;
}

/**
 * Options for {@link ParserRegistry}.
 */
export interface ParserRegistryOptions {
  /** Parser for details no registered type accepts. */
  fallback?: DetailsParser<unknown>;
}

/**
 * Dispatches log details to the parser registered for their type.
 *
 * Types are tried in registration order; the first whose `isValid` accepts
 * the details wins. Details no type accepts go to the fallback parser
 * ({@link parseUnknownDetails} by default).
 *
 * @example
 * ```typescript
 * const parsers = new ParserRegistry()
 *   .registerRecord(FileError)
 *   .register(new StringType(), (s) => [{ key: "reason", value: s }]);
 * parsers.parse({ path: "/tmp/a", code: 2 });
 * ```
 */
export class ParserRegistry {
  #entries: ParserEntry[] = [];
  #fallback: DetailsParser<unknown>;

  constructor(options: ParserRegistryOptions = {}) {
    this.#fallback = options.fallback ?? parseUnknownDetails;
  }

  /**
   * Registers `parser` for the values `type` accepts.
   */
  public register<T>(type: Type<T>, parser: DetailsParser<T>): this {
    this.#entries.push({
      type,
      parse: (details) => {
        if (!type.is(details)) {
          throwInvalidError([], details, type);
        }
        return parser(details);
      },
    });
    return this;
  }

  /**
   * Registers a record type with its field-by-field parser.
   */
  public registerRecord<T extends object>(recordType: RecordType<T>): this {
    return this.register(recordType, createRecordParser(recordType));
  }

  /**
   * Registers a record type with its `toText` parser.
   */
  public registerText<T extends object>(
    recordType: RecordType<T>,
    options: TextParserOptions = {},
  ): this {
    return this.register(recordType, createTextParser(recordType, options));
  }

  /**
   * Returns the parser for `details`: the first registered one whose type
   * accepts them, or the fallback.
   */
  public resolve(details: unknown): DetailsParser<unknown> {
    for (const entry of this.#entries) {
      if (entry.type.isValid(details)) {
        return entry.parse;
      }
    }
    return this.#fallback;
  }

  /**
   * Parses `details` with the parser {@link resolve} picks. `null` and
   * `undefined` produce no pairs.
   */
  public parse(details: unknown): KeyValuePair[] {
    if (details === null || details === undefined) {
      return [];
    }
    return this.resolve(details)(details);
  }

  /** Returns the number of registered parsers. */
  public size(): number {
    return this.#entries.length;
  }
}
