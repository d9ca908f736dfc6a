import type { TextBuffer } from "../../serialization/buffers/text_buffer.ts";
import {
  TEXT_OVERFLOW,
  TextTap,
  type WriteResult,
} from "../../serialization/text_tap.ts";
import { throwInvalidError } from "../error.ts";
import type { Type } from "../type.ts";
import { qualifyFieldName } from "./field_names.ts";
import type { FieldDescriptor } from "./record_field.ts";

/**
 * Compiled record writer: renders a record (already known to be an object)
 * into the buffer under the given name prefix. Returns the byte length
 * written or `TEXT_OVERFLOW`.
 */
export type CompiledTextWriter = (
  record: object,
  buffer: TextBuffer,
  prefix: string,
) => number;

/**
 * Compiled writer for one field. `fullName` is the field's dotted name
 * (or, for a nested record, the prefix its own fields are written under).
 */
export type CompiledFieldWriter = (
  tap: TextTap,
  value: unknown,
  fullName: string,
) => WriteResult;

/**
 * Context passed to strategy methods for assembling record writers.
 */
export interface RecordWriterContext {
  /** Field descriptors in declaration order. */
  fields: FieldDescriptor[];
  /** Whether field values are checked while writing. */
  validate: boolean;
  /** Reference to the parent record type for error reporting. */
  recordType: Type;
}

/**
 * Strategy interface for compiling record text writers.
 *
 * Implementations can choose different approaches:
 * - CompiledWriterStrategy: Inlines primitive formatting and precomputes
 *   unprefixed field names.
 * - InterpretedWriterStrategy: Asks the field types for everything on
 *   every write.
 *
 * Every strategy must produce identical text for the same input.
 */
export interface RecordWriterStrategy {
  /**
   * Compiles a writer for a single field.
   * @param field The field descriptor.
   * @param validate Whether to validate values.
   */
  compileFieldWriter(
    field: FieldDescriptor,
    validate: boolean,
  ): CompiledFieldWriter;

  /**
   * Assembles field writers into a complete record writer.
   * @param context The record writer context.
   * @param fieldWriters Pre-compiled writers for each field.
   */
  assembleRecordWriter(
    context: RecordWriterContext,
    fieldWriters: CompiledFieldWriter[],
  ): CompiledTextWriter;
}

/**
 * Writes the fields of one record in order, separated by single spaces.
 *
 * The running offset lives in the tap. A field that does not fit aborts the
 * whole record: the buffer is terminated at the current offset, which keeps
 * every field written so far and the separator after the last of them. A
 * nested record that renders nothing gives back the separator written for
 * it.
 *
 * A field is checked only when both the record and the field's own type
 * validate. Nested records are embedded by value, so a checked nested field
 * must not be `null`.
 */
export function writeFields(
  tap: TextTap,
  record: object,
  names: string[],
  fullName: (index: number) => string,
  fieldWriters: CompiledFieldWriter[],
): number {
  for (let i = 0; i < fieldWriters.length; i++) {
    const start = tap.getPos();
    if (start > 0 && !tap.writeSeparator().success) {
      tap.terminate();
      return TEXT_OVERFLOW;
    }
    const value: unknown = Reflect.get(record, names[i]);
    const result = fieldWriters[i](tap, value, fullName(i));
    if (!result.success) {
      tap.terminate();
      return TEXT_OVERFLOW;
    }
    if (result.data === 0) {
      tap.rewind(start);
    }
  }
  tap.terminate();
  return tap.getPos();
}

/**
 * Compiled writer strategy, the default.
 *
 * Field names under an empty prefix are computed once per record type, the
 * validation branch is resolved at compile time and primitive fields call
 * their type's `format` directly.
 */
export class CompiledWriterStrategy implements RecordWriterStrategy {
  public compileFieldWriter(
    field: FieldDescriptor,
    validate: boolean,
  ): CompiledFieldWriter {
    if (field.kind === "struct") {
      const nested = field.type;
      const checked = validate && nested.getValidate();
      return (tap, value, fullName) => {
        if (checked && (value === null || value === undefined)) {
          throwInvalidError([fullName], value, nested);
        }
        return tap.writeRegion((region) =>
          nested.writeText(value, region, fullName, checked)
        );
      };
    }

    const type = field.type;
    if (!validate || !type.getValidate()) {
      return (tap, value, fullName) =>
        tap.writeFragment(`${fullName}=${type.format(value)}`);
    }
    return (tap, value, fullName) => {
      if (!type.check(value)) {
        throwInvalidError([fullName], value, type);
      }
      return tap.writeFragment(`${fullName}=${type.format(value)}`);
    };
  }

  public assembleRecordWriter(
    context: RecordWriterContext,
    fieldWriters: CompiledFieldWriter[],
  ): CompiledTextWriter {
    const names = context.fields.map((field) => field.name);
    const bareName = (index: number) => names[index];

    return (record, buffer, prefix) => {
      const fullName = prefix
        ? (index: number) => `${prefix}.${names[index]}`
        : bareName;
      return writeFields(
        new TextTap(buffer),
        record,
        names,
        fullName,
        fieldWriters,
      );
    };
  }
}

/**
 * Interpreted writer strategy that delegates to the field types on every
 * write.
 *
 * This strategy is useful for:
 * - Debugging and testing
 * - Checking the compiled strategy against a plain reference
 */
export class InterpretedWriterStrategy implements RecordWriterStrategy {
  public compileFieldWriter(
    field: FieldDescriptor,
    validate: boolean,
  ): CompiledFieldWriter {
    return (tap, value, fullName) => {
      const checked = validate && field.type.getValidate();
      if (field.kind === "struct") {
        if (checked && (value === null || value === undefined)) {
          throwInvalidError([fullName], value, field.type);
        }
        return tap.writeRegion((region) =>
          field.type.writeText(value, region, fullName, checked)
        );
      }
      if (checked && !field.type.check(value)) {
        throwInvalidError([fullName], value, field.type);
      }
      return tap.writeFragment(`${fullName}=${field.type.format(value)}`);
    };
  }

  public assembleRecordWriter(
    context: RecordWriterContext,
    fieldWriters: CompiledFieldWriter[],
  ): CompiledTextWriter {
    const names = context.fields.map((field) => field.name);
    return (record, buffer, prefix) =>
      writeFields(
        new TextTap(buffer),
        record,
        names,
        (index) => qualifyFieldName(prefix, names[index]),
        fieldWriters,
      );
  }
}

/**
 * Default writer strategy instance.
 */
export const defaultWriterStrategy: RecordWriterStrategy =
  new CompiledWriterStrategy();
