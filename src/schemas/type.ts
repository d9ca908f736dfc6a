import type { ErrorHook } from "./error.ts";

/**
 * Options for validation, including an optional error hook.
 */
export type IsValidOptions = { errorHook?: ErrorHook };

/**
 * Classification of a field: formatted directly, or a nested record.
 */
export type FieldKind = "primitive" | "struct";

/**
 * Represents a JSON value used in schema definitions.
 */
export type JSONType =
  | string
  | number
  | boolean
  | null
  | { [key: string]: JSONType }
  | JSONType[];

/**
 * Abstract base class for every field type.
 *
 * A field type knows which runtime values it accepts and how to describe
 * itself as a schema. Primitive types add text formatting on top; record
 * types add field lists and the `toText` writer.
 */
export abstract class Type<T = unknown> {
  protected readonly validateWrites: boolean;

  protected constructor(validate = true) {
    this.validateWrites = validate;
  }

  /**
   * Returns whether values are checked before they are serialized.
   */
  public getValidate(): boolean {
    return this.validateWrites;
  }

  /**
   * Validates if a value conforms to the schema.
   * @param value The value to validate.
   * @param opts Optional validation options.
   * @returns True if valid, false otherwise.
   */
  public isValid(value: unknown, opts?: IsValidOptions): boolean {
    return this.check(value, opts?.errorHook, []);
  }

  /**
   * Type guard form of {@link isValid}.
   */
  public is(value: unknown): value is T {
    return this.check(value);
  }

  /**
   * Returns the kind of fields declared with this type: `struct` for record
   * types, `primitive` for everything formatted directly.
   */
  public abstract getKind(): FieldKind;

  /**
   * Checks if a value is valid according to the schema.
   * @param value The value to check.
   * @param errorHook Called with the path of every invalid value found.
   * @param path Current path in the schema for error reporting.
   */
  public abstract check(
    value: unknown,
    errorHook?: ErrorHook,
    path?: string[],
  ): boolean;

  /**
   * Creates a validated copy of the value.
   */
  public abstract cloneFromValue(value: unknown): T;

  /**
   * Returns the JSON schema representation.
   */
  public abstract toJSON(): JSONType;
}

/**
 * Extracts the value type a field type accepts.
 */
export type ValueOf<F> = F extends Type<infer T> ? T : never;
