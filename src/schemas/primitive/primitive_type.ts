import { Type } from "../type.ts";
import { type ErrorHook, throwInvalidError } from "../error.ts";

/**
 * Options shared by every primitive type.
 */
export interface PrimitiveTypeOptions<T> {
  /** Whether values are checked before they are formatted. Defaults to true. */
  validate?: boolean;
  /**
   * Replaces the type's own rendering. The function receives values that
   * already passed validation (when validation is on).
   */
  format?: (value: T) => string;
}

/**
 * Abstract base class for primitive field types.
 *
 * A primitive type is the format spec of a PRIMITIVE-kind field: it decides
 * which values the field accepts and how a value is rendered after the
 * `name=` part of the field's fragment.
 */
export abstract class PrimitiveType<T = unknown> extends Type<T> {
  readonly #customFormat?: (value: T) => string;

  /** Creates a new primitive type. */
  constructor(options: PrimitiveTypeOptions<T> = {}) {
    super(options.validate ?? true);
    this.#customFormat = options.format;
  }

  /**
   * Renders a value as text. No validation is performed.
   */
  public format(value: T): string {
    return this.#customFormat
      ? this.#customFormat(value)
      : this.formatValue(value);
  }

  public override getKind(): "primitive" {
    return "primitive";
  }

  /** Returns true if a custom format function replaces the default one. */
  public hasCustomFormat(): boolean {
    return this.#customFormat !== undefined;
  }

  public override check(
    value: unknown,
    errorHook?: ErrorHook,
    path: string[] = [],
  ): boolean {
    const isValid = this.accepts(value);
    if (!isValid && errorHook) {
      errorHook(path, value, this);
    }
    return isValid;
  }

  /**
   * Clones a primitive value (primitives are immutable).
   */
  public override cloneFromValue(value: unknown): T {
    if (!this.accepts(value)) {
      throwInvalidError([], value, this);
    }
    return value;
  }

  /** Type guard for the values this type accepts. */
  protected abstract accepts(value: unknown): value is T;

  /** The built-in rendering of a value. */
  protected abstract formatValue(value: T): string;
}
