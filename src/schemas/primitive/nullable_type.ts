import { PrimitiveType } from "./primitive_type.ts";
import type { JSONType } from "../type.ts";

/**
 * Options for {@link NullableType}.
 */
export interface NullableTypeOptions {
  /** Text rendered for `null`. Defaults to `null`. */
  nullText?: string;
}

/**
 * Wraps a primitive type so that the field also accepts `null`, the
 * equivalent of an absent text handle.
 */
export class NullableType<T> extends PrimitiveType<T | null> {
  readonly #inner: PrimitiveType<T>;
  readonly #nullText: string;

  constructor(inner: PrimitiveType<T>, options: NullableTypeOptions = {}) {
    super({ validate: inner.getValidate() });
    this.#inner = inner;
    this.#nullText = options.nullText ?? "null";
  }

  /** Returns the wrapped type. */
  public getInner(): PrimitiveType<T> {
    return this.#inner;
  }

  protected override accepts(value: unknown): value is T | null {
    return value === null || this.#inner.isValid(value);
  }

  protected override formatValue(value: T | null): string {
    return value === null ? this.#nullText : this.#inner.format(value);
  }

  public override toJSON(): JSONType {
    const json: { [key: string]: JSONType } = {
      type: "nullable",
      of: this.#inner.toJSON(),
    };
    if (this.#nullText !== "null") json.nullText = this.#nullText;
    return json;
  }
}
