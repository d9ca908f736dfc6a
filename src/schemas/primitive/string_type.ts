import { PrimitiveType, type PrimitiveTypeOptions } from "./primitive_type.ts";
import type { JSONType } from "../type.ts";

/**
 * Options for {@link StringType}.
 */
export interface StringTypeOptions extends PrimitiveTypeOptions<string> {
  /** Wrap the value in double quotes. */
  quote?: boolean;
  /** Backslash-escape `"`, `\` and NUL (as `\0`) in the value. */
  escape?: boolean;
}

/**
 * Escapes double quotes and backslashes with a backslash, and NUL as `\0`.
 */
export function escapeText(value: string): string {
  return value.replace(
    /["\\\0]/g,
    (char) => char === "\0" ? "\\0" : `\\${char}`,
  );
}

/**
 * String type. Values are written verbatim unless the field declares
 * `escape` or `quote`. Strings containing NUL are rejected: NUL terminates
 * the text held by a buffer.
 */
export class StringType extends PrimitiveType<string> {
  readonly #quote: boolean;
  readonly #escape: boolean;

  constructor(options: StringTypeOptions = {}) {
    super(options);
    this.#quote = options.quote ?? false;
    this.#escape = options.escape ?? false;
  }

  protected override accepts(value: unknown): value is string {
    return typeof value === "string" && !value.includes("\0");
  }

  protected override formatValue(value: string): string {
    const text = this.#escape ? escapeText(value) : value;
    return this.#quote ? `"${text}"` : text;
  }

  public override toJSON(): JSONType {
    if (!this.#quote && !this.#escape) {
      return "string";
    }
    const json: { [key: string]: JSONType } = { type: "string" };
    if (this.#quote) json.quote = true;
    if (this.#escape) json.escape = true;
    return json;
  }
}
