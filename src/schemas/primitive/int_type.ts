import { PrimitiveType, type PrimitiveTypeOptions } from "./primitive_type.ts";
import type { JSONType } from "../type.ts";

/**
 * Options for {@link IntType}.
 */
export interface IntTypeOptions extends PrimitiveTypeOptions<number> {
  /** Radix of the rendered digits, 2 to 36. Defaults to 10. */
  radix?: number;
  /**
   * Minimum rendered width, sign included. Shorter values are left-padded
   * with zeros after the sign, like `%05d`.
   */
  width?: number;
}

/**
 * Integer type accepting any safe integer.
 */
export class IntType extends PrimitiveType<number> {
  readonly #radix: number;
  readonly #width: number;

  /** Creates a new int type. */
  constructor(options: IntTypeOptions = {}) {
    super(options);
    const { radix = 10, width = 0 } = options;
    if (!Number.isInteger(radix) || radix < 2 || radix > 36) {
      throw new Error(`Invalid int radix: ${radix}`);
    }
    if (!Number.isInteger(width) || width < 0) {
      throw new Error(`Invalid int width: ${width}`);
    }
    this.#radix = radix;
    this.#width = width;
  }

  protected override accepts(value: unknown): value is number {
    return typeof value === "number" && Number.isSafeInteger(value);
  }

  protected override formatValue(value: number): string {
    const negative = value < 0;
    let digits = Math.abs(value).toString(this.#radix);
    if (this.#width > 0) {
      digits = digits.padStart(this.#width - (negative ? 1 : 0), "0");
    }
    return negative ? `-${digits}` : digits;
  }

  public override toJSON(): JSONType {
    if (this.#radix === 10 && this.#width === 0) {
      return "int";
    }
    const json: { [key: string]: JSONType } = { type: "int" };
    if (this.#radix !== 10) json.radix = this.#radix;
    if (this.#width !== 0) json.width = this.#width;
    return json;
  }
}
