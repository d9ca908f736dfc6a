import { PrimitiveType, type PrimitiveTypeOptions } from "./primitive_type.ts";
import type { JSONType } from "../type.ts";

/**
 * Options for {@link DoubleType}.
 */
export interface DoubleTypeOptions extends PrimitiveTypeOptions<number> {
  /** Digits after the decimal point, like `%.2f`. Unset renders the shortest form. */
  precision?: number;
}

/**
 * Double precision floating point type.
 */
export class DoubleType extends PrimitiveType<number> {
  readonly #precision?: number;

  constructor(options: DoubleTypeOptions = {}) {
    super(options);
    const { precision } = options;
    if (
      precision !== undefined &&
      (!Number.isInteger(precision) || precision < 0 || precision > 100)
    ) {
      throw new Error(`Invalid double precision: ${precision}`);
    }
    this.#precision = precision;
  }

  protected override accepts(value: unknown): value is number {
    return typeof value === "number";
  }

  protected override formatValue(value: number): string {
    if (this.#precision === undefined || !Number.isFinite(value)) {
      return String(value);
    }
    return value.toFixed(this.#precision);
  }

  public override toJSON(): JSONType {
    return this.#precision === undefined
      ? "double"
      : { type: "double", precision: this.#precision };
  }
}
