import { PrimitiveType, type PrimitiveTypeOptions } from "./primitive_type.ts";
import type { JSONType } from "../type.ts";

/**
 * Options for {@link LongType}.
 */
export interface LongTypeOptions extends PrimitiveTypeOptions<bigint> {
  /** Radix of the rendered digits, 2 to 36. Defaults to 10. */
  radix?: number;
}

/**
 * Arbitrary-precision integer type backed by `bigint`.
 */
export class LongType extends PrimitiveType<bigint> {
  readonly #radix: number;

  constructor(options: LongTypeOptions = {}) {
    super(options);
    const { radix = 10 } = options;
    if (!Number.isInteger(radix) || radix < 2 || radix > 36) {
      throw new Error(`Invalid long radix: ${radix}`);
    }
    this.#radix = radix;
  }

  protected override accepts(value: unknown): value is bigint {
    return typeof value === "bigint";
  }

  protected override formatValue(value: bigint): string {
    return value.toString(this.#radix);
  }

  public override toJSON(): JSONType {
    return this.#radix === 10 ? "long" : { type: "long", radix: this.#radix };
  }
}
