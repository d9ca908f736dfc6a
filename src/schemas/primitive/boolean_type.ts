import { PrimitiveType, type PrimitiveTypeOptions } from "./primitive_type.ts";
import type { JSONType } from "../type.ts";

/**
 * Boolean type, rendered as `true` or `false`.
 */
export class BooleanType extends PrimitiveType<boolean> {
  constructor(options: PrimitiveTypeOptions<boolean> = {}) {
    super(options);
  }

  protected override accepts(value: unknown): value is boolean {
    return typeof value === "boolean";
  }

  protected override formatValue(value: boolean): string {
    return value ? "true" : "false";
  }

  /**
   * Returns the JSON representation of the boolean type.
   */
  public override toJSON(): JSONType {
    return "boolean";
  }
}
