import type { Type } from "./type.ts";
import { safeStringify } from "./json.ts";

/**
 * Hook function for handling validation errors.
 */
export type ErrorHook = (
  path: string[],
  invalidValue: unknown,
  schemaType: Type,
) => void;

/**
 * Error thrown when a value does not match its field type.
 */
export class ValidationError extends Error {
  /** The field path to the invalid value. */
  public readonly path: string[];
  /** The value that failed validation. */
  public readonly value: unknown;
  /** The type that rejected the value. */
  public readonly type: Type;

  /**
   * Creates a new ValidationError.
   * @param path The field path to the invalid value.
   * @param invalidValue The invalid value.
   * @param schemaType The type that rejected it.
   */
  constructor(path: string[], invalidValue: unknown, schemaType: Type) {
    const serializedValue = safeStringify(invalidValue);
    const serializedJSON = safeStringify(schemaType.toJSON());
    let message =
      `Invalid value: '${serializedValue}' for type: ${serializedJSON}`;
    if (path.length > 0) {
      message += ` at path: ${path.join(".")}`;
    }
    super(message);
    this.name = "ValidationError";
    this.path = path;
    this.value = invalidValue;
    this.type = schemaType;
  }
}

/**
 * Throws a ValidationError for invalid values. Usable as an {@link ErrorHook}.
 */
export function throwInvalidError(
  path: string[],
  invalidValue: unknown,
  schemaType: Type,
): never {
  throw new ValidationError(path, invalidValue, schemaType);
}
