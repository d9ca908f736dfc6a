const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Checks if the given name is a valid record or field identifier.
 * @param name - The name to validate.
 * @returns True if the name is valid, false otherwise.
 */
export function isValidName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

/**
 * Builds the dotted name of a field under a prefix. An empty or missing
 * prefix yields the bare field name.
 *
 * @example
 * ```typescript
 * qualifyFieldName("line.start", "x"); // "line.start.x"
 * qualifyFieldName("", "x"); // "x"
 * ```
 */
export function qualifyFieldName(
  prefix: string | null | undefined,
  name: string,
): string {
  return prefix ? `${prefix}.${name}` : name;
}
