function stringifyObject(obj: unknown): string | undefined {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === "bigint") return `${value}n`;
    if (typeof value === "object" && value !== null) {
      if (seen.has(value)) return "[Circular]";
      seen.add(value);
    }
    return value;
  });
}

/**
 * Renders any value for an error message. Scalars print as-is; objects print
 * as compact JSON with circular references and bigints made printable.
 */
export function safeStringify(value: unknown): string {
  if (
    typeof value === "string" || typeof value === "number" ||
    typeof value === "boolean" || value === null || value === undefined
  ) {
    return String(value);
  }
  if (typeof value === "bigint") {
    return `${value}n`;
  }
  if (typeof value === "function" || typeof value === "symbol") {
    return String(value);
  }
  return stringifyObject(value) ?? String(value);
}
