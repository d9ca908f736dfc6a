import { escapeText } from "../schemas/primitive/string_type.ts";
import type { KeyValuePair } from "./key_value.ts";

/**
 * Combines the user message and the parsed pairs into one log line.
 * Returning `undefined` reports a formatting failure to the logger.
 */
export type LogFormatter = (
  message: string,
  pairs: readonly KeyValuePair[],
) => string | undefined;

/**
 * logfmt-style formatter: `message key1="value1" key2="value2"`.
 *
 * Values are quoted with `"` and `\` backslash-escaped. Pairs with an empty
 * key or value are skipped. No extra space is added after a message that
 * already ends with one.
 *
 * @example
 * ```typescript
 * formatLogfmt("open failed", [{ key: "path", value: "/tmp/a" }]);
 * // 'open failed path="/tmp/a"'
 * ```
 */
export const formatLogfmt: LogFormatter = (message, pairs) => {
  let line = message;
  for (const { key, value } of pairs) {
    if (!key || !value) {
      continue;
    }
    if (line.length > 0 && !line.endsWith(" ")) {
      line += " ";
    }
    line += `${key}="${escapeText(value)}"`;
  }
  return line;
};
