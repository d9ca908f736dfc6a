import { format } from "node:util";
import { decode, encodeAt, utf8ByteLength } from "../serialization/text_encoding.ts";
import {
  type LoggerConfig,
  resolveLoggerConfig,
  type ResolvedLoggerConfig,
} from "./config.ts";
import type { KeyValuePair } from "./key_value.ts";
import { describeKind, type ParserRegistry } from "./parsers.ts";

/** Appended to a user message cut at the message limit. */
export const MESSAGE_TRUNCATED_SUFFIX = "...(msg_truncated)";

const WARNING_PREFIX = "[StructuredLogger Warning]";

/**
 * Cuts `message` to at most `limit` UTF-8 bytes, never inside a character,
 * and appends {@link MESSAGE_TRUNCATED_SUFFIX} when anything was cut.
 */
export function truncateMessage(message: string, limit: number): string {
  if (utf8ByteLength(message) <= limit) {
    return message;
  }
  const bytes = new Uint8Array(limit);
  const written = encodeAt(bytes, 0, message);
  return `${decode(bytes.subarray(0, written))}${MESSAGE_TRUNCATED_SUFFIX}`;
}

/**
 * Error logger combining a printf-style message with structured details.
 *
 * Each call parses the details into key/value pairs through the configured
 * {@link ParserRegistry}, formats the message, hands both to the formatter
 * and delivers the resulting line to the sink.
 *
 * @example
 * ```typescript
 * const logger = new StructuredLogger({
 *   parsers: new ParserRegistry().registerRecord(FileError),
 * });
 * logger.error({ path: "/etc/app.conf", code: 13 }, "open failed after %d tries", 3);
 * // open failed after 3 tries path="/etc/app.conf" code="13"
 * ```
 */
export class StructuredLogger {
  readonly #config: ResolvedLoggerConfig;

  /**
   * @param config Logger settings; see {@link LoggerConfig}.
   * @param env Environment used for the defaults.
   * @throws LoggerConfigError when the configuration is invalid.
   */
  constructor(config: LoggerConfig = {}, env: NodeJS.ProcessEnv = process.env) {
    this.#config = resolveLoggerConfig(config, env);
    this.#config.diagnostics.debug(
      {
        messageLimit: this.#config.messageLimit,
        formatter: this.#config.formatter.name || "anonymous",
        sink: this.#config.sink.name || "anonymous",
        parsers: this.#config.parsers.size(),
      },
      "structured logger initialized",
    );
  }

  /** Returns the registry used to parse details. */
  public getParsers(): ParserRegistry {
    return this.#config.parsers;
  }

  /** Returns the byte limit of the formatted user message. */
  public getMessageLimit(): number {
    return this.#config.messageLimit;
  }

  /**
   * Logs an error.
   *
   * @param details Structured details, or `null`/`undefined` for none.
   * @param message A `util.format` format string.
   * @param args Values for the format string.
   */
  public error(details: unknown, message: string, ...args: unknown[]): void {
    const hasDetails = details !== null && details !== undefined;
    const pairs = hasDetails ? this.#parseDetails(details) : [];
    const userMessage = truncateMessage(
      format(message, ...args),
      this.#config.messageLimit,
    );

    const line = this.#formatLine(userMessage, pairs);
    if (line === undefined) {
      this.#warn(`Formatter failed. Raw user message: ${userMessage}`);
      if (hasDetails && pairs.length === 0) {
        this.#warn(
          `Parsing of error details might have also failed for details of type ${
            describeKind(details)
          }.`,
        );
      }
      return;
    }

    this.#config.sink(line);
  }

  #parseDetails(details: unknown): KeyValuePair[] {
    try {
      return this.#config.parsers.parse(details);
    } catch (error) {
      this.#config.diagnostics.debug(
        { err: error, kind: describeKind(details) },
        "details parser failed",
      );
      return [];
    }
  }

  #formatLine(
    message: string,
    pairs: readonly KeyValuePair[],
  ): string | undefined {
    try {
      return this.#config.formatter(message, pairs);
    } catch (error) {
      this.#config.diagnostics.debug({ err: error }, "formatter failed");
      return undefined;
    }
  }

  #warn(text: string): void {
    this.#config.fallbackStream.write(`${WARNING_PREFIX} ${text}\n`);
  }
}
