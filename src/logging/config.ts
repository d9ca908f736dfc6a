import type { Writable } from "node:stream";
import type { LevelWithSilent, Logger } from "pino";
import { createDiagnostics, diagnosticsLevelFromEnv } from "./diagnostics.ts";
import { formatLogfmt, type LogFormatter } from "./formatters.ts";
import { ParserRegistry } from "./parsers.ts";
import { createStreamSink, type LogSink } from "./sinks.ts";

/** Default byte limit of the formatted user message. */
export const DEFAULT_MESSAGE_LIMIT = 1024;

/** Environment variable overriding the default message limit. */
export const MESSAGE_LIMIT_ENV_VAR = "FIELDLOG_MESSAGE_LIMIT";

const DIAGNOSTICS_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

/**
 * Configuration of a {@link StructuredLogger}. Every setting is optional.
 */
export interface LoggerConfig {
  /** Turns the message and the pairs into a line. Defaults to logfmt. */
  formatter?: LogFormatter;
  /**
   * Delivers formatted lines. Defaults to a stream sink over
   * {@link fallbackStream}.
   */
  sink?: LogSink;
  /**
   * Stream receiving the logger's own warnings, such as a formatter
   * failure. Defaults to standard error.
   */
  fallbackStream?: Writable;
  /** Parsers for structured details. Defaults to an empty registry. */
  parsers?: ParserRegistry;
  /**
   * Byte limit of the formatted user message; longer messages are cut and
   * marked. Defaults to {@link DEFAULT_MESSAGE_LIMIT}, or the value of
   * {@link MESSAGE_LIMIT_ENV_VAR} when set.
   */
  messageLimit?: number;
  /** The library's own logger. Built from {@link diagnosticsLevel} if unset. */
  diagnostics?: Logger;
  /** Level of the library's own logger. Defaults to the environment. */
  diagnosticsLevel?: LevelWithSilent;
}

/**
 * A configuration with every default filled in.
 */
export interface ResolvedLoggerConfig {
  formatter: LogFormatter;
  sink: LogSink;
  fallbackStream: Writable;
  parsers: ParserRegistry;
  messageLimit: number;
  diagnostics: Logger;
}

/**
 * Error thrown for an invalid logger configuration.
 */
export class LoggerConfigError extends Error {
  /** The offending setting. */
  public readonly setting: string;

  constructor(setting: string, message: string) {
    super(`Invalid logger setting "${setting}": ${message}`);
    this.name = "LoggerConfigError";
    this.setting = setting;
  }
}

/**
 * Validates `config` and fills in the defaults.
 *
 * @param config The caller's configuration.
 * @param env Environment consulted for {@link MESSAGE_LIMIT_ENV_VAR} and the
 * diagnostics level.
 * @throws LoggerConfigError when a setting has the wrong shape.
 */
export function resolveLoggerConfig(
  config: LoggerConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedLoggerConfig {
  if (config.formatter !== undefined && typeof config.formatter !== "function") {
    throw new LoggerConfigError("formatter", "expected a function");
  }
  if (config.sink !== undefined && typeof config.sink !== "function") {
    throw new LoggerConfigError("sink", "expected a function");
  }
  if (
    config.parsers !== undefined && !(config.parsers instanceof ParserRegistry)
  ) {
    throw new LoggerConfigError("parsers", "expected a ParserRegistry");
  }

  const messageLimit = config.messageLimit ?? messageLimitFromEnv(env);
  if (!Number.isInteger(messageLimit) || messageLimit <= 0) {
    throw new LoggerConfigError(
      "messageLimit",
      `expected a positive integer, got ${messageLimit}`,
    );
  }

  const level = config.diagnosticsLevel;
  if (level !== undefined && !DIAGNOSTICS_LEVELS.includes(level)) {
    throw new LoggerConfigError(
      "diagnosticsLevel",
      `expected one of ${DIAGNOSTICS_LEVELS.join(", ")}, got ${level}`,
    );
  }

  const fallbackStream = config.fallbackStream ?? process.stderr;
  return {
    formatter: config.formatter ?? formatLogfmt,
    sink: config.sink ?? createStreamSink(fallbackStream),
    fallbackStream,
    parsers: config.parsers ?? new ParserRegistry(),
    messageLimit,
    diagnostics: config.diagnostics ??
      createDiagnostics({ level: level ?? diagnosticsLevelFromEnv(env) }),
  };
}

function messageLimitFromEnv(env: NodeJS.ProcessEnv): number {
  const raw = env[MESSAGE_LIMIT_ENV_VAR];
  if (raw === undefined || raw === "") {
    return DEFAULT_MESSAGE_LIMIT;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new LoggerConfigError(
      "messageLimit",
      `${MESSAGE_LIMIT_ENV_VAR} must be a positive integer, got ${raw}`,
    );
  }
  return parsed;
}
