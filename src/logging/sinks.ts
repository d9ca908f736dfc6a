import type { Writable } from "node:stream";
import pino, { type Level, type Logger } from "pino";

/**
 * Delivers one formatted log line.
 */
export type LogSink = (line: string) => void;

/**
 * A sink backed by a file descriptor that must be released.
 */
export type FileSink = LogSink & {
  /** Flushes pending output to the file. */
  flush(): void;
  /** Closes the file. The sink must not be used afterwards. */
  close(): void;
};

/**
 * Creates a sink writing each line, followed by a newline, to `stream`.
 * Defaults to the process's standard error.
 */
export function createStreamSink(
  stream: Writable = process.stderr,
): LogSink {
  return (line) => {
    stream.write(`${line}\n`);
  };
}

/**
 * Options for {@link createFileSink}.
 */
export interface FileSinkOptions {
  /** Create missing parent directories. Defaults to true. */
  mkdir?: boolean;
  /** Append to an existing file instead of truncating it. Defaults to true. */
  append?: boolean;
}

/**
 * Creates a sink appending lines to the file at `path`.
 *
 * Writes go through a synchronous pino destination, so every line is on
 * disk when the sink returns.
 */
export function createFileSink(
  path: string,
  options: FileSinkOptions = {},
): FileSink {
  const destination = pino.destination({
    dest: path,
    sync: true,
    append: options.append ?? true,
    mkdir: options.mkdir ?? true,
  });
  const sink: LogSink = (line) => {
    destination.write(`${line}\n`);
  };
  return Object.assign(sink, {
    flush: () => destination.flushSync(),
    close: () => destination.end(),
  });
}

/**
 * Creates a sink forwarding each line as the message of a pino log entry at
 * `level` (default `error`).
 */
export function createPinoSink(
  logger: Logger,
  level: Level = "error",
): LogSink {
  return (line) => {
    logger[level](line);
  };
}
