// Example: attach a typed record to error log lines.
import type { Writable } from "node:stream";
import {
  createStreamSink,
  defineRecord,
  IntType,
  ParserRegistry,
  StringType,
  StructuredLogger,
} from "../src/mod.ts";

export const FileError = defineRecord("FileError", [
  { name: "path", type: new StringType() },
  { name: "code", type: new IntType() },
]);

/**
 * Creates a logger writing logfmt lines to `stream`, with `FileError`
 * details expanded into `path` and `code` pairs.
 */
export function createFileErrorLogger(
  stream: Writable,
  env: NodeJS.ProcessEnv = process.env,
): StructuredLogger {
  return new StructuredLogger({
    sink: createStreamSink(stream),
    fallbackStream: stream,
    parsers: new ParserRegistry().registerRecord(FileError),
  }, env);
}
