import { Writable } from "node:stream";
import type { DestinationStream } from "pino";

/**
 * Writable keeping everything written to it, for asserting on warnings.
 */
export class MemoryStream extends Writable {
  readonly chunks: string[] = [];

  constructor() {
    super({ decodeStrings: false });
  }

  public override _write(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(String(chunk));
    callback();
  }

  /** Returns everything written so far. */
  public text(): string {
    return this.chunks.join("");
  }
}

/**
 * pino destination collecting the entries it receives, parsed.
 */
export interface EntryCollector extends DestinationStream {
  entries: Record<string, unknown>[];
}

export function createEntryCollector(): EntryCollector {
  const entries: Record<string, unknown>[] = [];
  return {
    entries,
    write(msg: string) {
      const parsed: unknown = JSON.parse(msg);
      if (typeof parsed === "object" && parsed !== null) {
        entries.push({ ...parsed });
      }
    },
  };
}
