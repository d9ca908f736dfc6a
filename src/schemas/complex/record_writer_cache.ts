import type {
  CompiledFieldWriter,
  CompiledTextWriter,
  RecordWriterContext,
  RecordWriterStrategy,
} from "./record_writer_strategy.ts";
import { defaultWriterStrategy } from "./record_writer_strategy.ts";

/**
 * Cache for compiled record text writers.
 *
 * Holds one writer per validation mode. Record nesting is acyclic, so a
 * writer never needs itself while it is being compiled.
 */
export class RecordWriterCache {
  #strictWriter?: CompiledTextWriter;
  #uncheckedWriter?: CompiledTextWriter;
  #strategy: RecordWriterStrategy;

  /**
   * Creates a new RecordWriterCache.
   * @param strategy The writer strategy to use for compilation.
   */
  constructor(strategy: RecordWriterStrategy = defaultWriterStrategy) {
    this.#strategy = strategy;
  }

  /**
   * Gets the writer strategy.
   */
  public getStrategy(): RecordWriterStrategy {
    return this.#strategy;
  }

  /**
   * Clears all cached writers.
   */
  public clear(): void {
    this.#strictWriter = undefined;
    this.#uncheckedWriter = undefined;
  }

  /**
   * Gets or creates the compiled writer for `context.validate`.
   * @param context The record writer context.
   * @returns The compiled writer function.
   */
  public getOrCreateWriter(context: RecordWriterContext): CompiledTextWriter {
    const cached = context.validate
      ? this.#strictWriter
      : this.#uncheckedWriter;
    if (cached) {
      return cached;
    }

    const fieldWriters: CompiledFieldWriter[] = context.fields.map((field) =>
      this.#strategy.compileFieldWriter(field, context.validate)
    );
    const writer = this.#strategy.assembleRecordWriter(context, fieldWriters);

    if (context.validate) {
      this.#strictWriter = writer;
    } else {
      this.#uncheckedWriter = writer;
    }
    return writer;
  }
}
