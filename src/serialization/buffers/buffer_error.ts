/**
 * Errors and overflow records of text buffer operations.
 *
 * The `toText` path never throws for capacity: a failed fragment write is
 * reported as a {@link TextOverflow} and surfaces to callers as
 * `TEXT_OVERFLOW`.
 */

/** Error describing a write that does not fit in a text buffer. */
export class WriteBufferError extends RangeError {
  /** The offset where the write operation failed. */
  public readonly offset: number;
  /** The size in bytes of the data being written. */
  public readonly dataSize: number;
  /** The capacity of the buffer, terminator included. */
  public readonly bufferLength: number;

  constructor(
    message: string,
    offset: number,
    dataSize: number,
    bufferLength: number,
  ) {
    super(message);
    this.name = "WriteBufferError";
    this.offset = offset;
    this.dataSize = dataSize;
    this.bufferLength = bufferLength;
  }
}

/**
 * A write that did not fit. Plain data; call {@link toError} for a
 * throwable {@link WriteBufferError}.
 */
export class TextOverflow {
  /** The offset where the write operation failed. */
  public readonly offset: number;
  /** The size in bytes of the data being written. */
  public readonly dataSize: number;
  /** The capacity of the buffer, terminator included. */
  public readonly bufferLength: number;

  constructor(offset: number, dataSize: number, bufferLength: number) {
    this.offset = offset;
    this.dataSize = dataSize;
    this.bufferLength = bufferLength;
  }

  public toError(): WriteBufferError {
    return new WriteBufferError(
      `Write exceeds text buffer capacity. offset=${this.offset}, size=${this.dataSize}, capacity=${this.bufferLength}`,
      this.offset,
      this.dataSize,
      this.bufferLength,
    );
  }
}
