import { decode } from "../text_encoding.ts";

/**
 * Caller-owned, fixed-capacity region of UTF-8 text.
 *
 * The buffer never grows. Writers place a NUL terminator after the last
 * byte they keep, so the text held by the buffer always ends at the first
 * NUL (or at the end of the region when the capacity is exhausted).
 *
 * Key features:
 * - Fixed size: the capacity is set at construction and includes the
 *   terminator, so a buffer of capacity `n` holds at most `n - 1` bytes of
 *   text.
 * - Shared regions: {@link region} returns a view over the tail of the same
 *   memory, which is how nested records write in place.
 * - Zero capacity: a buffer of capacity 0 is valid and is never written.
 *
 * @example
 * ```typescript
 * const buffer = new TextBuffer(64);
 * Point.toText({ x: 10, y: 20 }, buffer, "p");
 * buffer.toString(); // "p.x=10 p.y=20"
 * ```
 */
export class TextBuffer {
  readonly #view: Uint8Array;

  /**
   * Creates a text buffer.
   * @param storage Either the capacity in bytes, or existing memory to write
   * into. Existing memory is used as-is and is not cleared.
   */
  constructor(storage: number | Uint8Array) {
    if (typeof storage === "number") {
      if (!Number.isInteger(storage) || storage < 0) {
        throw new RangeError(
          `Text buffer capacity must be a non-negative integer. Got ${storage}`,
        );
      }
      this.#view = new Uint8Array(storage);
    } else {
      this.#view = storage;
    }
  }

  /** Returns the capacity in bytes, terminator included. */
  public capacity(): number {
    return this.#view.length;
  }

  /** Returns the underlying bytes. */
  public bytes(): Uint8Array {
    return this.#view;
  }

  /**
   * Returns a buffer over the bytes from `offset` to the end of this one.
   * Writes through the returned buffer land in this buffer's memory.
   * Offsets past the end yield a buffer of capacity 0.
   */
  public region(offset: number): TextBuffer {
    const start = Math.min(Math.max(offset, 0), this.#view.length);
    return new TextBuffer(this.#view.subarray(start));
  }

  /**
   * Writes the terminator at `offset`, or in the last byte when `offset` is
   * at or past the end. Does nothing on a zero-capacity buffer.
   */
  public terminate(offset: number): void {
    const capacity = this.#view.length;
    if (capacity === 0) {
      return;
    }
    this.#view[Math.min(Math.max(offset, 0), capacity - 1)] = 0;
  }

  /** Returns the number of text bytes before the terminator. */
  public length(): number {
    const end = this.#view.indexOf(0);
    return end === -1 ? this.#view.length : end;
  }

  /** Decodes the text held by the buffer. */
  public toString(): string {
    return decode(this.#view.subarray(0, this.length()));
  }
}
