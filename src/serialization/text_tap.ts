import { err, ok, type Result } from "../internal/result.ts";
import { TextOverflow } from "./buffers/buffer_error.ts";
import type { TextBuffer } from "./buffers/text_buffer.ts";
import { encodeAt, utf8ByteLength } from "./text_encoding.ts";

/**
 * Outcome of a tap write: the number of bytes written, or the overflow.
 */
export type WriteResult = Result<number, TextOverflow>;

/**
 * Value returned by `toText` when the output does not fit in the buffer.
 */
export const TEXT_OVERFLOW = -1;

/**
 * Sequential writer over a {@link TextBuffer}.
 *
 * Every write is atomic: a fragment is copied in full or the buffer is left
 * untouched and an error result is returned. The tap never writes outside
 * the buffer and always keeps a byte free for the terminator after a
 * fragment.
 */
export class TextTap {
  readonly #buffer: TextBuffer;
  readonly #view: Uint8Array;
  #pos = 0;

  constructor(buffer: TextBuffer) {
    this.#buffer = buffer;
    this.#view = buffer.bytes();
  }

  /** Returns the current write offset. */
  public getPos(): number {
    return this.#pos;
  }

  /** Returns the number of bytes left before the end of the buffer. */
  public remaining(): number {
    return this.#view.length - this.#pos;
  }

  /**
   * Writes the single space that separates two fields.
   * The separator only needs its own byte; the fragment that follows is
   * responsible for leaving room for the terminator.
   */
  public writeSeparator(): WriteResult {
    if (this.#pos >= this.#view.length) {
      return err(this.#overflow(1));
    }
    this.#view[this.#pos++] = 0x20;
    return ok(1);
  }

  /**
   * Writes a complete fragment, provided the fragment and a terminator fit.
   *
   * @throws RangeError when `text` contains a NUL character, which would end
   * the buffer's text early.
   */
  public writeFragment(text: string): WriteResult {
    const nul = text.indexOf("\0");
    if (nul !== -1) {
      throw new RangeError(
        `Text fragment contains a NUL character at index ${nul}`,
      );
    }
    const size = utf8ByteLength(text);
    if (this.#pos + size >= this.#view.length) {
      return err(this.#overflow(size));
    }
    const written = encodeAt(this.#view, this.#pos, text);
    this.#pos += written;
    return ok(written);
  }

  /**
   * Hands the rest of the buffer to `writer` and advances by the length it
   * reports. A negative length is an overflow and leaves the offset alone.
   */
  public writeRegion(writer: (region: TextBuffer) => number): WriteResult {
    const written = writer(this.#buffer.region(this.#pos));
    if (written < 0) {
      return err(this.#overflow(this.remaining()));
    }
    this.#pos += written;
    return ok(written);
  }

  /** Moves the write offset back to `pos`. */
  public rewind(pos: number): void {
    if (pos < 0 || pos > this.#pos) {
      throw new RangeError(
        `Cannot rewind to ${pos}; current position is ${this.#pos}`,
      );
    }
    this.#pos = pos;
  }

  /** Terminates the buffer at the current offset. */
  public terminate(): void {
    this.#buffer.terminate(this.#pos);
  }

  #overflow(size: number): TextOverflow {
    return new TextOverflow(this.#pos, size, this.#view.length);
  }
}
