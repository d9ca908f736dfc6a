/**
 * UTF-8 helpers shared by the text buffer and the primitive formatters.
 *
 * Fragments are measured with {@link utf8ByteLength} before they are written
 * so that a write either lands completely or not at all.
 */
const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Returns the number of bytes needed to encode a string as UTF-8.
 *
 * This is equivalent to `encoder.encode(input).length` but avoids allocating
 * a `Uint8Array`.
 */
export function utf8ByteLength(input: string): number {
  let length = 0;

  for (let index = 0; index < input.length; index++) {
    const codeUnit = input.charCodeAt(index);

    if (codeUnit < 0x80) {
      length += 1;
      continue;
    }

    if (codeUnit < 0x800) {
      length += 2;
      continue;
    }

    if (codeUnit >= 0xd800 && codeUnit <= 0xdbff) {
      const nextCodeUnit = input.charCodeAt(index + 1);
      if (nextCodeUnit >= 0xdc00 && nextCodeUnit <= 0xdfff) {
        // Surrogate pair, code point >= 0x10000.
        length += 4;
        index++;
        continue;
      }
      // Unpaired high surrogate; TextEncoder emits U+FFFD.
      length += 3;
      continue;
    }

    length += 3;
  }

  return length;
}

/**
 * Encodes `input` into `target` starting at `offset`.
 * The caller must have checked that the encoded text fits.
 * @returns The number of bytes written.
 */
export function encodeAt(
  target: Uint8Array,
  offset: number,
  input: string,
): number {
  return encoder.encodeInto(input, target.subarray(offset)).written;
}

/**
 * Decodes a Uint8Array into a string using UTF-8 encoding.
 */
export const decode = (bytes: Uint8Array): string => decoder.decode(bytes);
