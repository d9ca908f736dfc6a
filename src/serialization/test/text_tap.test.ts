import { describe, expect, it } from "vitest";
import { TextBuffer } from "../buffers/text_buffer.ts";
import { TextOverflow, WriteBufferError } from "../buffers/buffer_error.ts";
import { TextTap } from "../text_tap.ts";

describe("TextTap", () => {
  describe("writeFragment", () => {
    it("should write fragments and separators in sequence", () => {
      const buffer = new TextBuffer(8);
      const tap = new TextTap(buffer);
      expect(tap.writeFragment("abc")).toEqual({ success: true, data: 3 });
      expect(tap.writeSeparator()).toEqual({ success: true, data: 1 });
      expect(tap.writeFragment("def")).toEqual({ success: true, data: 3 });
      tap.terminate();
      expect(tap.getPos()).toBe(7);
      expect(buffer.toString()).toBe("abc def");
    });

    it("should keep a byte free for the terminator", () => {
      const buffer = new TextBuffer(8);
      const tap = new TextTap(buffer);
      const result = tap.writeFragment("abcdefgh");
      expect(result.success).toBe(false);
      expect(tap.getPos()).toBe(0);
      expect(buffer.length()).toBe(0);
      expect(tap.writeFragment("abcdefg").success).toBe(true);
    });

    it("should describe the overflow and build its error on demand", () => {
      const tap = new TextTap(new TextBuffer(8));
      tap.writeFragment("ab");
      const result = tap.writeFragment("abcdefgh");
      if (result.success) {
        throw new Error("expected an overflow");
      }
      expect(result.error).toEqual(new TextOverflow(2, 8, 8));
      const error = result.error.toError();
      expect(error).toBeInstanceOf(WriteBufferError);
      expect(error).toBeInstanceOf(RangeError);
      expect(error.offset).toBe(2);
      expect(error.dataSize).toBe(8);
      expect(error.bufferLength).toBe(8);
      expect(error.message).toBe(
        "Write exceeds text buffer capacity. offset=2, size=8, capacity=8",
      );
    });

    it("should refuse fragments containing NUL", () => {
      const buffer = new TextBuffer(8);
      const tap = new TextTap(buffer);
      expect(() => tap.writeFragment("a\u0000b")).toThrow(
        "Text fragment contains a NUL character at index 1",
      );
      expect(tap.getPos()).toBe(0);
    });

    it("should measure fragments in UTF-8 bytes", () => {
      const buffer = new TextBuffer(3);
      const tap = new TextTap(buffer);
      expect(tap.writeFragment("éé").success).toBe(false);
      expect(tap.writeFragment("é")).toEqual({ success: true, data: 2 });
      tap.terminate();
      expect(buffer.toString()).toBe("é");
    });
  });

  describe("writeSeparator", () => {
    it("should only need its own byte", () => {
      const tap = new TextTap(new TextBuffer(2));
      tap.writeFragment("a");
      expect(tap.writeSeparator().success).toBe(true);
      expect(tap.remaining()).toBe(0);
      expect(tap.writeSeparator().success).toBe(false);
    });
  });

  describe("writeRegion", () => {
    it("should advance by the length the writer reports", () => {
      const buffer = new TextBuffer(16);
      const tap = new TextTap(buffer);
      tap.writeFragment("ab");
      const result = tap.writeRegion((region) => {
        expect(region.capacity()).toBe(14);
        const inner = new TextTap(region);
        inner.writeFragment("xyz");
        inner.terminate();
        return inner.getPos();
      });
      expect(result).toEqual({ success: true, data: 3 });
      expect(tap.getPos()).toBe(5);
      expect(buffer.toString()).toBe("abxyz");
    });

    it("should report a negative length as an overflow", () => {
      const tap = new TextTap(new TextBuffer(16));
      tap.writeFragment("ab");
      expect(tap.writeRegion(() => -1).success).toBe(false);
      expect(tap.getPos()).toBe(2);
    });
  });

  describe("rewind", () => {
    it("should move the offset back", () => {
      const buffer = new TextBuffer(8);
      const tap = new TextTap(buffer);
      tap.writeFragment("abc");
      tap.writeSeparator();
      tap.rewind(3);
      tap.terminate();
      expect(buffer.toString()).toBe("abc");
    });

    it("should refuse to move forward or below zero", () => {
      const tap = new TextTap(new TextBuffer(8));
      tap.writeFragment("ab");
      expect(() => tap.rewind(5)).toThrow(
        "Cannot rewind to 5; current position is 2",
      );
      expect(() => tap.rewind(-1)).toThrow(RangeError);
    });
  });
});
