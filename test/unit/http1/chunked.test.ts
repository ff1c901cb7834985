import { describe, it, expect } from "vitest";
import { Buffer } from "node:buffer";
import { ChunkedDecoder } from "../../../src/http1/chunked.js";

function decodeAll(decoder: ChunkedDecoder): string {
  return Buffer.concat(decoder.getChunks()).toString("latin1");
}

describe("ChunkedDecoder", () => {
  it("decodes several chunks in one feed", () => {
    const decoder = new ChunkedDecoder();
    decoder.feed(Buffer.from("4\r\nhop-\r\n4\r\nline\r\n0\r\n\r\n"));

    expect(decodeAll(decoder)).toBe("hop-line");
    expect(decoder.done).toBe(true);
    expect(decoder.remainder.length).toBe(0);
  });

  it("hands out partial chunk data before the chunk is complete", () => {
    const decoder = new ChunkedDecoder();
    decoder.feed(Buffer.from("a\r\n0123"));
    expect(decodeAll(decoder)).toBe("0123");
    expect(decoder.done).toBe(false);

    decoder.feed(Buffer.from("456789\r\n0\r\n\r\n"));
    expect(decodeAll(decoder)).toBe("456789");
    expect(decoder.done).toBe(true);
  });

  it("waits for a size line split across feeds", () => {
    const decoder = new ChunkedDecoder();
    decoder.feed(Buffer.from("1"));
    decoder.feed(Buffer.from("0;name=value\r\n"));
    decoder.feed(Buffer.from("sixteen bytes!!!\r\n0\r\n\r\n"));

    expect(decodeAll(decoder)).toBe("sixteen bytes!!!");
    expect(decoder.done).toBe(true);
  });

  it("waits for the CRLF after chunk data when it arrives split", () => {
    const decoder = new ChunkedDecoder();
    decoder.feed(Buffer.from("2\r\nok\r"));
    expect(decodeAll(decoder)).toBe("ok");
    decoder.feed(Buffer.from("\n0\r\n\r\n"));
    expect(decoder.done).toBe(true);
  });

  it("discards trailer fields", () => {
    const decoder = new ChunkedDecoder();
    decoder.feed(Buffer.from("3\r\nabc\r\n0\r\nx-checksum: 1234\r\nx-other: y\r\n\r\n"));

    expect(decodeAll(decoder)).toBe("abc");
    expect(decoder.done).toBe(true);
  });

  it("keeps bytes after the terminating blank line as remainder", () => {
    const decoder = new ChunkedDecoder();
    decoder.feed(Buffer.from("0\r\n\r\nHTTP/1.1"));

    expect(decoder.done).toBe(true);
    expect(decoder.remainder.toString("latin1")).toBe("HTTP/1.1");
  });

  it("reports no remainder before the body is done", () => {
    const decoder = new ChunkedDecoder();
    decoder.feed(Buffer.from("5\r\nab"));
    expect(decoder.remainder.length).toBe(0);
  });

  it("rejects a non-hex size", () => {
    const decoder = new ChunkedDecoder();
    expect(() => decoder.feed(Buffer.from("zz\r\n"))).toThrow('Invalid chunk size: "zz"');
  });

  it("rejects missing CRLF after chunk data", () => {
    const decoder = new ChunkedDecoder();
    expect(() => decoder.feed(Buffer.from("2\r\nokXX0\r\n\r\n"))).toThrow(
      "Expected CRLF after chunk data",
    );
  });

  it("rejects chunks over 16MB", () => {
    const decoder = new ChunkedDecoder();
    expect(() => decoder.feed(Buffer.from("1000001\r\n"))).toThrow(
      "Chunk size too large: 16777217",
    );
  });

  it("rejects an unterminated size line over 8KB", () => {
    const decoder = new ChunkedDecoder();
    expect(() => decoder.feed(Buffer.alloc(8193, "1"))).toThrow("Chunk header line too long");
  });
});
