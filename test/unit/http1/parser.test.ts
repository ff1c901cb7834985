import { describe, it, expect } from "vitest";
import { Buffer } from "node:buffer";
import { parseResponseHead, ResponseParseError } from "../../../src/http1/parser.js";

function parse(head: string, method?: string) {
  return parseResponseHead(Buffer.from(head, "latin1"), { method });
}

describe("parseResponseHead", () => {
  it("returns null until the blank line arrives", () => {
    expect(parse("HTTP/1.1 200 OK\r\nContent-Length: 2\r\n")).toBeNull();
  });

  it("parses the status line and headers in order", () => {
    const result = parse(
      "HTTP/1.1 200 OK\r\nContent-Length: 5\r\nSet-Cookie: a=1\r\nSet-Cookie: b=2\r\n\r\nhello",
    );
    if (!result) throw new Error("expected a complete head");
    const { response, bodyStart } = result;
    expect(response.status).toBe(200);
    expect(response.statusText).toBe("OK");
    expect(response.httpVersion).toBe("1.1");
    expect(response.headers.getAll("set-cookie")).toEqual(["a=1", "b=2"]);
    expect(response.bodyMode).toBe("content-length");
    expect(response.contentLength).toBe(5);
    expect(response.keepAlive).toBe(true);
    expect(bodyStart).toBe(72);
  });

  it("accepts a status line without a reason phrase", () => {
    const result = parse("HTTP/1.1 204\r\n\r\n");
    expect(result?.response.statusText).toBe("");
    expect(result?.response.bodyMode).toBe("none");
  });

  it("never expects a body for HEAD, 1xx, 204 or 304", () => {
    expect(parse("HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\n", "HEAD")?.response.bodyMode).toBe(
      "none",
    );
    expect(parse("HTTP/1.1 100 Continue\r\n\r\n")?.response.bodyMode).toBe("none");
    expect(parse("HTTP/1.1 304 Not Modified\r\nContent-Length: 10\r\n\r\n")?.response.bodyMode).toBe(
      "none",
    );
  });

  it("lets Transfer-Encoding win over Content-Length", () => {
    const result = parse(
      "HTTP/1.1 200 OK\r\nContent-Length: 10\r\nTransfer-Encoding: gzip, chunked\r\n\r\n",
    );
    expect(result?.response.bodyMode).toBe("chunked");
  });

  it("reads until close for a non-chunked Transfer-Encoding", () => {
    const result = parse("HTTP/1.1 200 OK\r\nTransfer-Encoding: gzip\r\n\r\n");
    expect(result?.response.bodyMode).toBe("close");
    expect(result?.response.keepAlive).toBe(false);
  });

  it("reads until close without any framing header", () => {
    expect(parse("HTTP/1.1 200 OK\r\n\r\n")?.response.bodyMode).toBe("close");
  });

  it("treats Content-Length: 0 as no body", () => {
    const result = parse("HTTP/1.1 302 Found\r\nLocation: /next\r\nContent-Length: 0\r\n\r\n");
    expect(result?.response.bodyMode).toBe("none");
    expect(result?.response.keepAlive).toBe(true);
  });

  it("accepts repeated identical Content-Length values", () => {
    const result = parse("HTTP/1.1 200 OK\r\nContent-Length: 3, 3\r\nContent-Length: 3\r\n\r\n");
    expect(result?.response.contentLength).toBe(3);
  });

  it("rejects conflicting Content-Length values", () => {
    expect(() => parse("HTTP/1.1 200 OK\r\nContent-Length: 3\r\nContent-Length: 4\r\n\r\n")).toThrow(
      "Conflicting Content-Length values: 3, 4",
    );
  });

  it("rejects a non-numeric Content-Length", () => {
    expect(() => parse("HTTP/1.1 200 OK\r\nContent-Length: -1\r\n\r\n")).toThrow(
      'Invalid Content-Length: "-1"',
    );
  });

  it("honours Connection: close", () => {
    const result = parse("HTTP/1.1 200 OK\r\nConnection: close\r\nContent-Length: 0\r\n\r\n");
    expect(result?.response.keepAlive).toBe(false);
  });

  it("keeps HTTP/1.0 alive only with Connection: keep-alive", () => {
    expect(parse("HTTP/1.0 200 OK\r\nContent-Length: 0\r\n\r\n")?.response.keepAlive).toBe(false);
    expect(
      parse("HTTP/1.0 200 OK\r\nConnection: keep-alive\r\nContent-Length: 0\r\n\r\n")?.response
        .keepAlive,
    ).toBe(true);
  });

  it("rejects garbage before the head is complete", () => {
    expect(() => parse("SSH-2.0-OpenSSH")).toThrow(ResponseParseError);
    expect(() => parse("SSH-2.0-OpenSSH")).toThrow("Invalid HTTP response: missing status line");
  });

  it("rejects a malformed status line", () => {
    expect(() => parse("HTTP/1.1 2000 OK\r\n\r\n")).toThrow('Invalid status line: "HTTP/1.1 2000 OK"');
  });

  it("rejects header lines without a name", () => {
    expect(() => parse("HTTP/1.1 200 OK\r\n: value\r\n\r\n")).toThrow('Invalid header line: ": value"');
  });

  it("rejects header names with separators", () => {
    expect(() => parse("HTTP/1.1 200 OK\r\nbad name: v\r\n\r\n")).toThrow(
      'Invalid header name: "bad name"',
    );
  });
});
