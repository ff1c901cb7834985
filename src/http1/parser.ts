/**
 * HTTP/1.1 response parser.
 * Parses the status line and header block, then decides how the body is framed.
 */
import { Buffer } from "node:buffer";
import { HeaderMap } from "../utils/headers.js";

export interface ParsedResponse {
  httpVersion: string;
  status: number;
  statusText: string;
  headers: HeaderMap;
  /** How the body should be read */
  bodyMode: "none" | "content-length" | "chunked" | "close";
  /** Content-Length value (if bodyMode is "content-length") */
  contentLength: number;
  /** Whether the server allows the connection to be reused */
  keepAlive: boolean;
}

export interface ParseOptions {
  /** Request method; HEAD responses never carry a body */
  method?: string;
}

/** Thrown for responses that cannot be HTTP/1.x framing. */
export class ResponseParseError extends Error {
  override name = "ResponseParseError";
}

const DOUBLE_CRLF = Buffer.from("\r\n\r\n");
const STATUS_LINE_RE = /^HTTP\/(\d)\.(\d) (\d{3})(?: (.*))?$/;
const HEADER_NAME_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

/**
 * Parse HTTP/1.1 response status line and headers from raw data.
 * Returns null if not enough data has been received yet; throws
 * ResponseParseError when the head is malformed.
 */
export function parseResponseHead(
  data: Buffer,
  options: ParseOptions = {},
): {
  response: ParsedResponse;
  bodyStart: number;
} | null {
  const headerEnd = data.indexOf(DOUBLE_CRLF);
  if (headerEnd === -1) {
    // Reject garbage early instead of waiting for a blank line that never comes
    if (data.length >= 5 && data.subarray(0, 5).toString("latin1") !== "HTTP/") {
      throw new ResponseParseError("Invalid HTTP response: missing status line");
    }
    return null;
  }

  const headSection = data.subarray(0, headerEnd).toString("latin1");
  const bodyStart = headerEnd + 4; // skip \r\n\r\n

  const lines = headSection.split("\r\n");

  // Parse status line: "HTTP/1.1 200 OK"
  const match = STATUS_LINE_RE.exec(lines[0]);
  if (!match) {
    throw new ResponseParseError(`Invalid status line: ${JSON.stringify(lines[0].slice(0, 64))}`);
  }
  const httpVersion = `${match[1]}.${match[2]}`;
  const status = parseInt(match[3], 10);
  const statusText = match[4] ?? "";

  const headers = new HeaderMap();
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (line === "") continue;
    const colonIdx = line.indexOf(":");
    if (colonIdx <= 0) {
      throw new ResponseParseError(`Invalid header line: ${JSON.stringify(line.slice(0, 64))}`);
    }
    const key = line.substring(0, colonIdx);
    if (!HEADER_NAME_RE.test(key)) {
      throw new ResponseParseError(`Invalid header name: ${JSON.stringify(key)}`);
    }
    headers.append(key, line.substring(colonIdx + 1).trim());
  }

  const { bodyMode, contentLength } = decideBodyMode(status, headers, options.method);

  const connection = (headers.get("connection") ?? "").toLowerCase();
  const keepAlive =
    bodyMode !== "close" &&
    !connection.includes("close") &&
    (httpVersion === "1.1" || connection.includes("keep-alive"));

  return {
    response: {
      httpVersion,
      status,
      statusText,
      headers,
      bodyMode,
      contentLength,
      keepAlive,
    },
    bodyStart,
  };
}

function decideBodyMode(
  status: number,
  headers: HeaderMap,
  method: string | undefined,
): { bodyMode: ParsedResponse["bodyMode"]; contentLength: number } {
  // RFC 9112 Section 6.3: these never have a body regardless of framing headers
  if (method?.toUpperCase() === "HEAD" || status === 204 || status === 304 || status < 200) {
    return { bodyMode: "none", contentLength: 0 };
  }

  const transferEncoding = headers.get("transfer-encoding");
  if (transferEncoding !== null) {
    // RFC 7230 Section 3.3.3: Transfer-Encoding takes precedence over Content-Length
    const codings = transferEncoding.toLowerCase().split(",");
    if (codings[codings.length - 1].trim() === "chunked") {
      return { bodyMode: "chunked", contentLength: 0 };
    }
    // Non-chunked Transfer-Encoding: read until connection closes
    return { bodyMode: "close", contentLength: 0 };
  }

  const lengths = headers.getAll("content-length");
  if (lengths.length > 0) {
    const distinct = new Set(lengths.flatMap(v => v.split(",")).map(v => v.trim()));
    if (distinct.size !== 1) {
      throw new ResponseParseError(`Conflicting Content-Length values: ${lengths.join(", ")}`);
    }
    const [value] = distinct;
    if (!/^\d+$/.test(value)) {
      throw new ResponseParseError(`Invalid Content-Length: ${JSON.stringify(value)}`);
    }
    const cl = parseInt(value, 10);
    return cl === 0
      ? { bodyMode: "none", contentLength: 0 }
      : { bodyMode: "content-length", contentLength: cl };
  }

  return { bodyMode: "close", contentLength: 0 };
}
