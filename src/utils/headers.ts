/**
 * Header utilities for HTTP/1.1.
 * HeaderMap keeps insertion order and multiple values per name, and looks
 * names up case-insensitively (RFC 9110 Section 5.1).
 */

const INVALID_HEADER_CHAR_RE = /[\r\n\0]/;

// RFC 7230 3.2.6. Field Value Components: token = 1*tchar
// tchar = "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." / "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

/** Headers input accepted by the public API. */
export type HeadersInit =
  | HeaderMap
  | Record<string, string | readonly string[]>
  | ReadonlyArray<readonly [string, string]>;

/**
 * Order-preserving, case-insensitive header multimap.
 * The first spelling of a name is kept for serialization.
 */
export class HeaderMap implements Iterable<[string, string]> {
  private entries_: Array<[string, string]> = [];

  constructor(init?: HeadersInit) {
    if (!init) return;
    if (init instanceof HeaderMap) {
      this.entries_ = init.entries_.map(([k, v]) => [k, v]);
      return;
    }
    if (isTupleList(init)) {
      for (const entry of init) {
        const candidate: unknown = entry;
        if (!isHeaderTuple(candidate)) {
          throw new TypeError(
            `Invalid header entry: expected [string, string], got ${JSON.stringify(candidate)}`,
          );
        }
        this.append(candidate[0], candidate[1]);
      }
      return;
    }
    for (const [key, value] of Object.entries(init)) {
      if (typeof value === "string") {
        this.append(key, value);
      } else {
        for (const v of value) this.append(key, v);
      }
    }
  }

  /** Number of header lines (not distinct names) */
  get size(): number {
    return this.entries_.length;
  }

  has(name: string): boolean {
    const lower = name.toLowerCase();
    return this.entries_.some(([k]) => k.toLowerCase() === lower);
  }

  /**
   * Value of a header, multiple lines joined with ", " (RFC 9110 Section 5.3).
   * Returns null when absent.
   */
  get(name: string): string | null {
    const values = this.getAll(name);
    return values.length === 0 ? null : values.join(", ");
  }

  getAll(name: string): string[] {
    const lower = name.toLowerCase();
    return this.entries_.filter(([k]) => k.toLowerCase() === lower).map(([, v]) => v);
  }

  append(name: string, value: string): this {
    validateHeaderName(name);
    validateHeaderValue(name, value);
    this.entries_.push([name, value]);
    return this;
  }

  /** Replace every value of `name` with a single value, keeping its position. */
  set(name: string, value: string): this {
    validateHeaderName(name);
    validateHeaderValue(name, value);
    const lower = name.toLowerCase();
    const idx = this.entries_.findIndex(([k]) => k.toLowerCase() === lower);
    if (idx === -1) {
      this.entries_.push([name, value]);
      return this;
    }
    this.entries_[idx] = [this.entries_[idx][0], value];
    this.entries_ = this.entries_.filter(([k], i) => i === idx || k.toLowerCase() !== lower);
    return this;
  }

  delete(name: string): boolean {
    const lower = name.toLowerCase();
    const before = this.entries_.length;
    this.entries_ = this.entries_.filter(([k]) => k.toLowerCase() !== lower);
    return this.entries_.length !== before;
  }

  clone(): HeaderMap {
    return new HeaderMap(this);
  }

  /** Distinct lowercase names, in first-seen order */
  names(): string[] {
    return [...new Set(this.entries_.map(([k]) => k.toLowerCase()))];
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.entries_.map(([k, v]): [string, string] => [k, v])[Symbol.iterator]();
  }
}

function isTupleList(
  init: Exclude<HeadersInit, HeaderMap>,
): init is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(init);
}

function isHeaderTuple(value: unknown): value is readonly [string, string] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "string" &&
    typeof value[1] === "string"
  );
}

/**
 * Validate header name against RFC 7230 token characters.
 */
export function validateHeaderName(name: string): void {
  if (!TOKEN_RE.test(name)) {
    throw new TypeError(`Invalid header name: ${JSON.stringify(name)} contains invalid characters`);
  }
}

/**
 * Validate header value against CR/LF/NUL injection.
 */
export function validateHeaderValue(name: string, value: string): void {
  if (INVALID_HEADER_CHAR_RE.test(value)) {
    throw new TypeError(`Invalid header value for "${name}": contains CR/LF/NUL`);
  }
}

/**
 * Serialize headers into HTTP/1.1 format: "Key: Value\r\n"
 * Validates against header injection (CR/LF/NUL).
 */
export function serializeHttp1Headers(headers: HeaderMap | Record<string, string>): string {
  const entries = headers instanceof HeaderMap ? [...headers] : Object.entries(headers);
  let result = "";
  for (const [key, value] of entries) {
    validateHeaderName(key);
    validateHeaderValue(key, value);
    result += `${key}: ${value}\r\n`;
  }
  return result;
}

/**
 * Framing and hop-by-hop headers the engine writes itself; caller values are dropped.
 * Connection passes through so a caller can send `Connection: close`.
 */
const MANAGED_HEADERS = new Set([
  "host",
  "keep-alive",
  "transfer-encoding",
  "upgrade",
  "content-length",
]);

/**
 * Normalize user-supplied headers into a HeaderMap.
 * Strips framing and hop-by-hop headers that the engine sets per message.
 */
export function normalizeHeaders(headers?: HeadersInit): HeaderMap {
  const result = new HeaderMap();
  if (!headers) return result;
  for (const [key, value] of new HeaderMap(headers)) {
    if (MANAGED_HEADERS.has(key.toLowerCase())) continue;
    result.append(key, value);
  }
  return result;
}

/**
 * Validate HTTP method to prevent CRLF injection and ensure valid token characters.
 */
export function validateMethod(method: string): void {
  if (!TOKEN_RE.test(method)) {
    throw new TypeError(`Invalid method: ${JSON.stringify(method)} contains invalid characters`);
  }
}

// RFC 7230 3.1.1 request-target cannot contain whitespace (SP/HTAB) or CR/LF
const INVALID_PATH_RE = /[\r\n\s]/;

/**
 * Validate HTTP path to prevent Request Splitting and ensure valid request-target.
 */
export function validatePath(path: string): void {
  if (INVALID_PATH_RE.test(path)) {
    throw new TypeError(
      `Invalid path: ${JSON.stringify(path)} contains whitespace or control characters`,
    );
  }
}
