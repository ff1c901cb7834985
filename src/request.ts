/**
 * Request value handed to the engine.
 *
 * Bodies are either buffered (replayable on redirect) or a single-use stream.
 * The redirect engine consults the tag instead of re-reading the stream.
 */
import { HeaderMap, normalizeHeaders, validateMethod, type HeadersInit } from "./utils/headers.js";
import { parseUrl } from "./utils/url.js";

export type RequestBody =
  | { readonly kind: "buffered"; readonly bytes: Uint8Array }
  | {
      readonly kind: "streaming";
      readonly stream: ReadableStream<Uint8Array>;
      /** Declared byte length; chunked transfer-coding is used when absent */
      readonly length?: number;
    };

export interface HttpRequest {
  readonly method: string;
  /** Absolute http(s) URL */
  readonly url: string;
  readonly headers: HeaderMap;
  readonly body: RequestBody | null;
  /** Total timeout override for this request (ms) */
  readonly timeout?: number;
  readonly signal?: AbortSignal;
}

export type BodyInit = Uint8Array | string | ReadableStream<Uint8Array> | RequestBody;

export interface RequestInit {
  method?: string;
  headers?: HeadersInit;
  body?: BodyInit | null;
  /** Byte length of a ReadableStream body, when known */
  bodyLength?: number;
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Build an HttpRequest from loose options.
 * String bodies default to `text/plain;charset=UTF-8`.
 */
export function createRequest(url: string | URL, init: RequestInit = {}): HttpRequest {
  const method = (init.method ?? "GET").toUpperCase();
  validateMethod(method);
  const href = parseUrl(url).href;
  const headers = normalizeHeaders(init.headers);

  if (typeof init.body === "string" && !headers.has("content-type")) {
    headers.set("content-type", "text/plain;charset=UTF-8");
  }

  return {
    method,
    url: href,
    headers,
    body: toRequestBody(init.body, init.bodyLength),
    timeout: init.timeout,
    signal: init.signal,
  };
}

export function bufferedBody(data: Uint8Array | string): RequestBody {
  return {
    kind: "buffered",
    bytes: typeof data === "string" ? new TextEncoder().encode(data) : data,
  };
}

export function streamingBody(stream: ReadableStream<Uint8Array>, length?: number): RequestBody {
  if (stream.locked) {
    throw new TypeError("ReadableStream body is already locked");
  }
  if (length !== undefined && (!Number.isInteger(length) || length < 0)) {
    throw new TypeError(`Invalid body length: ${length}`);
  }
  return { kind: "streaming", stream, length };
}

export function isReplayable(body: RequestBody | null): boolean {
  return body === null || body.kind === "buffered";
}

/** Byte length when known up front */
export function bodyLength(body: RequestBody): number | undefined {
  return body.kind === "buffered" ? body.bytes.byteLength : body.length;
}

function toRequestBody(body: BodyInit | null | undefined, length?: number): RequestBody | null {
  if (body === null || body === undefined) return null;
  if (typeof body === "string" || body instanceof Uint8Array) return bufferedBody(body);
  if (body instanceof ReadableStream) return streamingBody(body, length);
  return body;
}
