/**
 * Response handed to the caller.
 * The body is a pull-based stream with decoding already attached; the
 * readers (`bytes`, `text`, `json`, …) consume it once.
 */
import { TextDecoder } from "node:util";
import { StatusError } from "./errors.js";
import type { HeaderMap } from "./utils/headers.js";

export interface HttpResponse {
  status: number;
  statusText: string;
  httpVersion: string;
  /** True for 2xx statuses */
  ok: boolean;
  headers: HeaderMap;
  /** Final URL after redirects */
  url: string;
  /** Whether at least one redirect was followed */
  redirected: boolean;
  /** Every URL requested, initial URL first */
  chain: readonly string[];
  body: ReadableStream<Uint8Array>;
  /** Whether a reader method has consumed the body */
  readonly bodyUsed: boolean;

  /** Read body as bytes */
  bytes(): Promise<Uint8Array>;
  /** Read body as ArrayBuffer */
  arrayBuffer(): Promise<ArrayBuffer>;
  /** Read body as text, using the Content-Type charset (UTF-8 by default) */
  text(): Promise<string>;
  /** Read body as JSON */
  json(): Promise<unknown>;
  /** Get all Set-Cookie header values as separate strings */
  getSetCookie(): string[];
  /** Discard the body; the connection is closed unless the body already ended */
  cancel(reason?: unknown): Promise<void>;
  /** Throw a StatusError for 4xx and 5xx statuses, otherwise return this response */
  errorForStatus(): HttpResponse;
}

export interface ResponseInit {
  status: number;
  statusText: string;
  httpVersion: string;
  headers: HeaderMap;
  url: string;
  chain: readonly string[];
  body: ReadableStream<Uint8Array>;
  /** Runs once when the body ends, errors or is cancelled */
  onSettled?: () => void;
}

/**
 * Wrap a ReadableStream so that cleanup runs automatically when the stream
 * finishes (done), is cancelled, or errors, regardless of whether the
 * consumer uses .text()/.json() or reads .body directly.
 */
export function createAutoCleanupStream(
  source: ReadableStream<Uint8Array>,
  onCleanup: () => void,
): ReadableStream<Uint8Array> {
  const reader = source.getReader();
  let cleaned = false;

  const doCleanup = () => {
    if (cleaned) return;
    cleaned = true;
    onCleanup();
  };

  return new ReadableStream<Uint8Array>(
    {
      async pull(controller) {
        try {
          const { done, value } = await reader.read();
          if (done) {
            controller.close();
            doCleanup();
          } else {
            controller.enqueue(value);
          }
        } catch (err) {
          controller.error(err);
          doCleanup();
        }
      },
      cancel(reason) {
        doCleanup();
        return reader.cancel(reason);
      },
    },
    { highWaterMark: 0 },
  );
}

/** Charset parameter of a Content-Type value */
export function charsetOf(contentType: string | null): string | null {
  if (!contentType) return null;
  const match = /;\s*charset\s*=\s*("?)([^";\s]+)\1/i.exec(contentType);
  return match ? match[2].toLowerCase() : null;
}

function decoderFor(contentType: string | null): TextDecoder {
  const charset = charsetOf(contentType);
  if (!charset) return new TextDecoder();
  try {
    return new TextDecoder(charset);
  } catch {
    // Unknown label
    return new TextDecoder();
  }
}

export function createResponse(init: ResponseInit): HttpResponse {
  const body = init.onSettled ? createAutoCleanupStream(init.body, init.onSettled) : init.body;
  let bodyConsumed = false;

  const consumeBody = async (): Promise<Uint8Array> => {
    if (bodyConsumed) throw new TypeError("Body already consumed");
    bodyConsumed = true;

    const reader = body.getReader();
    const chunks: Uint8Array[] = [];
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
    }

    if (chunks.length === 1) return chunks[0];
    const totalLength = chunks.reduce((sum, c) => sum + c.length, 0);
    const result = new Uint8Array(totalLength);
    let offset = 0;
    for (const chunk of chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  };

  const response: HttpResponse = {
    status: init.status,
    statusText: init.statusText,
    httpVersion: init.httpVersion,
    ok: init.status >= 200 && init.status < 300,
    headers: init.headers,
    url: init.url,
    redirected: init.chain.length > 1,
    chain: init.chain,
    body,
    get bodyUsed() {
      return bodyConsumed;
    },
    bytes: consumeBody,
    async arrayBuffer(): Promise<ArrayBuffer> {
      const bytes = await consumeBody();
      const buffer = new ArrayBuffer(bytes.byteLength);
      new Uint8Array(buffer).set(bytes);
      return buffer;
    },
    async text(): Promise<string> {
      const bytes = await consumeBody();
      return decoderFor(init.headers.get("content-type")).decode(bytes);
    },
    async json(): Promise<unknown> {
      const text = await response.text();
      return JSON.parse(text);
    },
    getSetCookie(): string[] {
      return init.headers.getAll("set-cookie");
    },
    async cancel(reason?: unknown): Promise<void> {
      bodyConsumed = true;
      await body.cancel(reason);
    },
    errorForStatus(): HttpResponse {
      if (init.status >= 400) throw new StatusError(init.status, init.statusText, init.url);
      return response;
    },
  };
  return response;
}
