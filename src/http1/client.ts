/**
 * HTTP/1.1 exchange over a connected socket.
 * Writes one request and parses one response. The response body streams with
 * backpressure (the socket is paused while the body queue is full), and
 * `settled` reports whether the socket was left at a clean message boundary
 * so the caller can keep it alive for the next request.
 */
import { Buffer } from "node:buffer";
import type { Duplex } from "node:stream";
import { BodyError, ConnectError, ProtocolError, TimeoutError, errorMessage } from "../errors.js";
import { bodyLength, type RequestBody } from "../request.js";
import {
  HeaderMap,
  serializeHttp1Headers,
  validateMethod,
  validatePath,
} from "../utils/headers.js";
import { parseResponseHead, ResponseParseError, type ParsedResponse } from "./parser.js";
import { ChunkedDecoder } from "./chunked.js";

export interface Http1Request {
  method: string;
  /** Origin-form path, or absolute-form URL when talking to a forward proxy */
  target: string;
  /** Full URL, used for error context */
  url: string;
  headers: HeaderMap;
  body?: RequestBody | null;
  signal?: AbortSignal;
  /** Timeout waiting for response headers (ms) */
  headersTimeout?: number;
  /** Timeout waiting for response body data (ms) */
  bodyTimeout?: number;
}

export type ConnectionOutcome = "reusable" | "closed";

export interface Http1Response {
  status: number;
  statusText: string;
  httpVersion: string;
  headers: HeaderMap;
  /** False for HEAD, 204, 304 and zero-length responses */
  hasBody: boolean;
  body: ReadableStream<Uint8Array>;
  /** Resolves once the exchange is over and the socket is either reusable or destroyed */
  settled: Promise<ConnectionOutcome>;
}

/** Limit header size to 80KB to prevent memory exhaustion */
const MAX_HEAD_SIZE = 81920;

const METHODS_WITH_BODY = new Set(["POST", "PUT", "PATCH"]);

/**
 * Send an HTTP/1.1 request over a socket and return the response.
 * Response listeners are attached before the first byte is written, so an
 * early response from the server is never missed.
 */
export async function http1Request(socket: Duplex, request: Http1Request): Promise<Http1Response> {
  if (request.signal?.aborted) {
    throw request.signal.reason ?? new DOMException("Aborted", "AbortError");
  }

  const method = request.method.toUpperCase();
  validateMethod(method);
  validatePath(request.target);

  const reqHeaders = request.headers.clone();
  const body = request.body ?? null;
  const length = body === null ? undefined : bodyLength(body);
  if (body === null) {
    if (METHODS_WITH_BODY.has(method)) reqHeaders.set("content-length", "0");
  } else if (length !== undefined) {
    reqHeaders.set("content-length", String(length));
  } else {
    // Streaming body of unknown length: chunked transfer encoding
    reqHeaders.set("transfer-encoding", "chunked");
  }

  const requestLine = `${method} ${request.target} HTTP/1.1\r\n`;
  const head = `${requestLine + serializeHttp1Headers(reqHeaders)}\r\n`;
  const wantsClose = (reqHeaders.get("connection") ?? "").toLowerCase().includes("close");

  const exchange = readResponse(socket, request, method, wantsClose);
  const write = writeRequest(socket, Buffer.from(head, "latin1"), body).catch((err: unknown) => {
    const error =
      err instanceof ConnectError || isAbortReason(err, request.signal)
        ? err
        : new ConnectError(`Failed to send request: ${errorMessage(err)}`, {
            url: request.url,
            phase: "send",
            cause: err,
          });
    exchange.fail(error);
    throw error;
  });

  const [, response] = await Promise.all([write, exchange.response]);
  return response;
}

function isAbortReason(err: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true && err === signal.reason;
}

async function writeRequest(socket: Duplex, head: Buffer, body: RequestBody | null): Promise<void> {
  if (body === null) {
    await writeToSocket(socket, head);
    return;
  }
  if (body.kind === "buffered") {
    // Small bodies go out in the same write as the head
    await writeToSocket(
      socket,
      body.bytes.byteLength <= 16384 ? Buffer.concat([head, body.bytes]) : head,
    );
    if (body.bytes.byteLength > 16384) await writeToSocket(socket, Buffer.from(body.bytes));
    return;
  }

  await writeToSocket(socket, head);
  const chunked = body.length === undefined;
  let written = 0;
  const reader = body.stream.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value.byteLength === 0) continue;
      written += value.byteLength;
      if (chunked) {
        await writeToSocket(socket, Buffer.from(`${value.byteLength.toString(16)}\r\n`));
        await writeToSocket(socket, Buffer.from(value));
        await writeToSocket(socket, Buffer.from("\r\n"));
      } else {
        if (body.length !== undefined && written > body.length) {
          throw new Error(`Request body exceeds declared length of ${body.length} bytes`);
        }
        await writeToSocket(socket, Buffer.from(value));
      }
    }
    if (chunked) {
      // Terminating chunk
      await writeToSocket(socket, Buffer.from("0\r\n\r\n"));
    } else if (written !== body.length) {
      throw new Error(`Request body ended after ${written} of ${body.length} declared bytes`);
    }
  } catch (err) {
    reader.cancel(err).catch(() => {});
    throw err;
  } finally {
    reader.releaseLock();
  }
}

function writeToSocket(socket: Duplex, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (socket.destroyed || !socket.writable) {
      reject(new Error("Socket is not writable"));
      return;
    }
    socket.write(data, (err?: Error | null) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

interface PendingExchange {
  response: Promise<Http1Response>;
  /** Abort the exchange from the writing side */
  fail(err: unknown): void;
}

/**
 * Read and parse HTTP/1.1 response from socket.
 * Returns response with a streaming body.
 */
function readResponse(
  socket: Duplex,
  request: Http1Request,
  method: string,
  wantsClose: boolean,
): PendingExchange {
  const { signal, headersTimeout, bodyTimeout, url } = request;
  let fail: (err: unknown) => void = () => {};

  const response = new Promise<Http1Response>((resolve, reject) => {
    let headBuffer: Buffer = Buffer.alloc(0);
    let headParsed = false;
    let finished = false;
    let parsed: ParsedResponse | null = null;
    let bodyBytesReceived = 0;
    let chunkedDecoder: ChunkedDecoder | null = null;
    const hasHeadersTimeout =
      typeof headersTimeout === "number" && headersTimeout > 0 && headersTimeout < Infinity;
    const bodyIdleTimeout =
      typeof bodyTimeout === "number" && bodyTimeout > 0 && bodyTimeout < Infinity
        ? bodyTimeout
        : null;

    let bodyController: ReadableStreamDefaultController<Uint8Array> | null = null;
    let bodyStreamClosed = false;

    let headersTimer: ReturnType<typeof setTimeout> | null = null;
    let bodyTimer: ReturnType<typeof setTimeout> | null = null;
    let lastBodyActivity = 0;

    let settleOutcome: (outcome: ConnectionOutcome) => void = () => {};
    const settled = new Promise<ConnectionOutcome>(r => {
      settleOutcome = r;
    });

    const bodyStream = new ReadableStream<Uint8Array>({
      start(controller) {
        bodyController = controller;
      },
      pull() {
        if (headParsed && !finished) socket.resume();
      },
      cancel() {
        // Consumer gave up mid-body: the socket position is unknown now
        bodyStreamClosed = true;
        finish(false);
      },
    });

    /** End the exchange; a reusable socket is paused at a message boundary */
    const finish = (reusable: boolean) => {
      if (finished) return;
      finished = true;
      cleanup();
      if (reusable && parsed?.keepAlive === true && !wantsClose) {
        socket.pause();
        settleOutcome("reusable");
      } else {
        socket.destroy();
        settleOutcome("closed");
      }
    };

    const closeBody = () => {
      if (bodyController && !bodyStreamClosed) {
        bodyStreamClosed = true;
        bodyController.close();
      }
      clearBodyTimer();
    };

    const errorBody = (err: unknown) => {
      if (bodyController && !bodyStreamClosed) {
        bodyStreamClosed = true;
        bodyController.error(err);
      }
    };

    const enqueueBody = (data: Uint8Array) => {
      if (!bodyController || bodyStreamClosed || data.length === 0) return;
      bodyController.enqueue(data);
      const desired = bodyController.desiredSize;
      if (desired !== null && desired <= 0) socket.pause();
    };

    const cleanup = () => {
      socket.removeListener("data", onData);
      socket.removeListener("end", onEnd);
      socket.removeListener("close", onEnd);
      socket.removeListener("error", onError);
      if (signal) signal.removeEventListener("abort", onAbort);
      clearHeadersTimer();
      clearBodyTimer();
    };

    /** Fail before or after headers; the socket is always destroyed */
    const failExchange = (err: unknown) => {
      if (finished) return;
      if (!headParsed) {
        reject(err);
      } else {
        errorBody(err);
      }
      finish(false);
    };
    fail = failExchange;

    const onAbort = () => {
      failExchange(signal?.reason ?? new DOMException("Aborted", "AbortError"));
    };

    const clearHeadersTimer = () => {
      if (headersTimer) {
        clearTimeout(headersTimer);
        headersTimer = null;
      }
    };

    const clearBodyTimer = () => {
      if (bodyTimer) {
        clearTimeout(bodyTimer);
        bodyTimer = null;
      }
    };

    const onHeadersTimeout = () => {
      if (headParsed) return;
      failExchange(
        new TimeoutError(`Headers timeout after ${headersTimeout}ms`, {
          url,
          phase: "headers",
          timeout: headersTimeout ?? 0,
        }),
      );
    };

    const onBodyTimeoutCheck = () => {
      bodyTimer = null;
      if (bodyIdleTimeout === null || finished) return;
      const elapsed = Date.now() - lastBodyActivity;
      if (elapsed >= bodyIdleTimeout) {
        failExchange(
          new TimeoutError(`Body timeout after ${bodyIdleTimeout}ms`, {
            url,
            phase: "body",
            timeout: bodyIdleTimeout,
          }),
        );
        return;
      }
      // Reschedule for remaining time
      bodyTimer = setTimeout(onBodyTimeoutCheck, bodyIdleTimeout - elapsed);
    };

    const markBodyActivity = () => {
      if (bodyIdleTimeout === null) return;
      lastBodyActivity = Date.now();
      if (!bodyTimer) {
        bodyTimer = setTimeout(onBodyTimeoutCheck, bodyIdleTimeout);
      }
    };

    const onData = (chunk: Buffer | Uint8Array) => {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      if (headParsed) {
        processBodyData(buf);
        return;
      }

      headBuffer = headBuffer.length > 0 ? Buffer.concat([headBuffer, buf]) : buf;

      if (headBuffer.length > MAX_HEAD_SIZE) {
        failExchange(
          new ProtocolError("Response headers too large (>80KB)", { url, phase: "headers" }),
        );
        return;
      }

      let result: ReturnType<typeof parseResponseHead>;
      try {
        result = parseResponseHead(headBuffer, { method });
      } catch (err) {
        failExchange(
          err instanceof ResponseParseError
            ? new ProtocolError(err.message, { url, phase: "headers", cause: err })
            : err,
        );
        return;
      }
      if (!result) return; // need more data for headers

      // Skip interim 1xx responses (100 Continue, 103 Early Hints)
      if (result.response.status < 200 && result.response.status !== 101) {
        const rest = headBuffer.subarray(result.bodyStart);
        headBuffer = Buffer.alloc(0);
        if (rest.length > 0) onData(rest);
        return;
      }

      headParsed = true;
      parsed = result.response;
      clearHeadersTimer();

      resolve({
        status: parsed.status,
        statusText: parsed.statusText,
        httpVersion: parsed.httpVersion,
        headers: parsed.headers,
        hasBody: parsed.bodyMode !== "none",
        body: bodyStream,
        settled,
      });

      // Process any body data that came with the headers
      const bodyData = headBuffer.subarray(result.bodyStart);
      headBuffer = Buffer.alloc(0); // free memory

      if (parsed.bodyMode === "none") {
        closeBody();
        finish(bodyData.length === 0 && parsed.status !== 101);
        return;
      }

      if (parsed.bodyMode === "chunked") {
        chunkedDecoder = new ChunkedDecoder();
      }
      markBodyActivity();

      if (bodyData.length > 0) {
        processBodyData(bodyData);
      }
    };

    const processBodyData = (data: Buffer) => {
      if (!parsed || finished) return;
      markBodyActivity();

      if (parsed.bodyMode === "chunked" && chunkedDecoder) {
        try {
          chunkedDecoder.feed(data);
        } catch (err) {
          failExchange(
            new ProtocolError(`Invalid chunked body: ${errorMessage(err)}`, {
              url,
              phase: "body",
              cause: err,
            }),
          );
          return;
        }
        for (const chunk of chunkedDecoder.getChunks()) {
          enqueueBody(chunk);
        }
        if (chunkedDecoder.done) {
          closeBody();
          finish(chunkedDecoder.remainder.length === 0);
        }
      } else if (parsed.bodyMode === "content-length") {
        const remaining = parsed.contentLength - bodyBytesReceived;
        const toEnqueue = data.length <= remaining ? data : data.subarray(0, remaining);
        bodyBytesReceived += toEnqueue.length;
        enqueueBody(toEnqueue);
        if (bodyBytesReceived >= parsed.contentLength) {
          closeBody();
          // Trailing bytes past the declared length leave the stream out of sync
          finish(data.length <= remaining);
        }
      } else {
        // "close" mode: read until connection closes
        enqueueBody(data);
      }
    };

    const onEnd = () => {
      if (finished) return;
      if (!headParsed) {
        failExchange(
          headBuffer.length === 0
            ? new ConnectError("Connection closed before response headers received", {
                url,
                phase: "headers",
              })
            : new ProtocolError("Connection closed while reading response headers", {
                url,
                phase: "headers",
              }),
        );
      } else if (parsed?.bodyMode === "close") {
        closeBody();
        finish(false);
      } else {
        failExchange(
          new BodyError("Connection closed before response body completed", { url }),
        );
      }
    };

    const onError = (err: Error) => {
      if (finished) return;
      if (!headParsed) {
        failExchange(
          headBuffer.length === 0
            ? new ConnectError(`Connection error before response: ${err.message}`, {
                url,
                phase: "headers",
                cause: err,
              })
            : new ProtocolError(`Connection error while reading headers: ${err.message}`, {
                url,
                phase: "headers",
                cause: err,
              }),
        );
      } else {
        failExchange(new BodyError(`Connection error while reading body: ${err.message}`, {
          url,
          cause: err,
        }));
      }
    };

    socket.on("data", onData);
    socket.on("end", onEnd);
    socket.on("close", onEnd);
    socket.on("error", onError);
    socket.resume();

    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener("abort", onAbort, { once: true });
    }

    if (hasHeadersTimeout) {
      headersTimer = setTimeout(onHeadersTimeout, headersTimeout);
    }
  });

  return { response, fail: err => fail(err) };
}
