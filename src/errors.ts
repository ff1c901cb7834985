/**
 * Error taxonomy.
 *
 * Every error raised by the engine carries the URL it was working on and the
 * phase it failed in, so callers can tell "could not connect" from
 * "connected but the server broke the protocol" from "redirect refused".
 */

export type RequestPhase =
  | "connect"
  | "tunnel"
  | "handshake"
  | "send"
  | "headers"
  | "body"
  | "redirect"
  | "status";

export interface HttpClientErrorOptions {
  url: string;
  phase: RequestPhase;
  cause?: unknown;
}

export class HttpClientError extends Error {
  readonly url: string;
  readonly phase: RequestPhase;

  constructor(message: string, options: HttpClientErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.url = options.url;
    this.phase = options.phase;
  }
}

/** DNS, TCP, TLS or proxy tunnel failure, or a connection lost before any response byte. */
export class ConnectError extends HttpClientError {
  /** Status line returned by a proxy that refused a CONNECT tunnel */
  readonly proxyStatus?: number;

  constructor(message: string, options: HttpClientErrorOptions & { proxyStatus?: number }) {
    super(message, options);
    this.proxyStatus = options.proxyStatus;
  }
}

/** Malformed response framing. Fatal; the connection is discarded. */
export class ProtocolError extends HttpClientError {}

export type RedirectFailure = "loop" | "too-many" | "unreplayable-body" | "policy";

/** The redirect engine refused to continue. */
export class RedirectError extends HttpClientError {
  readonly reason: RedirectFailure;
  /** URLs visited in this chain, initial URL first */
  readonly chain: readonly string[];

  constructor(
    message: string,
    options: Omit<HttpClientErrorOptions, "phase"> & {
      reason: RedirectFailure;
      chain: readonly string[];
    },
  ) {
    super(message, { ...options, phase: "redirect" });
    this.reason = options.reason;
    this.chain = options.chain;
  }

  get chainLength(): number {
    return this.chain.length;
  }
}

/** Mid-stream I/O failure or decompression corruption while pulling the body. */
export class BodyError extends HttpClientError {
  constructor(message: string, options: Omit<HttpClientErrorOptions, "phase">) {
    super(message, { ...options, phase: "body" });
  }
}

export type TimeoutPhase = "connect" | "headers" | "body";

export class TimeoutError extends HttpClientError {
  readonly timeout: number;

  constructor(
    message: string,
    options: Omit<HttpClientErrorOptions, "phase"> & { phase: TimeoutPhase; timeout: number },
  ) {
    super(message, options);
    this.timeout = options.timeout;
  }
}

/** Raised by `HttpResponse.errorForStatus()` for 4xx/5xx responses. */
export class StatusError extends HttpClientError {
  readonly status: number;

  constructor(status: number, statusText: string, url: string) {
    const label = status >= 500 ? "server" : "client";
    const text = statusText ? ` ${statusText}` : "";
    super(`HTTP ${label} error (${status}${text}) for url (${url})`, { url, phase: "status" });
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
