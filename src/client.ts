/**
 * HTTP client engine.
 *
 * `execute` drives one logical request: resolve the proxy, acquire a
 * transport from the pool, send, ingest cookies, ask the redirect engine,
 * and loop until a final response comes back with its decoder attached.
 * A transport goes back to the pool only once its exchange settled at a
 * clean message boundary.
 */
import { ConnectionPool } from "./connection-pool.js";
import type { CookieJar } from "./cookie-jar.js";
import { normalizeClientOptions, type ClientOptions, type ResolvedClientOptions } from "./config.js";
import { ACCEPT_ENCODING, attachDecoder } from "./decoder.js";
import { ConnectError, TimeoutError, errorMessage, type TimeoutPhase } from "./errors.js";
import type { Http1Request, Http1Response } from "./http1/client.js";
import { basicAuth, ProxyResolver } from "./proxy.js";
import { RedirectEngine } from "./redirect.js";
import {
  createRequest,
  isReplayable,
  type HttpRequest,
  type RequestInit,
} from "./request.js";
import { createResponse, type HttpResponse } from "./response.js";
import { establishTransport, type ConnectionKey, type Transport } from "./transport.js";
import { HeaderMap } from "./utils/headers.js";
import { parseUrl, type ParsedUrl } from "./utils/url.js";

/** Redirect bodies larger than this are not drained; the connection is dropped instead */
const MAX_DRAIN_BYTES = 64 * 1024;

export type MethodInit = Omit<RequestInit, "method">;

export class HttpClient {
  private readonly options: ResolvedClientOptions;
  private readonly pool: ConnectionPool;
  private readonly proxies: ProxyResolver;
  private closed = false;

  constructor(options: ClientOptions = {}) {
    this.options = normalizeClientOptions(options);
    const { logger } = this.options;
    this.pool = new ConnectionPool({ ...this.options.pool, logger });
    this.proxies =
      this.options.proxy === false
        ? ProxyResolver.none()
        : new ProxyResolver(this.options.proxy, this.options.env, logger);
  }

  /** The jar shared by this client's requests, if cookies are enabled */
  get cookieJar(): CookieJar | null {
    return this.options.cookies;
  }

  /** Idle pooled connections across all origins */
  get idleConnections(): number {
    return this.pool.idleCount();
  }

  request(url: string | URL, init: RequestInit = {}): Promise<HttpResponse> {
    return this.execute(createRequest(url, init));
  }

  get(url: string | URL, init: MethodInit = {}): Promise<HttpResponse> {
    return this.request(url, { ...init, method: "GET" });
  }

  head(url: string | URL, init: MethodInit = {}): Promise<HttpResponse> {
    return this.request(url, { ...init, method: "HEAD" });
  }

  post(url: string | URL, init: MethodInit = {}): Promise<HttpResponse> {
    return this.request(url, { ...init, method: "POST" });
  }

  put(url: string | URL, init: MethodInit = {}): Promise<HttpResponse> {
    return this.request(url, { ...init, method: "PUT" });
  }

  patch(url: string | URL, init: MethodInit = {}): Promise<HttpResponse> {
    return this.request(url, { ...init, method: "PATCH" });
  }

  delete(url: string | URL, init: MethodInit = {}): Promise<HttpResponse> {
    return this.request(url, { ...init, method: "DELETE" });
  }

  /**
   * Send a request and return the final response.
   * The total timeout keeps running until the body is read to the end.
   */
  async execute(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) throw new Error("Client is closed");
    if (request.signal?.aborted) {
      throw request.signal.reason ?? new DOMException("Aborted", "AbortError");
    }

    const timeout = request.timeout ?? this.options.timeout;
    let phase: TimeoutPhase = "connect";
    let currentUrl = request.url;

    // Total timeout; the reason records where the request was when it fired
    const timeoutController = new AbortController();
    let timer: ReturnType<typeof setTimeout> | null = null;
    if (timeout > 0 && timeout < Infinity) {
      timer = setTimeout(() => {
        timeoutController.abort(
          new TimeoutError(`Request timed out after ${timeout}ms`, {
            url: currentUrl,
            phase,
            timeout,
          }),
        );
      }, timeout);
    }
    const clearTimer = () => {
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    };

    // Merge user signal + timeout signal
    const signal = request.signal
      ? AbortSignal.any([request.signal, timeoutController.signal])
      : timeoutController.signal;

    const redirects = new RedirectEngine(this.options.redirect, request.url);
    let current = request;

    try {
      while (true) {
        currentUrl = current.url;
        phase = "connect";
        const response = await this.send(current, signal, () => {
          phase = "headers";
        });

        const jar = this.options.cookies;
        const setCookies = response.headers.getAll("set-cookie");
        if (jar && setCookies.length > 0) jar.ingest(current.url, setCookies);

        const decision = redirects.next(current, response);
        if (decision.kind === "follow") {
          this.options.logger.debug(
            `[redirect] ${response.status} ${current.url} -> ${decision.request.url}`,
          );
          await this.discardBody(response.body, current.url);
          current = decision.request;
          continue;
        }
        if (decision.kind === "failed") {
          await response.body.cancel(decision.error);
          throw decision.error;
        }

        phase = "body";
        if (!response.hasBody) clearTimer();
        const body = this.options.decompress
          ? attachDecoder(response.headers, response.body, {
              url: current.url,
              hasBody: response.hasBody,
            })
          : response.body;

        return createResponse({
          status: response.status,
          statusText: response.statusText,
          httpVersion: response.httpVersion,
          headers: response.headers,
          url: current.url,
          chain: [...redirects.chain],
          body,
          onSettled: clearTimer,
        });
      }
    } catch (err) {
      clearTimer();
      if (timeoutController.signal.aborted) throw timeoutController.signal.reason;
      if (request.signal?.aborted) {
        throw request.signal.reason ?? new DOMException("Aborted", "AbortError");
      }
      throw err;
    }
  }

  /** Close idle connections; requests in flight finish and then close theirs. */
  close(): void {
    this.closed = true;
    this.pool.clear();
  }

  /**
   * One exchange on a pooled or new transport. A reused transport that
   * fails before any response byte is retried once on a fresh one,
   * provided the body can be sent again.
   */
  private async send(
    request: HttpRequest,
    signal: AbortSignal,
    onSending: () => void,
  ): Promise<Http1Response> {
    const target = parseUrl(request.url);
    const proxy = this.proxies.resolve(target);
    const key: ConnectionKey = {
      scheme: target.protocol,
      host: target.hostname,
      port: target.port,
      proxy: proxy?.id,
    };
    const establish = () =>
      establishTransport({
        key,
        proxy,
        connector: this.options.connector,
        lookup: this.options.lookup,
        connectTimeout: this.options.connectTimeout,
        tls: this.options.tls,
        userAgent: this.options.userAgent ?? undefined,
        signal,
        url: request.url,
        logger: this.options.logger,
      });

    const first = await this.pool.acquire(key, establish);
    try {
      return await this.exchange(first.transport, request, target, signal, onSending);
    } catch (err) {
      this.pool.discard(first.transport);
      if (
        !first.reused ||
        !(err instanceof ConnectError) ||
        !isReplayable(request.body) ||
        signal.aborted
      ) {
        throw err;
      }
      this.options.logger.debug(
        `[client] reused connection to ${first.transport.id} failed (${err.message}), retrying on a new connection`,
      );
    }

    const retry = await this.pool.acquire(key, establish, { fresh: true });
    try {
      return await this.exchange(retry.transport, request, target, signal, onSending);
    } catch (err) {
      this.pool.discard(retry.transport);
      throw err;
    }
  }

  private async exchange(
    transport: Transport,
    request: HttpRequest,
    target: ParsedUrl,
    signal: AbortSignal,
    onSending: () => void,
  ): Promise<Http1Response> {
    const wire = this.wireRequest(transport, request, target, signal);
    onSending();
    const response = await transport.send(wire);
    void response.settled.then(outcome => {
      if (outcome === "reusable" && !this.closed) this.pool.release(transport);
      else this.pool.discard(transport);
    });
    return response;
  }

  /**
   * Headers as they go on the wire: Host first, then client defaults under
   * the request's own headers, then whatever the engine adds. Explicit
   * headers are never overridden or duplicated.
   */
  private wireRequest(
    transport: Transport,
    request: HttpRequest,
    target: ParsedUrl,
    signal: AbortSignal,
  ): Http1Request {
    const merged = this.options.defaultHeaders.clone();
    for (const name of request.headers.names()) merged.delete(name);
    for (const [name, value] of request.headers) merged.append(name, value);

    const headers = new HeaderMap().set("host", target.authority);
    for (const [name, value] of merged) headers.append(name, value);

    const { userAgent, decompress } = this.options;
    if (userAgent && !headers.has("user-agent")) headers.set("user-agent", userAgent);
    if (!headers.has("accept")) headers.set("accept", "*/*");
    if (decompress && !headers.has("accept-encoding")) {
      headers.set("accept-encoding", ACCEPT_ENCODING);
    }

    const url = new URL(request.url);
    if ((url.username || url.password) && !headers.has("authorization")) {
      headers.set(
        "authorization",
        basicAuth(decodeURIComponent(url.username), decodeURIComponent(url.password)),
      );
    }
    if (transport.proxyAuthorization && !headers.has("proxy-authorization")) {
      headers.set("proxy-authorization", transport.proxyAuthorization);
    }

    const jar = this.options.cookies;
    if (jar && !headers.has("cookie")) {
      const cookie = jar.cookiesFor(request.url);
      if (cookie) headers.set("cookie", cookie);
    }

    return {
      method: request.method,
      target: transport.absoluteForm
        ? `${target.protocol}://${target.authority}${target.path}`
        : target.path,
      url: request.url,
      headers,
      body: request.body,
      signal,
      headersTimeout: this.options.headersTimeout,
      bodyTimeout: this.options.bodyTimeout,
    };
  }

  /** Read a redirect body to its end so the connection can be reused. */
  private async discardBody(body: ReadableStream<Uint8Array>, url: string): Promise<void> {
    const reader = body.getReader();
    let drained = 0;
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) return;
        drained += value.byteLength;
        if (drained > MAX_DRAIN_BYTES) {
          await reader.cancel();
          return;
        }
      }
    } catch (err) {
      // The exchange already destroyed the connection
      this.options.logger.debug(`[client] failed to drain redirect body from ${url}: ${errorMessage(err)}`);
    }
  }
}

/**
 * One-off request with a throw-away client and no connection reuse.
 */
export function request(
  url: string | URL,
  init: RequestInit = {},
  options: ClientOptions = {},
): Promise<HttpResponse> {
  const client = new HttpClient({ ...options, pool: { ...options.pool, maxIdlePerHost: 0 } });
  return client.request(url, init);
}
