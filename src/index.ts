/**
 * hopline: HTTP/1.1 client with keep-alive pooling, proxies (including
 * CONNECT tunnels), a cookie jar, redirect handling and streaming
 * decompression.
 */

// Main API
export { HttpClient, request } from "./client.js";
export type { MethodInit } from "./client.js";
export { createRequest, bufferedBody, streamingBody, isReplayable } from "./request.js";
export type { HttpRequest, RequestInit, RequestBody, BodyInit } from "./request.js";
export type { HttpResponse } from "./response.js";
export { toWebResponse } from "./compat/web.js";
export type { WebResponsePair } from "./compat/web.js";

// Configuration
export {
  VERSION,
  DEFAULT_USER_AGENT,
  DEFAULT_REDIRECT,
  DEFAULT_POOL,
  DEFAULT_TIMEOUT,
  DEFAULT_CONNECT_TIMEOUT,
} from "./config.js";
export type { ClientOptions, PoolConfig, TlsConfig } from "./config.js";
export { consoleLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Errors
export {
  HttpClientError,
  ConnectError,
  ProtocolError,
  RedirectError,
  BodyError,
  TimeoutError,
  StatusError,
} from "./errors.js";
export type { RequestPhase, RedirectFailure, TimeoutPhase } from "./errors.js";

// Cookies
export { CookieJar } from "./cookie-jar.js";
export type { StoredCookie, CookieInit, SerializedCookieJar } from "./cookie-jar.js";

// Proxies
export { ProxyResolver, NoProxy, parseProxyUrl, basicAuth } from "./proxy.js";
export type {
  ProxyConfig,
  ProxyRule,
  ProxyScheme,
  ProxyCredentials,
  ProxyEndpoint,
  ProxyTarget,
  Env,
} from "./proxy.js";

// Redirects
export { RedirectEngine, REDIRECT_STATUSES, limitedPolicy, resolveLocation } from "./redirect.js";
export type {
  RedirectAction,
  RedirectAttempt,
  RedirectPolicy,
  RedirectOptions,
  RedirectState,
  RedirectDecision,
} from "./redirect.js";

// Decoding
export { decodeBody, parseContentEncoding, ACCEPT_ENCODING } from "./decoder.js";
export type { ContentCoding } from "./decoder.js";

// Socket layer (advanced usage)
export { nodeConnector } from "./socket/connect.js";
export type { Connector, TcpOptions, SecureOptions } from "./socket/connect.js";
export { http1Request } from "./http1/client.js";
export type { Http1Request, Http1Response } from "./http1/client.js";

// Utilities
export { HeaderMap } from "./utils/headers.js";
export type { HeadersInit } from "./utils/headers.js";
export { parseUrl } from "./utils/url.js";
export type { ParsedUrl } from "./utils/url.js";
