/**
 * Client configuration: options, defaults and validation.
 * Options are validated once, when the client is built.
 */
import type { LookupFunction } from "node:net";
import { CookieJar } from "./cookie-jar.js";
import { consoleLogger, type Logger } from "./logger.js";
import type { Env, ProxyConfig } from "./proxy.js";
import type { RedirectOptions } from "./redirect.js";
import { nodeConnector, type Connector } from "./socket/connect.js";
import { normalizeHeaders, type HeaderMap, type HeadersInit } from "./utils/headers.js";

export const VERSION = "0.1.0";

export const DEFAULT_USER_AGENT = `hopline/${VERSION}`;

export interface PoolConfig {
  /** Idle connections kept per origin; 0 disables reuse (default: 8) */
  maxIdlePerHost?: number;
  /** How long an idle connection may be reused (ms, default: 60000) */
  idleTimeout?: number;
}

export interface TlsConfig {
  /** Verify the server certificate (default: true) */
  rejectUnauthorized?: boolean;
  /** Extra trusted CA certificates (PEM) */
  ca?: string | Buffer | Array<string | Buffer>;
}

export interface ClientOptions {
  /** "env" reads the proxy environment variables; false disables proxies (default: "env") */
  proxy?: "env" | false | ProxyConfig;
  /** Redirect behaviour; false never follows */
  redirect?: Partial<RedirectOptions> | false;
  pool?: PoolConfig;
  /** Total timeout per request including the body (ms, default: 30000, 0 disables) */
  timeout?: number;
  /** Timeout per connection attempt, TLS and tunnel included (ms, default: 10000, 0 disables) */
  connectTimeout?: number;
  /** Timeout waiting for response headers (ms) */
  headersTimeout?: number;
  /** Idle timeout between body chunks (ms) */
  bodyTimeout?: number;
  tls?: TlsConfig;
  /** true for a fresh jar, false for none, or a shared jar (default: true) */
  cookies?: boolean | CookieJar;
  /** Send Accept-Encoding and decode compressed bodies (default: true) */
  decompress?: boolean;
  /** Headers sent with every request; request headers win */
  defaultHeaders?: HeadersInit;
  /** User-Agent header; false sends none (default: "hopline/<version>") */
  userAgent?: string | false;
  /** Socket layer (default: node:net + node:tls) */
  connector?: Connector;
  /** DNS resolver passed to the connector */
  lookup?: LookupFunction;
  logger?: Logger;
  /** Environment read for proxy variables (default: process.env) */
  env?: Env;
}

export interface ResolvedClientOptions {
  proxy: ProxyConfig | false;
  redirect: RedirectOptions;
  pool: Required<PoolConfig>;
  timeout: number;
  connectTimeout: number;
  headersTimeout?: number;
  bodyTimeout?: number;
  tls: { rejectUnauthorized: boolean; ca?: TlsConfig["ca"] };
  cookies: CookieJar | null;
  decompress: boolean;
  defaultHeaders: HeaderMap;
  userAgent: string | null;
  connector: Connector;
  lookup?: LookupFunction;
  logger: Logger;
  env: Env;
}

export const DEFAULT_REDIRECT: RedirectOptions = {
  follow: true,
  maxRedirects: 10,
  downgradeMethod: true,
  referer: true,
};

export const DEFAULT_POOL: Required<PoolConfig> = {
  maxIdlePerHost: 8,
  idleTimeout: 60_000,
};

export const DEFAULT_TIMEOUT = 30_000;
export const DEFAULT_CONNECT_TIMEOUT = 10_000;

function checkTimeout(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (typeof value !== "number" || Number.isNaN(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative number, got ${String(value)}`);
  }
}

function checkCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${String(value)}`);
  }
}

/** Infinity and 0 both mean "no timeout" */
function toTimeout(value: number): number {
  return value === Infinity ? 0 : value;
}

/**
 * Fill in defaults and validate. Throws RangeError/TypeError on bad values.
 */
export function normalizeClientOptions(options: ClientOptions = {}): ResolvedClientOptions {
  const logger = options.logger ?? consoleLogger;

  checkTimeout("timeout", options.timeout);
  checkTimeout("connectTimeout", options.connectTimeout);
  checkTimeout("headersTimeout", options.headersTimeout);
  checkTimeout("bodyTimeout", options.bodyTimeout);

  const redirect: RedirectOptions =
    options.redirect === false
      ? { ...DEFAULT_REDIRECT, follow: false }
      : { ...DEFAULT_REDIRECT, ...options.redirect };
  checkCount("redirect.maxRedirects", redirect.maxRedirects);
  if (redirect.policy !== undefined && typeof redirect.policy !== "function") {
    throw new TypeError("redirect.policy must be a function");
  }

  const pool = { ...DEFAULT_POOL, ...options.pool };
  checkCount("pool.maxIdlePerHost", pool.maxIdlePerHost);
  checkTimeout("pool.idleTimeout", pool.idleTimeout);

  let cookies: CookieJar | null;
  if (options.cookies instanceof CookieJar) cookies = options.cookies;
  else if (options.cookies === false) cookies = null;
  else cookies = new CookieJar({ logger });

  let proxy: ProxyConfig | false;
  if (options.proxy === false) proxy = false;
  else if (options.proxy === undefined || options.proxy === "env") proxy = { env: true };
  else proxy = options.proxy;

  const userAgent =
    options.userAgent === false ? null : (options.userAgent ?? DEFAULT_USER_AGENT);

  return {
    proxy,
    redirect,
    pool,
    timeout: toTimeout(options.timeout ?? DEFAULT_TIMEOUT),
    connectTimeout: toTimeout(options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT),
    headersTimeout: options.headersTimeout,
    bodyTimeout: options.bodyTimeout,
    tls: {
      rejectUnauthorized: options.tls?.rejectUnauthorized ?? true,
      ca: options.tls?.ca,
    },
    cookies,
    decompress: options.decompress ?? true,
    defaultHeaders: normalizeHeaders(options.defaultHeaders),
    userAgent,
    connector: options.connector ?? nodeConnector,
    lookup: options.lookup,
    logger,
    env: options.env ?? process.env,
  };
}
