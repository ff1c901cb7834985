/**
 * Proxy resolution.
 *
 * Rules map a target scheme ("http", "https" or "*") to a proxy URL.
 * Scheme-specific rules are tried before wildcard rules, and exclusion
 * patterns (NO_PROXY) win over both. Rules can come from options, from the
 * environment, or both (explicit rules first).
 */
import { Buffer } from "node:buffer";
import ipaddr from "ipaddr.js";
import type { IPv4, IPv6 } from "ipaddr.js";
import { consoleLogger, type Logger } from "./logger.js";
import type { ParsedUrl } from "./utils/url.js";

export type ProxyScheme = "http" | "https" | "*";

export interface ProxyCredentials {
  username: string;
  password: string;
}

export interface ProxyRule {
  scheme: ProxyScheme;
  /** Proxy URL; a missing scheme means `http://` */
  url: string;
  /** Overrides credentials embedded in the URL */
  auth?: ProxyCredentials;
}

export interface ProxyConfig {
  rules?: ProxyRule[];
  /** Exclusion patterns, as a NO_PROXY string or a list */
  noProxy?: string | readonly string[];
  /** Also read HTTP_PROXY, HTTPS_PROXY, ALL_PROXY and NO_PROXY (default: true) */
  env?: boolean;
}

export interface ProxyEndpoint {
  /** Stable identity used in connection keys (credentials included as a user name only) */
  id: string;
  protocol: "http" | "https";
  host: string;
  port: number;
  /** `Proxy-Authorization` header value */
  authorization?: string;
}

export interface ProxyTarget extends ProxyEndpoint {
  /** HTTPS targets are reached with a CONNECT tunnel */
  tunnel: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

/** `Basic` credentials for Authorization / Proxy-Authorization headers. */
export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
}

/**
 * Parse a proxy URL. `host:port` without a scheme is taken as `http://`.
 * Throws TypeError for unsupported schemes.
 */
export function parseProxyUrl(raw: string, auth?: ProxyCredentials): ProxyEndpoint {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `http://${raw}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new TypeError(`Invalid proxy URL: ${raw}`);
  }
  const scheme = url.protocol.slice(0, -1);
  if (scheme !== "http" && scheme !== "https") {
    throw new TypeError(`Unsupported proxy scheme: ${url.protocol}`);
  }
  const host = url.hostname.replace(/^\[|\]$/g, "");
  if (!host) throw new TypeError(`Invalid proxy URL: ${raw}`);
  const port = url.port ? parseInt(url.port, 10) : scheme === "https" ? 443 : 80;

  const username = auth?.username ?? decodeURIComponent(url.username);
  const password = auth?.password ?? decodeURIComponent(url.password);
  const authorization = username || password ? basicAuth(username, password) : undefined;
  const hostPart = host.includes(":") ? `[${host}]` : host;
  const userPart = username ? `${encodeURIComponent(username)}@` : "";

  return {
    id: `${scheme}://${userPart}${hostPart}:${port}`,
    protocol: scheme,
    host,
    port,
    authorization,
  };
}

type IpAddress = IPv4 | IPv6;

function parseIp(value: string): IpAddress | null {
  if (!ipaddr.isValid(value)) return null;
  const addr = ipaddr.parse(value);
  // Compare IPv4-mapped IPv6 addresses as IPv4
  return addr instanceof ipaddr.IPv6 && addr.isIPv4MappedAddress() ? addr.toIPv4Address() : addr;
}

function parseCidr(value: string): [IpAddress, number] | null {
  if (!value.includes("/")) return null;
  try {
    return ipaddr.parseCIDR(value);
  } catch {
    return null;
  }
}

function inRange(ip: IpAddress, [network, bits]: [IpAddress, number]): boolean {
  if (ip instanceof ipaddr.IPv4 && network instanceof ipaddr.IPv4) return ip.match(network, bits);
  if (ip instanceof ipaddr.IPv6 && network instanceof ipaddr.IPv6) return ip.match(network, bits);
  return false;
}

/**
 * NO_PROXY exclusion patterns: `*`, host names, domain suffixes
 * (`example.com` and `.example.com` both cover subdomains), IP addresses
 * and CIDR ranges.
 */
export class NoProxy {
  private readonly all: boolean;
  private readonly domains: string[] = [];
  private readonly ips: IpAddress[] = [];
  private readonly ranges: Array<[IpAddress, number]> = [];

  constructor(patterns: string | readonly string[]) {
    const list = typeof patterns === "string" ? patterns.split(",") : patterns;
    let all = false;
    for (const raw of list) {
      const pattern = raw.trim().toLowerCase();
      if (!pattern) continue;
      if (pattern === "*") {
        all = true;
        continue;
      }
      const range = parseCidr(pattern);
      if (range) {
        this.ranges.push(range);
        continue;
      }
      const ip = parseIp(pattern.replace(/^\[|\]$/g, ""));
      if (ip) {
        this.ips.push(ip);
        continue;
      }
      // Ports in host patterns are ignored; the host name decides
      const domain = pattern.replace(/:\d+$/, "").replace(/^\*?\./, "");
      if (domain) this.domains.push(domain);
    }
    this.all = all;
  }

  get isEmpty(): boolean {
    return !this.all && this.domains.length === 0 && this.ips.length === 0 && this.ranges.length === 0;
  }

  /** Whether requests to `host` bypass the proxy */
  matches(host: string): boolean {
    if (this.all) return true;
    const hostname = host.toLowerCase().replace(/^\[|\]$/g, "").replace(/\.$/, "");
    const ip = parseIp(hostname);
    if (ip) {
      return (
        this.ips.some(other => other.kind() === ip.kind() && other.toString() === ip.toString()) ||
        this.ranges.some(range => inRange(ip, range))
      );
    }
    return this.domains.some(domain => hostname === domain || hostname.endsWith(`.${domain}`));
  }
}

function firstEnv(env: Env, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Rules from the environment. Lowercase variables win over uppercase.
 * Under CGI (REQUEST_METHOD set) the uppercase HTTP_PROXY is ignored, since
 * a request header named `Proxy` would otherwise control it.
 */
export function rulesFromEnv(env: Env): { rules: ProxyRule[]; noProxy?: string } {
  const cgi = env.REQUEST_METHOD !== undefined;
  const rules: ProxyRule[] = [];
  const http = firstEnv(env, cgi ? ["http_proxy"] : ["http_proxy", "HTTP_PROXY"]);
  if (http) rules.push({ scheme: "http", url: http });
  const https = firstEnv(env, ["https_proxy", "HTTPS_PROXY"]);
  if (https) rules.push({ scheme: "https", url: https });
  const all = firstEnv(env, ["all_proxy", "ALL_PROXY"]);
  if (all) rules.push({ scheme: "*", url: all });
  return { rules, noProxy: firstEnv(env, ["no_proxy", "NO_PROXY"]) };
}

interface CompiledRule {
  scheme: ProxyScheme;
  endpoint: ProxyEndpoint;
}

export class ProxyResolver {
  private readonly rules: readonly CompiledRule[];
  private readonly noProxy: NoProxy | null;

  constructor(config: ProxyConfig = {}, env: Env = process.env, logger: Logger = consoleLogger) {
    const compiled: CompiledRule[] = (config.rules ?? []).map(rule => ({
      scheme: rule.scheme,
      endpoint: parseProxyUrl(rule.url, rule.auth),
    }));
    const exclusions: string[] = [];
    if (config.noProxy !== undefined) {
      exclusions.push(...(typeof config.noProxy === "string" ? [config.noProxy] : config.noProxy));
    }

    if (config.env !== false) {
      const fromEnv = rulesFromEnv(env);
      for (const rule of fromEnv.rules) {
        try {
          compiled.push({ scheme: rule.scheme, endpoint: parseProxyUrl(rule.url) });
        } catch {
          // The value may carry credentials; only the scheme is logged
          logger.warn(`[proxy] ignoring invalid ${rule.scheme} proxy URL from the environment`);
        }
      }
      if (fromEnv.noProxy) exclusions.push(fromEnv.noProxy);
    }

    this.rules = compiled;
    const noProxy = new NoProxy(exclusions.join(","));
    this.noProxy = noProxy.isEmpty ? null : noProxy;
  }

  /** Resolver reading only the environment */
  static fromEnv(env: Env = process.env, logger?: Logger): ProxyResolver {
    return new ProxyResolver({ env: true }, env, logger);
  }

  /** Resolver that never proxies */
  static none(): ProxyResolver {
    return new ProxyResolver({ env: false });
  }

  get isEmpty(): boolean {
    return this.rules.length === 0;
  }

  /** Proxy for a target URL, or null for a direct connection */
  resolve(url: Pick<ParsedUrl, "protocol" | "hostname">): ProxyTarget | null {
    if (this.rules.length === 0) return null;
    if (this.noProxy?.matches(url.hostname)) return null;
    const rule =
      this.rules.find(r => r.scheme === url.protocol) ?? this.rules.find(r => r.scheme === "*");
    if (!rule) return null;
    return { ...rule.endpoint, tunnel: url.protocol === "https" };
  }
}
