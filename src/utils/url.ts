/**
 * URL parsing utility.
 */

export interface ParsedUrl {
  protocol: "https" | "http";
  /** Host name without IPv6 brackets, lowercased */
  hostname: string;
  port: number;
  path: string; // includes query string, e.g. "/v1/chat?model=gpt-4"
  /** Host header value: bracketed IPv6, port only when not the scheme default */
  authority: string;
  /** Serialized URL without fragment */
  href: string;
}

/**
 * Parse an absolute http(s) URL string into its components.
 * Throws TypeError for other schemes.
 */
export function parseUrl(url: string | URL): ParsedUrl {
  const parsed = typeof url === "string" ? new URL(url) : url;

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new TypeError(`Unsupported URL scheme: ${parsed.protocol}`);
  }
  const protocol = parsed.protocol === "https:" ? "https" : "http";
  const hostname = stripBrackets(parsed.hostname);
  const defaultPort = protocol === "https" ? 443 : 80;
  const port = parsed.port ? parseInt(parsed.port, 10) : defaultPort;
  const path = parsed.pathname + parsed.search;
  const authority = port === defaultPort ? parsed.hostname : `${parsed.hostname}:${port}`;

  const withoutHash = new URL(parsed.href);
  withoutHash.hash = "";

  return { protocol, hostname, port, path: path || "/", authority, href: withoutHash.href };
}

function stripBrackets(hostname: string): string {
  return hostname.startsWith("[") && hostname.endsWith("]") ? hostname.slice(1, -1) : hostname;
}
