/**
 * Redirect state machine, one instance per `execute` call.
 *
 *   initial ──3xx──▶ following(hops, visited) ──3xx──▶ following …
 *      │                    │
 *      └──────other─────────┴──▶ done | failed(RedirectError)
 *
 * The engine only decides and rewrites; the client performs the requests.
 */
import { RedirectError, type RedirectFailure } from "./errors.js";
import type { HttpRequest } from "./request.js";
import type { HeaderMap } from "./utils/headers.js";
import { parseUrl, type ParsedUrl } from "./utils/url.js";

export const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

/** Headers that must not follow the request to another origin */
const CROSS_ORIGIN_STRIPPED = ["authorization", "cookie", "proxy-authorization", "www-authenticate"];

/** Headers describing a body that is dropped */
const BODY_HEADERS = ["content-type", "content-length", "content-encoding", "transfer-encoding"];

export type RedirectAction =
  | { action: "follow" }
  | { action: "stop" }
  | { action: "error"; message: string };

/** What a custom policy sees for each redirect it is asked about */
export interface RedirectAttempt {
  status: number;
  /** URL that answered with the redirect */
  from: string;
  /** Resolved Location */
  to: string;
  /** URLs visited so far, initial URL first */
  previous: readonly string[];
  follow(): RedirectAction;
  stop(): RedirectAction;
  error(message: string): RedirectAction;
}

export type RedirectPolicy = (attempt: RedirectAttempt) => RedirectAction;

export interface RedirectOptions {
  /** Follow redirects at all (default: true) */
  follow: boolean;
  /** Maximum hops per request (default: 10) */
  maxRedirects: number;
  /** Turn POST/PUT/… into GET on 301 and 302 (default: true) */
  downgradeMethod: boolean;
  /** Send a Referer header on redirected requests (default: true) */
  referer: boolean;
  policy?: RedirectPolicy;
}

export type RedirectState =
  | { kind: "initial" }
  | { kind: "following"; hops: number; visited: readonly string[] }
  | { kind: "done" }
  | { kind: "failed"; error: RedirectError };

export type RedirectDecision =
  | { kind: "follow"; request: HttpRequest }
  | { kind: "done" }
  | { kind: "failed"; error: RedirectError };

export interface RedirectResponseHead {
  status: number;
  headers: HeaderMap;
}

export class RedirectEngine {
  private _state: RedirectState = { kind: "initial" };
  private readonly visited: string[];
  private hops = 0;

  constructor(
    private readonly options: RedirectOptions,
    initialUrl: string,
  ) {
    this.visited = [initialUrl];
  }

  get state(): RedirectState {
    return this._state;
  }

  /** URLs requested in this chain, initial URL first */
  get chain(): readonly string[] {
    return this.visited;
  }

  get redirected(): boolean {
    return this.hops > 0;
  }

  /**
   * Decide what to do with a response to `request`.
   * On "follow" the returned request is the next one to send; its Cookie
   * header is left for the caller to derive from the jar.
   */
  next(request: HttpRequest, response: RedirectResponseHead): RedirectDecision {
    if (this._state.kind === "done" || this._state.kind === "failed") {
      throw new Error(`Redirect chain already ${this._state.kind}`);
    }

    const { status } = response;
    if (!REDIRECT_STATUSES.has(status)) return this.done();

    const location = response.headers.get("location");
    if (location === null) return this.done();
    const target = resolveLocation(location, request.url);
    if (!target) return this.done();
    if (!this.options.follow) return this.done();

    if (this.visited.includes(target.href)) {
      return this.fail("loop", `Redirect loop detected: ${target.href}`, request.url);
    }
    if (this.hops >= this.options.maxRedirects) {
      return this.fail(
        "too-many",
        `Too many redirects (max ${this.options.maxRedirects})`,
        request.url,
      );
    }

    if (this.options.policy) {
      const decision = this.options.policy(makeAttempt(status, request.url, target.href, this.visited));
      if (decision.action === "stop") return this.done();
      if (decision.action === "error") return this.fail("policy", decision.message, request.url);
    }

    const built = this.buildNext(request, status, target);
    if (!built) {
      return this.fail(
        "unreplayable-body",
        `Cannot follow ${status} redirect: request body is a stream and cannot be resent`,
        request.url,
      );
    }

    this.hops++;
    this.visited.push(target.href);
    this._state = { kind: "following", hops: this.hops, visited: [...this.visited] };
    return { kind: "follow", request: built };
  }

  /** Rewrite the request for the next hop; null when the body cannot be replayed */
  private buildNext(request: HttpRequest, status: number, target: ParsedUrl): HttpRequest | null {
    const headers = request.headers.clone();
    let { method, body } = request;

    const downgrade =
      (status === 303 && method !== "GET" && method !== "HEAD") ||
      ((status === 301 || status === 302) &&
        this.options.downgradeMethod &&
        method !== "GET" &&
        method !== "HEAD");

    if (downgrade) {
      method = "GET";
      body = null;
      for (const name of BODY_HEADERS) headers.delete(name);
    } else if (body?.kind === "streaming") {
      // 307/308 (or 301/302 without downgrade) must resend the body
      return null;
    }

    const previous = parseUrl(request.url);
    if (previous.hostname !== target.hostname || previous.port !== target.port) {
      for (const name of CROSS_ORIGIN_STRIPPED) headers.delete(name);
    }

    headers.delete("referer");
    if (this.options.referer && !(previous.protocol === "https" && target.protocol === "http")) {
      headers.set("referer", refererFor(request.url));
    }

    return {
      method,
      url: target.href,
      headers,
      body,
      timeout: request.timeout,
      signal: request.signal,
    };
  }

  private done(): RedirectDecision {
    this._state = { kind: "done" };
    return { kind: "done" };
  }

  private fail(reason: RedirectFailure, message: string, url: string): RedirectDecision {
    const error = new RedirectError(message, { url, reason, chain: [...this.visited] });
    this._state = { kind: "failed", error };
    return { kind: "failed", error };
  }
}

/** Resolve a Location header; null when it is not an http(s) URL */
export function resolveLocation(location: string, base: string): ParsedUrl | null {
  let resolved: URL;
  try {
    resolved = new URL(location, base);
  } catch {
    return null;
  }
  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") return null;
  if (!resolved.hostname) return null;
  return parseUrl(resolved);
}

/** Previous URL without credentials or fragment */
function refererFor(url: string): string {
  const parsed = new URL(url);
  parsed.username = "";
  parsed.password = "";
  parsed.hash = "";
  return parsed.href;
}

function makeAttempt(
  status: number,
  from: string,
  to: string,
  visited: readonly string[],
): RedirectAttempt {
  return {
    status,
    from,
    to,
    previous: [...visited],
    follow: () => ({ action: "follow" }),
    stop: () => ({ action: "stop" }),
    error: message => ({ action: "error", message }),
  };
}

/** Stop after `max` hops; a drop-in policy for `RedirectOptions.policy` */
export function limitedPolicy(max: number): RedirectPolicy {
  return attempt =>
    attempt.previous.length > max
      ? attempt.error(`Too many redirects (max ${max})`)
      : attempt.follow();
}
