/**
 * Cookie jar shared by every request of a client.
 *
 * Storage, RFC 6265 matching and Set-Cookie parsing are tough-cookie's; this
 * class pins down the contract the engine relies on: synchronous access,
 * a header value per URL, ingestion that never throws for a bad cookie, and
 * a versioned JSON form for persistence.
 */
import {
  Cookie,
  cookieCompare,
  CookieJar as ToughCookieJar,
  MemoryCookieStore,
} from "tough-cookie";
import { errorMessage } from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";

export interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  /** Sent only to the exact host that set it */
  hostOnly: boolean;
  path: string;
  /** Expiry in ms since epoch, or null for a session cookie */
  expires: number | null;
  secure: boolean;
  httpOnly: boolean;
  sameSite?: string;
  /** Creation time in ms since epoch */
  creation: number;
}

export interface CookieInit {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  expires?: Date;
  secure?: boolean;
  httpOnly?: boolean;
}

export type SerializedCookieJar = ToughCookieJar.Serialized;

function toStoredCookie(cookie: Cookie): StoredCookie {
  const expiry = cookie.expiryTime();
  return {
    name: cookie.key,
    value: cookie.value,
    domain: cookie.domain ?? "",
    hostOnly: cookie.hostOnly ?? true,
    path: cookie.path ?? "/",
    expires: Number.isFinite(expiry) ? expiry : null,
    secure: cookie.secure,
    httpOnly: cookie.httpOnly,
    sameSite: cookie.sameSite,
    creation: cookie.creation instanceof Date ? cookie.creation.getTime() : 0,
  };
}

export class CookieJar {
  private readonly store: MemoryCookieStore;
  private readonly jar: ToughCookieJar;
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.store = new MemoryCookieStore();
    this.jar = new ToughCookieJar(this.store, { looseMode: true });
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * `Cookie` header value for a request to `url`, or "" when nothing matches.
   * Longer paths come first, then older cookies.
   */
  cookiesFor(url: string): string {
    const now = Date.now();
    // expire: false keeps lookups read-only; expired cookies are skipped here
    return this.jar
      .getCookiesSync(url, { expire: false })
      .filter(c => c.expiryTime() > now)
      .sort(cookieCompare)
      .map(c => c.cookieString())
      .join("; ");
  }

  /**
   * Store the cookies from a response's Set-Cookie headers.
   * A cookie with an expiry in the past deletes the stored one and is not
   * kept itself; rejected cookies (foreign domain, malformed) are skipped.
   */
  ingest(url: string, setCookieHeaders: readonly string[]): void {
    for (const header of setCookieHeaders) {
      try {
        const stored = this.jar.setCookieSync(header, url);
        // An expired cookie has replaced its namesake; drop it as well
        if (stored.expiryTime() <= Date.now()) this.remove(stored);
      } catch (err) {
        const name = header.split("=", 1)[0].trim();
        this.logger.debug(
          `[cookies] rejected cookie "${name}" from ${url}: ${errorMessage(err)}`,
        );
      }
    }
  }

  /** Store a cookie as if `url` had set it. Throws when the cookie is rejected. */
  set(url: string, init: CookieInit): void {
    const cookie = new Cookie({
      key: init.name,
      value: init.value,
      secure: init.secure ?? false,
      httpOnly: init.httpOnly ?? false,
    });
    // Unset fields keep tough-cookie's defaults (host-only, default path, session)
    if (init.domain !== undefined) cookie.domain = init.domain;
    if (init.path !== undefined) cookie.path = init.path;
    if (init.expires !== undefined) cookie.expires = init.expires;
    this.jar.setCookieSync(cookie, url);
  }

  /** Snapshot of every stored, unexpired cookie */
  all(): StoredCookie[] {
    const now = Date.now();
    let cookies: Cookie[] = [];
    // The memory store answers synchronously
    this.store.getAllCookies((err, found) => {
      if (err) throw err;
      cookies = found;
    });
    return cookies.filter(c => c.expiryTime() > now).map(toStoredCookie);
  }

  private remove(cookie: Cookie): void {
    const { domain, path, key } = cookie;
    if (!domain || !path) return;
    this.store.removeCookie(domain, path, key, err => {
      if (err) throw err;
    });
  }

  /** Remove every cookie, session cookies included */
  clear(): void {
    this.jar.removeAllCookiesSync();
  }

  toJSON(): SerializedCookieJar {
    return this.jar.serializeSync();
  }

  static fromJSON(data: SerializedCookieJar | string, options: { logger?: Logger } = {}): CookieJar {
    const jar = new CookieJar(options);
    // Restores into this jar's store
    ToughCookieJar.deserializeSync(data, jar.store);
    return jar;
  }
}
