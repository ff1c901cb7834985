/**
 * A live connection to one origin (directly or through a proxy).
 *
 * A transport is either active (owned by exactly one in-flight request),
 * idle (parked in the pool) or closed. While idle it watches the socket:
 * a peer close, an error, or any unsolicited byte marks it dead, so the
 * pool's liveness check on checkout never hands out a half-closed socket.
 */
import type { Duplex } from "node:stream";
import type { LookupFunction } from "node:net";
import { http1Request, type Http1Request, type Http1Response } from "./http1/client.js";
import type { Logger } from "./logger.js";
import type { ProxyTarget } from "./proxy.js";
import {
  connectDeadline,
  openSocket,
  upgradeSocket,
  type Connector,
  type SecureOptions,
} from "./socket/connect.js";
import { authorityOf, openTunnel } from "./socket/tunnel.js";

export interface ConnectionKey {
  scheme: "http" | "https";
  host: string;
  port: number;
  /** Identity of the proxy in between, if any */
  proxy?: string;
}

export function connectionKeyId(key: ConnectionKey): string {
  const origin = `${key.scheme}://${authorityOf(key.host, key.port)}`;
  return key.proxy ? `${origin} via ${key.proxy}` : origin;
}

export type TransportState = "active" | "idle" | "closed";

export interface TransportInit {
  key: ConnectionKey;
  socket: Duplex;
  /** Write absolute-form request targets (plain HTTP through a forward proxy) */
  absoluteForm?: boolean;
  /** Proxy-Authorization sent with every request (plain HTTP through a proxy) */
  proxyAuthorization?: string;
  logger: Logger;
}

export class Transport {
  readonly key: ConnectionKey;
  readonly id: string;
  readonly absoluteForm: boolean;
  readonly proxyAuthorization?: string;
  /** Number of requests sent over this transport */
  requestCount = 0;
  /** Time the transport last went idle (ms since epoch) */
  idleSince = 0;

  private readonly socket: Duplex;
  private readonly logger: Logger;
  private _state: TransportState = "active";
  private peerGone = false;

  constructor(init: TransportInit) {
    this.key = init.key;
    this.id = connectionKeyId(init.key);
    this.socket = init.socket;
    this.absoluteForm = init.absoluteForm ?? false;
    this.proxyAuthorization = init.proxyAuthorization;
    this.logger = init.logger;
  }

  get state(): TransportState {
    return this._state;
  }

  /** Whether the connection can still carry a request */
  get isAlive(): boolean {
    return (
      this._state !== "closed" &&
      !this.peerGone &&
      !this.socket.destroyed &&
      this.socket.readable &&
      this.socket.writable
    );
  }

  /** Run one request/response exchange. The transport must be active. */
  async send(request: Http1Request): Promise<Http1Response> {
    if (this._state !== "active") {
      throw new Error(`Transport ${this.id} is ${this._state}, not active`);
    }
    this.requestCount++;
    const response = await http1Request(this.socket, request);
    void response.settled.then(outcome => {
      if (outcome === "closed") this.markClosed();
    });
    return response;
  }

  /** Park the transport; starts watching for a peer close. */
  markIdle(): void {
    if (this._state === "closed") return;
    this._state = "idle";
    this.idleSince = Date.now();
    this.socket.on("data", this.onIdleData);
    this.socket.on("end", this.onIdleClose);
    this.socket.on("close", this.onIdleClose);
    this.socket.on("error", this.onIdleError);
    // Flowing while idle so a FIN from the peer is noticed
    this.socket.resume();
  }

  /** Hand the transport to a request. */
  markActive(): void {
    if (this._state === "closed") return;
    this.stopWatching();
    this._state = "active";
    this.socket.pause();
  }

  close(): void {
    if (this._state === "closed") return;
    this.stopWatching();
    this.markClosed();
    this.socket.destroy();
  }

  private markClosed(): void {
    this._state = "closed";
  }

  private stopWatching(): void {
    this.socket.removeListener("data", this.onIdleData);
    this.socket.removeListener("end", this.onIdleClose);
    this.socket.removeListener("close", this.onIdleClose);
    this.socket.removeListener("error", this.onIdleError);
  }

  private onIdleData = () => {
    this.logger.debug(`[pool] unexpected data on idle connection ${this.id}, dropping it`);
    this.peerGone = true;
    this.close();
  };

  private onIdleClose = () => {
    this.logger.debug(`[pool] idle connection ${this.id} closed by peer`);
    this.peerGone = true;
    this.close();
  };

  private onIdleError = (err: Error) => {
    this.logger.debug(`[pool] idle connection ${this.id} failed: ${err.message}`);
    this.peerGone = true;
    this.close();
  };
}

export interface EstablishOptions {
  key: ConnectionKey;
  proxy: ProxyTarget | null;
  connector: Connector;
  lookup?: LookupFunction;
  connectTimeout: number;
  tls: Omit<SecureOptions, "servername">;
  userAgent?: string;
  signal?: AbortSignal;
  /** Request URL, for error context */
  url: string;
  logger: Logger;
}

/**
 * Open a new transport for a connection key.
 * HTTPS through a proxy tunnels with CONNECT before the TLS handshake;
 * plain HTTP through a proxy talks to the proxy in absolute form.
 */
export async function establishTransport(options: EstablishOptions): Promise<Transport> {
  const { key, proxy, connector, lookup, url, logger } = options;
  const deadline = connectDeadline(options.connectTimeout, url, options.signal);
  const { signal } = deadline;
  const targetTls: SecureOptions = { ...options.tls, servername: key.host };

  try {
    if (!proxy) {
      logger.debug(`[socket] connecting to ${connectionKeyId(key)}`);
      const socket = await openSocket(connector, {
        host: key.host,
        port: key.port,
        lookup,
        tls: key.scheme === "https" ? targetTls : undefined,
        signal,
        url,
      });
      return new Transport({ key, socket, logger });
    }

    logger.debug(`[socket] connecting to proxy ${proxy.id} for ${connectionKeyId(key)}`);
    const proxySocket = await openSocket(connector, {
      host: proxy.host,
      port: proxy.port,
      lookup,
      tls: proxy.protocol === "https" ? { ...options.tls, servername: proxy.host } : undefined,
      signal,
      url,
    });

    if (key.scheme === "http") {
      return new Transport({
        key,
        socket: proxySocket,
        absoluteForm: true,
        proxyAuthorization: proxy.authorization,
        logger,
      });
    }

    logger.debug(`[tunnel] CONNECT ${authorityOf(key.host, key.port)} via ${proxy.id}`);
    const tunnel = await openTunnel(proxySocket, {
      host: key.host,
      port: key.port,
      proxyAuthorization: proxy.authorization,
      userAgent: options.userAgent,
      signal,
      url,
    });
    const socket = await upgradeSocket(connector, tunnel, targetTls, signal, url);
    return new Transport({ key, socket, logger });
  } finally {
    deadline.clear();
  }
}
