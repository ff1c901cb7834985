/**
 * TCP/TLS connection factory.
 * The Connector is the pluggable socket layer; the default one uses Node's
 * net and tls modules. `openSocket` adds cancellation and error
 * classification on top of whichever connector is configured.
 */
import net, { type LookupFunction } from "node:net";
import tls from "node:tls";
import type { Duplex } from "node:stream";
import { ConnectError, TimeoutError, errorMessage } from "../errors.js";

export interface TcpOptions {
  host: string;
  port: number;
  lookup?: LookupFunction;
}

export interface SecureOptions {
  /** Host name for SNI and certificate verification */
  servername: string;
  rejectUnauthorized: boolean;
  ca?: string | Buffer | Array<string | Buffer>;
}

export interface Connector {
  /** Open a plain TCP connection */
  connect(options: TcpOptions): Promise<Duplex>;
  /** Start TLS over an already connected socket */
  secure(socket: Duplex, options: SecureOptions): Promise<Duplex>;
}

/** Connector backed by node:net and node:tls */
export const nodeConnector: Connector = {
  connect({ host, port, lookup }) {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host, port, lookup });
      const onError = (err: Error) => {
        socket.destroy();
        reject(err);
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.removeListener("error", onError);
        socket.setNoDelay(true);
        resolve(socket);
      });
    });
  },

  secure(socket, { servername, rejectUnauthorized, ca }) {
    return new Promise((resolve, reject) => {
      const tlsSocket = tls.connect({
        socket,
        // SNI must not carry an IP literal
        servername: net.isIP(servername) ? undefined : servername,
        rejectUnauthorized,
        ca,
        ALPNProtocols: ["http/1.1"],
      });
      const onError = (err: Error) => {
        tlsSocket.destroy();
        reject(err);
      };
      tlsSocket.once("error", onError);
      tlsSocket.once("secureConnect", () => {
        tlsSocket.removeListener("error", onError);
        resolve(tlsSocket);
      });
    });
  },
};

export interface ConnectDeadline {
  signal: AbortSignal;
  clear(): void;
}

/**
 * Combine the connect timeout with the caller's signal.
 * The timeout aborts with a TimeoutError in the "connect" phase.
 */
export function connectDeadline(
  timeout: number,
  url: string,
  signal?: AbortSignal,
): ConnectDeadline {
  const controller = new AbortController();
  const timer =
    timeout > 0
      ? setTimeout(
          () =>
            controller.abort(
              new TimeoutError(`Connect timeout after ${timeout}ms`, {
                url,
                phase: "connect",
                timeout,
              }),
            ),
          timeout,
        )
      : null;
  return {
    signal: signal ? AbortSignal.any([signal, controller.signal]) : controller.signal,
    clear: () => {
      if (timer) clearTimeout(timer);
    },
  };
}

export interface OpenSocketOptions extends TcpOptions {
  /** Upgrade to TLS after connecting */
  tls?: SecureOptions;
  signal: AbortSignal;
  /** Request URL, for error context */
  url: string;
}

/**
 * Open a TCP (and optionally TLS) socket through the connector.
 * Failures become ConnectError; an aborted signal rejects with its reason.
 */
export async function openSocket(connector: Connector, options: OpenSocketOptions): Promise<Duplex> {
  const { host, port, lookup, url, signal } = options;
  let socket: Duplex;
  try {
    socket = await abortable(connector.connect({ host, port, lookup }), signal);
  } catch (err) {
    throw wrapFailure(err, signal, `Failed to connect to ${host}:${port}`, url, "connect");
  }
  return options.tls ? upgradeSocket(connector, socket, options.tls, signal, url) : socket;
}

/** Run the TLS handshake over a connected socket (directly or through a tunnel). */
export async function upgradeSocket(
  connector: Connector,
  socket: Duplex,
  options: SecureOptions,
  signal: AbortSignal,
  url: string,
): Promise<Duplex> {
  try {
    return await abortable(connector.secure(socket, options), signal);
  } catch (err) {
    socket.destroy();
    throw wrapFailure(
      err,
      signal,
      `TLS handshake with ${options.servername} failed`,
      url,
      "handshake",
    );
  }
}

/**
 * Await a connection attempt unless the signal fires first.
 * A socket that arrives after cancellation is destroyed.
 */
export function abortable<T extends Duplex>(attempt: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    attempt.then(s => s.destroy(), () => {});
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const onAbort = () => {
      if (!settled) {
        settled = true;
        reject(signal.reason ?? new DOMException("Aborted", "AbortError"));
      }
    };
    signal.addEventListener("abort", onAbort, { once: true });
    attempt.then(
      result => {
        signal.removeEventListener("abort", onAbort);
        if (settled) {
          result.destroy();
          return;
        }
        settled = true;
        resolve(result);
      },
      err => {
        signal.removeEventListener("abort", onAbort);
        if (!settled) {
          settled = true;
          reject(err);
        }
      },
    );
  });
}

function wrapFailure(
  err: unknown,
  signal: AbortSignal,
  message: string,
  url: string,
  phase: "connect" | "handshake",
): unknown {
  // Timeouts and caller aborts pass through as-is
  if (signal.aborted && err === signal.reason) return err;
  if (err instanceof ConnectError || err instanceof TimeoutError) return err;
  return new ConnectError(`${message}: ${errorMessage(err)}`, { url, phase, cause: err });
}
