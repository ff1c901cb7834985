/**
 * CONNECT tunnel through an HTTP proxy.
 * After a 2xx answer the socket carries raw bytes to the target, ready for TLS.
 */
import { Buffer } from "node:buffer";
import type { Duplex } from "node:stream";
import { ConnectError, errorMessage } from "../errors.js";
import { parseResponseHead, ResponseParseError } from "../http1/parser.js";

const MAX_TUNNEL_HEAD = 8192;

export interface TunnelOptions {
  /** Target host (IPv6 without brackets) */
  host: string;
  port: number;
  /** Value for the Proxy-Authorization header */
  proxyAuthorization?: string;
  userAgent?: string;
  signal: AbortSignal;
  /** Request URL, for error context */
  url: string;
}

/** Format `host:port` for a CONNECT request target. */
export function authorityOf(host: string, port: number): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * Send `CONNECT host:port HTTP/1.1` and wait for the proxy's answer.
 * Resolves with the same socket once the tunnel is open; the socket is
 * destroyed when the proxy refuses or the handshake fails.
 */
export function openTunnel(socket: Duplex, options: TunnelOptions): Promise<Duplex> {
  const { url, signal } = options;
  const authority = authorityOf(options.host, options.port);

  let head = `CONNECT ${authority} HTTP/1.1\r\nHost: ${authority}\r\n`;
  if (options.userAgent) head += `User-Agent: ${options.userAgent}\r\n`;
  if (options.proxyAuthorization) head += `Proxy-Authorization: ${options.proxyAuthorization}\r\n`;
  head += "\r\n";

  return new Promise<Duplex>((resolve, reject) => {
    let buffer: Buffer = Buffer.alloc(0);
    let done = false;

    const cleanup = () => {
      socket.removeListener("data", onData);
      socket.removeListener("end", onEnd);
      socket.removeListener("close", onEnd);
      socket.removeListener("error", onError);
      signal.removeEventListener("abort", onAbort);
    };

    const fail = (err: unknown) => {
      if (done) return;
      done = true;
      cleanup();
      socket.destroy();
      reject(err);
    };

    const onAbort = () => fail(signal.reason);

    const onEnd = () => {
      fail(new ConnectError("Unexpected EOF while tunneling", { url, phase: "tunnel" }));
    };

    const onError = (err: Error) => {
      fail(
        new ConnectError(`Tunnel connection failed: ${err.message}`, {
          url,
          phase: "tunnel",
          cause: err,
        }),
      );
    };

    const onData = (chunk: Buffer) => {
      buffer = Buffer.concat([buffer, chunk]);
      if (buffer.length > MAX_TUNNEL_HEAD) {
        fail(new ConnectError("Proxy response headers too large", { url, phase: "tunnel" }));
        return;
      }

      let parsed: ReturnType<typeof parseResponseHead>;
      try {
        parsed = parseResponseHead(buffer, { method: "CONNECT" });
      } catch (err) {
        fail(
          new ConnectError(
            `Invalid proxy response: ${err instanceof ResponseParseError ? err.message : errorMessage(err)}`,
            { url, phase: "tunnel", cause: err },
          ),
        );
        return;
      }
      if (!parsed) return;

      const { status, statusText } = parsed.response;
      if (status === 407) {
        fail(
          new ConnectError("Proxy authentication required", {
            url,
            phase: "tunnel",
            proxyStatus: status,
          }),
        );
        return;
      }
      if (status < 200 || status > 299) {
        fail(
          new ConnectError(`Proxy refused CONNECT: ${status} ${statusText}`.trimEnd(), {
            url,
            phase: "tunnel",
            proxyStatus: status,
          }),
        );
        return;
      }

      done = true;
      cleanup();
      socket.pause();
      // Bytes after the proxy's head already belong to the tunnelled stream
      const rest = buffer.subarray(parsed.bodyStart);
      if (rest.length > 0) socket.unshift(rest);
      resolve(socket);
    };

    if (signal.aborted) {
      fail(signal.reason);
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    socket.on("data", onData);
    socket.on("end", onEnd);
    socket.on("close", onEnd);
    socket.on("error", onError);
    socket.resume();

    socket.write(Buffer.from(head, "latin1"), (err?: Error | null) => {
      if (err) {
        fail(
          new ConnectError(`Failed to send CONNECT: ${err.message}`, {
            url,
            phase: "tunnel",
            cause: err,
          }),
        );
      }
    });
  });
}
