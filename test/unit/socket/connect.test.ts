import { describe, it, expect, vi, afterEach } from "vitest";
import type { Duplex } from "node:stream";
import { ConnectError, TimeoutError } from "../../../src/errors.js";
import {
  abortable,
  connectDeadline,
  openSocket,
  type Connector,
} from "../../../src/socket/connect.js";
import { MockSocket } from "../../helpers/mock-socket.js";
import { MockServer } from "../../helpers/mock-server.js";

const TARGET_URL = "https://example.com/";

function neverConnects(): Connector {
  return {
    connect: () => new Promise<Duplex>(() => {}),
    secure: socket => Promise.resolve(socket),
  };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("openSocket", () => {
  it("connects without TLS", async () => {
    const server = new MockServer(() => undefined);
    const socket = await openSocket(server, {
      host: "example.com",
      port: 80,
      signal: new AbortController().signal,
      url: TARGET_URL,
    });

    expect(socket).toBe(server.sockets[0]);
    expect(server.connects).toEqual([{ host: "example.com", port: 80, lookup: undefined }]);
    expect(server.secures).toEqual([]);
  });

  it("runs the TLS handshake with the given server name", async () => {
    const server = new MockServer(() => undefined);
    await openSocket(server, {
      host: "example.com",
      port: 443,
      tls: { servername: "example.com", rejectUnauthorized: true },
      signal: new AbortController().signal,
      url: TARGET_URL,
    });

    expect(server.secures).toEqual([{ servername: "example.com", rejectUnauthorized: true }]);
  });

  it("wraps TCP failures in ConnectError", async () => {
    const server = new MockServer(() => undefined);
    server.connectFailures.push(new Error("connect ECONNREFUSED 127.0.0.1:80"));
    const error = await openSocket(server, {
      host: "example.com",
      port: 80,
      signal: new AbortController().signal,
      url: TARGET_URL,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConnectError);
    expect(error).toMatchObject({
      message: "Failed to connect to example.com:80: connect ECONNREFUSED 127.0.0.1:80",
      phase: "connect",
      url: TARGET_URL,
    });
  });

  it("wraps handshake failures and destroys the socket", async () => {
    const socket = new MockSocket();
    const connector: Connector = {
      connect: () => Promise.resolve(socket),
      secure: () => Promise.reject(new Error("certificate has expired")),
    };
    const error = await openSocket(connector, {
      host: "example.com",
      port: 443,
      tls: { servername: "example.com", rejectUnauthorized: true },
      signal: new AbortController().signal,
      url: TARGET_URL,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConnectError);
    expect(error).toMatchObject({
      message: "TLS handshake with example.com failed: certificate has expired",
      phase: "handshake",
    });
    expect(socket.destroyed).toBe(true);
  });

  it("fails with the connect deadline's TimeoutError", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const deadline = connectDeadline(100, TARGET_URL);
    const pending = openSocket(neverConnects(), {
      host: "example.com",
      port: 443,
      signal: deadline.signal,
      url: TARGET_URL,
    }).catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(100);

    const error = await pending;
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({
      message: "Connect timeout after 100ms",
      phase: "connect",
      timeout: 100,
    });
  });

  it("passes the caller's abort reason through", async () => {
    const controller = new AbortController();
    const pending = openSocket(neverConnects(), {
      host: "example.com",
      port: 443,
      signal: controller.signal,
      url: TARGET_URL,
    });
    const reason = new Error("cancelled");
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });
});

describe("connectDeadline", () => {
  it("never fires when cleared", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const deadline = connectDeadline(100, TARGET_URL);
    deadline.clear();
    await vi.advanceTimersByTimeAsync(200);
    expect(deadline.signal.aborted).toBe(false);
  });

  it("has no timer for a zero timeout", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const deadline = connectDeadline(0, TARGET_URL);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(deadline.signal.aborted).toBe(false);
  });

  it("follows the caller's signal", () => {
    const controller = new AbortController();
    const deadline = connectDeadline(100, TARGET_URL, controller.signal);
    controller.abort(new Error("stop"));
    expect(deadline.signal.aborted).toBe(true);
    deadline.clear();
  });
});

describe("abortable", () => {
  it("destroys a socket that connects after the abort", async () => {
    const controller = new AbortController();
    let connect: (socket: MockSocket) => void = () => {};
    const attempt = new Promise<MockSocket>(resolve => {
      connect = resolve;
    });
    const pending = abortable(attempt, controller.signal).catch((err: unknown) => err);
    controller.abort(new Error("stop"));

    const late = new MockSocket();
    connect(late);
    await pending;
    await attempt;
    expect(late.destroyed).toBe(true);
  });
});
