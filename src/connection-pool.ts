/**
 * Keep-alive connection pool.
 * Idle HTTP/1.1 transports are kept per connection key, most recently used
 * first, so sequential requests to the same origin skip the TCP + TLS
 * handshake. Eviction (age, dead peers, per-key limit) runs lazily on
 * checkout and release; the pool owns no timers.
 *
 * Every method is synchronous apart from waiting on `establish`, so pool
 * state never changes across an await.
 */
import type { Logger } from "./logger.js";
import { connectionKeyId, type ConnectionKey, type Transport } from "./transport.js";

export interface PoolOptions {
  /** Idle transports kept per key; 0 disables reuse */
  maxIdlePerHost: number;
  /** Maximum time a transport may sit idle (ms) */
  idleTimeout: number;
  logger: Logger;
}

export interface Acquired {
  transport: Transport;
  /** True when the transport came from the pool rather than a fresh connect */
  reused: boolean;
}

export class ConnectionPool {
  private readonly idle = new Map<string, Transport[]>();
  private readonly inUse = new Set<Transport>();
  private readonly options: PoolOptions;

  constructor(options: PoolOptions) {
    this.options = options;
  }

  /**
   * Reuse an idle transport for the key, or establish a new one.
   * `fresh` skips the idle list.
   */
  async acquire(
    key: ConnectionKey,
    establish: () => Promise<Transport>,
    options: { fresh?: boolean } = {},
  ): Promise<Acquired> {
    const pooled = options.fresh ? null : this.checkout(key);
    if (pooled) return { transport: pooled, reused: true };
    const transport = await establish();
    this.inUse.add(transport);
    return { transport, reused: false };
  }

  /**
   * Take the most recently used live transport for the key.
   * Expired and dead transports met on the way are closed.
   */
  checkout(key: ConnectionKey): Transport | null {
    const id = connectionKeyId(key);
    const list = this.idle.get(id);
    if (!list) return null;
    this.evictExpired(id, list);

    let found: Transport | null = null;
    while (list.length > 0) {
      const candidate = list.pop();
      if (candidate === undefined) break;
      if (candidate.isAlive) {
        found = candidate;
        break;
      }
      this.options.logger.debug(`[pool] dropping dead connection to ${id}`);
      candidate.close();
    }
    if (list.length === 0) this.idle.delete(id);
    if (!found) return null;

    found.markActive();
    this.inUse.add(found);
    this.options.logger.debug(`[pool] reusing connection to ${id}`);
    return found;
  }

  /**
   * Return a transport after its exchange settled cleanly.
   * Dead transports, and any beyond the per-key limit, are closed.
   */
  release(transport: Transport): void {
    if (!this.inUse.delete(transport)) return;
    const { maxIdlePerHost } = this.options;
    if (maxIdlePerHost <= 0 || !transport.isAlive) {
      transport.close();
      return;
    }

    const id = transport.id;
    const list = this.idle.get(id) ?? [];
    transport.markIdle();
    list.push(transport);
    // Oldest idle transports sit at the front
    while (list.length > maxIdlePerHost) {
      list.shift()?.close();
    }
    this.evictExpired(id, list);
    if (list.length > 0) this.idle.set(id, list);
    else this.idle.delete(id);
  }

  /** Close a transport that must not be reused. */
  discard(transport: Transport): void {
    this.inUse.delete(transport);
    const list = this.idle.get(transport.id);
    if (list) {
      const idx = list.indexOf(transport);
      if (idx !== -1) list.splice(idx, 1);
      if (list.length === 0) this.idle.delete(transport.id);
    }
    transport.close();
  }

  /** Close every idle transport. In-flight ones close when they are released. */
  clear(): void {
    for (const list of this.idle.values()) {
      for (const transport of list) transport.close();
    }
    this.idle.clear();
  }

  /** Idle transports for one key, or across all keys */
  idleCount(key?: ConnectionKey): number {
    if (key) return this.idle.get(connectionKeyId(key))?.length ?? 0;
    let total = 0;
    for (const list of this.idle.values()) total += list.length;
    return total;
  }

  /** Transports currently owned by a request */
  get activeCount(): number {
    return this.inUse.size;
  }

  private evictExpired(id: string, list: Transport[]): void {
    const now = Date.now();
    const { idleTimeout } = this.options;
    for (let i = list.length - 1; i >= 0; i--) {
      const transport = list[i];
      if (transport.state === "closed" || now - transport.idleSince > idleTimeout) {
        this.options.logger.debug(`[pool] evicting idle connection to ${id}`);
        list.splice(i, 1);
        transport.close();
      }
    }
  }
}
