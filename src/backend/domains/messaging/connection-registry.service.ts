/**
 * Connection Registry
 *
 * Process-local index from thread id to the live real-time connections bound
 * to it. The registry owns its map outright: handlers only reach it through
 * bind/unbind/broadcast, each of which completes its map mutation
 * synchronously, so concurrent handlers on the event loop never observe a
 * half-updated set.
 *
 * Fan-out to other server instances is not handled here.
 */

import { WS_READY_STATE } from '@/backend/constants';
import { toError } from '@/backend/lib/error-utils';
import { createLogger } from '@/backend/services/logger.service';

const logger = createLogger('connection-registry');

const DEFAULT_WRITE_TIMEOUT_MS = 5000;

/**
 * The slice of a `ws` WebSocket the registry relies on.
 */
export interface ThreadConnection {
  readonly readyState: number;
  send(data: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export interface BroadcastResult {
  delivered: number;
  pruned: number;
}

export interface ConnectionRegistryOptions {
  /** Per-connection budget for one write before the peer is dropped */
  writeTimeoutMs?: number;
}

export class ConnectionRegistry {
  private readonly connections = new Map<string, Set<ThreadConnection>>();
  private writeTimeoutMs: number;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
  }

  setWriteTimeout(writeTimeoutMs: number): void {
    this.writeTimeoutMs = writeTimeoutMs;
  }

  bind(threadId: string, connection: ThreadConnection): void {
    let set = this.connections.get(threadId);
    if (!set) {
      set = new Set();
      this.connections.set(threadId, set);
    }
    set.add(connection);
    logger.info('Connection bound', { threadId, connections: set.size });
  }

  /**
   * Remove a connection. Safe to call more than once.
   */
  unbind(threadId: string, connection: ThreadConnection): boolean {
    const set = this.connections.get(threadId);
    if (!set?.delete(connection)) {
      return false;
    }
    if (set.size === 0) {
      this.connections.delete(threadId);
    }
    logger.info('Connection unbound', { threadId, connections: set.size });
    return true;
  }

  connectionCount(threadId?: string): number {
    if (threadId !== undefined) {
      return this.connections.get(threadId)?.size ?? 0;
    }
    let total = 0;
    for (const set of this.connections.values()) {
      total += set.size;
    }
    return total;
  }

  /**
   * Push a serialized frame to every connection bound to the thread.
   *
   * Writes are issued synchronously in bind order against a snapshot of the
   * set, so two broadcasts for the same thread reach each peer in call order.
   * A peer whose write errors, or does not complete within the write timeout,
   * is unbound and terminated; the others are unaffected.
   */
  async broadcast(threadId: string, payload: string): Promise<BroadcastResult> {
    const set = this.connections.get(threadId);
    if (!set || set.size === 0) {
      return { delivered: 0, pruned: 0 };
    }

    const snapshot = [...set];
    const writes = snapshot.map((connection) => this.write(connection, payload));
    const results = await Promise.allSettled(writes);

    let pruned = 0;
    results.forEach((result, index) => {
      const connection = snapshot[index];
      if (result.status === 'fulfilled' || !connection) {
        return;
      }
      pruned += 1;
      logger.warn('Pruning connection after failed delivery', {
        threadId,
        error: toError(result.reason).message,
      });
      this.unbind(threadId, connection);
      connection.terminate();
    });

    logger.debug('Broadcast complete', { threadId, delivered: snapshot.length - pruned, pruned });
    return { delivered: snapshot.length - pruned, pruned };
  }

  /**
   * Close every connection, e.g. on shutdown.
   */
  closeAll(code = 1001, reason = 'Server shutting down'): void {
    for (const [threadId, set] of this.connections) {
      for (const connection of set) {
        try {
          connection.close(code, reason);
        } catch (error) {
          logger.warn('Failed to close connection', { threadId, error: toError(error).message });
          connection.terminate();
        }
      }
    }
    this.connections.clear();
  }

  private write(connection: ThreadConnection, payload: string): Promise<void> {
    if (connection.readyState !== WS_READY_STATE.OPEN) {
      return Promise.reject(new Error('Connection is not open'));
    }

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Write timed out after ${this.writeTimeoutMs}ms`));
      }, this.writeTimeoutMs);

      try {
        connection.send(payload, (err) => {
          clearTimeout(timer);
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        });
      } catch (error) {
        clearTimeout(timer);
        reject(toError(error));
      }
    });
  }
}

export const connectionRegistry = new ConnectionRegistry();
