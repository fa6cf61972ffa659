/**
 * Per-backend lifecycle and serialization.
 *
 * Each backend name maps to exactly one ServerEntry holding a stable mutex
 * and a lazily started connection. Every operation on a backend (starting
 * it, calling it, resetting it) runs under that backend's mutex, so traffic to
 * one backend is totally ordered while distinct backends proceed in parallel.
 *
 * Entry creation is the only step that mutates the shared name→entry map. It
 * is a synchronous check-then-insert with no await in between, so it cannot
 * interleave with another caller and never overlaps backend I/O.
 */

import type { ServerConfig } from "../config/types";
import type { BackendConnector, BackendHandle } from "../backend/types";
import {
  ServerSpawnFailedError,
  ServerUnavailableError,
  TimeoutError,
} from "../gateway/errors";
import { withTimeout } from "../util/timeout";
import { type BackoffOptions, calculateBackoff, DEFAULT_BACKOFF } from "./backoff";
import { Mutex } from "./mutex";
import { error as logError, log, warn } from "../util/logger";

export type ConnectionState = "NotStarted" | "Starting" | "Ready" | "Failed";

export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;

interface ServerEntry {
  readonly name: string;
  readonly mutex: Mutex;
  state: ConnectionState;
  handle?: BackendHandle;
  failureCount: number;
  lastActivity: number;
  lastFailureAt?: number;
  lastError?: string;
}

export interface ServerStatus {
  name: string;
  state: ConnectionState;
  failureCount: number;
  lastActivity: number;
  lastError?: string;
}

export interface ServerRegistryOptions {
  retry?: BackoffOptions;
  connectTimeoutMs?: number;
  /** Clock used for cooldowns and activity stamps. */
  now?: () => number;
}

export class ServerRegistry {
  private entries = new Map<string, ServerEntry>();
  private connector: BackendConnector;
  private servers: Readonly<Record<string, ServerConfig>>;
  private retry: Required<BackoffOptions>;
  private connectTimeoutMs: number;
  private now: () => number;
  private closed = false;

  constructor(
    connector: BackendConnector,
    servers: Record<string, ServerConfig>,
    options: ServerRegistryOptions = {},
  ) {
    this.connector = connector;
    this.servers = { ...servers };
    this.retry = { ...DEFAULT_BACKOFF, ...options.retry };
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  private getEntry(name: string): ServerEntry {
    const existing = this.entries.get(name);
    if (existing) return existing;

    const entry: ServerEntry = {
      name,
      mutex: new Mutex(),
      state: "NotStarted",
      failureCount: 0,
      lastActivity: this.now(),
    };
    this.entries.set(name, entry);
    log(`Registered backend entry: ${name}`);
    return entry;
  }

  /** The one mutex serializing all work against `name`. */
  getClientMutex(name: string): Mutex {
    return this.getEntry(name).mutex;
  }

  hasConfig(name: string): boolean {
    return Object.hasOwn(this.servers, name);
  }

  /**
   * Return the backend's connection, starting it if needed. The caller must
   * hold the mutex from getClientMutex(name) for the whole call and for any
   * use of the returned handle.
   */
  async getOrCreateConnection(name: string): Promise<BackendHandle> {
    const entry = this.getEntry(name);
    if (!entry.mutex.isLocked()) {
      throw new Error(
        `getOrCreateConnection("${name}") called without holding the backend's mutex`,
      );
    }
    if (this.closed) {
      throw new ServerUnavailableError(name, null, undefined, "gateway is shutting down");
    }

    if (entry.state === "Ready" && entry.handle) {
      if (entry.handle.connected) {
        entry.lastActivity = this.now();
        return entry.handle;
      }
      warn(`${name}: connection lost, starting a new one`);
      entry.handle = undefined;
      entry.state = "NotStarted";
    }

    if (entry.state === "Failed") {
      if (entry.failureCount >= this.retry.maxAttempts) {
        throw new ServerUnavailableError(name, null, entry.lastError);
      }
      const cooldown = calculateBackoff(entry.failureCount - 1, this.retry);
      const elapsed = this.now() - (entry.lastFailureAt ?? 0);
      if (elapsed < cooldown) {
        throw new ServerUnavailableError(name, cooldown - elapsed, entry.lastError);
      }
    }

    return this.start(entry);
  }

  private async start(entry: ServerEntry): Promise<BackendHandle> {
    const { name } = entry;
    entry.state = "Starting";
    log(`Starting backend: ${name} (attempt ${entry.failureCount + 1})`);

    try {
      const config = this.servers[name];
      if (!config) {
        throw new Error(`no configuration for backend "${name}"`);
      }

      const pending = this.connector.start(name, config);
      let handle: BackendHandle;
      try {
        handle = await withTimeout(
          pending,
          this.connectTimeoutMs,
          () => new TimeoutError(`Starting backend "${name}"`, this.connectTimeoutMs),
        );
      } catch (err) {
        if (err instanceof TimeoutError) {
          // A start that finishes after its deadline must not leave a live process behind.
          pending
            .then(late => late.close())
            .catch(lateErr =>
              log(
                `${name}: late start failed: ${
                  lateErr instanceof Error ? lateErr.message : String(lateErr)
                }`,
              )
            );
        }
        throw err;
      }

      entry.handle = handle;
      entry.state = "Ready";
      entry.failureCount = 0;
      entry.lastFailureAt = undefined;
      entry.lastError = undefined;
      entry.lastActivity = this.now();
      log(`Backend ready: ${name}`);
      return handle;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      entry.handle = undefined;
      entry.state = "Failed";
      entry.failureCount += 1;
      entry.lastFailureAt = this.now();
      entry.lastError = message;

      if (entry.failureCount >= this.retry.maxAttempts) {
        logError(
          `${name}: failed to start ${entry.failureCount} times, giving up until reset`,
        );
      } else {
        warn(
          `${name}: start failed (${message}); next attempt allowed in ${
            calculateBackoff(entry.failureCount - 1, this.retry)
          }ms`,
        );
      }
      throw new ServerSpawnFailedError(name, err);
    }
  }

  /** Record activity on a backend without touching its connection. */
  touch(name: string): void {
    this.getEntry(name).lastActivity = this.now();
  }

  /**
   * Close the backend's connection (if any) and clear its failure history,
   * so the next call starts it afresh.
   */
  async resetServer(name: string): Promise<void> {
    const entry = this.getEntry(name);
    await entry.mutex.runExclusive(async () => {
      await this.closeEntry(entry);
      entry.failureCount = 0;
      entry.lastFailureAt = undefined;
      entry.lastError = undefined;
      log(`Reset backend: ${name}`);
    });
  }

  status(): ServerStatus[] {
    return [...this.entries.values()].map(entry => ({
      name: entry.name,
      state: entry.state,
      failureCount: entry.failureCount,
      lastActivity: entry.lastActivity,
      lastError: entry.lastError,
    }));
  }

  /** Close every backend, each under its own mutex. No new starts afterwards. */
  async shutdown(): Promise<void> {
    this.closed = true;
    log("Shutting down all backend connections...");
    await Promise.allSettled(
      [...this.entries.values()].map(entry =>
        entry.mutex.runExclusive(() => this.closeEntry(entry))
      ),
    );
  }

  get isShutDown(): boolean {
    return this.closed;
  }

  private async closeEntry(entry: ServerEntry): Promise<void> {
    const handle = entry.handle;
    entry.handle = undefined;
    entry.state = "NotStarted";
    if (handle) {
      await handle.close();
    }
  }
}
