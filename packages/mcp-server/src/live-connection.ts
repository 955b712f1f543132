/**
 * Live Connection: lazily opened, reused bridge to the executor.
 *
 * `get()` returns the open bridge, opens a new one when none is open (or
 * the last one was lost), and returns null when the executor cannot be
 * reached so callers can fall back to script rendering.
 */

import { isCadLinkError, silentLogger } from '@cadlink/protocol';
import type { Logger } from '@cadlink/protocol';
import { DEFAULT_CONNECT_TIMEOUT_MS, ExecutorBridge } from './bridge.js';

export interface LiveConnectionOptions {
  host: string;
  port: number;
  connectTimeoutMs?: number;
  logger?: Logger;
}

export class LiveConnection {
  private readonly options: LiveConnectionOptions;
  private readonly logger: Logger;
  private bridge: ExecutorBridge | null = null;
  private opening: Promise<ExecutorBridge | null> | null = null;
  private lastError: string | null = null;
  /** Bumped by close(); an open that started before it is discarded. */
  private generation = 0;

  constructor(options: LiveConnectionOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  get isConnected(): boolean {
    return this.bridge?.isConnected ?? false;
  }

  /** Reason the most recent connection attempt failed, if it did. */
  get lastFailure(): string | null {
    return this.lastError;
  }

  get address(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  async get(): Promise<ExecutorBridge | null> {
    if (this.bridge?.isConnected) return this.bridge;
    if (!this.opening) {
      const opening: Promise<ExecutorBridge | null> = this.open().finally(() => {
        if (this.opening === opening) this.opening = null;
      });
      this.opening = opening;
    }
    return this.opening;
  }

  /** Drops the open bridge and any connect still in progress. */
  close(): void {
    this.generation++;
    this.opening = null;
    this.bridge?.close();
    this.bridge = null;
  }

  private async open(): Promise<ExecutorBridge | null> {
    const { host, port } = this.options;
    const bridge = new ExecutorBridge({ host, port, logger: this.logger.child('bridge') });
    const generation = this.generation;

    try {
      await bridge.connect(this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
    } catch (err) {
      if (!isCadLinkError(err)) throw err;
      if (generation !== this.generation) return null;
      this.bridge = null;
      this.lastError = err.message;
      this.logger.warn(`Executor unavailable: ${err.message}`);
      return null;
    }

    if (generation !== this.generation) {
      bridge.close();
      return null;
    }
    this.bridge = bridge;
    this.lastError = null;
    return bridge;
  }
}
