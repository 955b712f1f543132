/**
 * Executor Bridge: client side of the framed TCP protocol.
 *
 * Requests go out FIFO with one in flight. Each request's timer starts
 * when it is queued; a request whose timer fires while still queued is
 * dropped without being sent. A request that times out in flight keeps
 * the queue blocked until its late reply arrives (and is discarded) or
 * the connection drops, so replies can never be matched to the wrong
 * request.
 */

import { createConnection } from 'node:net';
import type { Socket } from 'node:net';
import {
  ConnectionError,
  ConnectionLostError,
  ConnectionRefusedError,
  FrameDecoder,
  MalformedMessageError,
  TimeoutError,
  createToolCall,
  encode,
  errorFromPayload,
  parsePayload,
  silentLogger,
} from '@cadlink/protocol';
import type { Logger, ToolCall, WireMessage } from '@cadlink/protocol';

export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 3_000;

export interface BridgeOptions {
  host: string;
  port: number;
  logger?: Logger;
}

interface PendingRequest {
  id: number;
  tool: string;
  timeoutMs: number;
  sentAt: number | null;
  resolve: (result: unknown) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

interface Greeting {
  resolve: () => void;
  reject: (err: Error) => void;
}

export class ExecutorBridge {
  private readonly host: string;
  private readonly port: number;
  private readonly logger: Logger;

  private socket: Socket | null = null;
  private greeting: Greeting | null = null;
  private readonly decoder = new FrameDecoder();
  private nextId = 1;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly queue: Array<{ id: number; frame: Buffer }> = [];
  private inFlightId: number | null = null;

  constructor(options: BridgeOptions) {
    this.host = options.host;
    this.port = options.port;
    this.logger = options.logger ?? silentLogger;
  }

  get address(): string {
    return `${this.host}:${this.port}`;
  }

  /** Connected and greeted by the executor. */
  get isConnected(): boolean {
    return this.socket !== null && this.greeting === null;
  }

  /** Requests awaiting a reply, queued ones included. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Requests not yet written to the socket. */
  get queuedCount(): number {
    return this.queue.length;
  }

  // ─── Connection ─────────────────────────────────────────────────

  async connect(timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS): Promise<void> {
    if (this.socket) {
      throw new ConnectionError(`Already connected to ${this.address}`);
    }

    const socket = createConnection({ host: this.host, port: this.port });
    socket.setNoDelay(true);
    this.socket = socket;
    this.decoder.reset();

    const ready = new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.teardown(socket, `timed out after ${timeoutMs}ms`);
      }, timeoutMs);
      this.greeting = {
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };
    });

    socket.on('data', (chunk) => this.receive(socket, chunk));
    socket.on('error', (err) => this.teardown(socket, err.message));
    socket.on('close', () => this.teardown(socket, null));

    await ready;
    this.logger.info(`Connected to executor at ${this.address}`);
  }

  /** Rejects everything pending or queued with ConnectionLost. */
  close(): void {
    if (this.socket) this.teardown(this.socket, 'closed by client');
  }

  // ─── Requests ───────────────────────────────────────────────────

  /** Validate raw input and send it. Nothing is written when validation fails. */
  async call(name: string, raw: unknown, timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS): Promise<unknown> {
    return this.send(createToolCall(name, raw), timeoutMs);
  }

  async send(call: ToolCall, timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS): Promise<unknown> {
    if (!this.isConnected) {
      throw new ConnectionError(`Not connected to the executor at ${this.address}`);
    }

    const id = this.nextId++;
    const frame = encode(call, id);

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => this.expire(id), timeoutMs);
      this.pending.set(id, { id, tool: call.name, timeoutMs, sentAt: null, resolve, reject, timer });
      this.queue.push({ id, frame });
      this.logger.debug(`Queued #${id} ${call.name}`);
      this.flush();
    });
  }

  private flush(): void {
    if (!this.socket || this.inFlightId !== null) return;

    const next = this.queue.shift();
    if (!next) return;

    this.inFlightId = next.id;
    const request = this.pending.get(next.id);
    if (request) request.sentAt = Date.now();
    this.socket.write(next.frame);
  }

  private expire(id: number): void {
    const request = this.pending.get(id);
    if (!request) return;

    this.pending.delete(id);
    const queued = this.queue.findIndex((entry) => entry.id === id);
    if (queued >= 0) {
      this.queue.splice(queued, 1);
      this.logger.warn(`#${id} ${request.tool} timed out before it was sent; dropped`);
    } else {
      this.logger.warn(`#${id} ${request.tool} timed out after ${request.timeoutMs}ms; waiting for its late reply`);
    }
    request.reject(new TimeoutError(request.tool, request.timeoutMs));
  }

  // ─── Incoming ───────────────────────────────────────────────────

  private receive(socket: Socket, chunk: Buffer): void {
    if (this.socket !== socket) return;

    try {
      for (const payload of this.decoder.push(chunk)) {
        this.route(parsePayload(payload));
        if (this.socket !== socket) return;
      }
    } catch (err) {
      if (!(err instanceof MalformedMessageError)) throw err;
      this.logger.error(`Malformed frame from executor: ${err.message}`);
      this.teardown(socket, err.message);
    }
  }

  private route(message: WireMessage): void {
    if (message.kind === 'request') {
      throw new MalformedMessageError('Executor sent a request frame');
    }

    const greeting = this.greeting;
    if (greeting) {
      if (message.id !== 0) {
        throw new MalformedMessageError(`Expected the ready greeting, got a reply for #${message.id}`);
      }
      if (message.kind === 'error') {
        const err = message.error.code === 'CONNECTION_REFUSED'
          ? new ConnectionRefusedError(message.error.message)
          : errorFromPayload(message.error);
        this.greeting = null;
        greeting.reject(err);
        if (this.socket) this.teardown(this.socket, null);
        return;
      }
      this.greeting = null;
      greeting.resolve();
      return;
    }

    const request = this.pending.get(message.id);
    if (!request) {
      this.logger.warn(`Discarding stale ${message.kind} for #${message.id}`);
      if (message.id === this.inFlightId) {
        this.inFlightId = null;
        this.flush();
      }
      return;
    }

    this.pending.delete(message.id);
    clearTimeout(request.timer);
    if (this.inFlightId === message.id) this.inFlightId = null;

    const elapsed = request.sentAt === null ? 0 : Date.now() - request.sentAt;
    if (message.kind === 'response') {
      this.logger.debug(`#${message.id} ${request.tool} done in ${elapsed}ms`);
      request.resolve(message.result);
    } else {
      this.logger.debug(`#${message.id} ${request.tool} failed: ${message.error.code}`);
      request.reject(errorFromPayload(message.error));
    }
    this.flush();
  }

  /** Drop the socket and fail the handshake, every pending and every queued request. */
  private teardown(socket: Socket, detail: string | null): void {
    if (this.socket !== socket) return;

    this.socket = null;
    this.inFlightId = null;
    this.queue.length = 0;
    socket.destroy();

    const greeting = this.greeting;
    if (greeting) {
      this.greeting = null;
      greeting.reject(
        new ConnectionError(
          detail === null
            ? `Executor at ${this.address} closed the connection before it was ready`
            : `Cannot connect to executor at ${this.address}: ${detail}`
        )
      );
      return;
    }

    const lost = new ConnectionLostError(detail === null ? undefined : `Connection to the executor was lost: ${detail}`);
    for (const request of this.pending.values()) {
      clearTimeout(request.timer);
      request.reject(lost);
    }
    if (this.pending.size > 0) {
      this.logger.warn(`Connection lost with ${this.pending.size} request(s) pending`);
    }
    this.pending.clear();
    this.logger.info(`Disconnected from executor at ${this.address}`);
  }
}
