/**
 * Command Executor: the host-side socket server.
 *
 * Accepts one client at a time and runs its requests strictly in order:
 * the socket is paused while a request is dispatched and the response is
 * written before the next frame is read.
 *
 *   closed → listening → connected ⇄ dispatching → listening / closed
 */

import { createServer } from 'node:net';
import type { AddressInfo, Server, Socket } from 'node:net';
import {
  ConnectionRefusedError,
  FrameDecoder,
  MalformedMessageError,
  NoActiveDocumentError,
  UnknownToolError,
  encodeError,
  encodeResult,
  errorToPayload,
  isToolName,
  parsePayload,
  parseToolParams,
  silentLogger,
} from '@cadlink/protocol';
import type { Logger, ToolName } from '@cadlink/protocol';
import type { DocumentHost } from './document.js';
import { createHandlerTable } from './handlers.js';
import type { HandlerTable } from './handlers.js';

export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 9876;

/** Time a turned-away peer gets to read its error frame before the socket is destroyed. */
const CLOSE_GRACE_MS = 1000;

export type ExecutorState = 'closed' | 'listening' | 'connected' | 'dispatching';

export interface ExecutorOptions {
  host?: string;
  /** 0 picks a free port; `start()` resolves the bound address. */
  port?: number;
  documents: DocumentHost;
  handlers?: HandlerTable;
  logger?: Logger;
}

export interface ExecutorStatus {
  state: ExecutorState;
  address: AddressInfo | null;
  client: string | null;
  handled: number;
}

function peerName(socket: Socket): string {
  return `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
}

function writeFrame(socket: Socket, frame: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(frame, (err) => (err ? reject(err) : resolve()));
  });
}

/** Send a last frame, then close once the peer has had a chance to read it. */
function turnAway(socket: Socket, frame: Buffer): void {
  socket.setTimeout(CLOSE_GRACE_MS, () => socket.destroy());
  socket.end(frame);
  socket.resume();
}

export class CommandExecutor {
  private readonly host: string;
  private readonly port: number;
  private readonly documents: DocumentHost;
  private readonly handlers: HandlerTable;
  private readonly logger: Logger;

  private server: Server | null = null;
  private client: Socket | null = null;
  private decoder = new FrameDecoder();
  private readonly inbox: Buffer[] = [];
  private currentState: ExecutorState = 'closed';
  private handled = 0;

  constructor(options: ExecutorOptions) {
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_PORT;
    this.documents = options.documents;
    this.handlers = options.handlers ?? createHandlerTable();
    this.logger = options.logger ?? silentLogger;
  }

  get state(): ExecutorState {
    return this.currentState;
  }

  status(): ExecutorStatus {
    const address = this.server?.address();
    return {
      state: this.currentState,
      address: address && typeof address !== 'string' ? address : null,
      client: this.client ? peerName(this.client) : null,
      handled: this.handled,
    };
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Executor is already started');
    }

    const server = createServer((socket) => this.accept(socket));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (err) => this.logger.error(`Server error: ${err.message}`));

    const address = server.address();
    if (!address || typeof address === 'string') {
      server.close();
      throw new Error('Executor is not bound to a TCP port');
    }

    this.server = server;
    this.currentState = 'listening';
    this.logger.info(`Listening on ${address.address}:${address.port}`);
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    const client = this.client;
    this.resetClient();
    client?.destroy();

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.currentState = 'closed';
    this.logger.info('Stopped');
  }

  // ─── Connections ────────────────────────────────────────────────

  private accept(socket: Socket): void {
    const peer = peerName(socket);
    socket.on('error', (err) => this.logger.warn(`Socket error from ${peer}: ${err.message}`));

    if (this.client) {
      this.logger.warn(`Refusing ${peer}: a client is already connected`);
      turnAway(socket, encodeError(0, errorToPayload(new ConnectionRefusedError())));
      return;
    }

    this.client = socket;
    this.decoder = new FrameDecoder();
    this.inbox.length = 0;
    this.currentState = 'connected';
    this.logger.info(`Client connected from ${peer}`);

    socket.setNoDelay(true);
    socket.on('data', (chunk) => this.receive(socket, chunk));
    socket.on('close', () => this.detach(socket, peer));
    socket.write(encodeResult(0, { ready: true }));
  }

  private detach(socket: Socket, peer: string): void {
    if (this.client !== socket) return;
    this.resetClient();
    this.logger.info(`Client ${peer} disconnected`);
  }

  private resetClient(): void {
    this.client = null;
    this.inbox.length = 0;
    this.decoder.reset();
    this.currentState = this.server ? 'listening' : 'closed';
  }

  private receive(socket: Socket, chunk: Buffer): void {
    if (this.client !== socket) return;

    let frames: Buffer[];
    try {
      frames = this.decoder.push(chunk);
    } catch (err) {
      this.dropMalformed(socket, err);
      return;
    }

    this.inbox.push(...frames);
    this.pump(socket).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Dispatch loop failed: ${message}`);
      socket.destroy();
    });
  }

  private dropMalformed(socket: Socket, err: unknown): void {
    const payload = errorToPayload(err);
    this.logger.warn(`Malformed frame from ${peerName(socket)}: ${payload.message}; closing connection`);
    this.resetClient();
    turnAway(socket, encodeError(0, payload));
  }

  // ─── Dispatch ───────────────────────────────────────────────────

  private async pump(socket: Socket): Promise<void> {
    if (this.currentState === 'dispatching') return;

    this.currentState = 'dispatching';
    socket.pause();
    try {
      let payload = this.inbox.shift();
      while (payload && this.client === socket) {
        let reply: Buffer;
        try {
          reply = await this.dispatch(payload);
        } catch (err) {
          if (err instanceof MalformedMessageError) {
            this.dropMalformed(socket, err);
            return;
          }
          throw err;
        }
        if (this.client !== socket) return;
        await writeFrame(socket, reply);
        this.handled++;
        payload = this.inbox.shift();
      }
    } finally {
      if (this.client === socket) {
        this.currentState = 'connected';
        socket.resume();
      }
    }
  }

  /** One request in, one reply frame out. Throws only on a malformed frame. */
  private async dispatch(payload: Buffer): Promise<Buffer> {
    const message = parsePayload(payload);
    if (message.kind !== 'request') {
      throw new MalformedMessageError(`Expected a request frame, got "${message.kind}"`);
    }

    const { id, tool } = message;
    this.logger.debug(`→ #${id} ${tool}`);
    try {
      const result = await this.execute(tool, message.params);
      return encodeResult(id, result);
    } catch (err) {
      const error = errorToPayload(err, tool);
      this.logger.warn(`#${id} ${tool} failed: ${error.code} ${error.message}`);
      return encodeError(id, error);
    }
  }

  private async execute(tool: string, raw: unknown): Promise<unknown> {
    if (!isToolName(tool)) {
      throw new UnknownToolError(tool);
    }
    return this.run(tool, raw);
  }

  private async run<N extends ToolName>(tool: N, raw: unknown): Promise<unknown> {
    const handler = this.handlers.get(tool);
    if (!handler) {
      throw new UnknownToolError(tool, `No handler registered for tool "${tool}"`);
    }
    const params = parseToolParams(tool, raw);
    const document = this.documents.activeDocument();
    if (!document) {
      throw new NoActiveDocumentError(tool);
    }
    return handler(params, document);
  }
}
