import { createServer } from 'node:net';
import type { Server, Socket } from 'node:net';
import { once } from 'node:events';
import { FrameDecoder, encodeResult, parsePayload } from '@cadlink/protocol';
import type { WireMessage } from '@cadlink/protocol';

/** Scripted executor: greets, records requests, replies only when told to. */
export interface FakeExecutor {
  port: number;
  /** Next request frame received from the bridge. */
  next(): Promise<WireMessage>;
  /** Requests received but not yet taken with next(). */
  readonly received: WireMessage[];
  reply(frame: Buffer): void;
  /** Drop the current client connection. */
  drop(): void;
  close(): Promise<void>;
}

export interface FakeExecutorOptions {
  /** Frame written on connect; the ready greeting by default, null for none. */
  greeting?: Buffer | null;
}

export async function startFakeExecutor(options: FakeExecutorOptions = {}): Promise<FakeExecutor> {
  const greeting = options.greeting === undefined ? encodeResult(0, { ready: true }) : options.greeting;
  const received: WireMessage[] = [];
  const waiters: Array<(message: WireMessage) => void> = [];
  let client: Socket | null = null;

  const server: Server = createServer((socket) => {
    client = socket;
    const decoder = new FrameDecoder();
    socket.on('data', (chunk) => {
      for (const payload of decoder.push(chunk)) {
        const message = parsePayload(payload);
        const waiter = waiters.shift();
        if (waiter) waiter(message);
        else received.push(message);
      }
    });
    socket.on('error', () => socket.destroy());
    if (greeting) socket.write(greeting);
  });

  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Fake executor did not bind a TCP port');
  }

  return {
    port: address.port,
    received,
    next: () => {
      const message = received.shift();
      if (message) return Promise.resolve(message);
      return new Promise((resolve) => waiters.push(resolve));
    },
    reply: (frame) => {
      client?.write(frame);
    },
    drop: () => {
      client?.destroy();
      client = null;
    },
    close: async () => {
      client?.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

/** A port nothing listens on. */
export async function closedPort(): Promise<number> {
  const server = createServer();
  server.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Probe server did not bind a TCP port');
  }
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}
