import { describe, it, expect, afterEach } from 'vitest';
import {
  ConnectionError,
  ConnectionRefusedError,
  RemoteError,
  TimeoutError,
  createToolCall,
  encodeError,
  encodeResult,
} from '@cadlink/protocol';
import { CommandExecutor, MemoryDocumentHost } from '@cadlink/executor';
import { ExecutorBridge } from '../src/bridge.js';
import { closedPort, startFakeExecutor } from './fake-executor.js';
import type { FakeExecutor } from './fake-executor.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const fakes: FakeExecutor[] = [];
const bridges: ExecutorBridge[] = [];
let executor: CommandExecutor | null = null;

async function fake(greeting?: Buffer | null): Promise<FakeExecutor> {
  const server = await startFakeExecutor({ greeting });
  fakes.push(server);
  return server;
}

function bridgeTo(port: number): ExecutorBridge {
  const bridge = new ExecutorBridge({ host: '127.0.0.1', port });
  bridges.push(bridge);
  return bridge;
}

async function connected(port: number): Promise<ExecutorBridge> {
  const bridge = bridgeTo(port);
  await bridge.connect(1000);
  return bridge;
}

afterEach(async () => {
  for (const bridge of bridges.splice(0)) bridge.close();
  for (const server of fakes.splice(0)) await server.close();
  await executor?.stop();
  executor = null;
});

const sketch = createToolCall('create_sketch', { plane: 'xy' });
const rectangle = createToolCall('draw_rectangle', { width: 10, height: 5 });

// ─── Handshake ──────────────────────────────────────────────────

describe('ExecutorBridge handshake', () => {
  it('is connected once the executor greets it', async () => {
    const server = await fake();
    const bridge = bridgeTo(server.port);
    expect(bridge.isConnected).toBe(false);
    await bridge.connect(1000);
    expect(bridge.isConnected).toBe(true);
    expect(bridge.address).toBe(`127.0.0.1:${server.port}`);
  });

  it('rejects a second connect while connected', async () => {
    const server = await fake();
    const bridge = await connected(server.port);
    await expect(bridge.connect(1000)).rejects.toThrow(`Already connected to 127.0.0.1:${server.port}`);
  });

  it('fails when nothing listens on the port', async () => {
    const port = await closedPort();
    const bridge = bridgeTo(port);
    const failure = bridge.connect(1000);
    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow(`Cannot connect to executor at 127.0.0.1:${port}:`);
    expect(bridge.isConnected).toBe(false);
  });

  it('times out when the executor never greets', async () => {
    const server = await fake(null);
    const bridge = bridgeTo(server.port);
    await expect(bridge.connect(50)).rejects.toThrow(
      `Cannot connect to executor at 127.0.0.1:${server.port}: timed out after 50ms`
    );
  });

  it('reports a refused greeting as ConnectionRefusedError', async () => {
    const server = await fake(encodeError(0, { code: 'CONNECTION_REFUSED', message: 'Busy' }));
    const bridge = bridgeTo(server.port);
    const failure = bridge.connect(1000);
    await expect(failure).rejects.toBeInstanceOf(ConnectionRefusedError);
    await expect(failure).rejects.toThrow('Busy');
    expect(bridge.isConnected).toBe(false);
  });

  it('is refused by an executor that already has a client', async () => {
    executor = new CommandExecutor({ host: '127.0.0.1', port: 0, documents: new MemoryDocumentHost() });
    const { port } = await executor.start();
    await connected(port);

    await expect(bridgeTo(port).connect(1000)).rejects.toMatchObject({
      code: 'CONNECTION_REFUSED',
      message: 'Executor already has an active client',
    });
  });
});

// ─── Requests ───────────────────────────────────────────────────

describe('ExecutorBridge requests', () => {
  it('round-trips a call through a real executor', async () => {
    const documents = new MemoryDocumentHost();
    documents.open('Bridge');
    executor = new CommandExecutor({ host: '127.0.0.1', port: 0, documents });
    const { port } = await executor.start();
    const bridge = await connected(port);

    expect(await bridge.send(sketch)).toEqual({ sketch: 'Sketch1', plane: 'xy' });
    expect(await bridge.call('draw_rectangle', { width: 10, height: 5 })).toEqual({
      sketch: 'Sketch1',
      curve: 'rectangle',
      profiles: 1,
    });
  });

  it('rebuilds executor errors as RemoteError', async () => {
    const documents = new MemoryDocumentHost();
    executor = new CommandExecutor({ host: '127.0.0.1', port: 0, documents });
    const { port } = await executor.start();
    const bridge = await connected(port);

    const failure = bridge.send(sketch);
    await expect(failure).rejects.toBeInstanceOf(RemoteError);
    await expect(failure).rejects.toMatchObject({ code: 'NO_ACTIVE_DOCUMENT', tool: 'create_sketch' });
  });

  it('validates before sending anything', async () => {
    const server = await fake();
    const bridge = await connected(server.port);

    await expect(bridge.call('fillet', { radius: -1 })).rejects.toMatchObject({
      code: 'PARAMETER_ERROR',
      tool: 'fillet',
      parameter: 'radius',
    });
    await sleep(20);
    expect(server.received).toEqual([]);
    expect(bridge.pendingCount).toBe(0);
  });

  it('refuses to send while disconnected', async () => {
    const bridge = bridgeTo(await closedPort());
    await expect(bridge.send(sketch)).rejects.toThrow(/^Not connected to the executor at 127\.0\.0\.1:\d+$/);
  });

  it('sends one request at a time in order', async () => {
    const server = await fake();
    const bridge = await connected(server.port);

    const first = bridge.send(sketch);
    const second = bridge.send(rectangle);

    expect(await server.next()).toEqual({ kind: 'request', id: 1, tool: 'create_sketch', params: { plane: 'xy' } });
    await sleep(20);
    expect(server.received).toEqual([]);
    expect(bridge.queuedCount).toBe(1);

    server.reply(encodeResult(1, 'one'));
    expect(await first).toBe('one');

    const next = await server.next();
    expect(next).toMatchObject({ kind: 'request', id: 2, tool: 'draw_rectangle' });
    server.reply(encodeResult(2, 'two'));
    expect(await second).toBe('two');
    expect(bridge.pendingCount).toBe(0);
  });
});

// ─── Timeouts ───────────────────────────────────────────────────

describe('ExecutorBridge timeouts', () => {
  it('rejects with TimeoutError and forgets the request', async () => {
    const server = await fake();
    const bridge = await connected(server.port);

    const failure = bridge.send(sketch, 50);
    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    await expect(failure).rejects.toThrow('create_sketch timed out after 50ms');
    expect(bridge.pendingCount).toBe(0);
    expect(bridge.isConnected).toBe(true);
  });

  it('drops a queued request whose timer fires before it is sent', async () => {
    const server = await fake();
    const bridge = await connected(server.port);

    const first = bridge.send(sketch, 2000);
    const second = bridge.send(rectangle, 30);
    expect(bridge.queuedCount).toBe(1);

    await expect(second).rejects.toMatchObject({ code: 'TIMEOUT', tool: 'draw_rectangle' });
    expect(bridge.queuedCount).toBe(0);

    expect(await server.next()).toMatchObject({ id: 1 });
    server.reply(encodeResult(1, null));
    expect(await first).toBeNull();

    await sleep(20);
    expect(server.received).toEqual([]);
  });

  it('discards a late reply and moves the queue on', async () => {
    const server = await fake();
    const bridge = await connected(server.port);

    const first = bridge.send(sketch, 30);
    const second = bridge.send(rectangle, 2000);
    expect(await server.next()).toMatchObject({ id: 1 });

    await expect(first).rejects.toMatchObject({ code: 'TIMEOUT' });
    // Still blocked behind the request that timed out in flight.
    await sleep(20);
    expect(server.received).toEqual([]);

    server.reply(encodeResult(1, 'late'));
    expect(await server.next()).toMatchObject({ id: 2, tool: 'draw_rectangle' });
    server.reply(encodeResult(2, 'fresh'));
    expect(await second).toBe('fresh');
  });
});

// ─── Connection loss ────────────────────────────────────────────

describe('ExecutorBridge connection loss', () => {
  it('rejects pending and queued requests when the executor goes away', async () => {
    const server = await fake();
    const bridge = await connected(server.port);

    const first = bridge.send(sketch);
    const second = bridge.send(rectangle);
    await server.next();
    server.drop();

    await expect(first).rejects.toMatchObject({ code: 'CONNECTION_LOST' });
    await expect(second).rejects.toMatchObject({ code: 'CONNECTION_LOST' });
    expect(bridge.isConnected).toBe(false);
    expect(bridge.pendingCount).toBe(0);
    expect(bridge.queuedCount).toBe(0);
  });

  it('rejects pending requests when closed by the client', async () => {
    const server = await fake();
    const bridge = await connected(server.port);

    const pending = bridge.send(sketch);
    bridge.close();
    await expect(pending).rejects.toThrow('Connection to the executor was lost: closed by client');
  });

  it('treats a malformed reply as fatal', async () => {
    const server = await fake();
    const bridge = await connected(server.port);

    const pending = bridge.send(sketch);
    await server.next();
    const junk = Buffer.from('not json');
    const header = Buffer.alloc(4);
    header.writeUInt32BE(junk.length, 0);
    server.reply(Buffer.concat([header, junk]));

    await expect(pending).rejects.toThrow('Connection to the executor was lost: Frame payload is not valid JSON');
    expect(bridge.isConnected).toBe(false);
  });
});
