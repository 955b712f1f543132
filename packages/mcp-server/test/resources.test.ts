import { describe, it, expect, afterEach } from 'vitest';
import { createToolCall } from '@cadlink/protocol';
import { CommandExecutor, MemoryDocumentHost } from '@cadlink/executor';
import { compile } from '@cadlink/script-compiler';
import { ExecutorBridge } from '../src/bridge.js';
import { LiveConnection } from '../src/live-connection.js';
import { ScriptSession } from '../src/session.js';
import { describeStatus, formatExamples, loadExamples } from '../src/resources.js';
import type { Example } from '../src/resources.js';

const examples = loadExamples();

let executor: CommandExecutor | null = null;
let bridge: ExecutorBridge | null = null;

afterEach(async () => {
  bridge?.close();
  bridge = null;
  await executor?.stop();
  executor = null;
});

describe('example sequences', () => {
  it('loads every bundled example', () => {
    expect(examples.map((example) => example.name)).toEqual([
      'Basic rectangle and extrude',
      'Circle with fillet',
      'Open box with mirror',
      'Revolved ring',
      'L-bracket',
    ]);
  });

  it('compiles each example into one script', () => {
    for (const example of examples) {
      const calls = example.calls.map((call) => createToolCall(call.name, call.parameters));
      const script = compile(calls, { description: example.name });
      expect(script.fragments).toHaveLength(example.calls.length);
    }
  });

  it('runs each example against an in-memory design', async () => {
    const documents = new MemoryDocumentHost();
    executor = new CommandExecutor({ host: '127.0.0.1', port: 0, documents });
    const { port } = await executor.start();
    bridge = new ExecutorBridge({ host: '127.0.0.1', port });
    await bridge.connect(1000);

    for (const example of examples) {
      documents.open(example.name);
      for (const call of example.calls) {
        await bridge.call(call.name, call.parameters);
      }
      expect(documents.activeDocument()?.sceneInfo().bodies.length).toBeGreaterThan(0);
    }
  });
});

describe('formatExamples', () => {
  const sample: Example[] = [
    {
      name: 'Plate',
      calls: [
        { name: 'create_sketch', parameters: { plane: 'xy' } },
        { name: 'extrude', parameters: { height: 5, operation: 'join' } },
        { name: 'get_scene_info', parameters: {} },
      ],
    },
  ];

  it('numbers the calls of each example', () => {
    expect(formatExamples(sample, 'script')).toBe(
      '# Example sequences (mode: script)\n\n' +
        '## Plate\n' +
        '1. create_sketch(plane="xy")\n' +
        '2. extrude(height=5, operation="join")\n' +
        '3. get_scene_info()\n\n' +
        'Each call returns a Fusion 360 script; get_session_script returns the whole sequence as one script.\n'
    );
  });

  it('describes live execution in socket mode', () => {
    expect(formatExamples(sample, 'socket').trimEnd().split('\n').pop()).toBe(
      'Calls execute directly in Fusion 360 while the executor is reachable.'
    );
  });
});

describe('describeStatus', () => {
  it('reports a connection that was never opened', () => {
    const session = new ScriptSession();
    session.record(createToolCall('create_sketch', { plane: 'xy' }), 'script');
    const connection = new LiveConnection({ host: 'localhost', port: 9876 });

    expect(describeStatus({ mode: 'script', connection, session })).toEqual({
      mode: 'script',
      executor: 'localhost:9876',
      connected: false,
      last_error: null,
      session_calls: 1,
    });
  });
});
