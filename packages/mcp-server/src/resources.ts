/**
 * MCP resources: connection status, the tool catalog, example sequences
 * and setup help.
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { listTools, paramValueSchema } from '@cadlink/protocol';
import type { ServerMode } from '@cadlink/protocol';
import type { LiveConnection } from './live-connection.js';
import type { ScriptSession } from './session.js';

export const EXAMPLES_PATH = fileURLToPath(new URL('../data/examples.json', import.meta.url));

const exampleSchema = z.object({
  name: z.string().min(1),
  calls: z.array(
    z.object({
      name: z.string().min(1),
      parameters: z.record(paramValueSchema).default({}),
    })
  ),
});

export type Example = z.infer<typeof exampleSchema>;

export function loadExamples(file = EXAMPLES_PATH): Example[] {
  return z.array(exampleSchema).parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

/** Example sequences as numbered call listings. */
export function formatExamples(examples: readonly Example[], mode: ServerMode): string {
  const sections = examples.map((example) => {
    const steps = example.calls.map((call, i) => {
      const args = Object.entries(call.parameters)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ');
      return `${i + 1}. ${call.name}(${args})`;
    });
    return `## ${example.name}\n${steps.join('\n')}`;
  });

  const footer = mode === 'socket'
    ? 'Calls execute directly in Fusion 360 while the executor is reachable.'
    : 'Each call returns a Fusion 360 script; get_session_script returns the whole sequence as one script.';

  return `# Example sequences (mode: ${mode})\n\n${sections.join('\n\n')}\n\n${footer}\n`;
}

export interface StatusContext {
  mode: ServerMode;
  connection: LiveConnection;
  session: ScriptSession;
}

export function describeStatus({ mode, connection, session }: StatusContext) {
  return {
    mode,
    executor: connection.address,
    connected: connection.isConnected,
    last_error: connection.lastFailure,
    session_calls: session.size,
  };
}

const HELP = `# cadlink setup

## Socket mode (default)
1. Start the executor inside Fusion 360 (or \`npm run executor\` for a headless one).
2. Start this server; calls execute live on localhost:9876.
3. When the executor is unreachable, calls fall back to script output.

## Script mode
Start with \`--mode=script\` (or CADLINK_MODE=script). Every operation call
returns a standalone script; run it from Utilities > Scripts and Add-Ins.

## Settings
--host / CADLINK_HOST, --port / CADLINK_PORT, --mode / CADLINK_MODE,
--timeout / CADLINK_TIMEOUT_MS, CADLINK_CONNECT_TIMEOUT_MS,
--log-level / CADLINK_LOG_LEVEL
`;

export function registerResources(server: McpServer, context: StatusContext, examples: readonly Example[]): void {
  server.resource(
    'status',
    'cadlink://status',
    { description: 'Executor connection status and session size', mimeType: 'application/json' },
    async () => {
      // Probe so the status reflects whether the executor is reachable right now.
      if (context.mode === 'socket') await context.connection.get();
      return {
        contents: [{
          uri: 'cadlink://status',
          mimeType: 'application/json',
          text: JSON.stringify(describeStatus(context), null, 2),
        }],
      };
    }
  );

  server.resource(
    'tools',
    'cadlink://tools',
    { description: 'Tool catalog with parameter summaries', mimeType: 'application/json' },
    async () => ({
      contents: [{
        uri: 'cadlink://tools',
        mimeType: 'application/json',
        text: JSON.stringify({ mode: context.mode, tools: listTools() }, null, 2),
      }],
    })
  );

  server.resource(
    'examples',
    'cadlink://examples',
    { description: 'Example tool call sequences', mimeType: 'text/markdown' },
    async () => ({
      contents: [{
        uri: 'cadlink://examples',
        mimeType: 'text/markdown',
        text: formatExamples(examples, context.mode),
      }],
    })
  );

  server.resource(
    'help',
    'cadlink://help',
    { description: 'Setup instructions', mimeType: 'text/markdown' },
    async () => ({
      contents: [{ uri: 'cadlink://help', mimeType: 'text/markdown', text: HELP }],
    })
  );
}
