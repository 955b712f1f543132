/**
 * MCP Tool Registrations: every catalog tool plus session/script tools.
 *
 * Catalog tools go through the ToolRouter. Every tool answers with JSON
 * text; failures come back as `isError` results carrying the structured
 * error payload.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  CompilationError,
  TOOL_INFO,
  TOOL_NAMES,
  TOOL_SHAPES,
  createToolCall,
  errorToPayload,
  isCadLinkError,
  silentLogger,
} from '@cadlink/protocol';
import type { Logger, ToolCall, ToolName } from '@cadlink/protocol';
import { compile } from '@cadlink/script-compiler';
import type { ToolRouter } from './router.js';
import type { ScriptSession } from './session.js';

export interface ToolContext {
  router: ToolRouter;
  session: ScriptSession;
  logger?: Logger;
}

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function textResult(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value) }] };
}

export function errorResult(err: unknown, tool?: string): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(errorToPayload(err, tool)) }], isError: true };
}

/** Run a tool body and turn a thrown error into an error result. */
export async function respond(tool: string, logger: Logger, run: () => unknown): Promise<ToolResult> {
  try {
    return textResult(await run());
  } catch (err) {
    const payload = errorToPayload(err, tool);
    logger.warn(`${tool} failed: ${payload.code} ${payload.message}`);
    if (!isCadLinkError(err) && err instanceof Error && err.stack) {
      logger.debug(err.stack);
    }
    return errorResult(err, tool);
  }
}

/** Build calls from raw input; a bad call is reported with its position. */
export function buildCalls(raw: ReadonlyArray<{ name: string; parameters?: unknown }>): ToolCall[] {
  return raw.map((entry, index) => {
    try {
      return createToolCall(entry.name, entry.parameters ?? {});
    } catch (err) {
      if (isCadLinkError(err)) throw new CompilationError(index, err);
      throw err;
    }
  });
}

/**
 * The advertised input shape of a catalog tool: same names and
 * descriptions, no constraints. `createToolCall` does the validating, so a
 * bad argument comes back as a structured PARAMETER_ERROR.
 */
export function advertisedShape(shape: z.ZodRawShape): Record<string, z.ZodUnknown> {
  return Object.fromEntries(
    Object.entries(shape).map(([key, schema]): [string, z.ZodUnknown] => {
      const text = schema.description ?? key;
      return [key, z.unknown().describe(schema.isOptional() ? text : `${text} (required)`)];
    })
  );
}

function registerCatalogTool(server: McpServer, name: ToolName, context: ToolContext, logger: Logger): void {
  server.tool(name, TOOL_INFO[name].description, advertisedShape(TOOL_SHAPES[name]), async (args) =>
    respond(name, logger, () => context.router.route(name, args))
  );
}

export function registerTools(server: McpServer, context: ToolContext): void {
  const logger = context.logger ?? silentLogger;
  const { session } = context;

  // ─── Catalog tools ────────────────────────────────────────────

  for (const name of TOOL_NAMES) {
    registerCatalogTool(server, name, context, logger);
  }

  // ─── Scripts and session ──────────────────────────────────────

  server.tool(
    'generate_script',
    'Compile an ordered list of tool calls into one standalone Fusion 360 script without executing anything.',
    {
      calls: z
        .array(
          z.object({
            name: z.string().describe('Tool name, e.g. create_sketch'),
            parameters: z.record(z.unknown()).optional().describe('Tool parameters'),
          })
        )
        .describe('Tool calls in execution order'),
      description: z.string().optional().describe('Description written into the script header'),
    },
    async ({ calls, description }) =>
      respond('generate_script', logger, () => {
        const compiled = compile(buildCalls(calls), { description, library: session.library });
        return { calls: compiled.fragments.length, preambles: compiled.preambles, script: compiled.text };
      })
  );

  server.tool(
    'get_session_script',
    'Return every operation made so far in this session, live or scripted, as one Fusion 360 script.',
    {
      description: z.string().optional().describe('Description written into the script header'),
    },
    async ({ description }) =>
      respond('get_session_script', logger, () => {
        const history = session.history();
        return {
          calls: history.length,
          live: history.filter((entry) => entry.path === 'live').length,
          script: session.script(description).text,
        };
      })
  );

  server.tool(
    'clear_session',
    'Forget the operations recorded in this session.',
    {},
    async () => respond('clear_session', logger, () => ({ cleared: session.clear() }))
  );
}
