/**
 * Tool Router: decides per call whether it runs live or becomes a script.
 *
 * socket mode: live when the executor is reachable, script otherwise.
 * script mode: always script.
 *
 * A live call that fails (remote error, timeout, lost connection) is not
 * retried as a script: the executor may already have applied it.
 */

import { createToolCall, silentLogger } from '@cadlink/protocol';
import type { Logger, ServerMode } from '@cadlink/protocol';
import { compile } from '@cadlink/script-compiler';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './bridge.js';
import type { LiveConnection } from './live-connection.js';
import type { ScriptSession } from './session.js';

export type RouteResult =
  | { path: 'live'; tool: string; result: unknown }
  | { path: 'script'; tool: string; script: string };

export interface RouterOptions {
  mode: ServerMode;
  connection: LiveConnection;
  session: ScriptSession;
  timeoutMs?: number;
  logger?: Logger;
}

export class ToolRouter {
  readonly mode: ServerMode;
  private readonly connection: LiveConnection;
  private readonly session: ScriptSession;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: RouterOptions) {
    this.mode = options.mode;
    this.connection = options.connection;
    this.session = options.session;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async route(name: string, raw: unknown): Promise<RouteResult> {
    const call = createToolCall(name, raw);

    if (this.mode === 'socket') {
      const bridge = await this.connection.get();
      if (bridge) {
        const result = await bridge.send(call, this.timeoutMs);
        this.session.record(call, 'live');
        return { path: 'live', tool: call.name, result };
      }
      this.logger.debug(`${call.name}: executor unreachable, rendering a script`);
    }

    // Throws UnknownTool for live-only tools.
    this.session.render(call);
    const script = compile([call], { description: call.name, library: this.session.library });
    this.session.record(call, 'script');
    return { path: 'script', tool: call.name, script: script.text };
  }
}
