/**
 * Script Session: the ordered record of operation calls made through the
 * server, live or scripted.
 *
 * `script()` compiles the whole record, so a session that mixed live and
 * scripted calls replays as one program under the same preamble and
 * ordering rules as any other compile. Query tools and `execute_code`
 * have no template and are not recorded.
 */

import { compile, createTemplateLibrary } from '@cadlink/script-compiler';
import type { CompiledScript, ScriptFragment, TemplateLibrary } from '@cadlink/script-compiler';
import type { ToolCall } from '@cadlink/protocol';

export type CallPath = 'live' | 'script';

export interface SessionEntry {
  readonly call: ToolCall;
  readonly path: CallPath;
}

export class ScriptSession {
  readonly library: TemplateLibrary;
  private readonly entries: SessionEntry[] = [];

  constructor(library: TemplateLibrary = createTemplateLibrary()) {
    this.library = library;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Records the call when it has a template; returns whether it was recorded. */
  record(call: ToolCall, path: CallPath): boolean {
    if (!this.library.has(call.name)) return false;
    this.entries.push(Object.freeze({ call, path }));
    return true;
  }

  /** Render one call against this session's templates. */
  render(call: ToolCall): ScriptFragment {
    return this.library.render(call);
  }

  history(): readonly SessionEntry[] {
    return [...this.entries];
  }

  calls(): ToolCall[] {
    return this.entries.map((entry) => entry.call);
  }

  script(description?: string): CompiledScript {
    return compile(this.calls(), { description, library: this.library });
  }

  /** Empties the session and returns how many calls were dropped. */
  clear(): number {
    const dropped = this.entries.length;
    this.entries.length = 0;
    return dropped;
  }
}
