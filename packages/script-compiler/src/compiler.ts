/**
 * Script Compiler: turns an ordered list of tool calls into one
 * standalone Fusion 360 script.
 *
 * Layout of the output:
 *   header comments
 *   imports
 *   each required preamble, once, in first-use order
 *   def run(context): setup, then one labelled block per call
 *   def stop(context)
 *
 * Output is a pure function of the calls and options: no timestamps,
 * no randomness.
 */

import { CompilationError, isCadLinkError } from '@cadlink/protocol';
import type { ToolCall } from '@cadlink/protocol';
import { createTemplateLibrary } from './library.js';
import type { ScriptFragment, TemplateLibrary } from './library.js';
import { PREAMBLES } from './preambles.js';
import type { PreambleId } from './preambles.js';
import { commentText, indent } from './python.js';

export interface CompileOptions {
  /** Written into the `#Description-` header line. */
  description?: string;
  library?: TemplateLibrary;
}

export interface CompiledScript {
  readonly text: string;
  readonly preambles: readonly PreambleId[];
  readonly fragments: readonly ScriptFragment[];
}

export const DEFAULT_DESCRIPTION = 'Generated Fusion 360 script';

const BODY_INDENT = 8;

let defaultLibrary: TemplateLibrary | null = null;

function builtinLibrary(): TemplateLibrary {
  defaultLibrary ??= createTemplateLibrary();
  return defaultLibrary;
}

/**
 * Compile `calls` in order. All-or-nothing: the first call that fails to
 * render aborts with a CompilationError naming its index.
 */
export function compile(calls: readonly ToolCall[], options: CompileOptions = {}): CompiledScript {
  const library = options.library ?? builtinLibrary();

  const fragments = calls.map((call, index) => {
    try {
      return library.render(call);
    } catch (err) {
      if (isCadLinkError(err)) throw new CompilationError(index, err);
      throw err;
    }
  });

  const preambles = collectPreambles(fragments);
  const text = emitScript(fragments, preambles, commentText(options.description ?? DEFAULT_DESCRIPTION));
  return Object.freeze({ text, preambles: Object.freeze(preambles), fragments: Object.freeze(fragments) });
}

/** Union of fragment preambles in first-seen order. */
export function collectPreambles(fragments: readonly ScriptFragment[]): PreambleId[] {
  const seen = new Set<PreambleId>();
  for (const fragment of fragments) {
    for (const id of fragment.preambles) seen.add(id);
  }
  return [...seen];
}

// ─── Emission ───────────────────────────────────────────────────

function emitScript(fragments: readonly ScriptFragment[], preambles: readonly PreambleId[], description: string): string {
  const out: string[] = [];
  const emit = (line = '') => out.push(line);

  emit('#Author-cadlink');
  emit(`#Description-${description}`);
  emit(`# ${fragments.length} tool call${fragments.length === 1 ? '' : 's'}.`);
  emit();
  emit('import adsk.core, adsk.fusion, adsk.cam, math, traceback');
  emit();

  for (const id of preambles) {
    emit();
    emit(PREAMBLES[id]);
    emit();
  }

  emit();
  emit('def run(context):');
  emit('    ui = None');
  emit('    try:');
  emit('        app = adsk.core.Application.get()');
  emit('        ui = app.userInterface');
  emit('        design = adsk.fusion.Design.cast(app.activeProduct)');
  emit('        if not design:');
  emit("            ui.messageBox('No active Fusion 360 design', 'No Design')");
  emit('            return');
  emit('        component = design.rootComponent');
  emit('        sketch = None');

  fragments.forEach((fragment, index) => {
    emit();
    emit(indent(`# ${index + 1}. ${fragment.tool}`, BODY_INDENT));
    emit(indent(fragment.body, BODY_INDENT));
  });

  emit();
  emit('    except Exception:');
  emit('        if ui:');
  emit("            ui.messageBox('Failed:\\n{}'.format(traceback.format_exc()))");
  emit();
  emit();
  emit('def stop(context):');
  emit('    pass');

  return out.join('\n') + '\n';
}
