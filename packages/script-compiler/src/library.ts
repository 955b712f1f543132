/**
 * Template Library: maps each operation tool to a parameterised Python
 * fragment and renders validated tool calls into fragments.
 *
 * Placeholders are written `{{slot}}`. Every slot value is formatted as a
 * Python literal for its declared kind before substitution, so agent text
 * never reaches the script unquoted.
 */

import { ParameterError, UnknownToolError } from '@cadlink/protocol';
import type { ToolCall } from '@cadlink/protocol';
import { isPreambleId } from './preambles.js';
import type { PreambleId } from './preambles.js';
import { BUILTIN_TEMPLATES } from './templates.js';
import { pythonFloat, pythonInt, pythonString } from './python.js';

// ─── Types ──────────────────────────────────────────────────────

export type SlotSpec =
  | { kind: 'number' }
  | { kind: 'integer' }
  | { kind: 'string' }
  | { kind: 'enum'; values: readonly string[] };

export interface ScriptTemplate {
  tool: string;
  preambles: readonly PreambleId[];
  slots: Readonly<Record<string, SlotSpec>>;
  body: string;
}

/** One rendered call: its body plus the helpers it depends on. */
export interface ScriptFragment {
  readonly tool: string;
  readonly preambles: readonly PreambleId[];
  readonly body: string;
  /** Python literal substituted for each slot. */
  readonly bindings: Readonly<Record<string, string>>;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

export function placeholdersOf(body: string): string[] {
  return [...new Set(Array.from(body.matchAll(PLACEHOLDER), (match) => match[1]))];
}

// ─── Library ────────────────────────────────────────────────────

export class TemplateLibrary {
  private readonly templates = new Map<string, ScriptTemplate>();

  /** Throws on a duplicate tool or a body whose placeholders and slots disagree. */
  register(template: ScriptTemplate): void {
    const { tool } = template;
    if (this.templates.has(tool)) {
      throw new Error(`Template already registered for "${tool}"`);
    }

    const placeholders = placeholdersOf(template.body);
    const slots = Object.keys(template.slots);
    const unbound = placeholders.filter((name) => !slots.includes(name));
    if (unbound.length > 0) {
      throw new Error(`Template "${tool}" uses undeclared slots: ${unbound.join(', ')}`);
    }
    const unused = slots.filter((name) => !placeholders.includes(name));
    if (unused.length > 0) {
      throw new Error(`Template "${tool}" declares unused slots: ${unused.join(', ')}`);
    }
    for (const id of template.preambles) {
      if (!isPreambleId(id)) {
        throw new Error(`Template "${tool}" needs unknown preamble "${id}"`);
      }
    }

    this.templates.set(tool, template);
  }

  has(tool: string): boolean {
    return this.templates.has(tool);
  }

  tools(): string[] {
    return [...this.templates.keys()];
  }

  /**
   * Render one call. Throws UnknownToolError when no template exists for
   * the tool and ParameterError when a slot value is missing or has the
   * wrong kind.
   */
  render(call: ToolCall): ScriptFragment {
    const template = this.templates.get(call.name);
    if (!template) {
      throw new UnknownToolError(call.name, `No script template for tool "${call.name}"`);
    }

    const bindings: Record<string, string> = {};
    for (const [slot, spec] of Object.entries(template.slots)) {
      bindings[slot] = formatSlot(call, slot, spec);
    }

    const body = template.body.replace(PLACEHOLDER, (_, name: string) => bindings[name]);
    return Object.freeze({
      tool: call.name,
      preambles: template.preambles,
      body,
      bindings: Object.freeze(bindings),
    });
  }
}

function formatSlot(call: ToolCall, slot: string, spec: SlotSpec): string {
  const value = call.parameters[slot];
  if (value === undefined) {
    throw new ParameterError(call.name, slot, 'missing required parameter');
  }

  switch (spec.kind) {
    case 'number':
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ParameterError(call.name, slot, 'expected a finite number');
      }
      return pythonFloat(value);
    case 'integer':
      if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
        throw new ParameterError(call.name, slot, 'expected an integer');
      }
      return pythonInt(value);
    case 'string':
      if (typeof value !== 'string') {
        throw new ParameterError(call.name, slot, 'expected a string');
      }
      return pythonString(value);
    case 'enum':
      if (typeof value !== 'string' || !spec.values.includes(value)) {
        throw new ParameterError(call.name, slot, `expected one of ${spec.values.join(', ')}`);
      }
      return pythonString(value);
  }
}

/** A library holding every built-in template. */
export function createTemplateLibrary(): TemplateLibrary {
  const library = new TemplateLibrary();
  for (const template of BUILTIN_TEMPLATES) {
    library.register(template);
  }
  return library;
}
