import { z } from 'zod';
import { isToolName, toolSchema } from './catalog.js';
import type { ToolName, ToolParams } from './catalog.js';
import { ParameterError, UnknownToolError } from './errors.js';

/** Scalar, enum (string) or vector parameter value. */
export type ParamValue = number | string | boolean | readonly number[];

export type ToolParameters = Readonly<Record<string, ParamValue>>;

export interface ToolCall {
  readonly name: string;
  readonly parameters: ToolParameters;
}

export const paramValueSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.array(z.number()),
]);

export const parametersSchema = z.record(paramValueSchema);

/** Freeze a call and its parameters (vectors included). */
export function freezeToolCall(name: string, parameters: Record<string, ParamValue>): ToolCall {
  const frozen: Record<string, ParamValue> = {};
  for (const key of Object.keys(parameters).sort()) {
    const value = parameters[key];
    frozen[key] = Array.isArray(value) ? Object.freeze([...value]) : value;
  }
  return Object.freeze({ name, parameters: Object.freeze(frozen) });
}

/**
 * Validate raw agent input against the catalog and build an immutable
 * ToolCall with schema defaults filled in.
 *
 * The tool name is checked before any parameter is looked at.
 */
export function createToolCall(name: string, raw: unknown = {}): ToolCall {
  if (!isToolName(name)) {
    throw new UnknownToolError(name);
  }
  return freezeToolCall(name, parametersSchema.parse(parseToolParams(name, raw)));
}

/** Parse raw parameters for a known tool; the first failing one becomes a ParameterError. */
export function parseToolParams<N extends ToolName>(name: N, raw: unknown): ToolParams<N> {
  const parsed = toolSchema(name).safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ParameterError(name, issueParameter(issue), issue?.message ?? 'invalid value');
  }
  return parsed.data;
}

function issueParameter(issue: z.ZodIssue | undefined): string {
  if (!issue) return '(unknown)';
  if (issue.code === 'unrecognized_keys') return issue.keys.join(', ');
  const head = issue.path[0];
  return head === undefined ? '(parameters)' : String(head);
}

export function toolCallsEqual(a: ToolCall, b: ToolCall): boolean {
  if (a.name !== b.name) return false;
  const keys = Object.keys(a.parameters);
  if (keys.length !== Object.keys(b.parameters).length) return false;
  return keys.every((key) => {
    const left = a.parameters[key];
    const right = b.parameters[key];
    if (Array.isArray(left) && Array.isArray(right)) {
      return left.length === right.length && left.every((v, i) => v === right[i]);
    }
    return left === right;
  });
}
