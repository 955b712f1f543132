/**
 * Error kinds shared by the compiler, the bridge and the executor.
 *
 * Every failure that crosses a package boundary is a CadLinkError with a
 * stable `code`, so it can travel over the wire as a structured payload
 * and be rebuilt on the other side without a stack trace.
 */

export const ERROR_CODES = [
  'UNKNOWN_TOOL',
  'PARAMETER_ERROR',
  'COMPILATION_ERROR',
  'MALFORMED_MESSAGE',
  'CONNECTION_ERROR',
  'CONNECTION_LOST',
  'CONNECTION_REFUSED',
  'TIMEOUT',
  'NO_ACTIVE_DOCUMENT',
  'HANDLER_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/** Wire shape of an error. */
export interface ErrorPayload {
  code: ErrorCode;
  message: string;
  tool?: string;
  parameter?: string;
}

export interface ErrorContext {
  tool?: string;
  parameter?: string;
}

export class CadLinkError extends Error {
  readonly code: ErrorCode;
  readonly tool?: string;
  readonly parameter?: string;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'CadLinkError';
    this.code = code;
    this.tool = context.tool;
    this.parameter = context.parameter;
  }
}

export class UnknownToolError extends CadLinkError {
  constructor(tool: string, message = `Unknown tool "${tool}"`) {
    super('UNKNOWN_TOOL', message, { tool });
    this.name = 'UnknownToolError';
  }
}

export class ParameterError extends CadLinkError {
  constructor(tool: string, parameter: string, reason: string) {
    super('PARAMETER_ERROR', `Invalid parameter "${parameter}" for ${tool}: ${reason}`, { tool, parameter });
    this.name = 'ParameterError';
  }
}

/** Wraps the first render failure of a compile; `index` is 0-based. */
export class CompilationError extends CadLinkError {
  readonly index: number;
  readonly failure: CadLinkError;

  constructor(index: number, failure: CadLinkError) {
    super('COMPILATION_ERROR', `Tool call ${index + 1} (${failure.tool ?? 'unknown'}): ${failure.message}`, {
      tool: failure.tool,
      parameter: failure.parameter,
    });
    this.name = 'CompilationError';
    this.index = index;
    this.failure = failure;
  }
}

export class MalformedMessageError extends CadLinkError {
  constructor(message: string) {
    super('MALFORMED_MESSAGE', message);
    this.name = 'MalformedMessageError';
  }
}

export class ConnectionError extends CadLinkError {
  constructor(message: string) {
    super('CONNECTION_ERROR', message);
    this.name = 'ConnectionError';
  }
}

export class ConnectionLostError extends CadLinkError {
  constructor(message = 'Connection to the executor was lost') {
    super('CONNECTION_LOST', message);
    this.name = 'ConnectionLostError';
  }
}

export class ConnectionRefusedError extends CadLinkError {
  constructor(message = 'Executor already has an active client') {
    super('CONNECTION_REFUSED', message);
    this.name = 'ConnectionRefusedError';
  }
}

/** The remote operation may still complete after this fires. */
export class TimeoutError extends CadLinkError {
  constructor(tool: string, timeoutMs: number) {
    super('TIMEOUT', `${tool} timed out after ${timeoutMs}ms`, { tool });
    this.name = 'TimeoutError';
  }
}

export class NoActiveDocumentError extends CadLinkError {
  constructor(tool: string) {
    super('NO_ACTIVE_DOCUMENT', `${tool} needs an open design but no document is active`, { tool });
    this.name = 'NoActiveDocumentError';
  }
}

/** An error reported by the executor, rebuilt on the client side. */
export class RemoteError extends CadLinkError {
  constructor(payload: ErrorPayload) {
    super(payload.code, payload.message, { tool: payload.tool, parameter: payload.parameter });
    this.name = 'RemoteError';
  }
}

export function isCadLinkError(err: unknown): err is CadLinkError {
  return err instanceof CadLinkError;
}

export function errorToPayload(err: unknown, fallbackTool?: string): ErrorPayload {
  if (isCadLinkError(err)) {
    const payload: ErrorPayload = { code: err.code, message: err.message };
    const tool = err.tool ?? fallbackTool;
    if (tool !== undefined) payload.tool = tool;
    if (err.parameter !== undefined) payload.parameter = err.parameter;
    return payload;
  }

  const payload: ErrorPayload = {
    code: 'HANDLER_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
  if (fallbackTool !== undefined) payload.tool = fallbackTool;
  return payload;
}

export function errorFromPayload(payload: ErrorPayload): RemoteError {
  return new RemoteError(payload);
}
