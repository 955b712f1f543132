/**
 * Command Codec: length-prefixed JSON frames.
 *
 *   [uint32 big-endian payload length N][N bytes UTF-8 JSON]
 *
 * One WireMessage per frame. The stream has no resynchronisation point,
 * so any framing or shape failure is fatal for the connection: callers
 * close the socket on MalformedMessageError.
 */

import { z } from 'zod';
import { ERROR_CODES, MalformedMessageError, type ErrorPayload } from './errors.js';
import { freezeToolCall, parametersSchema, type ToolCall, type ToolParameters } from './tool-call.js';

const HEADER_BYTES = 4;
export const MAX_FRAME_BYTES = 16 * 1024 * 1024;

export interface RequestMessage {
  kind: 'request';
  id: number;
  tool: string;
  params: ToolParameters;
}

export interface ResponseMessage {
  kind: 'response';
  id: number;
  result: unknown;
}

export interface ErrorMessage {
  kind: 'error';
  id: number;
  error: ErrorPayload;
}

export type WireMessage = RequestMessage | ResponseMessage | ErrorMessage;
export type ReplyMessage = ResponseMessage | ErrorMessage;

const correlationId = z.number().int().min(0);

const errorPayloadSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  tool: z.string().optional(),
  parameter: z.string().optional(),
});

const wireMessageSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('request'), id: correlationId, tool: z.string().min(1), params: parametersSchema }),
  z.object({ kind: z.literal('response'), id: correlationId, result: z.unknown() }),
  z.object({ kind: z.literal('error'), id: correlationId, error: errorPayloadSchema }),
]);

// ─── Framing ────────────────────────────────────────────────────

export function encodeFrame(payload: Buffer): Buffer {
  if (payload.length > MAX_FRAME_BYTES) {
    throw new MalformedMessageError(`Frame too large: ${payload.length} bytes (max ${MAX_FRAME_BYTES})`);
  }
  const header = Buffer.alloc(HEADER_BYTES);
  header.writeUInt32BE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

/** Decode exactly one complete frame. */
export function decodeFrame(bytes: Uint8Array): Buffer {
  const buffer = Buffer.from(bytes);
  if (buffer.length < HEADER_BYTES) {
    throw new MalformedMessageError(`Truncated frame header: ${buffer.length} of ${HEADER_BYTES} bytes`);
  }
  const length = buffer.readUInt32BE(0);
  if (length > MAX_FRAME_BYTES) {
    throw new MalformedMessageError(`Frame too large: ${length} bytes (max ${MAX_FRAME_BYTES})`);
  }
  if (buffer.length !== HEADER_BYTES + length) {
    throw new MalformedMessageError(
      `Frame length mismatch: header says ${length} bytes, got ${buffer.length - HEADER_BYTES}`
    );
  }
  return buffer.subarray(HEADER_BYTES);
}

/**
 * Incremental frame reassembly for a byte stream. Handles frames split
 * across reads and several frames arriving in one read. Chunks are held
 * as received and joined once per completed frame.
 */
export class FrameDecoder {
  private chunks: Buffer[] = [];
  private size = 0;

  /** Returns every frame payload completed by this chunk. */
  push(chunk: Uint8Array): Buffer[] {
    if (chunk.length > 0) {
      this.chunks.push(Buffer.from(chunk));
      this.size += chunk.length;
    }
    const frames: Buffer[] = [];

    while (this.size >= HEADER_BYTES) {
      const length = this.peekLength();
      if (length > MAX_FRAME_BYTES) {
        throw new MalformedMessageError(`Frame too large: ${length} bytes (max ${MAX_FRAME_BYTES})`);
      }
      if (this.size < HEADER_BYTES + length) break;

      frames.push(this.take(HEADER_BYTES + length).subarray(HEADER_BYTES));
    }

    return frames;
  }

  /** Bytes received but not yet part of a complete frame. */
  get pendingBytes(): number {
    return this.size;
  }

  reset(): void {
    this.chunks = [];
    this.size = 0;
  }

  private peekLength(): number {
    let head = this.chunks[0];
    if (!head || head.length < HEADER_BYTES) {
      // Header split across reads: merge just enough chunks to read it.
      let count = 0;
      let bytes = 0;
      for (const chunk of this.chunks) {
        count++;
        bytes += chunk.length;
        if (bytes >= HEADER_BYTES) break;
      }
      head = Buffer.concat(this.chunks.slice(0, count));
      this.chunks.splice(0, count, head);
    }
    return head.readUInt32BE(0);
  }

  /** Removes the first `n` buffered bytes and returns them as one buffer. */
  private take(n: number): Buffer {
    const parts: Buffer[] = [];
    let remaining = n;
    while (remaining > 0) {
      const chunk = this.chunks[0];
      if (!chunk) break;
      if (chunk.length <= remaining) {
        parts.push(chunk);
        this.chunks.shift();
        remaining -= chunk.length;
      } else {
        parts.push(chunk.subarray(0, remaining));
        this.chunks[0] = chunk.subarray(remaining);
        remaining = 0;
      }
    }
    this.size -= n;
    return Buffer.concat(parts, n);
  }
}

// ─── Messages ───────────────────────────────────────────────────

export function encodeMessage(message: WireMessage): Buffer {
  return encodeFrame(Buffer.from(JSON.stringify(message), 'utf-8'));
}

/** Parse a frame payload (no length header) into a WireMessage. */
export function parsePayload(payload: Uint8Array): WireMessage {
  let value: unknown;
  try {
    value = JSON.parse(Buffer.from(payload).toString('utf-8'));
  } catch {
    throw new MalformedMessageError('Frame payload is not valid JSON');
  }

  const parsed = wireMessageSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new MalformedMessageError(`Unexpected message shape${where}: ${issue?.message ?? 'invalid'}`);
  }

  const message = parsed.data;
  if (message.kind === 'response') {
    return { kind: 'response', id: message.id, result: message.result ?? null };
  }
  return message;
}

/** Decode one complete frame (header included) into a WireMessage. */
export function decodeMessage(bytes: Uint8Array): WireMessage {
  return parsePayload(decodeFrame(bytes));
}

export function encode(call: ToolCall, id = 0): Buffer {
  return encodeMessage({ kind: 'request', id, tool: call.name, params: call.parameters });
}

export function decode(bytes: Uint8Array): ToolCall {
  const message = decodeMessage(bytes);
  if (message.kind !== 'request') {
    throw new MalformedMessageError(`Expected a request frame, got "${message.kind}"`);
  }
  return freezeToolCall(message.tool, { ...message.params });
}

export function encodeResult(id: number, result: unknown): Buffer {
  return encodeMessage({ kind: 'response', id, result: result ?? null });
}

export function encodeError(id: number, error: ErrorPayload): Buffer {
  return encodeMessage({ kind: 'error', id, error });
}

export function decodeResult(bytes: Uint8Array): ReplyMessage {
  const message = decodeMessage(bytes);
  if (message.kind === 'request') {
    throw new MalformedMessageError('Expected a response or error frame, got "request"');
  }
  return message;
}
