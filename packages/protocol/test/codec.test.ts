import { describe, it, expect } from 'vitest';
import {
  encode,
  decode,
  encodeFrame,
  decodeFrame,
  encodeResult,
  encodeError,
  decodeResult,
  decodeMessage,
  FrameDecoder,
  createToolCall,
  freezeToolCall,
  MalformedMessageError,
  MAX_FRAME_BYTES,
} from '../src/index.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

function rawFrame(json: string): Buffer {
  return encodeFrame(Buffer.from(json, 'utf-8'));
}

// ─── Framing ────────────────────────────────────────────────────

describe('frames', () => {
  it('prefixes the payload with a big-endian length', () => {
    const frame = encodeFrame(Buffer.from('abc'));
    expect([...frame]).toEqual([0, 0, 0, 3, 0x61, 0x62, 0x63]);
  });

  it('rejects a truncated header', () => {
    const err = thrownBy(() => decodeFrame(Buffer.from([0, 0])));
    expect(err).toBeInstanceOf(MalformedMessageError);
    expect(err).toMatchObject({ message: 'Truncated frame header: 2 of 4 bytes' });
  });

  it('rejects a payload shorter than the header claims', () => {
    const frame = encodeFrame(Buffer.from('hello'));
    const err = thrownBy(() => decodeFrame(frame.subarray(0, 7)));
    expect(err).toMatchObject({
      code: 'MALFORMED_MESSAGE',
      message: 'Frame length mismatch: header says 5 bytes, got 3',
    });
  });

  it('rejects trailing bytes after the payload', () => {
    const frame = Buffer.concat([encodeFrame(Buffer.from('hi')), Buffer.from([1])]);
    expect(() => decodeFrame(frame)).toThrow(MalformedMessageError);
  });

  it('rejects an oversized length header', () => {
    const header = Buffer.alloc(4);
    header.writeUInt32BE(MAX_FRAME_BYTES + 1, 0);
    expect(() => decodeFrame(header)).toThrow(/Frame too large/);
  });
});

// ─── Tool call round trip ───────────────────────────────────────

describe('encode / decode', () => {
  it('round-trips a validated call', () => {
    const call = createToolCall('draw_rectangle', { width: 40, height: 30, origin_x: -2.5 });
    expect(decode(encode(call, 7))).toEqual(call);
  });

  it('round-trips vector and boolean parameters', () => {
    const call = freezeToolCall('probe', { at: [1, -2, 3.5], flag: true, label: 'ü' });
    expect(decode(encode(call))).toEqual(call);
  });

  it('carries the correlation id', () => {
    const message = decodeMessage(encode(createToolCall('get_scene_info'), 42));
    expect(message).toEqual({ kind: 'request', id: 42, tool: 'get_scene_info', params: {} });
  });

  it('rejects a payload that is not JSON', () => {
    const err = thrownBy(() => decode(rawFrame('{"kind":')));
    expect(err).toMatchObject({ code: 'MALFORMED_MESSAGE', message: 'Frame payload is not valid JSON' });
  });

  it('rejects a message with an unknown kind', () => {
    expect(() => decode(rawFrame('{"kind":"ping","id":1}'))).toThrow(MalformedMessageError);
  });

  it('rejects a request with a negative correlation id', () => {
    expect(() => decode(rawFrame('{"kind":"request","id":-1,"tool":"extrude","params":{}}'))).toThrow(
      /Unexpected message shape at id/
    );
  });

  it('rejects nested objects as parameter values', () => {
    expect(() =>
      decode(rawFrame('{"kind":"request","id":1,"tool":"extrude","params":{"height":{"mm":5}}}'))
    ).toThrow(MalformedMessageError);
  });

  it('refuses to decode a response as a tool call', () => {
    expect(() => decode(encodeResult(1, { ok: true }))).toThrow('Expected a request frame, got "response"');
  });

  it('survives every truncation of a valid frame', () => {
    const frame = encode(createToolCall('fillet', { radius: 2 }), 3);
    for (let cut = 0; cut < frame.length; cut++) {
      expect(() => decode(frame.subarray(0, cut))).toThrow(MalformedMessageError);
    }
  });
});

// ─── Results ────────────────────────────────────────────────────

describe('results', () => {
  it('decodes a response', () => {
    expect(decodeResult(encodeResult(5, { feature_name: 'Extrude1' }))).toEqual({
      kind: 'response',
      id: 5,
      result: { feature_name: 'Extrude1' },
    });
  });

  it('encodes an undefined result as null', () => {
    expect(decodeResult(encodeResult(2, undefined))).toEqual({ kind: 'response', id: 2, result: null });
  });

  it('decodes an error', () => {
    const reply = decodeResult(
      encodeError(9, { code: 'NO_ACTIVE_DOCUMENT', message: 'no design', tool: 'extrude' })
    );
    expect(reply).toEqual({
      kind: 'error',
      id: 9,
      error: { code: 'NO_ACTIVE_DOCUMENT', message: 'no design', tool: 'extrude' },
    });
  });

  it('rejects an error with an unknown code', () => {
    expect(() =>
      decodeResult(rawFrame('{"kind":"error","id":1,"error":{"code":"BOOM","message":"x"}}'))
    ).toThrow(MalformedMessageError);
  });

  it('refuses a request where a reply is expected', () => {
    expect(() => decodeResult(encode(createToolCall('get_scene_info'), 1))).toThrow(MalformedMessageError);
  });
});

// ─── Stream reassembly ──────────────────────────────────────────

describe('FrameDecoder', () => {
  const first = encodeResult(1, 'one');
  const second = encodeResult(2, 'two');

  it('reassembles a frame delivered one byte at a time', () => {
    const decoder = new FrameDecoder();
    const frames: Buffer[] = [];
    for (const byte of first) {
      frames.push(...decoder.push(Buffer.from([byte])));
    }
    expect(frames).toHaveLength(1);
    expect(decodeResult(encodeFrame(frames[0]))).toEqual({ kind: 'response', id: 1, result: 'one' });
    expect(decoder.pendingBytes).toBe(0);
  });

  it('splits two frames that arrive in one chunk', () => {
    const decoder = new FrameDecoder();
    const frames = decoder.push(Buffer.concat([first, second]));
    expect(frames.map((f) => JSON.parse(f.toString('utf-8')).id)).toEqual([1, 2]);
  });

  it('keeps a partial trailing frame for the next chunk', () => {
    const decoder = new FrameDecoder();
    const joined = Buffer.concat([first, second]);
    const cut = first.length + 3;
    expect(decoder.push(joined.subarray(0, cut))).toHaveLength(1);
    expect(decoder.pendingBytes).toBe(3);
    expect(decoder.push(joined.subarray(cut))).toHaveLength(1);
  });

  it('reads a header split across chunks that also carry payload', () => {
    const decoder = new FrameDecoder();
    expect(decoder.push(first.subarray(0, 2))).toEqual([]);
    expect(decoder.push(first.subarray(2, 7))).toEqual([]);
    const frames = decoder.push(first.subarray(7));
    expect(frames).toHaveLength(1);
    expect(frames[0]?.toString('utf-8')).toBe('{"kind":"response","id":1,"result":"one"}');
  });

  it('collects a large frame over many reads and completes it once', () => {
    const decoder = new FrameDecoder();
    const payload = Buffer.alloc(1024 * 1024, 0x61);
    const frame = encodeFrame(payload);
    const step = 64 * 1024;
    const completed: Buffer[] = [];

    for (let offset = 0; offset < frame.length; offset += step) {
      const out = decoder.push(frame.subarray(offset, offset + step));
      if (offset + step < frame.length) {
        expect(out).toEqual([]);
        expect(decoder.pendingBytes).toBe(offset + step);
      }
      completed.push(...out);
    }

    expect(completed).toHaveLength(1);
    expect(completed[0]?.equals(payload)).toBe(true);
    expect(decoder.pendingBytes).toBe(0);
  });

  it('starts empty again after reset', () => {
    const decoder = new FrameDecoder();
    decoder.push(first.subarray(0, 6));
    decoder.reset();
    expect(decoder.pendingBytes).toBe(0);
    expect(decoder.push(second)).toHaveLength(1);
  });

  it('throws on an oversized header', () => {
    const decoder = new FrameDecoder();
    const header = Buffer.alloc(4);
    header.writeUInt32BE(MAX_FRAME_BYTES + 1, 0);
    expect(() => decoder.push(header)).toThrow(MalformedMessageError);
  });
});
