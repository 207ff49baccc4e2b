import { describe, it, expect } from 'vitest';
import {
  ChunkDecoder,
  LengthPrefixedDecoder,
  createFrameDecoder,
  encodeFrame,
  type FrameEvent,
} from '../../../src/protocol/framing.js';

const frame = (text: string): Buffer => encodeFrame(Buffer.from(text, 'utf-8'), 'length-prefixed');
const bodies = (events: FrameEvent[]): string[] =>
  events.map(e => (e.kind === 'frame' ? e.body.toString('utf-8') : `oversized:${e.declaredBytes}`));

describe('encodeFrame', () => {
  it('should prefix a big-endian length', () => {
    expect([...frame('abc')]).toEqual([0, 0, 0, 3, 0x61, 0x62, 0x63]);
  });

  it('should leave the body untouched in chunk mode', () => {
    const body = Buffer.from('abc');
    expect(encodeFrame(body, 'chunk')).toBe(body);
  });
});

describe('LengthPrefixedDecoder', () => {
  it('should split coalesced frames', () => {
    const decoder = new LengthPrefixedDecoder(1024);
    const events = decoder.push(Buffer.concat([frame('one'), frame('two'), frame('three')]));
    expect(bodies(events)).toEqual(['one', 'two', 'three']);
    expect(decoder.bufferedBytes).toBe(0);
  });

  it('should reassemble a frame split across reads, header included', () => {
    const decoder = new LengthPrefixedDecoder(1024);
    const bytes = frame('hello');

    expect(decoder.push(bytes.subarray(0, 2))).toEqual([]);
    expect(decoder.bufferedBytes).toBe(2);
    expect(decoder.push(bytes.subarray(2, 6))).toEqual([]);
    expect(bodies(decoder.push(bytes.subarray(6)))).toEqual(['hello']);
    expect(decoder.bufferedBytes).toBe(0);
  });

  it('should emit a frame and keep the start of the next one', () => {
    const decoder = new LengthPrefixedDecoder(1024);
    const second = frame('second');
    expect(bodies(decoder.push(Buffer.concat([frame('first'), second.subarray(0, 5)])))).toEqual(['first']);
    expect(decoder.bufferedBytes).toBe(5);
    expect(bodies(decoder.push(second.subarray(5)))).toEqual(['second']);
  });

  it('should decode an empty body', () => {
    const decoder = new LengthPrefixedDecoder(1024);
    expect(bodies(decoder.push(Buffer.from([0, 0, 0, 0])))).toEqual(['']);
  });

  it('should skip an oversized frame and recover at the next one', () => {
    const decoder = new LengthPrefixedDecoder(8);
    const header = Buffer.alloc(4);
    header.writeUInt32BE(100, 0);

    expect(bodies(decoder.push(Buffer.concat([header, Buffer.alloc(10)])))).toEqual(['oversized:100']);
    expect(decoder.bufferedBytes).toBe(0);

    expect(bodies(decoder.push(Buffer.concat([Buffer.alloc(90), frame('ok')])))).toEqual(['ok']);
  });

  it('should forget partial input on reset', () => {
    const decoder = new LengthPrefixedDecoder(1024);
    decoder.push(frame('partial').subarray(0, 6));
    decoder.reset();
    expect(decoder.bufferedBytes).toBe(0);
    expect(bodies(decoder.push(frame('fresh')))).toEqual(['fresh']);
  });
});

describe('ChunkDecoder', () => {
  it('should treat every read as one message', () => {
    const decoder = new ChunkDecoder(1024);
    expect(bodies(decoder.push(Buffer.from('{"type":1}')))).toEqual(['{"type":1}']);
    expect(decoder.bufferedBytes).toBe(0);
  });

  it('should flag reads above the limit', () => {
    const decoder = new ChunkDecoder(4);
    expect(bodies(decoder.push(Buffer.from('too long')))).toEqual(['oversized:8']);
  });
});

describe('createFrameDecoder', () => {
  it('should pick the decoder for the mode', () => {
    expect(createFrameDecoder('chunk', 10)).toBeInstanceOf(ChunkDecoder);
    expect(createFrameDecoder('length-prefixed', 10)).toBeInstanceOf(LengthPrefixedDecoder);
  });
});
