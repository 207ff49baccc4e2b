/**
 * Stream framing for the voice socket.
 *
 * 'length-prefixed': uint32 big-endian body length, then the body.
 * 'chunk': every read is taken as one whole message (legacy host behaviour,
 * only safe when the transport never splits or merges writes).
 */

import type { FramingMode } from '../core/types.js';

export const FRAME_HEADER_BYTES = 4;

export type FrameEvent =
  | { kind: 'frame'; body: Buffer }
  | { kind: 'oversized'; declaredBytes: number };

export interface FrameDecoder {
  /** Feed bytes from the socket; returns every event they complete, in order. */
  push(chunk: Buffer): FrameEvent[];
  /** Bytes held while waiting for the rest of a frame */
  readonly bufferedBytes: number;
  reset(): void;
}

export function encodeFrame(body: Buffer, mode: FramingMode): Buffer {
  if (mode === 'chunk') return body;

  const header = Buffer.allocUnsafe(FRAME_HEADER_BYTES);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

export class LengthPrefixedDecoder implements FrameDecoder {
  private pending: Buffer = Buffer.alloc(0);
  /** Body bytes still to throw away after an oversized header */
  private skipRemaining = 0;

  constructor(private readonly maxFrameBytes: number) {}

  push(chunk: Buffer): FrameEvent[] {
    const events: FrameEvent[] = [];
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    while (true) {
      if (this.skipRemaining > 0) {
        const dropped = Math.min(this.skipRemaining, this.pending.length);
        this.pending = this.pending.subarray(dropped);
        this.skipRemaining -= dropped;
        if (this.skipRemaining > 0) break;
      }

      if (this.pending.length < FRAME_HEADER_BYTES) break;

      const declared = this.pending.readUInt32BE(0);
      if (declared > this.maxFrameBytes) {
        events.push({ kind: 'oversized', declaredBytes: declared });
        this.pending = this.pending.subarray(FRAME_HEADER_BYTES);
        this.skipRemaining = declared;
        continue;
      }

      const frameEnd = FRAME_HEADER_BYTES + declared;
      if (this.pending.length < frameEnd) break;

      // Copy so the body does not pin the larger read buffer
      events.push({ kind: 'frame', body: Buffer.from(this.pending.subarray(FRAME_HEADER_BYTES, frameEnd)) });
      this.pending = this.pending.subarray(frameEnd);
    }

    if (this.pending.length === 0) {
      this.pending = Buffer.alloc(0);
    }
    return events;
  }

  get bufferedBytes(): number {
    return this.pending.length;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
    this.skipRemaining = 0;
  }
}

export class ChunkDecoder implements FrameDecoder {
  constructor(private readonly maxFrameBytes: number) {}

  push(chunk: Buffer): FrameEvent[] {
    if (chunk.length > this.maxFrameBytes) {
      return [{ kind: 'oversized', declaredBytes: chunk.length }];
    }
    return [{ kind: 'frame', body: chunk }];
  }

  get bufferedBytes(): number {
    return 0;
  }

  reset(): void {}
}

export function createFrameDecoder(mode: FramingMode, maxFrameBytes: number): FrameDecoder {
  return mode === 'chunk' ? new ChunkDecoder(maxFrameBytes) : new LengthPrefixedDecoder(maxFrameBytes);
}
