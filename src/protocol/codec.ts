import { z } from 'zod';
import { ProtocolError } from '../core/errors.js';
import { toMessageType, type WireMessage } from './wire.js';

export type DecodeResult =
  | { ok: true; message: WireMessage }
  | { ok: false; error: ProtocolError };

// The host client writes the type as a quoted integer, so both forms are accepted.
const RawMessageSchema = z.object({
  type: z.union([
    z.number().int(),
    z.string().regex(/^-?\d+$/).transform(Number),
  ]),
  data: z.string().default(''),
  metadata: z.string().default(''),
});

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function encodeMessage(message: WireMessage): Buffer {
  return Buffer.from(
    JSON.stringify({ type: message.type, data: message.data, metadata: message.metadata }),
    'utf-8',
  );
}

export function decodeMessage(bytes: Uint8Array): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8.decode(bytes));
  } catch (err) {
    return {
      ok: false,
      error: new ProtocolError('Invalid message format', 'malformed', err instanceof Error ? err : undefined),
    };
  }

  const raw = RawMessageSchema.safeParse(parsed);
  if (!raw.success) {
    return { ok: false, error: new ProtocolError('Invalid message format', 'malformed', raw.error) };
  }

  const type = toMessageType(raw.data.type);
  if (type === null) {
    return {
      ok: false,
      error: new ProtocolError(`Unknown message type: ${raw.data.type}`, 'unknown_type'),
    };
  }

  return { ok: true, message: { type, data: raw.data.data, metadata: raw.data.metadata } };
}
