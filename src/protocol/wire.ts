/**
 * Wire message types shared by the voice service and its clients.
 */

export enum MessageType {
  AUDIO_DATA = 0,
  TRANSCRIPTION = 1,
  LUA_SCRIPT = 2,
  ERROR = 3,
  STATUS = 4,
}

export interface WireMessage {
  type: MessageType;
  /** UTF-8 text, or an audio chunk for AUDIO_DATA */
  data: string;
  metadata: string;
}

/** Metadata value marking an AUDIO_DATA payload as base64 */
export const BASE64_METADATA = 'base64';

/** Map a wire integer onto the enumeration; null when it is not one of the five codes. */
export function toMessageType(code: number): MessageType | null {
  switch (code) {
    case MessageType.AUDIO_DATA:
      return MessageType.AUDIO_DATA;
    case MessageType.TRANSCRIPTION:
      return MessageType.TRANSCRIPTION;
    case MessageType.LUA_SCRIPT:
      return MessageType.LUA_SCRIPT;
    case MessageType.ERROR:
      return MessageType.ERROR;
    case MessageType.STATUS:
      return MessageType.STATUS;
    default:
      return null;
  }
}

export function messageTypeName(type: MessageType): string {
  return MessageType[type];
}

export function createMessage(type: MessageType, data: string = '', metadata: string = ''): WireMessage {
  return { type, data, metadata };
}

export const statusMessage = (text: string): WireMessage => createMessage(MessageType.STATUS, text);
export const errorMessage = (text: string): WireMessage => createMessage(MessageType.ERROR, text);
export const transcriptionMessage = (text: string): WireMessage =>
  createMessage(MessageType.TRANSCRIPTION, text);

/** Build an AUDIO_DATA message carrying raw bytes as base64. */
export function audioMessage(chunk: Buffer): WireMessage {
  return createMessage(MessageType.AUDIO_DATA, chunk.toString('base64'), BASE64_METADATA);
}

/** Bytes an AUDIO_DATA message contributes to the session buffer. */
export function audioPayload(message: WireMessage): Buffer {
  return message.metadata === BASE64_METADATA
    ? Buffer.from(message.data, 'base64')
    : Buffer.from(message.data, 'utf-8');
}
