/**
 * VoiceClient: host-side end of the voice socket.
 *
 * The service answers every message exactly once and in order, so replies
 * are matched to requests with a FIFO of pending resolvers.
 */

import { EventEmitter } from 'node:events';
import { createConnection, type Socket } from 'node:net';
import type { FramingMode } from '../core/types.js';
import { ConnectionError, ProtocolError, toError } from '../core/errors.js';
import { decodeMessage, encodeMessage } from '../protocol/codec.js';
import { createFrameDecoder, encodeFrame, type FrameDecoder } from '../protocol/framing.js';
import { MessageType, audioMessage, createMessage, type WireMessage } from '../protocol/wire.js';

export interface VoiceClientOptions {
  framing?: FramingMode;
  maxMessageBytes?: number;
  /** Reject a pending request after this long; 0 waits forever (default: 0) */
  requestTimeoutMs?: number;
}

interface PendingReply {
  resolve: (message: WireMessage) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

export class VoiceClient extends EventEmitter {
  private socket: Socket | null = null;
  private decoder: FrameDecoder;
  private pending: PendingReply[] = [];
  private readonly framing: FramingMode;
  private readonly requestTimeoutMs: number;

  constructor(private readonly socketPath: string, options: VoiceClientOptions = {}) {
    super();
    this.framing = options.framing ?? 'length-prefixed';
    this.requestTimeoutMs = options.requestTimeoutMs ?? 0;
    this.decoder = createFrameDecoder(this.framing, options.maxMessageBytes ?? 16 * 1024 * 1024);
  }

  async connect(): Promise<void> {
    if (this.socket) return;

    const socket = await new Promise<Socket>((resolve, reject) => {
      const s = createConnection(this.socketPath);
      const onError = (err: Error): void => {
        reject(new ConnectionError(`Failed to connect to ${this.socketPath}: ${err.message}`, this.socketPath, err));
      };
      s.once('error', onError);
      s.once('connect', () => {
        s.off('error', onError);
        resolve(s);
      });
    });

    socket.on('data', chunk => this.onData(chunk));
    socket.on('error', err => {
      this.failPending(new ConnectionError(`Connection error: ${err.message}`, this.socketPath, err));
    });
    socket.on('close', () => {
      this.socket = null;
      this.failPending(new ConnectionError('Connection closed', this.socketPath));
      this.emit('close');
    });
    this.socket = socket;
  }

  isConnected(): boolean {
    return this.socket !== null;
  }

  /**
   * Send a message and wait for the service's reply to it.
   */
  request(message: WireMessage): Promise<WireMessage> {
    return this.requestRaw(encodeMessage(message));
  }

  /**
   * Send already-encoded bytes as one frame and wait for the reply.
   */
  async requestRaw(body: Buffer): Promise<WireMessage> {
    const reply = this.expectReply();
    try {
      await this.writeFrame(encodeFrame(body, this.framing));
    } catch (err) {
      this.failPending(new ConnectionError(`Failed to send: ${toError(err).message}`, this.socketPath, toError(err)));
    }
    return reply;
  }

  sendAudio(chunk: Buffer): Promise<WireMessage> {
    return this.request(audioMessage(chunk));
  }

  requestTranscription(): Promise<WireMessage> {
    return this.request(createMessage(MessageType.TRANSCRIPTION, 'request'));
  }

  /**
   * Stream a whole recording in chunks, then ask for its transcription.
   */
  async transcribe(audio: Buffer, chunkSize: number = 64 * 1024): Promise<WireMessage> {
    for (let offset = 0; offset < audio.length; offset += chunkSize) {
      const reply = await this.sendAudio(audio.subarray(offset, offset + chunkSize));
      if (reply.type === MessageType.ERROR) return reply;
    }
    return this.requestTranscription();
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    await new Promise<void>(resolve => {
      socket.once('close', () => resolve());
      socket.end();
    });
  }

  private expectReply(): Promise<WireMessage> {
    if (!this.socket) {
      return Promise.reject(new ConnectionError('Not connected', this.socketPath));
    }

    return new Promise<WireMessage>((resolve, reject) => {
      const entry: PendingReply = { resolve, reject, timer: null };
      if (this.requestTimeoutMs > 0) {
        entry.timer = setTimeout(() => {
          this.pending = this.pending.filter(p => p !== entry);
          reject(new ConnectionError(`No reply within ${this.requestTimeoutMs}ms`, this.socketPath));
          // A late reply would be paired with the wrong request from here on
          this.socket?.destroy();
        }, this.requestTimeoutMs);
      }
      this.pending.push(entry);
    });
  }

  private writeFrame(frame: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new ConnectionError('Not connected', this.socketPath));
    }
    return new Promise<void>((resolve, reject) => {
      socket.write(frame, err => (err ? reject(toError(err)) : resolve()));
    });
  }

  private onData(chunk: Buffer): void {
    for (const event of this.decoder.push(chunk)) {
      if (event.kind === 'oversized') {
        this.failNext(new ProtocolError(`Reply of ${event.declaredBytes} bytes exceeds the client limit`, 'oversized'));
        continue;
      }

      const decoded = decodeMessage(event.body);
      if (!decoded.ok) {
        this.failNext(decoded.error);
        continue;
      }

      const next = this.pending.shift();
      if (next) {
        if (next.timer) clearTimeout(next.timer);
        next.resolve(decoded.message);
      } else {
        this.emit('message', decoded.message);
      }
    }
  }

  /** An unreadable reply still answers the oldest request, so later replies stay paired. */
  private failNext(error: ProtocolError): void {
    const next = this.pending.shift();
    if (!next) {
      this.emit('warning', error);
      return;
    }
    if (next.timer) clearTimeout(next.timer);
    next.reject(error);
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    this.pending = [];
    for (const entry of pending) {
      if (entry.timer) clearTimeout(entry.timer);
      entry.reject(error);
    }
  }
}
