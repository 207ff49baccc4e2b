/**
 * VoiceConnection: one accepted client socket.
 *
 * Frames are decoded as they arrive and dispatched strictly one at a time,
 * in arrival order, through a promise chain. The connection owns its audio
 * buffer; nothing outside this class reads or mutates it.
 */

import { EventEmitter } from 'node:events';
import type { Socket } from 'node:net';
import type pino from 'pino';
import { nanoid } from 'nanoid';
import { ConnectionError, TranscriptionError, toError } from '../core/errors.js';
import { decodeMessage, encodeMessage } from '../protocol/codec.js';
import { createFrameDecoder, encodeFrame, type FrameDecoder, type FrameEvent } from '../protocol/framing.js';
import {
  MessageType,
  audioPayload,
  errorMessage,
  messageTypeName,
  statusMessage,
  transcriptionMessage,
  type WireMessage,
} from '../protocol/wire.js';
import { AudioSessionBuffer } from './audio-buffer.js';
import type { ServiceContext } from './context.js';

export enum ConnectionState {
  OPEN = 'OPEN',
  AWAITING_INPUT = 'AWAITING_INPUT',
  DISPATCHING = 'DISPATCHING',
  TRANSCRIBING = 'TRANSCRIBING',
  RESPONDING = 'RESPONDING',
  CLOSED = 'CLOSED',
}

export interface ConnectionStats {
  id: string;
  state: ConnectionState;
  bytesReceived: number;
  messagesHandled: number;
  protocolErrors: number;
  transcriptions: number;
  bufferedAudioBytes: number;
}

/** Pause reading once this many frames are waiting to be dispatched */
const MAX_QUEUED_FRAMES = 256;

export class VoiceConnection extends EventEmitter {
  readonly id: string;
  private state = ConnectionState.OPEN;
  private readonly buffer = new AudioSessionBuffer();
  private readonly decoder: FrameDecoder;
  private readonly logger: pino.Logger;
  private queue: Promise<void> = Promise.resolve();
  private queuedFrames = 0;
  /** Aborted on close so an abandoned transcription gives its engine permit back */
  private readonly cancel = new AbortController();
  private inputEnded = false;

  private bytesReceived = 0;
  private messagesHandled = 0;
  private protocolErrors = 0;
  private transcriptions = 0;

  constructor(
    private readonly socket: Socket,
    private readonly context: ServiceContext,
    id: string = nanoid(10),
  ) {
    super();
    this.id = id;
    const { framing, maxMessageBytes } = context.config.service;
    this.decoder = createFrameDecoder(framing, maxMessageBytes);
    this.logger = context.logger.child({ connectionId: id });
  }

  start(): void {
    this.socket.on('data', chunk => this.onData(chunk));
    this.socket.on('end', () => this.onPeerEnd());
    this.socket.on('close', () => this.close('socket closed'));
    this.socket.on('error', err => {
      const error = new ConnectionError(`Socket error: ${err.message}`, this.id, err);
      this.logger.warn({ error: error.message }, 'Connection I/O error');
      this.close(error.message);
    });

    this.state = ConnectionState.AWAITING_INPUT;
    this.logger.info('Client connected');
  }

  getState(): ConnectionState {
    return this.state;
  }

  isClosed(): boolean {
    return this.state === ConnectionState.CLOSED;
  }

  /** True while a transcription request is being processed */
  isBusy(): boolean {
    return this.state === ConnectionState.TRANSCRIBING;
  }

  getStats(): ConnectionStats {
    return {
      id: this.id,
      state: this.state,
      bytesReceived: this.bytesReceived,
      messagesHandled: this.messagesHandled,
      protocolErrors: this.protocolErrors,
      transcriptions: this.transcriptions,
      bufferedAudioBytes: this.buffer.byteLength,
    };
  }

  /**
   * Stop reading and wait until every frame already received has been answered.
   */
  async settle(): Promise<void> {
    if (!this.isClosed()) this.socket.pause();
    await this.queue;
  }

  close(reason: string = 'closed by service'): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.state = ConnectionState.CLOSED;
    this.cancel.abort(new TranscriptionError('Connection closed', 'cancelled'));
    this.buffer.release();
    this.decoder.reset();
    this.socket.destroy();

    this.logger.info({ reason, messagesHandled: this.messagesHandled }, 'Connection closed');
    this.emit('close', { id: this.id, reason });
  }

  // ─── Read side ──────────────────────────────────────────────

  private onData(chunk: Buffer): void {
    if (this.isClosed() || this.inputEnded) return;
    this.bytesReceived += chunk.length;

    for (const event of this.decoder.push(chunk)) {
      this.enqueue(event);
    }
  }

  /**
   * The peer has finished sending. Everything it sent before EOF is still
   * answered; the connection closes once the queue is empty.
   */
  private onPeerEnd(): void {
    if (this.isClosed() || this.inputEnded) return;
    this.inputEnded = true;
    this.logger.debug({ queuedFrames: this.queuedFrames }, 'Peer finished sending');
    this.queue = this.queue.then(() => this.close('peer closed'));
  }

  private enqueue(event: FrameEvent): void {
    this.queuedFrames++;
    if (this.queuedFrames >= MAX_QUEUED_FRAMES) {
      this.socket.pause();
    }

    this.queue = this.queue
      .then(() => this.process(event))
      .catch(err => {
        const error = toError(err);
        this.logger.warn({ error: error.message }, 'Failed to answer client');
        this.close(error.message);
      })
      .finally(() => {
        this.queuedFrames--;
        if (this.queuedFrames < MAX_QUEUED_FRAMES && !this.isClosed() && !this.inputEnded && this.socket.isPaused()) {
          this.socket.resume();
        }
      });
  }

  private async process(event: FrameEvent): Promise<void> {
    if (this.isClosed()) return;
    this.state = ConnectionState.DISPATCHING;

    if (event.kind === 'oversized') {
      this.protocolErrors++;
      this.logger.warn({ declaredBytes: event.declaredBytes }, 'Oversized frame skipped');
      await this.respond(
        errorMessage(`Message exceeds maximum size of ${this.context.config.service.maxMessageBytes} bytes`),
      );
      return;
    }

    const decoded = decodeMessage(event.body);
    if (!decoded.ok) {
      this.protocolErrors++;
      this.logger.warn({ kind: decoded.error.kind, bytes: event.body.length }, 'Failed to decode message');
      await this.respond(errorMessage(decoded.error.message));
      return;
    }

    this.messagesHandled++;
    await this.dispatch(decoded.message);
  }

  // ─── Dispatch ───────────────────────────────────────────────

  private async dispatch(message: WireMessage): Promise<void> {
    switch (message.type) {
      case MessageType.AUDIO_DATA: {
        const payload = audioPayload(message);
        this.buffer.append(payload);
        this.logger.debug({ bytes: payload.length, buffered: this.buffer.byteLength }, 'Audio chunk buffered');
        await this.respond(statusMessage('Received audio chunk'));
        return;
      }

      case MessageType.TRANSCRIPTION:
        await this.handleTranscription();
        return;

      case MessageType.LUA_SCRIPT:
      case MessageType.STATUS:
      case MessageType.ERROR:
        await this.respond(errorMessage(`Unsupported message type: ${messageTypeName(message.type)}`));
        return;

      default: {
        const unreachable: never = message.type;
        await this.respond(errorMessage(`Unknown message type: ${String(unreachable)}`));
      }
    }
  }

  private async handleTranscription(): Promise<void> {
    if (this.buffer.isEmpty()) {
      await this.respond(errorMessage('No audio data to transcribe'));
      return;
    }

    this.state = ConnectionState.TRANSCRIBING;
    // Drained before the engine runs so a failed attempt never leaks into the next request
    const audio = this.buffer.drain();
    this.transcriptions++;
    this.logger.info({ bytes: audio.length }, 'Transcription requested');

    const outcome = await this.context.bridge.transcribe(audio, this.cancel.signal);
    if (this.isClosed()) {
      this.logger.debug('Transcription finished after connection closed; result dropped');
      return;
    }

    if (outcome.ok) {
      this.logger.info({ durationMs: outcome.durationMs, chars: outcome.text.length }, 'Transcription completed');
      await this.respond(transcriptionMessage(outcome.text));
    } else {
      this.logger.warn(
        { durationMs: outcome.durationMs, kind: outcome.error.kind, error: outcome.error.message },
        'Transcription failed',
      );
      await this.respond(errorMessage(outcome.error.message));
    }
  }

  // ─── Write side ─────────────────────────────────────────────

  private async respond(message: WireMessage): Promise<void> {
    if (this.isClosed()) return;
    this.state = ConnectionState.RESPONDING;

    const frame = encodeFrame(encodeMessage(message), this.context.config.service.framing);
    await new Promise<void>((resolve, reject) => {
      this.socket.write(frame, err => {
        if (err) {
          reject(new ConnectionError(`Failed to write response: ${err.message}`, this.id, err));
          return;
        }
        resolve();
      });
    });

    if (!this.isClosed()) {
      this.state = ConnectionState.AWAITING_INPUT;
    }
  }
}
