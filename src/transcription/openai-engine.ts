import OpenAI, { toFile } from 'openai';
import { ConfigError } from '../core/errors.js';
import type { TranscribeOptions, TranscriptionEngine } from './types.js';
import { pcmFloat32ToWav } from './wav.js';

export interface OpenAIEngineOptions {
  apiKey?: string;
  model?: string;
  language?: string;
  sampleRate?: number;
  audioFormat?: 'f32le' | 'wav';
}

/**
 * Transcribes through the OpenAI audio API. The request is plain async I/O,
 * so it never holds up other connections.
 */
export class OpenAITranscriptionEngine implements TranscriptionEngine {
  readonly name = 'openai';
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAIEngineOptions = {}) {}

  async load(): Promise<void> {
    this.getClient();
  }

  async transcribe(audio: Buffer, options: TranscribeOptions = {}): Promise<string> {
    const wav = this.options.audioFormat === 'wav'
      ? audio
      : pcmFloat32ToWav(audio, this.options.sampleRate ?? 16000);

    const response = await this.getClient().audio.transcriptions.create(
      {
        file: await toFile(wav, 'speech.wav', { type: 'audio/wav' }),
        model: this.options.model ?? 'whisper-1',
        ...(this.options.language ? { language: this.options.language } : {}),
      },
      { signal: options.signal },
    );
    return response.text;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = this.options.apiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigError('OPENAI_API_KEY environment variable not set');
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }
}
