import type { VoxConfig } from '../core/types.js';
import { CommandTranscriptionEngine } from './command-engine.js';
import { OpenAITranscriptionEngine } from './openai-engine.js';
import type { TranscriptionEngine } from './types.js';

export { CommandTranscriptionEngine, parseRecognizerOutput, type CommandEngineOptions } from './command-engine.js';
export { OpenAITranscriptionEngine, type OpenAIEngineOptions } from './openai-engine.js';
export { pcmFloat32ToWav, encodeWav16, readFloat32Samples, normalizeSamples } from './wav.js';
export type { TranscriptionEngine, TranscribeOptions } from './types.js';

export function createTranscriptionEngine(config: VoxConfig): TranscriptionEngine {
  const { transcription } = config;
  switch (transcription.engine) {
    case 'openai':
      return new OpenAITranscriptionEngine({
        apiKey: config.openaiApiKey,
        model: transcription.model,
        language: transcription.language,
        sampleRate: transcription.sampleRate,
        audioFormat: transcription.audioFormat,
      });
    case 'command':
      return new CommandTranscriptionEngine({
        command: transcription.command,
        args: transcription.args,
        audioFormat: transcription.audioFormat,
      });
  }
}
