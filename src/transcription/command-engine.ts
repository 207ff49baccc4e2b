/**
 * CommandTranscriptionEngine: runs an external recognizer per request.
 *
 * Each request stages its audio in its own temporary directory, so
 * concurrent requests never share a file. The recognizer gets the file
 * path as its last argument and prints one JSON line on stdout:
 *   {"text": "...", "error": ""}
 * Running it as a child process keeps the event loop free while it works.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { getLogger } from '../core/logger.js';
import { resolveExecutable, runCommand, tail } from '../utils/process.js';
import type { TranscribeOptions, TranscriptionEngine } from './types.js';

export interface CommandEngineOptions {
  command: string;
  /** Arguments placed before the audio path */
  args?: string[];
  audioFormat?: 'f32le' | 'wav';
  env?: NodeJS.ProcessEnv;
}

const RecognizerOutputSchema = z.object({
  text: z.string().default(''),
  error: z.string().default(''),
});

export type RecognizerOutput = z.infer<typeof RecognizerOutputSchema>;

/**
 * Find the recognizer's JSON line. Logging may share stdout, so the last
 * line that parses wins.
 */
export function parseRecognizerOutput(stdout: string): RecognizerOutput | null {
  const lines = stdout.split('\n').map(l => l.trim()).filter(Boolean).reverse();
  for (const line of lines) {
    if (!line.startsWith('{')) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }
    const result = RecognizerOutputSchema.safeParse(parsed);
    if (result.success) return result.data;
  }
  return null;
}

export class CommandTranscriptionEngine implements TranscriptionEngine {
  readonly name = 'command';
  private resolvedCommand: string | null = null;

  constructor(private readonly options: CommandEngineOptions) {}

  async load(): Promise<void> {
    this.resolvedCommand = await resolveExecutable(this.options.command);
    if (!this.resolvedCommand) {
      throw new Error(`Recognizer command not found: ${this.options.command}`);
    }
    getLogger().debug({ command: this.resolvedCommand }, 'Recognizer command resolved');
  }

  async transcribe(audio: Buffer, options: TranscribeOptions = {}): Promise<string> {
    const command = this.resolvedCommand ?? this.options.command;
    const dir = await mkdtemp(join(tmpdir(), 'voxbridge-'));
    const audioPath = join(dir, this.options.audioFormat === 'wav' ? 'audio.wav' : 'audio.f32');

    try {
      await writeFile(audioPath, audio);
      const result = await runCommand(command, [...(this.options.args ?? []), audioPath], {
        env: this.options.env,
        signal: options.signal,
      });

      const output = parseRecognizerOutput(result.stdout);
      if (!output) {
        const detail = tail(result.stderr.trim(), 500);
        throw new Error(`Recognizer exited with code ${result.code} without a result${detail ? `: ${detail}` : ''}`);
      }
      if (output.error) {
        throw new Error(output.error);
      }
      return output.text;
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
