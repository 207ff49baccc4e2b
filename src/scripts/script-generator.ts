/**
 * ScriptGenerator: turns a transcribed command into a host script.
 *
 * Sends the transcription plus example command/script pairs to an OpenAI
 * chat model, cleans the reply, stamps a provenance header and saves it.
 */

import OpenAI from 'openai';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { nanoid } from 'nanoid';
import { ConfigError, ScriptGenerationError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { DEFAULT_EXAMPLES, type ScriptExample } from './examples.js';
import { SYSTEM_PROMPT, cleanScript, formatExamples } from './prompt.js';

export type ChatClient = Pick<OpenAI, 'chat'>;

export interface ScriptGeneratorOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  outputDir: string;
  examples?: ScriptExample[];
  /** Injected client; built from apiKey when omitted */
  client?: ChatClient;
  now?: () => Date;
}

export interface GeneratedScript {
  script: string;
  scriptPath: string;
}

const pad = (n: number): string => String(n).padStart(2, '0');

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function scriptFileName(date: Date, suffix: string): string {
  const stamp = formatTimestamp(date).replace(/[-:]/g, '').replace(' ', '_');
  return `voice_command_${stamp}_${suffix}.lua`;
}

export class ScriptGenerator {
  private client: ChatClient | null;
  private readonly examples: ScriptExample[];
  private readonly now: () => Date;

  constructor(private readonly options: ScriptGeneratorOptions) {
    this.client = options.client ?? null;
    this.examples = options.examples ?? DEFAULT_EXAMPLES;
    this.now = options.now ?? (() => new Date());
  }

  async generate(transcription: string): Promise<GeneratedScript> {
    const command = transcription.trim();
    if (!command) {
      throw new ScriptGenerationError('Empty transcription provided');
    }

    const logger = getLogger();
    const client = this.getClient();
    logger.info({ command, model: this.options.model ?? 'gpt-4o' }, 'Requesting script generation');

    let content: string | null | undefined;
    try {
      const response = await client.chat.completions.create({
        model: this.options.model ?? 'gpt-4o',
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: formatExamples(this.examples) },
          { role: 'user', content: `Voice Command: ${command}` },
        ],
        temperature: this.options.temperature ?? 0.2,
        max_tokens: this.options.maxTokens ?? 500,
      });
      content = response.choices[0]?.message.content;
    } catch (err) {
      const error = toError(err);
      const prefix = err instanceof OpenAI.APIError ? 'OpenAI API error: ' : '';
      throw new ScriptGenerationError(`${prefix}${error.message}`, error);
    }

    const body = cleanScript(content ?? '');
    if (!body) {
      throw new ScriptGenerationError('Model returned an empty script');
    }

    const createdAt = this.now();
    const script =
      `-- Generated from voice command: ${command}\n-- Timestamp: ${formatTimestamp(createdAt)}\n\n${body}`;
    const scriptPath = await this.save(script, createdAt);

    logger.info({ scriptPath, lines: body.split('\n').length }, 'Script generated');
    return { script, scriptPath };
  }

  private async save(script: string, createdAt: Date): Promise<string> {
    await mkdir(this.options.outputDir, { recursive: true });
    const scriptPath = join(this.options.outputDir, scriptFileName(createdAt, nanoid(6)));
    try {
      await writeFile(scriptPath, script, 'utf-8');
    } catch (err) {
      throw new ScriptGenerationError(`Failed to save script to ${scriptPath}`, toError(err));
    }
    return scriptPath;
  }

  private getClient(): ChatClient {
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
