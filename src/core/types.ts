import { z } from 'zod';
import { tmpdir } from 'os';
import { join } from 'path';

// ===== Configuration =====

export const FramingModeSchema = z.enum(['length-prefixed', 'chunk']);
export type FramingMode = z.infer<typeof FramingModeSchema>;

export const VoxConfigSchema = z.object({
  service: z.object({
    socketPath: z.string().min(1).default(join(tmpdir(), 'voxbridge.sock')),
    /** File mode applied to the socket after bind (0o666 lets any local peer connect) */
    socketMode: z.number().int().min(0).max(0o777).default(0o666),
    framing: FramingModeSchema.default('length-prefixed'),
    maxMessageBytes: z.number().int().min(1024).default(16 * 1024 * 1024),
  }).default({}),
  transcription: z.object({
    engine: z.enum(['command', 'openai']).default('command'),
    /** Recognizer executable for the command engine */
    command: z.string().default('whisper-transcribe'),
    /** Arguments placed before the staged audio path */
    args: z.array(z.string()).default([]),
    model: z.string().default('whisper-1'),
    language: z.string().optional(),
    sampleRate: z.number().int().positive().default(16000),
    /** 'f32le' is raw mono float32 PCM; 'wav' is passed through untouched */
    audioFormat: z.enum(['f32le', 'wav']).default('f32le'),
    /** Per-request deadline, 0 disables */
    timeoutMs: z.number().int().min(0).default(120_000),
    maxConcurrent: z.number().int().min(1).max(16).default(1),
  }).default({}),
  scripts: z.object({
    model: z.string().default('gpt-4o'),
    temperature: z.number().min(0).max(2).default(0.2),
    maxTokens: z.number().int().positive().default(500),
    examplesDir: z.string().optional(),
    outputDir: z.string().default(join(tmpdir(), 'voxbridge', 'scripts')),
  }).default({}),
  shutdown: z.object({
    /** How long stop() waits for in-flight transcriptions, 0 closes immediately */
    drainTimeoutMs: z.number().int().min(0).default(5000),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
  openaiApiKey: z.string().optional(),
});

export type VoxConfig = z.infer<typeof VoxConfigSchema>;

/** Deep partial used for programmatic overrides */
export type VoxConfigOverrides = {
  [K in keyof VoxConfig]?: VoxConfig[K] extends object ? Partial<VoxConfig[K]> : VoxConfig[K];
};
