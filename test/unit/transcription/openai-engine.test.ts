import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  create: vi.fn(),
  toFile: vi.fn(),
  constructed: [] as Array<{ apiKey?: string }>,
}));

vi.mock('openai', () => {
  class OpenAI {
    audio = { transcriptions: { create: mocks.create } };
    constructor(options: { apiKey?: string }) {
      mocks.constructed.push(options);
    }
  }
  return { default: OpenAI, toFile: mocks.toFile };
});

import { OpenAITranscriptionEngine } from '../../../src/transcription/openai-engine.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('OpenAITranscriptionEngine', () => {
  const savedKey = process.env.OPENAI_API_KEY;

  beforeEach(() => {
    delete process.env.OPENAI_API_KEY;
    mocks.create.mockReset();
    mocks.toFile.mockReset();
    mocks.constructed.length = 0;
    mocks.toFile.mockImplementation(async (data: Buffer, name: string) => ({ data, name }));
    mocks.create.mockResolvedValue({ text: 'fly to mars' });
  });

  afterEach(() => {
    if (savedKey === undefined) delete process.env.OPENAI_API_KEY;
    else process.env.OPENAI_API_KEY = savedKey;
  });

  it('should refuse to load without an API key', async () => {
    const engine = new OpenAITranscriptionEngine();
    await expect(engine.load()).rejects.toBeInstanceOf(ConfigError);
    await expect(engine.load()).rejects.toThrow('OPENAI_API_KEY environment variable not set');
  });

  it('should fall back to the environment key', async () => {
    process.env.OPENAI_API_KEY = 'test-secret';
    await new OpenAITranscriptionEngine().load();
    expect(mocks.constructed).toEqual([{ apiKey: 'test-secret' }]);
  });

  it('should upload float32 audio as a WAV file', async () => {
    const engine = new OpenAITranscriptionEngine({ apiKey: 'test-secret', model: 'whisper-1', sampleRate: 16000 });
    const pcm = Buffer.alloc(8);
    pcm.writeFloatLE(0.5, 0);
    pcm.writeFloatLE(-0.5, 4);
    const controller = new AbortController();

    const text = await engine.transcribe(pcm, { signal: controller.signal });

    expect(text).toBe('fly to mars');
    const [wav, name] = mocks.toFile.mock.calls[0];
    expect(name).toBe('speech.wav');
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.length).toBe(48);

    const [params, requestOptions] = mocks.create.mock.calls[0];
    expect(params).toEqual({ file: { data: wav, name: 'speech.wav' }, model: 'whisper-1' });
    expect(requestOptions).toEqual({ signal: controller.signal });
  });

  it('should pass wav input through and forward the language', async () => {
    const engine = new OpenAITranscriptionEngine({ apiKey: 'test-secret', audioFormat: 'wav', language: 'en' });
    const wav = Buffer.from('RIFF....WAVE');

    await engine.transcribe(wav);

    expect(mocks.toFile.mock.calls[0][0]).toBe(wav);
    expect(mocks.create.mock.calls[0][0]).toMatchObject({ model: 'whisper-1', language: 'en' });
  });
});
