/**
 * `voxbridge transcribe <audio_file>`: one-shot transcription of a file.
 * Prints exactly one JSON line: {"text": ..., "error": ...}.
 */

import { Command, Option } from 'commander';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { toError } from '../../core/errors.js';
import { TranscriptionBridge } from '../../service/transcription-bridge.js';
import { createTranscriptionEngine } from '../../transcription/index.js';
import { loadCliConfig, printJson, type CommonOptions } from '../shared.js';

export function createTranscribeCommand(): Command {
  const cmd = new Command('transcribe');

  cmd
    .description('Transcribe an audio file and print {text, error} as JSON')
    .argument('[audio_file]', 'Raw float32 PCM (or WAV) audio file')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .addOption(new Option('--engine <engine>', 'Transcription engine').choices(['command', 'openai']))
    .option('-v, --verbose', 'Pretty-print logs to stderr')
    .action(async (audioFile: string | undefined, options: CommonOptions) => {
      process.exitCode = await transcribeFile(audioFile, options);
    });

  return cmd;
}

export async function transcribeFile(audioFile: string | undefined, options: CommonOptions): Promise<number> {
  if (!audioFile) {
    printJson({ text: '', error: 'Usage: voxbridge transcribe <audio_file_path>' });
    return 1;
  }
  if (!existsSync(audioFile)) {
    printJson({ text: '', error: `Audio file not found: ${audioFile}` });
    return 1;
  }

  try {
    const config = loadCliConfig(options);
    const engine = createTranscriptionEngine(config);
    await engine.load();

    const bridge = new TranscriptionBridge(engine, { timeoutMs: config.transcription.timeoutMs });
    const outcome = await bridge.transcribe(await readFile(audioFile));
    await engine.dispose?.();

    if (!outcome.ok) {
      printJson({ text: '', error: outcome.error.message });
      return 1;
    }
    printJson({ text: outcome.text, error: '' });
    return 0;
  } catch (err) {
    printJson({ text: '', error: toError(err).message });
    return 1;
  }
}
