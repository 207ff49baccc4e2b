/**
 * `voxbridge generate "<transcription>"`: one-shot script generation.
 */

import { Command } from 'commander';
import { toError } from '../../core/errors.js';
import { loadExamples } from '../../scripts/examples.js';
import { ScriptGenerator } from '../../scripts/script-generator.js';
import { loadCliConfig, printJson, type CommonOptions } from '../shared.js';

export function createGenerateCommand(): Command {
  const cmd = new Command('generate');

  cmd
    .description('Generate a host script from transcribed text and print the result as JSON')
    .argument('[transcription]', 'Transcribed voice command')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-v, --verbose', 'Pretty-print logs to stderr')
    .action(async (transcription: string | undefined, options: CommonOptions) => {
      process.exitCode = await generateScript(transcription, options);
    });

  return cmd;
}

export async function generateScript(transcription: string | undefined, options: CommonOptions): Promise<number> {
  if (transcription === undefined) {
    printJson({ success: false, error: 'Usage: voxbridge generate <transcription>' });
    return 1;
  }
  if (!transcription.trim()) {
    printJson({ success: false, error: 'Empty transcription provided' });
    return 1;
  }

  try {
    const config = loadCliConfig(options);
    const generator = new ScriptGenerator({
      apiKey: config.openaiApiKey,
      model: config.scripts.model,
      temperature: config.scripts.temperature,
      maxTokens: config.scripts.maxTokens,
      outputDir: config.scripts.outputDir,
      examples: await loadExamples(config.scripts.examplesDir),
    });

    const { script, scriptPath } = await generator.generate(transcription);
    printJson({ success: true, script, script_path: scriptPath });
    return 0;
  } catch (err) {
    printJson({ success: false, error: toError(err).message });
    return 1;
  }
}
