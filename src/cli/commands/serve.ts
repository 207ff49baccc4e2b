/**
 * `voxbridge serve`: run the voice IPC service until SIGINT/SIGTERM.
 */

import { Command, Option } from 'commander';
import { getLogger } from '../../core/logger.js';
import { StartupError } from '../../core/errors.js';
import { createServiceContext } from '../../service/context.js';
import { VoiceService } from '../../service/voice-service.js';
import { createTranscriptionEngine } from '../../transcription/index.js';
import { loadCliConfig, type CommonOptions } from '../shared.js';

export function createServeCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Listen on a Unix socket for audio and transcription requests')
    .option('-d, --dir <directory>', 'Project directory (for .voxbridge.yaml)', '.')
    .option('-s, --socket <path>', 'Socket path')
    .addOption(new Option('--framing <mode>', 'Message framing').choices(['length-prefixed', 'chunk']))
    .addOption(new Option('--engine <engine>', 'Transcription engine').choices(['command', 'openai']))
    .option('-v, --verbose', 'Pretty-print logs to stderr')
    .action(async (options: CommonOptions) => {
      await serve(options);
    });

  return cmd;
}

export async function serve(options: CommonOptions): Promise<void> {
  const config = loadCliConfig(options);
  const logger = getLogger();
  const context = createServiceContext(config, createTranscriptionEngine(config), logger);
  const service = new VoiceService(context);

  try {
    await service.start();
  } catch (err) {
    if (err instanceof StartupError) {
      logger.fatal({ error: err.message }, 'Voice service failed to start');
      // The file transport runs in a worker; flush before the CLI exits
      await new Promise<void>(resolve => logger.flush(() => resolve()));
    }
    throw err;
  }

  service.installSignalHandlers(() => {
    process.exit(0);
  });
  console.error(`voxbridge listening on ${config.service.socketPath} (${config.service.framing})`);
}
