/**
 * `voxbridge send <audio_file>`: stream a recording to a running service.
 */

import { Command, Option } from 'commander';
import { readFile } from 'fs/promises';
import { toError } from '../../core/errors.js';
import { VoiceClient } from '../../client/voice-client.js';
import { MessageType } from '../../protocol/wire.js';
import { loadCliConfig, printJson, type CommonOptions } from '../shared.js';

interface SendOptions extends CommonOptions {
  chunkSize: number;
}

export function createSendCommand(): Command {
  const cmd = new Command('send');

  cmd
    .description('Send an audio file to the running service and print its transcription')
    .argument('<audio_file>', 'Audio file to stream')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-s, --socket <path>', 'Socket path')
    .addOption(new Option('--framing <mode>', 'Message framing').choices(['length-prefixed', 'chunk']))
    .option('--chunk-size <bytes>', 'Bytes per AUDIO_DATA message', (v: string) => parseInt(v, 10), 64 * 1024)
    .action(async (audioFile: string, options: SendOptions) => {
      process.exitCode = await sendFile(audioFile, options);
    });

  return cmd;
}

async function sendFile(audioFile: string, options: SendOptions): Promise<number> {
  const config = loadCliConfig(options);
  const client = new VoiceClient(config.service.socketPath, {
    framing: config.service.framing,
    maxMessageBytes: config.service.maxMessageBytes,
  });

  try {
    const audio = await readFile(audioFile);
    await client.connect();
    const reply = await client.transcribe(audio, options.chunkSize > 0 ? options.chunkSize : 64 * 1024);

    if (reply.type === MessageType.TRANSCRIPTION) {
      printJson({ text: reply.data, error: '' });
      return 0;
    }
    printJson({ text: '', error: reply.data });
    return 1;
  } catch (err) {
    printJson({ text: '', error: toError(err).message });
    return 1;
  } finally {
    await client.close();
  }
}
