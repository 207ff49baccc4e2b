/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createServeCommand } from './commands/serve.js';
import { createTranscribeCommand } from './commands/transcribe.js';
import { createGenerateCommand } from './commands/generate.js';
import { createSendCommand } from './commands/send.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Voice command bridge: audio in over a Unix socket, text and scripts out');

  program.addCommand(createServeCommand());
  program.addCommand(createTranscribeCommand());
  program.addCommand(createGenerateCommand());
  program.addCommand(createSendCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
