import { resolve } from 'path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import { FramingModeSchema, type VoxConfig, type VoxConfigOverrides } from '../core/types.js';

export interface CommonOptions {
  dir: string;
  socket?: string;
  framing?: string;
  engine?: string;
  verbose?: boolean;
}

/**
 * Load config for a CLI command and install the logger it asks for.
 */
export function loadCliConfig(options: CommonOptions): VoxConfig {
  const overrides: VoxConfigOverrides = {};

  if (options.socket || options.framing) {
    overrides.service = {
      ...(options.socket ? { socketPath: resolve(options.socket) } : {}),
      ...(options.framing ? { framing: FramingModeSchema.parse(options.framing) } : {}),
    };
  }
  if (options.engine === 'command' || options.engine === 'openai') {
    overrides.transcription = { engine: options.engine };
  }
  if (options.verbose) {
    overrides.logging = { verbose: true };
  }

  const config = new ConfigManager(resolve(options.dir)).load(overrides);
  setLogger(createLogger('voxbridge', { level: config.logging.level, verbose: config.logging.verbose }));
  return config;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value));
}
