import type pino from 'pino';
import type { VoxConfig } from '../core/types.js';
import { getLogger } from '../core/logger.js';
import type { TranscriptionEngine } from '../transcription/types.js';
import { TranscriptionBridge } from './transcription-bridge.js';

/**
 * Everything a connection needs from the service, passed explicitly.
 * The engine is shared read-only; connections never touch each other's state.
 */
export interface ServiceContext {
  readonly config: VoxConfig;
  readonly engine: TranscriptionEngine;
  readonly bridge: TranscriptionBridge;
  readonly logger: pino.Logger;
}

export function createServiceContext(
  config: VoxConfig,
  engine: TranscriptionEngine,
  logger: pino.Logger = getLogger(),
): ServiceContext {
  const bridge = new TranscriptionBridge(engine, {
    timeoutMs: config.transcription.timeoutMs,
    maxConcurrent: config.transcription.maxConcurrent,
  });
  return { config, engine, bridge, logger };
}
