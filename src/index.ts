/**
 * voxbridge: voice command bridge for a 3D visualization host.
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, VoiceService, createServiceContext, createTranscriptionEngine } from 'voxbridge';
 *
 * const config = new ConfigManager().load();
 * const service = new VoiceService(createServiceContext(config, createTranscriptionEngine(config)));
 * await service.start();
 * service.installSignalHandlers();
 * ```
 */

// Core
export { ConfigManager } from './core/config.js';
export { VoxConfigSchema, FramingModeSchema, type VoxConfig, type VoxConfigOverrides, type FramingMode } from './core/types.js';
export { getLogger, setLogger, createLogger, type LoggerOptions } from './core/logger.js';
export {
  VoxError,
  ConfigError,
  ProtocolError,
  TranscriptionError,
  ConnectionError,
  StartupError,
  ScriptGenerationError,
  type ProtocolErrorKind,
  type TranscriptionErrorKind,
} from './core/errors.js';
export { AsyncSemaphore } from './core/mutex.js';

// Protocol
export {
  MessageType,
  BASE64_METADATA,
  createMessage,
  audioMessage,
  audioPayload,
  statusMessage,
  errorMessage,
  transcriptionMessage,
  messageTypeName,
  toMessageType,
  type WireMessage,
} from './protocol/wire.js';
export { encodeMessage, decodeMessage, type DecodeResult } from './protocol/codec.js';
export {
  encodeFrame,
  createFrameDecoder,
  LengthPrefixedDecoder,
  ChunkDecoder,
  FRAME_HEADER_BYTES,
  type FrameDecoder,
  type FrameEvent,
} from './protocol/framing.js';

// Service
export { VoiceService, type VoiceServiceStats } from './service/voice-service.js';
export { VoiceConnection, ConnectionState, type ConnectionStats } from './service/connection.js';
export { AudioSessionBuffer } from './service/audio-buffer.js';
export {
  TranscriptionBridge,
  type TranscriptionBridgeOptions,
  type TranscriptionOutcome,
} from './service/transcription-bridge.js';
export { createServiceContext, type ServiceContext } from './service/context.js';

// Transcription engines
export * from './transcription/index.js';

// Script generation
export * from './scripts/index.js';

// Client
export { VoiceClient, type VoiceClientOptions } from './client/voice-client.js';

export { VERSION, NAME } from './version.js';
