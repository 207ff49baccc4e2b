export class VoxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'VoxError';
  }
}

export class ConfigError extends VoxError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export type ProtocolErrorKind = 'malformed' | 'unknown_type' | 'oversized';

/** A frame the codec could not turn into a message. Answered, never fatal. */
export class ProtocolError extends VoxError {
  constructor(message: string, public readonly kind: ProtocolErrorKind, cause?: Error) {
    super(message, 'PROTOCOL_ERROR', 'decode', cause);
    this.name = 'ProtocolError';
  }
}

export type TranscriptionErrorKind = 'engine_failure' | 'timeout' | 'empty_input' | 'cancelled';

export class TranscriptionError extends VoxError {
  constructor(message: string, public readonly kind: TranscriptionErrorKind, cause?: Error) {
    super(message, 'TRANSCRIPTION_ERROR', 'transcribe', cause);
    this.name = 'TranscriptionError';
  }
}

export class ConnectionError extends VoxError {
  constructor(message: string, public readonly connectionId: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', 'connection', cause);
    this.name = 'ConnectionError';
  }
}

export class StartupError extends VoxError {
  constructor(message: string, cause?: Error) {
    super(message, 'STARTUP_ERROR', 'startup', cause);
    this.name = 'StartupError';
  }
}

export class ScriptGenerationError extends VoxError {
  constructor(message: string, cause?: Error) {
    super(message, 'SCRIPT_GENERATION_ERROR', 'generate', cause);
    this.name = 'ScriptGenerationError';
  }
}

/** Normalize an unknown thrown value into an Error */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
