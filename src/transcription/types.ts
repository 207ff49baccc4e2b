export interface TranscribeOptions {
  /** Aborted when the caller stops waiting (deadline or shutdown) */
  signal?: AbortSignal;
}

/**
 * A speech recognizer. One instance is shared by every connection; callers
 * never invoke it concurrently beyond the bridge's configured limit.
 */
export interface TranscriptionEngine {
  readonly name: string;
  /** Prepare the engine; a rejection is fatal at service startup. */
  load(): Promise<void>;
  transcribe(audio: Buffer, options?: TranscribeOptions): Promise<string>;
  dispose?(): Promise<void>;
}
