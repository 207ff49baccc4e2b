/**
 * TranscriptionBridge: the only path from a connection to the shared engine.
 *
 * Limits concurrent engine use with a semaphore, puts a deadline on every
 * call and folds every failure into a TranscriptionError outcome. It never
 * rejects, so a failing engine cannot take a connection down with it.
 */

import { AsyncSemaphore } from '../core/mutex.js';
import { TranscriptionError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { stopwatch } from '../utils/timer.js';
import type { TranscriptionEngine } from '../transcription/types.js';

export type TranscriptionOutcome =
  | { ok: true; text: string; durationMs: number }
  | { ok: false; error: TranscriptionError; durationMs: number };

export interface TranscriptionBridgeOptions {
  /** Deadline per request including time spent queued; 0 disables (default: 120000) */
  timeoutMs?: number;
  /** Engine calls allowed at once across all connections (default: 1) */
  maxConcurrent?: number;
}

export class TranscriptionBridge {
  private readonly semaphore: AsyncSemaphore;
  private readonly timeoutMs: number;
  private readonly controllers = new Set<AbortController>();

  constructor(
    private readonly engine: TranscriptionEngine,
    options: TranscriptionBridgeOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.semaphore = new AsyncSemaphore(options.maxConcurrent ?? 1);
  }

  /**
   * Transcribe one utterance. `signal` lets the caller withdraw the request,
   * which also aborts the engine call and frees its permit.
   */
  async transcribe(audio: Buffer, signal?: AbortSignal): Promise<TranscriptionOutcome> {
    const watch = stopwatch();

    if (audio.length === 0) {
      return {
        ok: false,
        error: new TranscriptionError('No audio data to transcribe', 'empty_input'),
        durationMs: 0,
      };
    }

    if (signal?.aborted) {
      return { ok: false, error: cancellation(signal), durationMs: 0 };
    }

    const controller = new AbortController();
    this.controllers.add(controller);
    const onCallerAbort = (): void => {
      if (signal) controller.abort(cancellation(signal));
    };
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    const timer = this.timeoutMs > 0
      ? setTimeout(() => {
          controller.abort(new TranscriptionError(`Transcription timed out after ${this.timeoutMs}ms`, 'timeout'));
        }, this.timeoutMs)
      : null;

    const run = this.semaphore.withPermit(
      () => this.engine.transcribe(audio, { signal: controller.signal }),
      controller.signal,
    );

    try {
      const text = await abandonOnAbort(run, controller.signal);
      return { ok: true, text: text.trim(), durationMs: watch.elapsed() };
    } catch (err) {
      return { ok: false, error: this.toTranscriptionError(err), durationMs: watch.elapsed() };
    } finally {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
      this.controllers.delete(controller);
      if (controller.signal.aborted) {
        // The engine may ignore the signal; its late result is dropped.
        run.catch(err => {
          getLogger().debug({ engine: this.engine.name, error: toError(err).message }, 'Abandoned transcription settled');
        });
      }
    }
  }

  /**
   * Abort every request still waiting on the engine.
   */
  abortAll(reason: string = 'Service shutting down'): void {
    for (const controller of this.controllers) {
      controller.abort(new TranscriptionError(reason, 'cancelled'));
    }
  }

  get activeCount(): number {
    return this.controllers.size;
  }

  get engineName(): string {
    return this.engine.name;
  }

  private toTranscriptionError(err: unknown): TranscriptionError {
    if (err instanceof TranscriptionError) return err;
    const error = toError(err);
    return new TranscriptionError(error.message || 'Transcription engine failed', 'engine_failure', error);
  }
}

function cancellation(signal: AbortSignal): TranscriptionError {
  return signal.reason instanceof TranscriptionError
    ? signal.reason
    : new TranscriptionError('Transcription cancelled', 'cancelled');
}

function abandonOnAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      err => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
