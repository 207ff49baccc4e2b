import { describe, it, expect } from 'vitest';
import { TranscriptionBridge } from '../../../src/service/transcription-bridge.js';
import { TranscriptionError } from '../../../src/core/errors.js';
import { FakeEngine, deferred, waitFor } from '../../helpers/fake-engine.js';

describe('TranscriptionBridge', () => {
  it('should reject empty input without calling the engine', async () => {
    const engine = new FakeEngine();
    const bridge = new TranscriptionBridge(engine);

    const outcome = await bridge.transcribe(Buffer.alloc(0));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('empty_input');
      expect(outcome.error.message).toBe('No audio data to transcribe');
    }
    expect(engine.calls).toHaveLength(0);
  });

  it('should return the trimmed engine text', async () => {
    const engine = new FakeEngine(() => '  hello world \n');
    const bridge = new TranscriptionBridge(engine);

    const outcome = await bridge.transcribe(Buffer.from('abcdef'));

    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.text).toBe('hello world');
    expect(engine.calls.map(c => c.toString('utf-8'))).toEqual(['abcdef']);
  });

  it('should map engine failures to engine_failure', async () => {
    const engine = new FakeEngine(() => {
      throw new Error('model crashed');
    });
    const bridge = new TranscriptionBridge(engine);

    const outcome = await bridge.transcribe(Buffer.from('abc'));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(TranscriptionError);
      expect(outcome.error.kind).toBe('engine_failure');
      expect(outcome.error.message).toBe('model crashed');
    }
  });

  it('should time out an engine that never answers', async () => {
    const engine = new FakeEngine(() => new Promise<string>(() => undefined));
    const bridge = new TranscriptionBridge(engine, { timeoutMs: 20 });

    const outcome = await bridge.transcribe(Buffer.from('abc'));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('timeout');
      expect(outcome.error.message).toBe('Transcription timed out after 20ms');
    }
    expect(bridge.activeCount).toBe(0);
  });

  it('should pass the deadline signal to the engine', async () => {
    let seen: AbortSignal | undefined;
    const engine = new FakeEngine((_audio, options) => {
      seen = options.signal;
      return 'ok';
    });
    const bridge = new TranscriptionBridge(engine, { timeoutMs: 1000 });

    await bridge.transcribe(Buffer.from('abc'));
    expect(seen).toBeInstanceOf(AbortSignal);
    expect(seen?.aborted).toBe(false);
  });

  it('should run one engine call at a time by default', async () => {
    const gates = [deferred<string>(), deferred<string>()];
    let active = 0;
    let peak = 0;
    const engine: FakeEngine = new FakeEngine(async (): Promise<string> => {
      const gate = gates[engine.calls.length - 1];
      active++;
      peak = Math.max(peak, active);
      const text = await gate.promise;
      active--;
      return text;
    });
    const bridge = new TranscriptionBridge(engine);

    const first = bridge.transcribe(Buffer.from('a'));
    const second = bridge.transcribe(Buffer.from('b'));

    await waitFor(() => engine.calls.length === 1);
    await new Promise(r => setTimeout(r, 10));
    expect(engine.calls).toHaveLength(1);

    gates[0].resolve('first');
    await waitFor(() => engine.calls.length === 2);
    gates[1].resolve('second');

    const outcomes = await Promise.all([first, second]);
    expect(outcomes.map(o => (o.ok ? o.text : o.error.message))).toEqual(['first', 'second']);
    expect(peak).toBe(1);
  });

  it('should allow parallel calls up to maxConcurrent', async () => {
    const gate = deferred<string>();
    const engine = new FakeEngine(() => gate.promise);
    const bridge = new TranscriptionBridge(engine, { maxConcurrent: 2 });

    const pending = [1, 2, 3].map(n => bridge.transcribe(Buffer.from(String(n))));
    await waitFor(() => engine.calls.length === 2);
    await new Promise(r => setTimeout(r, 10));
    expect(engine.calls).toHaveLength(2);
    expect(bridge.activeCount).toBe(3);

    gate.resolve('done');
    const outcomes = await Promise.all(pending);
    expect(outcomes.every(o => o.ok)).toBe(true);
    expect(engine.calls).toHaveLength(3);
  });

  it('should cancel in-flight requests on abortAll', async () => {
    const engine = new FakeEngine(() => new Promise<string>(() => undefined));
    const bridge = new TranscriptionBridge(engine, { timeoutMs: 0 });

    const pending = bridge.transcribe(Buffer.from('abc'));
    await waitFor(() => engine.calls.length === 1);
    bridge.abortAll();

    const outcome = await pending;
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('cancelled');
      expect(outcome.error.message).toBe('Service shutting down');
    }
  });

  it('should cancel when the caller withdraws the request', async () => {
    const engine = new FakeEngine((_audio, options) =>
      new Promise<string>((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }),
    );
    const bridge = new TranscriptionBridge(engine);
    const caller = new AbortController();

    const pending = bridge.transcribe(Buffer.from('abc'), caller.signal);
    await waitFor(() => engine.calls.length === 1);
    caller.abort();

    const outcome = await pending;
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('cancelled');
      expect(outcome.error.message).toBe('Transcription cancelled');
    }

    // The permit came back with the aborted call
    engine.behavior = () => 'next';
    await expect(bridge.transcribe(Buffer.from('def'))).resolves.toMatchObject({ ok: true, text: 'next' });
  });

  it('should keep the caller\'s cancellation reason', async () => {
    const engine = new FakeEngine();
    const bridge = new TranscriptionBridge(engine);
    const caller = new AbortController();
    caller.abort(new TranscriptionError('Connection closed', 'cancelled'));

    const outcome = await bridge.transcribe(Buffer.from('abc'), caller.signal);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.message).toBe('Connection closed');
    expect(engine.calls).toHaveLength(0);
  });

  it('should report the engine name', () => {
    expect(new TranscriptionBridge(new FakeEngine()).engineName).toBe('fake');
  });
});
