import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { createServer, type Server } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { VoxConfigSchema } from '../../../src/core/types.js';
import { getLogger } from '../../../src/core/logger.js';
import { createServiceContext, type ServiceContext } from '../../../src/service/context.js';
import { ConnectionState, VoiceConnection } from '../../../src/service/connection.js';
import { VoiceClient } from '../../../src/client/voice-client.js';
import { MessageType, createMessage } from '../../../src/protocol/wire.js';
import { FakeEngine, waitFor } from '../../helpers/fake-engine.js';

describe('VoiceConnection', () => {
  let dir: string;
  let socketPath: string;
  let server: Server;
  let engine: FakeEngine;
  let context: ServiceContext;
  let connections: VoiceConnection[];
  let client: VoiceClient;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'vox-conn-'));
    socketPath = join(dir, 'conn.sock');
    engine = new FakeEngine();
    context = createServiceContext(VoxConfigSchema.parse({ service: { socketPath } }), engine, getLogger());
    connections = [];

    server = createServer({ allowHalfOpen: true }, socket => {
      const connection = new VoiceConnection(socket, context, `conn-${connections.length + 1}`);
      connection.start();
      connections.push(connection);
    });
    await new Promise<void>(resolve => server.listen(socketPath, () => resolve()));

    client = new VoiceClient(socketPath);
    await client.connect();
    await waitFor(() => connections.length === 1);
  });

  afterEach(async () => {
    await client.close();
    for (const connection of connections) connection.close('test finished');
    await new Promise<void>(resolve => server.close(() => resolve()));
    rmSync(dir, { recursive: true, force: true });
  });

  it('should wait for input once started', () => {
    expect(connections[0].id).toBe('conn-1');
    expect(connections[0].getState()).toBe(ConnectionState.AWAITING_INPUT);
  });

  it('should track what it has handled', async () => {
    await client.request(createMessage(MessageType.AUDIO_DATA, 'abc'));
    await client.requestRaw(Buffer.from('garbage'));

    expect(connections[0].getStats()).toMatchObject({
      id: 'conn-1',
      messagesHandled: 1,
      protocolErrors: 1,
      transcriptions: 0,
      bufferedAudioBytes: 3,
    });
  });

  it('should emit close once', async () => {
    const events: unknown[] = [];
    connections[0].on('close', event => events.push(event));

    connections[0].close('kicked');
    connections[0].close('again');

    expect(events).toEqual([{ id: 'conn-1', reason: 'kicked' }]);
    expect(connections[0].isClosed()).toBe(true);
    await waitFor(() => !client.isConnected());
  });

  it('should cancel its transcription on close and give the engine back', async () => {
    let abandoned: AbortSignal | undefined;
    engine.behavior = (audio, options) => {
      if (audio.toString('utf-8') !== 'slow') return 'fast';
      abandoned = options.signal;
      return new Promise<string>((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    };

    await client.request(createMessage(MessageType.AUDIO_DATA, 'slow'));
    const orphaned = client.request(createMessage(MessageType.TRANSCRIPTION)).catch((err: unknown) => err);
    await waitFor(() => engine.calls.length === 1);
    expect(connections[0].isBusy()).toBe(true);

    connections[0].close('client went away');

    expect(abandoned?.aborted).toBe(true);
    await expect(orphaned).resolves.toHaveProperty('message', 'Connection closed');

    // maxConcurrent is 1, so this only runs once the abandoned call has let go
    const next = await context.bridge.transcribe(Buffer.from('next'));
    expect(next).toMatchObject({ ok: true, text: 'fast' });
    expect(context.bridge.activeCount).toBe(0);
  });
});
