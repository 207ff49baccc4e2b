/**
 * VoiceService: Unix-domain-socket listener and lifecycle owner.
 *
 * Loads the transcription engine, binds the socket, hands every accepted
 * client to its own VoiceConnection and tears everything down on stop().
 * The socket path and listening server belong to this class alone.
 */

import { EventEmitter } from 'node:events';
import { createServer, type Server, type Socket } from 'node:net';
import { chmod, rm } from 'node:fs/promises';
import { StartupError, toError } from '../core/errors.js';
import { sleep } from '../utils/timer.js';
import type { ServiceContext } from './context.js';
import { VoiceConnection, type ConnectionStats } from './connection.js';

export interface VoiceServiceStats {
  running: boolean;
  socketPath: string;
  engine: string;
  connectionsAccepted: number;
  activeConnections: number;
  inFlightTranscriptions: number;
  uptime: number;
  connections: ConnectionStats[];
}

export class VoiceService extends EventEmitter {
  private server: Server | null = null;
  private readonly connections = new Map<string, VoiceConnection>();
  private running = false;
  private stopping: Promise<void> | null = null;
  private startedAt = 0;
  private connectionsAccepted = 0;
  private signalHandlers: Array<{ signal: NodeJS.Signals; handler: () => void }> = [];

  constructor(private readonly context: ServiceContext) {
    super();
  }

  get socketPath(): string {
    return this.context.config.service.socketPath;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Load the engine and start listening. Every failure here is a StartupError.
   */
  async start(): Promise<void> {
    if (this.running) return;
    const { logger, engine } = this.context;

    logger.info({ engine: engine.name }, 'Loading transcription engine');
    try {
      await engine.load();
    } catch (err) {
      throw new StartupError(`Failed to load transcription engine "${engine.name}": ${toError(err).message}`, toError(err));
    }

    try {
      await rm(this.socketPath, { force: true });
    } catch (err) {
      throw new StartupError(`Cannot remove stale socket at ${this.socketPath}`, toError(err));
    }

    // Half-open so replies still go out after a client has finished writing
    const server = createServer({ allowHalfOpen: true }, socket => this.accept(socket));
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(new StartupError(`Failed to bind ${this.socketPath}: ${err.message}`, err));
      };
      server.once('error', onError);
      server.listen(this.socketPath, () => {
        server.off('error', onError);
        resolve();
      });
    });

    try {
      await chmod(this.socketPath, this.context.config.service.socketMode);
    } catch (err) {
      server.close();
      throw new StartupError(`Failed to set permissions on ${this.socketPath}`, toError(err));
    }

    server.on('error', err => {
      logger.error({ error: err.message }, 'Listener error');
    });

    this.server = server;
    this.running = true;
    this.startedAt = Date.now();
    logger.info(
      { socketPath: this.socketPath, framing: this.context.config.service.framing },
      'Voice service listening',
    );
    this.emit('listening', { socketPath: this.socketPath });
  }

  /**
   * Stop accepting, give in-flight transcriptions up to drainTimeoutMs,
   * close what remains and remove the socket file. Safe to call repeatedly.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Stop on SIGINT/SIGTERM and call onStopped once cleanup has finished.
   */
  installSignalHandlers(onStopped: (signal: NodeJS.Signals) => void = () => process.exit(0)): void {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      const handler = (): void => {
        this.context.logger.info({ signal }, 'Termination signal received');
        this.stop().then(
          () => onStopped(signal),
          err => {
            this.context.logger.error({ error: toError(err).message }, 'Shutdown failed');
            onStopped(signal);
          },
        );
      };
      process.once(signal, handler);
      this.signalHandlers.push({ signal, handler });
    }
  }

  getStats(): VoiceServiceStats {
    return {
      running: this.running,
      socketPath: this.socketPath,
      engine: this.context.engine.name,
      connectionsAccepted: this.connectionsAccepted,
      activeConnections: this.connections.size,
      inFlightTranscriptions: this.context.bridge.activeCount,
      uptime: this.running ? Date.now() - this.startedAt : 0,
      connections: [...this.connections.values()].map(c => c.getStats()),
    };
  }

  private accept(socket: Socket): void {
    if (!this.running) {
      socket.destroy();
      return;
    }

    const connection = new VoiceConnection(socket, this.context);
    this.connections.set(connection.id, connection);
    this.connectionsAccepted++;

    connection.once('close', () => {
      this.connections.delete(connection.id);
      this.emit('connection:closed', connection.id);
    });

    connection.start();
    this.emit('connection', connection.id);
  }

  private async shutdown(): Promise<void> {
    const { logger, config, engine, bridge } = this.context;
    const wasRunning = this.running;
    this.running = false;

    for (const { signal, handler } of this.signalHandlers) {
      process.off(signal, handler);
    }
    this.signalHandlers = [];

    const server = this.server;
    this.server = null;
    const closed = server
      ? new Promise<void>(resolve => server.close(() => resolve()))
      : Promise.resolve();

    const drainTimeoutMs = config.shutdown.drainTimeoutMs;
    const open = [...this.connections.values()];
    const busy = open.filter(c => c.isBusy()).length;
    if (drainTimeoutMs > 0 && open.length > 0) {
      logger.info({ connections: open.length, busy, drainTimeoutMs }, 'Draining connections');
      const deadline = new AbortController();
      await Promise.race([
        Promise.all(open.map(c => c.settle())),
        sleep(drainTimeoutMs, deadline.signal),
      ]);
      deadline.abort();
    }

    bridge.abortAll();
    for (const connection of this.connections.values()) {
      connection.close('service shutting down');
    }
    await closed;

    if (wasRunning) {
      try {
        await rm(this.socketPath, { force: true });
      } catch (err) {
        logger.warn({ error: toError(err).message, socketPath: this.socketPath }, 'Failed to remove socket file');
      }
    }

    if (engine.dispose) {
      try {
        await engine.dispose();
      } catch (err) {
        logger.warn({ error: toError(err).message }, 'Engine dispose failed');
      }
    }

    if (wasRunning) {
      logger.info({ socketPath: this.socketPath }, 'Voice service stopped');
      this.emit('stopped');
    }
  }
}
