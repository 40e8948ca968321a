// src/proxy/proxy-server.ts
import { createServer, AddressInfo, Server as NetServer, Socket } from 'net';
import { rootLogger } from '../logger.js';
import { CommandSender, ProxyServerOptions } from '../types/boiler-types.js';
import { DEFAULTS } from '../constants/constants.js';
import { ConnectionHandler } from './connection-handler.js';

const logger = rootLogger.createLogger('ProxyServer');

/**
 * TCP listener exposing the controller through the hex line protocol. Each accepted
 * socket gets its own ConnectionHandler task; they share the client, whose serial
 * channel keeps the wire to one transaction at a time.
 */
export class ProxyServer {
  private readonly server: NetServer;
  private readonly handlers = new Map<string, ConnectionHandler>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly port: number;
  private readonly host: string;
  private nextConnectionId = 1;

  constructor(
    private readonly client: CommandSender,
    options: ProxyServerOptions
  ) {
    this.port = options.port;
    this.host = options.host ?? DEFAULTS.HOST;
    this.server = createServer(socket => this.handleSocket(socket));
  }

  /**
   * Binds and starts accepting. Rejects when the port cannot be bound.
   */
  start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        this.server.off('listening', onListening);
        logger.error(`Cannot listen on ${this.host}:${this.port}: ${err.message}`);
        reject(err);
      };
      const onListening = (): void => {
        this.server.off('error', onError);
        this.server.on('error', (err: Error) => logger.error(`Listener error: ${err.message}`));
        const { port } = this.address();
        logger.info(`Proxy listening on ${this.host}:${port}`);
        resolve();
      };
      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(this.port, this.host);
    });
  }

  /**
   * Closes every open connection and the listener, and waits for handlers to finish.
   */
  async stop(): Promise<void> {
    logger.info('Shutting down proxy...');
    for (const handler of this.handlers.values()) {
      handler.close();
    }
    await Promise.all(this.tasks);
    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close((err?: Error) => {
        if (err) reject(err);
        else resolve();
      });
    });
    logger.info('Proxy stopped');
  }

  address(): AddressInfo {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Proxy is not listening on a TCP port');
    }
    return address;
  }

  get connectionCount(): number {
    return this.handlers.size;
  }

  private handleSocket(socket: Socket): void {
    const connectionId = `${this.nextConnectionId++}`;
    const handler = new ConnectionHandler(socket, this.client, connectionId);
    this.handlers.set(connectionId, handler);
    logger.info(`Connected from ${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? '?'}`, {
      connection: connectionId,
    });

    const task = handler.run().finally(() => {
      this.handlers.delete(connectionId);
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }
}
