// src/proxy/connection-handler.ts
import { Socket } from 'net';
import * as readline from 'readline';
import { rootLogger } from '../logger.js';
import { CommandSender } from '../types/boiler-types.js';
import { formatErrorLine, formatResponseLine, parseCommandLine } from './line-protocol.js';

const logger = rootLogger.createLogger('ConnectionHandler');

export enum ConnectionState {
  AWAITING_LINE = 'AWAITING_LINE',
  PROCESSING = 'PROCESSING',
  CLOSED = 'CLOSED',
}

/**
 * One TCP client: reads a hex line, sends it to the controller, writes back the reply
 * or an error line, and repeats until the peer goes away.
 *
 * Lines from one connection are handled strictly one after another. A failing command
 * only produces an error line; the connection ends on socket faults alone.
 */
export class ConnectionHandler {
  private state: ConnectionState = ConnectionState.AWAITING_LINE;
  private linesHandled = 0;

  constructor(
    private readonly socket: Socket,
    private readonly client: CommandSender,
    public readonly connectionId: string
  ) {}

  get currentState(): ConnectionState {
    return this.state;
  }

  /**
   * Runs the read-process-write loop. Resolves once the connection is closed; never rejects.
   */
  async run(): Promise<void> {
    const rl = readline.createInterface({ input: this.socket, crlfDelay: Infinity });
    this.socket.on('error', (err: Error) => {
      logger.debug(`Socket error: ${err.message}`, { connection: this.connectionId });
    });
    this.socket.once('close', () => rl.close());

    try {
      for await (const line of rl) {
        if (this.state === ConnectionState.CLOSED) break;
        const response = await this.processLine(line);
        if (response === null) continue;
        await this.writeLine(response);
        this.transition(ConnectionState.AWAITING_LINE);
      }
    } catch (err: unknown) {
      logger.debug('Connection I/O failed', err, { connection: this.connectionId });
    } finally {
      rl.close();
      this.close();
    }
  }

  /**
   * Turns one request line into one response line, or null for a blank line.
   * Never throws.
   */
  async processLine(line: string): Promise<string | null> {
    this.transition(ConnectionState.PROCESSING);
    try {
      const request = parseCommandLine(line);
      if (request === null) {
        this.transition(ConnectionState.AWAITING_LINE);
        return null;
      }
      this.linesHandled++;
      const payload = await this.client.sendCommand(request.command, request.payload);
      return formatResponseLine(payload);
    } catch (err: unknown) {
      logger.info('Replying with error line', err, { connection: this.connectionId });
      return formatErrorLine(err);
    }
  }

  close(): void {
    if (this.state === ConnectionState.CLOSED) return;
    this.transition(ConnectionState.CLOSED);
    this.socket.destroy();
    logger.info(`Closed after ${this.linesHandled} commands`, { connection: this.connectionId });
  }

  private writeLine(text: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.destroyed || !this.socket.writable) {
        reject(new Error('Socket is not writable'));
        return;
      }
      this.socket.write(text, (err?: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private transition(next: ConnectionState): void {
    if (this.state === ConnectionState.CLOSED) return;
    if (this.state !== next) {
      logger.trace(`${this.state} -> ${next}`, { connection: this.connectionId });
    }
    this.state = next;
  }
}
