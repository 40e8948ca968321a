// src/transport/node-serialport.ts
import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array } from '../utils/utils.js';
import { rootLogger } from '../logger.js';
import { ConnectionInitializationError, SerialPortIOError } from '../errors.js';
import {
  Transport,
  NodeSerialTransportOptions,
  SerialPortFactoryOptions,
  SerialPortLike,
} from '../types/boiler-types.js';
import { DEFAULTS } from '../constants/constants.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 115200,
  DEFAULT_MAX_BUFFER_SIZE: 0x10000 + 16,
  POLL_INTERVAL_MS: 5,
} as const;

const logger = rootLogger.createLogger('NodeSerialTransport');

const createSerialPort = (options: SerialPortFactoryOptions): SerialPortLike =>
  new SerialPort({ ...options, autoOpen: false });

class NodeSerialTransport implements Transport {
  private path: string;
  private options: Required<NodeSerialTransportOptions>;
  private port: SerialPortLike | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    this.path = path;
    this.options = {
      baudRate: DEFAULTS.BAUD_RATE,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      readTimeout: DEFAULTS.READ_TIMEOUT_MS,
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      createPort: createSerialPort,
      ...options,
    };
  }

  get isOpen(): boolean {
    return this._isOpen && this.port !== null && this.port.isOpen;
  }

  async connect(): Promise<void> {
    if (this.isOpen) {
      logger.warn(`Serial port ${this.path} is already open`);
      return;
    }
    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new ConnectionInitializationError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    try {
      await this._createAndOpenPort();
    } catch (err: unknown) {
      this.port = null;
      logger.error(`Failed to open serial port ${this.path}: ${errorMessage(err)}`);
      throw err;
    }
    logger.info(`Serial port ${this.path} opened at ${this.options.baudRate} baud`);
  }

  private _createAndOpenPort(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = this.options.createPort({
        path: this.path,
        baudRate: this.options.baudRate,
        dataBits: this.options.dataBits,
        stopBits: this.options.stopBits,
        parity: this.options.parity,
      });
      this.port = port;

      port.open((err: Error | null) => {
        if (err) {
          this._isOpen = false;
          const message = err.message.toLowerCase();
          if (message.includes('permission')) {
            reject(new ConnectionInitializationError(`Permission denied: ${this.path}`));
          } else if (message.includes('busy')) {
            reject(new ConnectionInitializationError(`Serial port ${this.path} is busy`));
          } else if (message.includes('no such file')) {
            reject(new ConnectionInitializationError(`Serial port ${this.path} does not exist`));
          } else {
            reject(new ConnectionInitializationError(err.message));
          }
          return;
        }

        this._isOpen = true;
        this.readBuffer = allocUint8Array(0);
        port.removeAllListeners();
        port.on('data', (data: Buffer) => this._onData(data));
        port.on('error', (error: Error) => this._onError(error));
        port.on('close', () => this._onClose());
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      logger.warn(`Read buffer overflow, keeping the last ${this.options.maxBufferSize} bytes`);
      this.readBuffer = sliceUint8Array(this.readBuffer, -this.options.maxBufferSize);
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
  }

  private _onClose(): void {
    logger.info(`Serial port ${this.path} closed`);
    this._isOpen = false;
  }

  async flush(): Promise<void> {
    const release = await this._operationMutex.acquire();
    try {
      if (this.readBuffer.length > 0) {
        logger.debug(`Discarding ${this.readBuffer.length} stale bytes`);
      }
      this.readBuffer = allocUint8Array(0);
    } finally {
      release();
    }
  }

  async write(buffer: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this.isOpen || port === null) throw new SerialPortIOError('Port closed');
    const release = await this._operationMutex.acquire();
    try {
      await new Promise<void>((resolve, reject) => {
        port.write(buffer, 'binary', (err: Error | null | undefined) => {
          if (err) {
            return reject(new SerialPortIOError(err.message));
          }
          port.drain((drainErr: Error | null) => {
            if (drainErr) {
              return reject(new SerialPortIOError(drainErr.message));
            }
            resolve();
          });
        });
      });
    } finally {
      release();
    }
  }

  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (length <= 0) return allocUint8Array(0);
    const release = await this._operationMutex.acquire();
    const start = Date.now();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const take = (count: number): Uint8Array => {
          const data = this.readBuffer.slice(0, count);
          this.readBuffer = sliceUint8Array(this.readBuffer, count);
          return data;
        };
        const check = (): void => {
          if (this.readBuffer.length >= length) return resolve(take(length));
          if (!this.isOpen) {
            // Bytes that arrived before the close are still handed out as a short read.
            if (this.readBuffer.length > 0) return resolve(take(this.readBuffer.length));
            return reject(new SerialPortIOError('Port closed'));
          }
          if (Date.now() - start >= timeout) return resolve(take(this.readBuffer.length));
          setTimeout(check, NODE_SERIAL_CONSTANTS.POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    this._isOpen = false;
    this.port = null;
    this.readBuffer = allocUint8Array(0);
    if (port === null || !port.isOpen) return;

    port.removeAllListeners();
    await new Promise<void>((resolve, reject) => {
      port.close((err: Error | null) => {
        if (err) reject(new SerialPortIOError(err.message));
        else {
          logger.info(`Serial port ${this.path} closed`);
          resolve();
        }
      });
    });
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export default NodeSerialTransport;
