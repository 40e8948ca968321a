// src/transport/serial-channel.ts
import { Mutex } from 'async-mutex';
import { FrameCodec } from '../framers/frame-codec.js';
import { BlockFramer } from '../framers/block-framer.js';
import { concatUint8Arrays, toHex } from '../utils/utils.js';
import { rootLogger } from '../logger.js';
import {
  BoilerError,
  IncompleteFrameError,
  SerialPortIOError,
  TimeoutError,
  WrongResponseHeaderError,
} from '../errors.js';
import { SerialChannelOptions, Transport } from '../types/boiler-types.js';
import { DEFAULTS } from '../constants/constants.js';

const logger = rootLogger.createLogger('SerialChannel');

/**
 * Owns the transport and runs one write + reply round trip at a time. Every caller in
 * the process goes through `transact`, which queues behind a single mutex, so a reply
 * always belongs to the request written just before it.
 */
export class SerialChannel {
  private readonly _mutex = new Mutex();
  private readonly timeout: number;
  private _pendingCount = 0;

  constructor(
    private readonly _transport: Transport,
    private readonly _codec: FrameCodec = new BlockFramer(),
    options: SerialChannelOptions = {}
  ) {
    this.timeout = options.timeout ?? DEFAULTS.READ_TIMEOUT_MS;
  }

  public get codec(): FrameCodec {
    return this._codec;
  }

  public get isOpen(): boolean {
    return this._transport.isOpen;
  }

  /** Number of transactions waiting for the wire, including the running one */
  public get pending(): number {
    return this._pendingCount;
  }

  public async open(): Promise<void> {
    await this._transport.connect();
  }

  public async close(): Promise<void> {
    await this._mutex.runExclusive(() => this._transport.disconnect());
  }

  /**
   * Writes a complete frame and reads exactly one reply frame.
   * @param frame - encoded request frame
   * @returns the raw reply frame, header and checksum included
   * @throws TimeoutError request not written, or no reply byte, before the deadline
   * @throws WrongResponseHeaderError short header or wrong marker
   * @throws IncompleteFrameError fewer bytes than the length field declares, or the port
   * closed part way through the body
   * @throws SerialPortIOError the port failed or is closed
   */
  public async transact(frame: Uint8Array): Promise<Uint8Array> {
    this._pendingCount++;
    try {
      return await this._mutex.runExclusive(() => this._exchange(frame));
    } finally {
      this._pendingCount--;
    }
  }

  private async _exchange(frame: Uint8Array): Promise<Uint8Array> {
    const deadline = Date.now() + this.timeout;
    const remaining = (): number => Math.max(0, deadline - Date.now());

    const flush = this._transport.flush?.bind(this._transport);
    if (flush) {
      await this._withTimeout(this._io(flush), remaining());
    }

    logger.trace(`TX ${toHex(frame)}`);
    await this._withTimeout(this._io(() => this._transport.write(frame)), remaining());

    const headerLength = this._codec.headerLength;
    const header = await this._io(() => this._transport.read(headerLength, remaining()));
    if (header.length === 0) {
      throw new TimeoutError(`No response received within ${this.timeout}ms`);
    }
    if (header.length < headerLength) {
      throw new WrongResponseHeaderError(header);
    }

    const bodyLength = this._codec.readHeader(header);
    const body = await this._readBody(bodyLength, remaining());
    if (body.length < bodyLength) {
      throw new IncompleteFrameError(bodyLength, body.length);
    }

    const reply = concatUint8Arrays([header, body]);
    logger.trace(`RX ${toHex(reply)}`);
    return reply;
  }

  /**
   * A port that closes once the header is in leaves the frame incomplete rather than
   * failing the port; bytes already buffered come back from `read` as a short read.
   */
  private async _readBody(length: number, timeout: number): Promise<Uint8Array> {
    try {
      return await this._io(() => this._transport.read(length, timeout));
    } catch (err: unknown) {
      if (err instanceof SerialPortIOError && !this._transport.isOpen) {
        return new Uint8Array(0);
      }
      throw err;
    }
  }

  /**
   * Bounds a flush or write by what is left of the transaction deadline.
   */
  private _withTimeout<T>(promise: Promise<T>, timeout: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new TimeoutError(`Request not sent within ${this.timeout}ms`)),
        timeout
      );
      promise
        .then(result => {
          clearTimeout(timer);
          resolve(result);
        })
        .catch((err: unknown) => {
          clearTimeout(timer);
          reject(err);
        });
    });
  }

  /**
   * Runs a transport call, mapping anything that is not already one of ours to an I/O error.
   */
  private async _io<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err: unknown) {
      if (err instanceof BoilerError) throw err;
      throw new SerialPortIOError(err instanceof Error ? err.message : String(err));
    }
  }
}
