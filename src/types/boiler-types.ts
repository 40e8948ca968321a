// src/types/boiler-types.ts

// !=============================================================================
// ! Transport
// !=============================================================================

/** Raw byte link to the controller */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;

  /**
   * Waits until `length` bytes are buffered or `timeout` ms have passed.
   * On timeout it resolves with whatever arrived, possibly nothing; it rejects only
   * when the port itself fails.
   */
  read(length: number, timeout?: number): Promise<Uint8Array>;

  /** Drops any unread input */
  flush?(): Promise<void>;
}

/** The subset of a `serialport` stream the Node transport drives */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback?: (err: Error | null) => void): void;
  close(callback?: (err: Error | null) => void): void;
  write(
    chunk: Uint8Array,
    encoding: BufferEncoding,
    callback?: (err: Error | null | undefined) => void
  ): boolean;
  drain(callback?: (err: Error | null) => void): void;
  on(event: 'data', listener: (data: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  removeAllListeners(event?: string | symbol): unknown;
}

export interface SerialPortFactoryOptions {
  path: string;
  baudRate: number;
  dataBits: 5 | 6 | 7 | 8;
  stopBits: 1 | 1.5 | 2;
  parity: 'none' | 'even' | 'mark' | 'odd' | 'space';
}

/** Options for the Node.js `serialport` transport */
export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  readTimeout?: number;
  maxBufferSize?: number;
  /** Creates the unopened port; defaults to a real `SerialPort` */
  createPort?: (options: SerialPortFactoryOptions) => SerialPortLike;
}

// !=============================================================================
// ! Framing
// !=============================================================================

/** A decoded frame: command byte plus payload, framing stripped */
export interface DecodedFrame {
  command: number;
  payload: Uint8Array;
}

export interface DecodeOptions {
  validateChecksum?: boolean;
}

// !=============================================================================
// ! Client / channel
// !=============================================================================

export interface SerialChannelOptions {
  /** Deadline for one complete write + reply, in ms */
  timeout?: number;
}

export interface ProtocolClientOptions {
  /** Reject replies whose checksum does not match (default: false) */
  validateChecksum?: boolean;
  /** Reject replies that echo a different command byte (default: true) */
  verifyCommand?: boolean;
}

// !=============================================================================
// ! Proxy
// !=============================================================================

export interface ProxyServerOptions {
  port: number;
  host?: string;
}

/** Anything that can answer a command; the proxy only needs this much of the client */
export interface CommandSender {
  sendCommand(command: number, payload?: Uint8Array): Promise<Uint8Array>;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context attached to a log line */
export interface LogContext {
  logger?: string;
  command?: number;
  connection?: string;
  bytes?: number;
  responseTime?: number;
  [key: string]: string | number | boolean | undefined;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}
