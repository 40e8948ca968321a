// src/errors.ts

import { toHex } from './utils/utils.js';

/**
 * Base class for all boiler link errors
 */
export class BoilerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BoilerError';
  }
}

// --- Errors for reading a reply frame ---

/**
 * Base class for failures while reading or validating a controller reply
 */
export class ResponseReadError extends BoilerError {
  constructor(message: string = 'Invalid response from controller') {
    super(message);
    this.name = 'ResponseReadError';
  }
}

/**
 * The reply did not start with the frame marker, or the header was cut short
 */
export class WrongResponseHeaderError extends ResponseReadError {
  readonly received: Uint8Array;

  constructor(received: Uint8Array) {
    super(`Received: ${toHex(received)}`);
    this.name = 'WrongResponseHeaderError';
    this.received = Uint8Array.from(received);
  }
}

/**
 * The length field does not describe the bytes actually present in the frame
 */
export class FrameLengthError extends ResponseReadError {
  readonly declared: number;
  readonly actual: number;

  constructor(declared: number, actual: number) {
    super(`Length field declares ${declared} bytes, frame carries ${actual}`);
    this.name = 'FrameLengthError';
    this.declared = declared;
    this.actual = actual;
  }
}

export class ChecksumError extends ResponseReadError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Expected checksum ${hexByte(expected)}, received ${hexByte(actual)}`);
    this.name = 'ChecksumError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * No reply byte arrived before the transaction deadline
 */
export class TimeoutError extends ResponseReadError {
  constructor(message: string = 'No response received from controller') {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * The port delivered fewer bytes than the length field announced
 */
export class IncompleteFrameError extends ResponseReadError {
  readonly declared: number;
  readonly actual: number;

  constructor(declared: number, actual: number) {
    super(`Expected ${declared} bytes after frame header, received ${actual}`);
    this.name = 'IncompleteFrameError';
    this.declared = declared;
    this.actual = actual;
  }
}

export class WrongCommandInResponseError extends ResponseReadError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Expected command ${hexByte(expected)}, received ${hexByte(actual)}`);
    this.name = 'WrongCommandInResponseError';
    this.expected = expected;
    this.actual = actual;
  }
}

// --- Errors for building a request ---

export class PayloadTooLargeError extends BoilerError {
  constructor(size: number, max: number) {
    super(`Payload of ${size} bytes exceeds the maximum of ${max}`);
    this.name = 'PayloadTooLargeError';
  }
}

export class InvalidCommandError extends BoilerError {
  constructor(command: number) {
    super(`Invalid command code: ${command}. Must be an integer between 0-255.`);
    this.name = 'InvalidCommandError';
  }
}

/**
 * A proxy line that is not a clean, even-length hex string
 */
export class HexDecodeError extends BoilerError {
  constructor(message: string) {
    super(message);
    this.name = 'HexDecodeError';
  }
}

// --- Errors for the serial port ---

/**
 * Error class for failed writes to or reads from the serial port
 */
export class SerialPortIOError extends BoilerError {
  constructor(message: string = 'Serial port I/O error') {
    super(message);
    this.name = 'SerialPortIOError';
  }
}

/**
 * Error class for a serial port that cannot be opened
 */
export class ConnectionInitializationError extends BoilerError {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionInitializationError';
  }
}

export class ConfigError extends BoilerError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function hexByte(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0');
}
