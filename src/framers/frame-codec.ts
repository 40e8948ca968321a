// src/framers/frame-codec.ts

import { DecodedFrame, DecodeOptions } from '../types/boiler-types.js';

/**
 * Builds and parses on-wire frames. The serial channel and the client only talk to
 * this interface, so the byte layout can be replaced without touching them.
 */
export interface FrameCodec {
  /** Number of bytes to read before the frame length is known */
  readonly headerLength: number;

  /**
   * Wraps a command byte and its payload into a complete frame
   */
  encode(command: number, payload: Uint8Array): Uint8Array;

  /**
   * Validates a complete frame and extracts the command byte and payload
   */
  decode(frame: Uint8Array, options?: DecodeOptions): DecodedFrame;

  /**
   * Validates a header read off the wire and returns how many bytes follow it
   */
  readHeader(header: Uint8Array): number;
}
