// src/framers/block-framer.ts
import { FrameCodec } from './frame-codec.js';
import { FRAME, MAX_PAYLOAD_LENGTH } from '../constants/constants.js';
import { shiftXorChecksum } from '../utils/checksum.js';
import {
  bytesToUint16BE,
  concatUint8Arrays,
  sliceUint8Array,
  uint16ToBytesBE,
} from '../utils/utils.js';
import {
  ChecksumError,
  FrameLengthError,
  InvalidCommandError,
  PayloadTooLargeError,
  WrongResponseHeaderError,
} from '../errors.js';
import { DecodedFrame, DecodeOptions } from '../types/boiler-types.js';

/**
 * `02 fd | length (u16 BE) | command | payload | checksum`
 */
export class BlockFramer implements FrameCodec {
  public readonly headerLength: number = FRAME.HEADER_LENGTH;

  constructor(private checksumFn: (data: Uint8Array) => number = shiftXorChecksum) {}

  public encode(command: number, payload: Uint8Array = new Uint8Array(0)): Uint8Array {
    if (!Number.isInteger(command) || command < 0 || command > 0xff) {
      throw new InvalidCommandError(command);
    }
    if (payload.length > MAX_PAYLOAD_LENGTH) {
      throw new PayloadTooLargeError(payload.length, MAX_PAYLOAD_LENGTH);
    }

    const frame = concatUint8Arrays([
      Uint8Array.from(FRAME.MARKER),
      uint16ToBytesBE(1 + payload.length),
      new Uint8Array([command]),
      payload,
    ]);
    return concatUint8Arrays([frame, new Uint8Array([this.checksumFn(frame)])]);
  }

  public readHeader(header: Uint8Array): number {
    if (!this.hasMarker(header)) {
      throw new WrongResponseHeaderError(header);
    }
    return bytesToUint16BE(header, 2) + FRAME.CHECKSUM_LENGTH;
  }

  public decode(frame: Uint8Array, options: DecodeOptions = {}): DecodedFrame {
    if (!this.hasMarker(frame)) {
      throw new WrongResponseHeaderError(frame);
    }

    const declared = bytesToUint16BE(frame, 2);
    const carried = Math.max(0, frame.length - FRAME.HEADER_LENGTH - FRAME.CHECKSUM_LENGTH);
    if (declared < 1 || declared !== carried) {
      throw new FrameLengthError(declared, carried);
    }

    if (options.validateChecksum) {
      const expected = this.checksumFn(sliceUint8Array(frame, 0, -1));
      const actual = frame[frame.length - 1] ?? 0;
      if (expected !== actual) {
        throw new ChecksumError(expected, actual);
      }
    }

    return {
      command: frame[FRAME.HEADER_LENGTH] ?? 0,
      payload: frame.slice(FRAME.HEADER_LENGTH + 1, -1),
    };
  }

  private hasMarker(bytes: Uint8Array): boolean {
    return (
      bytes.length >= FRAME.HEADER_LENGTH &&
      bytes[0] === FRAME.MARKER[0] &&
      bytes[1] === FRAME.MARKER[1]
    );
  }
}
