// src/proxy/line-protocol.ts
import { HexDecodeError } from '../errors.js';
import { toHex } from '../utils/utils.js';

const HEX_DIGIT = /^[0-9a-fA-F]$/;

export interface CommandLine {
  command: number;
  payload: Uint8Array;
}

/**
 * Strictly decodes a hex string: even length, hex digits only, no separators.
 * @throws HexDecodeError
 */
export function decodeHex(text: string): Uint8Array {
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (!HEX_DIGIT.test(ch)) {
      throw new HexDecodeError(`non-hexadecimal character '${ch}' at position ${i}`);
    }
  }
  if (text.length % 2 !== 0) {
    throw new HexDecodeError(`odd number of hex digits (${text.length})`);
  }

  const bytes = new Uint8Array(text.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(text.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Splits a request line into command byte and payload. Returns null for a blank line.
 */
export function parseCommandLine(line: string): CommandLine | null {
  const bytes = decodeHex(line.trim());
  const command = bytes[0];
  if (command === undefined) return null;
  return { command, payload: bytes.slice(1) };
}

export function formatResponseLine(payload: Uint8Array): string {
  return `${toHex(payload)}\n`;
}

/**
 * `!<ErrorName>: <message>` followed by a newline
 */
export function formatErrorLine(err: unknown): string {
  const name = err instanceof Error ? err.name : 'Error';
  const message = err instanceof Error ? err.message : String(err);
  return `!${name}: ${message.replace(/[\r\n]+/g, ' ')}\n`;
}
