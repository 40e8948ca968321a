// src/constants/constants.ts

/**
 * Frame layout: marker(2) + length(2, big-endian) + command(1) + payload(n) + checksum(1)
 */
export const FRAME = {
  MARKER: [0x02, 0xfd],
  HEADER_LENGTH: 4,
  CHECKSUM_LENGTH: 1,
  MAX_LENGTH_FIELD: 0xffff,
} as const;

/** Largest payload the 16-bit length field can describe next to the command byte */
export const MAX_PAYLOAD_LENGTH = FRAME.MAX_LENGTH_FIELD - 1;

/**
 * Commands used by the read-outs of the command-line tool
 */
export const COMMANDS = {
  CURRENT_VALUES: 0x30,
  BOILER_STATE: 0x51,
} as const;

export const DEFAULTS = {
  BAUD_RATE: 57600,
  READ_TIMEOUT_MS: 1000,
  HOST: '0.0.0.0',
} as const;
