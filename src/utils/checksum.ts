// src/utils/checksum.ts

/**
 * Single-byte checksum used by the controller: every byte is folded in together
 * with its own value shifted left by one bit (truncated to 8 bits).
 *
 * @param buffer - frame bytes preceding the checksum position
 * @returns checksum value (0-255)
 */
export function shiftXorChecksum(buffer: Uint8Array): number {
  let crc: number = 0;
  for (const byte of buffer) {
    crc = (crc ^ byte ^ ((byte << 1) & 0xff)) & 0xff;
  }
  return crc;
}
