// src/cli/readouts.ts
import { COMMANDS } from '../constants/constants.js';
import { CommandSender } from '../types/boiler-types.js';
import { concatUint8Arrays } from '../utils/utils.js';

export interface ValueDefinition {
  label: string;
  /** 2-byte value address */
  address: [number, number];
}

/** Temperatures printed by `--values` */
export const VALUE_CATALOG: readonly ValueDefinition[] = [
  { label: 'Boiler temperature', address: [0x00, 0x00] },
  { label: 'Exhaust temperature', address: [0x00, 0x01] },
  { label: 'External temperature', address: [0x00, 0x04] },
  { label: 'Buffer top temperature', address: [0x00, 0x76] },
  { label: 'Buffer bottom temperature', address: [0x00, 0x78] },
  { label: 'Hot water storage temperature', address: [0x00, 0x5d] },
];

export function readState(client: CommandSender): Promise<Uint8Array> {
  return client.sendCommand(COMMANDS.BOILER_STATE);
}

/**
 * @param addresses - concatenated 2-byte value addresses
 */
export function readValues(client: CommandSender, addresses: Uint8Array): Promise<Uint8Array> {
  return client.sendCommand(COMMANDS.CURRENT_VALUES, addresses);
}

export function catalogAddresses(catalog: readonly ValueDefinition[] = VALUE_CATALOG): Uint8Array {
  return concatUint8Arrays(catalog.map(entry => Uint8Array.from(entry.address)));
}

/**
 * State text follows two leading bytes: latin-1, entries separated by `;`.
 */
export function describeState(payload: Uint8Array): string[] {
  return Buffer.from(payload.subarray(2)).toString('latin1').split(';');
}

/**
 * Signed big-endian integer, usually the temperature times two, as `12.5°C`.
 */
export function formatTemperature(valueBytes: Uint8Array, multipliedBy2: boolean = true): string {
  let value = 0;
  for (const byte of valueBytes) {
    value = value * 256 + byte;
  }
  const bits = valueBytes.length * 8;
  if (bits > 0 && value >= 2 ** (bits - 1)) {
    value -= 2 ** bits;
  }
  return `${(value / (multipliedBy2 ? 2 : 1)).toFixed(1)}°C`;
}

/**
 * Pairs each catalog entry with its 2-byte value from a `readValues` reply.
 */
export function describeValues(
  payload: Uint8Array,
  catalog: readonly ValueDefinition[] = VALUE_CATALOG
): string[] {
  const lines: string[] = [];
  catalog.forEach((entry, index) => {
    const value = payload.subarray(index * 2, index * 2 + 2);
    if (value.length === 2) {
      lines.push(`${entry.label}: ${formatTemperature(value)}`);
    }
  });
  return lines;
}
