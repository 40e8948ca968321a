import { describe, expect, it, vi } from 'vitest';
import { Socket } from 'net';
import { ConnectionHandler, ConnectionState } from '../src/proxy/connection-handler.js';
import { TimeoutError } from '../src/errors.js';
import { CommandSender } from '../src/types/boiler-types.js';

const senderReplying = (reply: number[]): CommandSender => ({
  sendCommand: vi.fn(async (): Promise<Uint8Array> => Uint8Array.from(reply)),
});

describe('ConnectionHandler', () => {
  it('starts out waiting for a line', () => {
    const handler = new ConnectionHandler(new Socket(), senderReplying([]), '1');
    expect(handler.currentState).toBe(ConnectionState.AWAITING_LINE);
  });

  it('is processing while a command is on its way', async () => {
    const handler = new ConnectionHandler(new Socket(), senderReplying([0x00, 0x0b]), '1');

    const response = handler.processLine('300004');
    expect(handler.currentState).toBe(ConnectionState.PROCESSING);
    expect(await response).toBe('000b\n');
  });

  it('goes back to waiting after a blank line', async () => {
    const handler = new ConnectionHandler(new Socket(), senderReplying([]), '1');

    expect(await handler.processLine('   ')).toBeNull();
    expect(handler.currentState).toBe(ConnectionState.AWAITING_LINE);
  });

  it('turns failures into error lines', async () => {
    const failing: CommandSender = {
      sendCommand: vi.fn(async (): Promise<Uint8Array> => {
        throw new TimeoutError('No response received within 100ms');
      }),
    };
    const handler = new ConnectionHandler(new Socket(), failing, '1');

    expect(await handler.processLine('51')).toBe(
      '!TimeoutError: No response received within 100ms\n'
    );
    expect(await handler.processLine('5')).toBe('!HexDecodeError: odd number of hex digits (1)\n');
  });

  it('stays closed once closed', async () => {
    const socket = new Socket();
    const handler = new ConnectionHandler(socket, senderReplying([0x01]), '1');

    handler.close();
    expect(handler.currentState).toBe(ConnectionState.CLOSED);
    expect(socket.destroyed).toBe(true);

    await handler.processLine('51');
    expect(handler.currentState).toBe(ConnectionState.CLOSED);
  });
});
