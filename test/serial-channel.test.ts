import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SerialPortMock } from 'serialport';
import { SerialChannel } from '../src/transport/serial-channel.js';
import NodeSerialTransport from '../src/transport/node-serialport.js';
import { BlockFramer } from '../src/framers/block-framer.js';
import {
  IncompleteFrameError,
  SerialPortIOError,
  TimeoutError,
  WrongResponseHeaderError,
} from '../src/errors.js';
import { SerialPortFactoryOptions } from '../src/types/boiler-types.js';
import { toHex } from '../src/utils/utils.js';
import { sleep } from './helpers.js';
import { FakeController, silentResponder } from './fake-controller.js';

const codec = new BlockFramer();
const TIMEOUT = 100;

describe('SerialChannel', () => {
  let fake: FakeController;
  let channel: SerialChannel;

  beforeEach(async () => {
    fake = new FakeController();
    channel = new SerialChannel(fake, codec, { timeout: TIMEOUT });
    await channel.open();
  });

  it('writes the frame and returns the complete reply', async () => {
    const request = codec.encode(0x30, Uint8Array.from([0x00, 0x04]));
    const reply = await channel.transact(request);

    expect(toHex(fake.written[0] ?? new Uint8Array(0))).toBe('02fd000330000458');
    expect(toHex(reply)).toBe('02fd000330000458');
  });

  it('drops stale input before writing', async () => {
    fake.inject([0x02, 0xfd, 0x00, 0x01, 0x99, 0x00]);
    const reply = await channel.transact(codec.encode(0x51, new Uint8Array(0)));
    expect(toHex(reply)).toBe('02fd000151f1');
    expect(fake.buffered).toBe(0);
  });

  it('times out when the controller stays silent', async () => {
    fake.setResponder(silentResponder);
    const started = Date.now();
    await expect(channel.transact(codec.encode(0x51, new Uint8Array(0)))).rejects.toThrow(
      TimeoutError
    );
    const elapsed = Date.now() - started;
    expect(elapsed).toBeGreaterThanOrEqual(TIMEOUT - 10);
    expect(elapsed).toBeLessThan(TIMEOUT + 500);
  });

  it('keeps working after a timeout and ignores the late reply', async () => {
    fake.delayMs = TIMEOUT + 50;
    await expect(
      channel.transact(codec.encode(0x30, Uint8Array.from([0x00, 0x01])))
    ).rejects.toThrow(TimeoutError);

    await sleep(100);
    expect(fake.buffered).toBeGreaterThan(0);
    fake.delayMs = 0;

    const reply = await channel.transact(codec.encode(0x30, Uint8Array.from([0x00, 0x04])));
    expect(toHex(reply)).toBe('02fd000330000458');
  });

  it('reports a truncated header with the bytes received', async () => {
    fake.setResponder(() => Uint8Array.from([0x02, 0xfd, 0x00]));
    const attempt = channel.transact(codec.encode(0x51, new Uint8Array(0)));
    await expect(attempt).rejects.toThrow(WrongResponseHeaderError);
    await expect(attempt).rejects.toThrow('Received: 02fd00');
  });

  it('reports a foreign frame marker', async () => {
    fake.setResponder(() => Uint8Array.from([0x03, 0xfd, 0x00, 0x01, 0x51, 0xf1]));
    await expect(channel.transact(codec.encode(0x51, new Uint8Array(0)))).rejects.toThrow(
      'Received: 03fd0001'
    );
  });

  it('reports a body shorter than the length field', async () => {
    fake.setResponder(() => Uint8Array.from([0x02, 0xfd, 0x00, 0x05, 0x51, 0x01, 0x02, 0x03]));
    const attempt = channel.transact(codec.encode(0x51, new Uint8Array(0)));
    await expect(attempt).rejects.toThrow(IncompleteFrameError);
    await expect(attempt).rejects.toThrow('Expected 6 bytes after frame header, received 4');
  });

  it('maps transport failures to SerialPortIOError and releases the channel', async () => {
    fake.failWrites = true;
    const attempt = channel.transact(codec.encode(0x51, new Uint8Array(0)));
    await expect(attempt).rejects.toThrow(SerialPortIOError);
    await expect(attempt).rejects.toThrow('write failed');

    fake.failWrites = false;
    const reply = await channel.transact(codec.encode(0x51, new Uint8Array(0)));
    expect(toHex(reply)).toBe('02fd000151f1');
  });

  it('gives up on a write that never completes', async () => {
    fake.stallWrites = true;
    const started = Date.now();
    const attempt = channel.transact(codec.encode(0x51, new Uint8Array(0)));
    await expect(attempt).rejects.toThrow(TimeoutError);
    await expect(attempt).rejects.toThrow('Request not sent within 100ms');
    expect(Date.now() - started).toBeLessThan(TIMEOUT + 500);

    fake.stallWrites = false;
    const reply = await channel.transact(codec.encode(0x51, new Uint8Array(0)));
    expect(toHex(reply)).toBe('02fd000151f1');
  });

  it('runs concurrent transactions one at a time, each with its own reply', async () => {
    fake.delayMs = 10;
    const requests = [0, 1, 2, 3, 4].map(i => codec.encode(0x30, Uint8Array.from([0x00, i])));

    const pending = requests.map(request => channel.transact(request));
    expect(channel.pending).toBe(5);
    const replies = await Promise.all(pending);

    replies.forEach((reply, i) => {
      expect(toHex(reply)).toBe(toHex(requests[i] ?? new Uint8Array(0)));
    });
    expect(fake.maxInFlight).toBe(1);
    expect(channel.pending).toBe(0);
  });

  it('opens and closes the transport', async () => {
    expect(channel.isOpen).toBe(true);
    await channel.close();
    expect(channel.isOpen).toBe(false);
  });
});

describe('SerialChannel on a serial port that closes', () => {
  const PATH = '/dev/ttyTEST3';
  let created: SerialPortMock | null = null;
  let channel: SerialChannel;

  const createPort = (options: SerialPortFactoryOptions): SerialPortMock => {
    created = new SerialPortMock({ ...options, autoOpen: false });
    return created;
  };

  const port = (): SerialPortMock => {
    if (created === null) throw new Error('mock port was not created');
    return created;
  };

  /** Settles with the error the state request failed with, or null */
  const startRequest = (): Promise<unknown> =>
    channel.transact(codec.encode(0x51, new Uint8Array(0))).then(
      () => null,
      (err: unknown) => err
    );

  const requestOnWire = (): Promise<void> =>
    vi.waitFor(() => {
      expect(port().port?.recording.length).toBe(6);
    });

  beforeEach(async () => {
    created = null;
    SerialPortMock.binding.createPort(PATH, { record: true });
    channel = new SerialChannel(new NodeSerialTransport(PATH, { createPort }), codec, {
      timeout: 2000,
    });
    await channel.open();
  });

  afterEach(() => {
    SerialPortMock.binding.reset();
  });

  it('reports a frame cut short by the close as incomplete', async () => {
    const outcome = startRequest();
    await requestOnWire();
    port().port?.emitData(Buffer.from([0x02, 0xfd, 0x00, 0x05, 0x51, 0x01]));
    await sleep(50);
    port().close();

    const err = await outcome;
    expect(err).toBeInstanceOf(IncompleteFrameError);
    expect(err).toHaveProperty('message', 'Expected 6 bytes after frame header, received 2');
  });

  it('reports a close right after the header as incomplete', async () => {
    const outcome = startRequest();
    await requestOnWire();
    port().port?.emitData(Buffer.from([0x02, 0xfd, 0x00, 0x05]));
    await sleep(50);
    port().close();

    const err = await outcome;
    expect(err).toBeInstanceOf(IncompleteFrameError);
    expect(err).toHaveProperty('message', 'Expected 6 bytes after frame header, received 0');
  });

  it('reports a close before any reply byte as a port failure', async () => {
    const outcome = startRequest();
    await requestOnWire();
    await sleep(20);
    port().close();

    const err = await outcome;
    expect(err).toBeInstanceOf(SerialPortIOError);
    expect(err).toHaveProperty('message', 'Port closed');
  });
});
