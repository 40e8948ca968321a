// src/transport/factory.ts

import NodeSerialTransport from './node-serialport.js';
import { SerialChannel } from './serial-channel.js';
import { ProtocolClient } from '../client.js';
import { BlockFramer } from '../framers/block-framer.js';
import { FrameCodec } from '../framers/frame-codec.js';
import { BoilerLinkConfig } from '../config.js';
import { ConnectionInitializationError } from '../errors.js';
import { rootLogger } from '../logger.js';
import type { SerialPortFactoryOptions, SerialPortLike, Transport } from '../types/boiler-types.js';

const logger = rootLogger.createLogger('Factory');

export interface BoilerLink {
  readonly transport: Transport;
  readonly channel: SerialChannel;
  readonly client: ProtocolClient;
  close(): Promise<void>;
}

export interface OpenBoilerLinkOptions {
  /** Use this transport instead of opening `config.serialPath` with `serialport` */
  transport?: Transport;
  /** Port constructor handed to the Node transport */
  createPort?: (options: SerialPortFactoryOptions) => SerialPortLike;
  codec?: FrameCodec;
}

/**
 * Wires transport, channel and client together and opens the port.
 *
 * @throws ConnectionInitializationError the port could not be opened; fatal at startup
 */
export async function openBoilerLink(
  config: BoilerLinkConfig,
  options: OpenBoilerLinkOptions = {}
): Promise<BoilerLink> {
  const transport =
    options.transport ??
    new NodeSerialTransport(config.serialPath, {
      baudRate: config.baudRate,
      readTimeout: config.readTimeout,
      ...(options.createPort ? { createPort: options.createPort } : {}),
    });
  const channel = new SerialChannel(transport, options.codec ?? new BlockFramer(), {
    timeout: config.readTimeout,
  });
  const client = new ProtocolClient(channel, { validateChecksum: config.validateChecksum });

  try {
    await channel.open();
  } catch (err: unknown) {
    if (err instanceof ConnectionInitializationError) throw err;
    throw new ConnectionInitializationError(err instanceof Error ? err.message : String(err));
  }
  logger.debug(`Link to ${config.serialPath} ready`);

  return {
    transport,
    channel,
    client,
    close: () => channel.close(),
  };
}
