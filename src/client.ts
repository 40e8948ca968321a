// src/client.ts
import { SerialChannel } from './transport/serial-channel.js';
import { rootLogger } from './logger.js';
import { WrongCommandInResponseError } from './errors.js';
import { CommandSender, ProtocolClientOptions } from './types/boiler-types.js';

const logger = rootLogger.createLogger('ProtocolClient');

/**
 * Request/response API to the controller. Used directly and by the TCP proxy.
 */
export class ProtocolClient implements CommandSender {
  private readonly channel: SerialChannel;
  private readonly validateChecksum: boolean;
  private readonly verifyCommand: boolean;

  constructor(channel: SerialChannel, options: ProtocolClientOptions = {}) {
    this.channel = channel;
    // Some controllers send wrong checksums on perfectly good replies.
    this.validateChecksum = options.validateChecksum ?? false;
    this.verifyCommand = options.verifyCommand ?? true;
  }

  /**
   * Sends a command and returns the reply payload, with framing, command byte and
   * checksum stripped.
   *
   * Codec and channel errors are propagated unchanged so callers can report the exact
   * failure kind.
   *
   * @param command - command code (0-255)
   * @param payload - command parameters
   */
  async sendCommand(command: number, payload: Uint8Array = new Uint8Array(0)): Promise<Uint8Array> {
    const startTime = Date.now();
    const codec = this.channel.codec;
    const frame = codec.encode(command, payload);

    try {
      const reply = await this.channel.transact(frame);
      const decoded = codec.decode(reply, { validateChecksum: this.validateChecksum });

      if (this.verifyCommand && decoded.command !== command) {
        throw new WrongCommandInResponseError(command, decoded.command);
      }

      logger.debug('Response received', {
        command,
        bytes: decoded.payload.length,
        responseTime: Date.now() - startTime,
      });
      return decoded.payload;
    } catch (err: unknown) {
      logger.warn('Command failed', err, { command, responseTime: Date.now() - startTime });
      throw err;
    }
  }
}
