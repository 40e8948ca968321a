// src/index.ts

export { ProtocolClient } from './client.js';
export { SerialChannel } from './transport/serial-channel.js';
export { default as NodeSerialTransport } from './transport/node-serialport.js';
export { openBoilerLink } from './transport/factory.js';
export type { BoilerLink, OpenBoilerLinkOptions } from './transport/factory.js';
export type { FrameCodec } from './framers/frame-codec.js';
export { BlockFramer } from './framers/block-framer.js';
export { shiftXorChecksum } from './utils/checksum.js';
export { ProxyServer } from './proxy/proxy-server.js';
export { ConnectionHandler, ConnectionState } from './proxy/connection-handler.js';
export {
  decodeHex,
  parseCommandLine,
  formatErrorLine,
  formatResponseLine,
} from './proxy/line-protocol.js';
export type { CommandLine } from './proxy/line-protocol.js';
export { resolveConfig } from './config.js';
export type { BoilerLinkConfig, BoilerLinkConfigInput } from './config.js';
export { default as Logger, rootLogger } from './logger.js';
export { FRAME, MAX_PAYLOAD_LENGTH, COMMANDS, DEFAULTS } from './constants/constants.js';
export * from './errors.js';
export type * from './types/boiler-types.js';
