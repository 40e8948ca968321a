// src/config.ts
import { ConfigError } from './errors.js';
import { DEFAULTS } from './constants/constants.js';
import { LogLevel } from './types/boiler-types.js';

/**
 * Everything the link needs at startup. Built by the caller (the CLI, or code embedding
 * the library); nothing in here reads the environment or the command line.
 */
export interface BoilerLinkConfig {
  serialPath: string;
  baudRate: number;
  readTimeout: number;
  validateChecksum: boolean;
  /** Proxy runs only when set */
  tcpPort?: number;
  host: string;
  logLevel: LogLevel;
}

export type BoilerLinkConfigInput = Partial<BoilerLinkConfig> & { serialPath: string };

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

/**
 * Applies defaults and validates.
 * @throws ConfigError
 */
export function resolveConfig(input: BoilerLinkConfigInput): BoilerLinkConfig {
  const config: BoilerLinkConfig = {
    serialPath: input.serialPath,
    baudRate: input.baudRate ?? DEFAULTS.BAUD_RATE,
    readTimeout: input.readTimeout ?? DEFAULTS.READ_TIMEOUT_MS,
    validateChecksum: input.validateChecksum ?? false,
    tcpPort: input.tcpPort,
    host: input.host ?? DEFAULTS.HOST,
    logLevel: input.logLevel ?? 'info',
  };

  if (config.serialPath.trim() === '') {
    throw new ConfigError('Serial device path is required');
  }
  if (!Number.isInteger(config.baudRate) || config.baudRate <= 0) {
    throw new ConfigError(`Invalid baud rate: ${config.baudRate}`);
  }
  if (!Number.isFinite(config.readTimeout) || config.readTimeout <= 0) {
    throw new ConfigError(`Invalid read timeout: ${config.readTimeout}. Must be a positive number of ms.`);
  }
  if (
    config.tcpPort !== undefined &&
    (!Number.isInteger(config.tcpPort) || config.tcpPort < 1 || config.tcpPort > 65535)
  ) {
    throw new ConfigError(`Invalid TCP port: ${config.tcpPort}. Must be between 1-65535.`);
  }
  if (!LOG_LEVELS.includes(config.logLevel)) {
    throw new ConfigError(`Unknown log level: ${config.logLevel}`);
  }
  return config;
}
