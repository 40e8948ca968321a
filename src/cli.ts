#!/usr/bin/env node
// src/cli.ts
import { parseArgs } from 'util';
import { resolveConfig, BoilerLinkConfig } from './config.js';
import { openBoilerLink, BoilerLink } from './transport/factory.js';
import { ProxyServer } from './proxy/proxy-server.js';
import { rootLogger } from './logger.js';
import { toHex } from './utils/utils.js';
import {
  catalogAddresses,
  describeState,
  describeValues,
  readState,
  readValues,
} from './cli/readouts.js';

const USAGE = `Usage: boiler-link <tty> [options]

  -p, --port <n>          TCP port to open for inbound hex requests
  -s, --state             request and print the current boiler state
      --values            request and print temperature values
      --validate-checksum reject replies with a wrong checksum
      --timeout <ms>      reply timeout (default 1000)
  -v, --verbose           debug logging
  -h, --help              show this help`;

interface CliOptions {
  config: BoilerLinkConfig;
  state: boolean;
  values: boolean;
}

function parseCommandLine(argv: string[]): CliOptions | null {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      port: { type: 'string', short: 'p' },
      state: { type: 'boolean', short: 's', default: false },
      values: { type: 'boolean', default: false },
      'validate-checksum': { type: 'boolean', default: false },
      timeout: { type: 'string' },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const tty = positionals[0];
  if (values.help || tty === undefined) return null;

  const config = resolveConfig({
    serialPath: tty,
    tcpPort: values.port !== undefined ? Number(values.port) : undefined,
    readTimeout: values.timeout !== undefined ? Number(values.timeout) : undefined,
    validateChecksum: values['validate-checksum'],
    logLevel: values.verbose ? 'debug' : 'info',
  });
  return { config, state: values.state ?? false, values: values.values ?? false };
}

async function runProxy(link: BoilerLink, config: BoilerLinkConfig, port: number): Promise<void> {
  const server = new ProxyServer(link.client, { port, host: config.host });
  await server.start();

  const shutdown = (signal: string): void => {
    console.log(`\nReceived ${signal}, shutting down...`);
    server
      .stop()
      .then(() => link.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

/**
 * Resolves with the exit code, or null while the proxy keeps the process running.
 */
async function main(argv: string[]): Promise<number | null> {
  let parsed: CliOptions | null;
  try {
    parsed = parseCommandLine(argv);
  } catch (err: unknown) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 2;
  }
  if (parsed === null) {
    console.log(USAGE);
    return 0;
  }

  const { config } = parsed;
  rootLogger.setLevel(config.logLevel);

  let link: BoilerLink;
  try {
    link = await openBoilerLink(config);
  } catch (err: unknown) {
    console.error(`Error connecting to TTY device: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  try {
    if (parsed.state) {
      const state = await readState(link.client);
      console.log(`STATE: ${toHex(state)}`);
      console.log(describeState(state).join('\n'));
    }

    if (parsed.values) {
      const values = await readValues(link.client, catalogAddresses());
      console.log(`VALUES: ${toHex(values)}`);
      console.log(describeValues(values).join('\n'));
    }
  } catch (err: unknown) {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    await link.close();
    return 1;
  }

  if (config.tcpPort !== undefined) {
    try {
      await runProxy(link, config, config.tcpPort);
    } catch (err: unknown) {
      console.error(`Cannot start proxy: ${err instanceof Error ? err.message : String(err)}`);
      await link.close();
      return 1;
    }
    return null;
  }

  await link.close();
  return 0;
}

main(process.argv.slice(2))
  .then(code => {
    if (code !== null) process.exit(code);
  })
  .catch((err: unknown) => {
    console.error('Fatal:', err);
    process.exit(1);
  });
