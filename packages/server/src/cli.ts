#!/usr/bin/env node
/**
 * Tunedrop - CLI Entry Point
 *
 * Usage:
 *   tunedrop                    # Start the HTTP gateway with defaults
 *   tunedrop --port 9000        # Custom port
 *   tunedrop --config ./my.yml  # Custom config
 *   tunedrop --console          # Chat with the bot in this terminal
 *   tunedrop --init             # Generate example config
 */

import * as fs from 'fs';
import { errorMessage, log } from '@tunedrop/core';
import { loadConfig, generateExampleConfig, type TunedropConfig } from './config';
import { TunedropApp } from './app';
import { GatewayServer, VERSION } from './gateway-server';
import { ConsoleChannel } from './channels/console-channel';
import { parseArgs } from './cli-args';

function printHelp(): void {
  console.log(`
Tunedrop - chat music bot

Usage: tunedrop [options]

Options:
  -c, --config <path>   Path to config file (YAML or JSON)
  -p, --port <port>     Gateway port (default: 8585)
  -h, --host <host>     Gateway host (default: 127.0.0.1)
      --console         Read commands from this terminal instead of HTTP
      --init            Generate example config file
      --help            Show this help message
  -v, --version         Show version

Environment Variables:
  TUNEDROP_PORT               Gateway port
  TUNEDROP_HOST               Gateway host
  TUNEDROP_DATABASE           Database file path
  TUNEDROP_CACHE_DIR          Download cache directory
  TUNEDROP_COOKIES            Extractor cookie file
  TUNEDROP_PROXY              HTTP proxy URL
  TUNEDROP_DEFAULT_PROVIDER   Provider used by "play"
  TUNEDROP_DELIVERY_MODES     Comma-separated mode order (card,voice,file,text)
  TUNEDROP_EXTRACTOR          Extractor binary (default: yt-dlp)
  TUNEDROP_LOG_LEVEL          Log level (debug, info, warn, error)

Examples:
  tunedrop                                # Start with defaults
  tunedrop --port 9000                    # Custom port
  tunedrop --config ./config.yml          # Use config file
  tunedrop --init                         # Generate config.yml
  TUNEDROP_DELIVERY_MODES=text tunedrop   # Text-only delivery
`);
}

function printVersion(): void {
  console.log(`Tunedrop v${VERSION}`);
}

async function runConsole(config: TunedropConfig): Promise<void> {
  const app = new TunedropApp({ config });
  await app.start();

  const channel = new ConsoleChannel();
  console.log('Type a command, e.g. "play <song>". Ctrl+D to quit.');
  await channel.listen(message => app.handle(message));
  await app.stop();
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (args.init) {
    fs.writeFileSync('config.yml', generateExampleConfig());
    console.log('Generated config.yml');
    console.log('\nEdit the file and run: tunedrop --config config.yml');
    process.exit(0);
  }

  // Load configuration
  let config: TunedropConfig;
  try {
    config = loadConfig({ configPath: args.configPath });

    // Override with CLI args
    if (args.port) {
      config.server.port = args.port;
    }
    if (args.host) {
      config.server.host = args.host;
    }
  } catch (error) {
    console.error('Failed to load configuration:', errorMessage(error));
    process.exit(1);
  }

  if (args.console) {
    await runConsole(config);
    return;
  }

  const server = new GatewayServer({
    config,
    app: new TunedropApp({ config }),
    onReady: (info) => {
      console.log(`\nTunedrop ready at ${info.localUrl}`);
    }
  });

  // Handle shutdown
  const shutdown = async (signal: string) => {
    log.info('Server', `${signal} received, shutting down...`);
    await server.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => {
      console.error('Shutdown failed:', errorMessage(error));
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => {
      console.error('Shutdown failed:', errorMessage(error));
      process.exit(1);
    });
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    process.exit(1);
  });

  await server.start();
}

// Run CLI
main().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
