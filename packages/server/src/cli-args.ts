/**
 * Command line flags for the tunedrop binary
 */

export interface CliArgs {
  configPath?: string;
  port?: number;
  host?: string;
  console?: boolean;
  init?: boolean;
  help?: boolean;
  version?: boolean;
}

// Parse command line arguments
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--config':
      case '-c':
        result.configPath = args[++i];
        break;
      case '--port':
      case '-p': {
        const port = parseInt(args[++i] ?? '', 10);
        if (Number.isInteger(port) && port > 0 && port <= 65535) {
          result.port = port;
        } else {
          result.help = true;
        }
        break;
      }
      case '--host':
      case '-h': {
        const host = args[i + 1];
        if (host && !host.startsWith('-')) {
          result.host = host;
          i++;
        } else {
          result.help = true;
        }
        break;
      }
      case '--console':
        result.console = true;
        break;
      case '--init':
        result.init = true;
        break;
      case '--help':
        result.help = true;
        break;
      case '--version':
      case '-v':
        result.version = true;
        break;
    }
  }

  return result;
}
