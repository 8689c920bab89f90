/**
 * CLI argument parsing and help text
 */

import { DEFAULT_SERVER_CONFIG } from './server/index.js';

// ============================================
// CLI Arguments
// ============================================

export interface CliArgs {
  command: 'serve' | 'help';
  port: number;
  host: string;
  verbose: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    command: 'serve',
    port: DEFAULT_SERVER_CONFIG.port,
    host: DEFAULT_SERVER_CONFIG.host,
    verbose: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === 'serve' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      result.port = parseInt(argv[++i] ?? '') || DEFAULT_SERVER_CONFIG.port;
    } else if (arg === '--host') {
      result.host = argv[++i] ?? DEFAULT_SERVER_CONFIG.host;
    } else if (arg === '--verbose' || arg === '-v') {
      result.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

export const HELP_TEXT = `
Resource Demo Server - one in-memory resource over HTTP

Usage: resource-server [command] [options]

Commands:
  serve     Start the HTTP server (default)
  help      Show this help message

Options:
  -p, --port <port>   Server port (default: ${DEFAULT_SERVER_CONFIG.port})
  --host <host>       Bind address (default: ${DEFAULT_SERVER_CONFIG.host})
  -v, --verbose       Log every request
  -h, --help          Show help
`;
