#!/usr/bin/env node
/**
 * Resource Demo Server - Main Entry Point
 * Provides CLI for starting the HTTP server
 */

import { ApiServer, RESOURCE_PATH } from './server/index.js';
import { HELP_TEXT, parseArgs, type CliArgs } from './cli.js';

// ============================================
// Commands
// ============================================

async function runServe(args: CliArgs): Promise<void> {
  const server = new ApiServer({
    port: args.port,
    host: args.host,
    logRequests: args.verbose,
  });

  await server.start();
  console.log(`
Endpoints:
  GET    /                   - Status
  GET    ${RESOURCE_PATH}      - Read resource (?first=&second= echoed)
  PUT    ${RESOURCE_PATH}      - Merge fields into resource
  POST   ${RESOURCE_PATH}      - Build a resource from a full body
  DELETE ${RESOURCE_PATH}      - Acknowledge

Press Ctrl+C to stop
`);

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  switch (args.command) {
    case 'help':
      console.log(HELP_TEXT);
      break;

    case 'serve':
      await runServe(args);
      break;
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
