#!/usr/bin/env node

/**
 * gdb-triage-mcp - Main entry point
 *
 * Starts the MCP server over stdio, runs the GDB preflight check and cleans up the
 * temporary triage script on shutdown.
 */

import process from 'node:process';
import { createServer, startServer } from './server/server.ts';
import { log } from './utils/logger.ts';
import { disposeDefaultGdbTriager, getDefaultGdbTriager } from './utils/triage/index.ts';
import { version } from './version.ts';

async function main(): Promise<void> {
  try {
    const supported = await getDefaultGdbTriager().hasSupportedGdb();
    if (!supported) {
      log('warn', 'GDB sanity check failed; triage_testcase calls will fail until GDB is fixed');
    }

    const server = createServer();
    await startServer(server);

    const shutdown = async (): Promise<void> => {
      disposeDefaultGdbTriager();
      await server.close();
      process.exit(0);
    };

    const onSignal = (): void => {
      shutdown().catch((error) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
    };
    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);

    log('info', `gdb-triage-mcp server (version ${version}) started successfully`);
  } catch (error) {
    console.error('Fatal error in main():', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled exception:', error);
  process.exit(1);
});
