#!/usr/bin/env node

/**
 * ISO provisioning server - entry point
 */

import { getConfig, printConfigInfo } from './config.js';
import { ProvisioningServer } from './presentation/ProvisioningServer.js';

async function main() {
  let server: ProvisioningServer | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    server = new ProvisioningServer(config);
    await server.start();
    server.printStats();

    // Setup graceful shutdown
    let shuttingDown = false;
    const shutdown = async (signal: string, exitCode: number = 0) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      try {
        await server?.shutdown();
      } catch (error) {
        console.error('💥 Error during shutdown:', error);
        exitCode = 1;
      }

      console.error('👋 Goodbye!\n');
      process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    // Also handle uncaught errors
    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason, promise) => {
      console.error('💥 Unhandled Rejection at:', promise, 'reason:', reason);
      void shutdown('UNHANDLED_REJECTION', 1);
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    if (server) {
      await server.shutdown().catch((shutdownError) => {
        console.error('💥 Error during shutdown:', shutdownError);
      });
    }

    process.exit(1);
  }
}

// Start the server
void main();
