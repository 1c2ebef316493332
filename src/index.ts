#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config/index.js';
import { createLogger } from './logger.js';
import { startGateway } from './gateway.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/gateway.yaml';

async function main() {
  const config = loadConfig(CONFIG_PATH);
  const logger = createLogger(config.logging);

  logger.info('Starting prompt gateway...');
  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  const { server } = await startGateway(config, logger);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    try {
      await server.close();
      logger.info('HTTP server closed');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error while closing HTTP server');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  // Don't exit - let the app continue
});

main().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
