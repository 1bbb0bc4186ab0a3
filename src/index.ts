import { logger } from './utils/logger';
import { config } from './config/config';
import { RunningServer, startServer } from './server';

let running: RunningServer | null = null;

async function main(): Promise<void> {
  try {
    running = await startServer(config);
  } catch (error) {
    logger.error('Failed to start awg-manager', { error });
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  try {
    if (running) {
      await running.shutdown(signal);
    }
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error });
    process.exit(1);
  }
}

export function installSignalHandlers(): void {
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', { error });
    process.exit(1);
  });
}

export async function run(): Promise<void> {
  installSignalHandlers();
  await main();
}

if (require.main === module) {
  void run();
}
