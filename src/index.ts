import { Bot } from './bot.js';
import { logger } from './logger.js';

const bot = new Bot();
const SHUTDOWN_TIMEOUT_MS = 5000;

async function main(): Promise<void> {
  try {
    await bot.start();
  } catch (error) {
    logger.error('Failed to start application', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

async function stopWithTimeout(): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      bot.stop(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Shutdown timeout')), SHUTDOWN_TIMEOUT_MS);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

function setupShutdownHandlers(): void {
  const signals = ['SIGTERM', 'SIGINT'];
  let isShuttingDown = false;

  signals.forEach(signal => {
    process.on(signal, () => {
      void (async (): Promise<void> => {
        if (isShuttingDown) {
          logger.warn(`Received ${signal} during shutdown, ignoring`);
          return;
        }
        isShuttingDown = true;
        logger.info(`Received ${signal}, shutting down gracefully`);
        try {
          await stopWithTimeout();
          process.exit(0);
        } catch (error) {
          logger.error('Error during shutdown', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        }
      })();
    });
  });

  const failFast = async (): Promise<void> => {
    if (!isShuttingDown) {
      isShuttingDown = true;
      try {
        await stopWithTimeout();
      } catch (cleanupError) {
        logger.error('Error during cleanup', {
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      }
    }
    process.exit(1);
  };

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    void failFast();
  });

  process.on('unhandledRejection', reason => {
    logger.error('Unhandled rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    void failFast();
  });
}

setupShutdownHandlers();
void main();
