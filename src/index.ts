import { createBot } from './bot.js';
import { logInfo, logError, errorMessage } from './utils/logger.js';

const bot = createBot();

const shutdown = (signal: string) => {
  logInfo('shutdown', { signal });
  bot.stop().catch((err: unknown) => logError('shutdown_failed', { error: errorMessage(err) }));
};
process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

await bot.api.deleteWebhook();
await bot.start({
  onStart: () => {
    logInfo('Lift projector bot started (long polling)');
  }
});
