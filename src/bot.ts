import { Bot, GrammyError, HttpError, type BotConfig, type Context } from 'grammy';
import { CONFIG } from './config.js';
import { detectIntent } from './domain/intent.js';
import { handleEstimate } from './handlers/estimate.js';
import { handleCompare } from './handlers/compare.js';
import { handleHelp } from './handlers/help.js';
import { logInfo, logError, errorMessage } from './utils/logger.js';

export function replyFor(text: string): string {
  const intent = detectIntent(text);
  if (intent === 'estimate') return handleEstimate(text);
  if (intent === 'compare') return handleCompare(text);
  return handleHelp();
}

export function createBot(token = CONFIG.telegramToken, config?: BotConfig<Context>) {
  const bot = new Bot(token, config);

  bot.command(['start', 'help'], async (ctx) => {
    await ctx.reply(handleHelp(), { parse_mode: 'HTML' });
  });

  bot.on('message:text', async (ctx) => {
    const updateId = ctx.update.update_id;
    const text = ctx.message.text;
    logInfo('incoming_message', { update_id: updateId, chat_id: ctx.chat.id });

    let reply: string;
    try {
      reply = replyFor(text);
    } catch (err) {
      logError('handler_error', { update_id: updateId, chat_id: ctx.chat.id, error: errorMessage(err) });
      reply = 'Something went wrong. Please try again.';
    }

    await ctx.reply(reply, { parse_mode: 'HTML' });
    logInfo('reply_sent', { update_id: updateId, chat_id: ctx.chat.id });
  });

  bot.catch((err) => {
    const e = err.error;
    const meta = { update_id: err.ctx.update.update_id };
    if (e instanceof GrammyError) {
      logError('telegram_request_failed', { ...meta, error: e.description });
    } else if (e instanceof HttpError) {
      logError('telegram_unreachable', { ...meta, error: errorMessage(e.error) });
    } else {
      logError('bot_error', { ...meta, error: errorMessage(e) });
    }
  });

  return bot;
}
