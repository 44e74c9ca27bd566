import { Telegraf } from 'telegraf';
import type { AppConfig } from '../config';
import { getTelegramToken } from '../config';
import {
  registerChat,
  deactivateChat,
  isChatActive,
  getLedgerStats,
} from '../db/database';
import { createLogger } from '../logger';
import { describeSchedule, formatReport, type SearchReport } from '../scheduler';

const log = createLogger('Bot');

let bot: Telegraf | null = null;
let searchCallback: (() => Promise<SearchReport | null>) | null = null;

export function setSearchCallback(cb: () => Promise<SearchReport | null>): void {
  searchCallback = cb;
}

export function createBot(config: AppConfig, token: string = getTelegramToken()): Telegraf {
  bot = new Telegraf(token);

  bot.command('start', async (ctx) => {
    const chatId = ctx.chat.id;
    registerChat(chatId);
    log.info(`Chat ${chatId} started`);
    await ctx.reply(
      'Welcome to Job Radar!\n\n' +
      'I watch job boards for postings that match your keywords and send you the new ones.\n\n' +
      'Commands:\n' +
      '/start — Start receiving notifications\n' +
      '/stop — Stop notifications\n' +
      '/status — Show current status\n' +
      '/search — Run search immediately'
    );
  });

  bot.command('stop', async (ctx) => {
    const chatId = ctx.chat.id;
    deactivateChat(chatId);
    log.info(`Chat ${chatId} stopped`);
    await ctx.reply('Notifications paused. Use /start to resume.');
  });

  bot.command('status', async (ctx) => {
    const active = isChatActive(ctx.chat.id);
    const stats = getLedgerStats();
    const enabledSites = config.sites.filter(s => s.enabled).map(s => s.name).join(', ') || 'none';

    await ctx.reply(
      `Status: ${active ? 'Active' : 'Paused'}\n\n` +
      `Keywords: ${config.jobKeywords.join(', ')}\n` +
      `Excluded: ${config.excludeKeywords.join(', ') || 'none'}\n` +
      `Sites: ${enabledSites}\n` +
      `Schedule: ${describeSchedule(config.schedule)}\n` +
      `Threshold: ${config.similarityThreshold}\n\n` +
      `Jobs seen: ${stats.total}\n` +
      `Last new job: ${stats.lastSeenAt ?? 'never'}`
    );
  });

  bot.command('search', async (ctx) => {
    if (!searchCallback) {
      await ctx.reply('Search engine is not ready yet. Please wait.');
      return;
    }
    await ctx.reply('🔍 Starting search... This may take a minute.');
    const report = await searchCallback();
    if (report) {
      await ctx.reply(formatReport(report), { parse_mode: 'MarkdownV2' });
    } else {
      await ctx.reply('Search did not run: another search is in progress or it failed. Check logs for details.');
    }
  });

  return bot;
}

export async function startBot(): Promise<void> {
  if (!bot) throw new Error('Bot not created. Call createBot() first.');

  bot.catch((err: unknown) => {
    log.error('Bot error', err);
  });

  // launch() resolves only when polling stops, so it is not awaited.
  bot.launch().catch((err: unknown) => {
    log.error('Bot polling stopped with an error', err);
  });
  log.info('Telegram bot started');
}

export function stopBot(reason: string): void {
  if (!bot) return;
  try {
    bot.stop(reason);
  } catch (err) {
    log.warn('Bot was not running', err);
  }
  bot = null;
}
