import { loadConfig, resolveConfigPath, type AppConfig } from './config';
import { initDatabase, closeDatabase } from './db/database';
import { createBot, startBot, stopBot, setSearchCallback } from './bot/bot';
import { createNotifiers, type MessageSender } from './notifier';
import { runExclusive, runSearchCycle, shouldRunAt, startScheduler, stopScheduler } from './scheduler';
import { createLogger } from './logger';

const log = createLogger('Main');

function reportInvalidSites(config: AppConfig): void {
  for (const site of config.invalidSites) {
    log.error(`Site "${site.name}" skipped: ${site.message}`);
  }
}

async function main(): Promise<void> {
  const once = process.argv.includes('--once');
  log.info('Job Radar starting...');

  const config = loadConfig(resolveConfigPath());
  reportInvalidSites(config);
  log.info(`Monitoring sites: ${config.sites.filter(s => s.enabled).map(s => s.name).join(', ') || 'none'}`);
  log.info(`Job keywords: ${config.jobKeywords.join(', ')}`);

  initDatabase(config.database.path);

  let telegram: MessageSender | undefined;
  if (config.notifications.telegram.enabled) {
    const bot = createBot(config);
    telegram = bot.telegram;
  }

  const notifiers = createNotifiers(config.notifications, telegram);
  const cycle = () => runSearchCycle(config, { notifiers });

  if (once) {
    await runExclusive(cycle);
    closeDatabase();
    return;
  }

  setSearchCallback(() => runExclusive(cycle));
  if (telegram) await startBot();

  if (shouldRunAt(new Date(), config.schedule, null)) {
    log.info('Running initial check');
    await runExclusive(cycle);
  } else {
    log.info('Skipping initial check (outside scheduled time)');
  }

  if (!startScheduler(config.schedule, cycle)) {
    throw new Error('Scheduler could not be started');
  }

  const shutdown = (signal: string) => {
    log.info(`Shutting down (${signal})...`);
    stopScheduler();
    stopBot(signal);
    closeDatabase();
    process.exit(0);
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  log.error('Fatal error', err);
  process.exit(1);
});
