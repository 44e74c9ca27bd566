import type { NotificationsConfig } from '../config';
import type { MatchResult } from '../matching/matcher';
import { createLogger } from '../logger';
import type { Notifier } from './format';
import { EmailNotifier } from './email';
import { FileNotifier } from './file';
import { TelegramNotifier, type MessageSender } from './telegram';
import { TerminalNotifier } from './terminal';

export type { Notifier } from './format';
export type { MessageSender } from './telegram';
export { TerminalNotifier } from './terminal';
export { FileNotifier } from './file';
export { EmailNotifier } from './email';
export { TelegramNotifier } from './telegram';

const log = createLogger('Notifier');

export interface NotifyOutcome {
  delivered: string[];
  failed: string[];
}

export function createNotifiers(config: NotificationsConfig, telegram?: MessageSender): Notifier[] {
  const notifiers: Notifier[] = [];
  if (config.terminal) notifiers.push(new TerminalNotifier());
  if (config.email.enabled) notifiers.push(new EmailNotifier(config.email));
  if (config.file.enabled) notifiers.push(new FileNotifier(config.file));
  if (config.telegram.enabled) {
    if (telegram) {
      notifiers.push(new TelegramNotifier(telegram));
    } else {
      log.warn('Telegram notifications enabled but no bot is running');
    }
  }
  return notifiers;
}

/** Sends to every channel; one channel failing never stops the others. */
export async function notifyAll(notifiers: readonly Notifier[], results: readonly MatchResult[]): Promise<NotifyOutcome> {
  const outcome: NotifyOutcome = { delivered: [], failed: [] };
  if (results.length === 0) return outcome;

  for (const notifier of notifiers) {
    try {
      await notifier.notify(results);
      outcome.delivered.push(notifier.name);
    } catch (err) {
      outcome.failed.push(notifier.name);
      log.error(`Notification channel "${notifier.name}" failed`, err);
    }
  }
  return outcome;
}
