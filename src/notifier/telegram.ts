import { Markup, type Telegram } from 'telegraf';
import { getActiveChats } from '../db/database';
import type { MatchResult } from '../matching/matcher';
import { createLogger } from '../logger';
import { escapeMarkdown, formatPercent, type Notifier } from './format';

const log = createLogger('TelegramNotifier');

type SendExtra = Parameters<Telegram['sendMessage']>[2];

/** The slice of the Telegram API the notifier needs. */
export interface MessageSender {
  sendMessage(chatId: number, text: string, extra?: SendExtra): Promise<unknown>;
}

function scoreBar(score: number): string {
  const filled = Math.round(score * 10);
  return '█'.repeat(filled) + '░'.repeat(10 - filled);
}

export function formatJobMessage({ record, score, bestKeyword }: MatchResult): string {
  return (
    `💼 *${escapeMarkdown(record.title)}*\n` +
    `🏢 ${escapeMarkdown(record.company)}\n` +
    `📊 Match: ${escapeMarkdown(formatPercent(score))} ${scoreBar(score)}\n` +
    `🔑 Keyword: ${escapeMarkdown(bestKeyword ?? 'N/A')}\n` +
    `🔗 Source: ${escapeMarkdown(record.source)}`
  );
}

export class TelegramNotifier implements Notifier {
  readonly name = 'telegram';

  constructor(
    private readonly sender: MessageSender,
    private readonly chats: () => number[] = getActiveChats,
  ) {}

  async notify(results: readonly MatchResult[]): Promise<void> {
    if (results.length === 0) return;

    const chatIds = this.chats();
    if (chatIds.length === 0) {
      log.info('No active chats, skipping Telegram notifications');
      return;
    }

    let failures = 0;
    for (const result of results) {
      const keyboard = Markup.inlineKeyboard([Markup.button.url('Apply →', result.record.link)]);
      for (const chatId of chatIds) {
        try {
          await this.sender.sendMessage(chatId, formatJobMessage(result), {
            parse_mode: 'MarkdownV2',
            ...keyboard,
          });
        } catch (err) {
          failures++;
          log.error(`Failed to send notification to chat ${chatId}`, err);
        }
      }
    }

    if (failures === results.length * chatIds.length) {
      throw new Error(`All ${failures} Telegram messages failed`);
    }
  }
}
