import * as nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { NotificationsConfig } from '../config';
import type { MatchResult } from '../matching/matcher';
import { createLogger } from '../logger';
import { formatPercent, formatTimestamp, type Notifier } from './format';

const log = createLogger('EmailNotifier');

export type EmailOptions = NotificationsConfig['email'];

export interface EmailSettings {
  host: string;
  port: number;
  from: string;
  to: string;
  password: string;
}

/** The slice of a nodemailer transporter the notifier needs. */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export type TransportFactory = (settings: EmailSettings) => MailTransport;

/**
 * Addresses and password come from the config first, then from
 * EMAIL_USER, EMAIL_TO and EMAIL_PASSWORD. Null when any of them is missing.
 */
export function resolveEmailSettings(options: EmailOptions, env: NodeJS.ProcessEnv = process.env): EmailSettings | null {
  const from = options.fromEmail || env.EMAIL_USER;
  const to = options.toEmail || env.EMAIL_TO;
  const password = options.password || env.EMAIL_PASSWORD;
  if (!from || !to || !password) return null;
  return { host: options.smtpServer, port: options.smtpPort, from, to, password };
}

export function emailSubject(results: readonly MatchResult[]): string {
  return `New job postings found! (${results.length} items)`;
}

export function renderEmailBody(results: readonly MatchResult[], date: Date): string {
  const lines = [`New job postings have been found! (${results.length} items)`, ''];
  results.forEach(({ record, score, bestKeyword }, i) => {
    lines.push(
      `[${i + 1}] ${record.title}`,
      `Company: ${record.company}`,
      `Link: ${record.link}`,
      `Source: ${record.source}`,
      `Similarity: ${formatPercent(score)}`,
      `Matched Keyword: ${bestKeyword ?? 'N/A'}`,
      '',
    );
  });
  lines.push('---', `Sent at: ${formatTimestamp(date)}`, '');
  return lines.join('\n');
}

export const smtpTransport: TransportFactory = ({ host, port, from, password }) =>
  nodemailer.createTransport({
    host,
    port,
    secure: port === 465,
    requireTLS: port !== 465,
    auth: { user: from, pass: password },
  });

export class EmailNotifier implements Notifier {
  readonly name = 'email';

  constructor(
    private readonly options: EmailOptions,
    private readonly createTransport: TransportFactory = smtpTransport,
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async notify(results: readonly MatchResult[]): Promise<void> {
    if (results.length === 0) return;

    const settings = resolveEmailSettings(this.options, this.env);
    if (!settings) {
      log.warn('Email configuration incomplete, skipping email notification');
      return;
    }

    await this.createTransport(settings).sendMail({
      from: settings.from,
      to: settings.to,
      subject: emailSubject(results),
      text: renderEmailBody(results, this.now()),
    });
    log.info(`Email notification sent to ${settings.to}`);
  }
}
