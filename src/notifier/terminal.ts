import type { MatchResult } from '../matching/matcher';
import { formatJobBlock, RULE, type Notifier } from './format';

const DETAIL_PREVIEW_LENGTH = 100;

export function renderTerminalReport(results: readonly MatchResult[]): string {
  const lines = ['', RULE, `🚀 New job postings found! (${results.length} items)`, RULE];
  results.forEach((result, i) => {
    lines.push('', ...formatJobBlock(result, i + 1, DETAIL_PREVIEW_LENGTH));
  });
  lines.push('', RULE, '');
  return lines.join('\n');
}

export class TerminalNotifier implements Notifier {
  readonly name = 'terminal';

  constructor(private readonly write: (text: string) => void = text => console.log(text)) {}

  async notify(results: readonly MatchResult[]): Promise<void> {
    if (results.length === 0) return;
    this.write(renderTerminalReport(results));
  }
}
