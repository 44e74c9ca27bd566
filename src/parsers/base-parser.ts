import axios from 'axios';
import type { SiteConfig } from '../config';
import type { JobRecord } from '../extraction/types';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const REQUEST_TIMEOUT_MS = 10000;

export abstract class BaseParser {
  constructor(readonly site: SiteConfig) {}

  get source(): string {
    return this.site.name;
  }

  abstract search(keyword: string): Promise<JobRecord[]>;

  protected async fetchPage(url: string): Promise<string> {
    const { data } = await axios.get<string>(url, {
      timeout: REQUEST_TIMEOUT_MS,
      responseType: 'text',
      headers: {
        'User-Agent': USER_AGENT,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
      },
    });
    return data;
  }
}
