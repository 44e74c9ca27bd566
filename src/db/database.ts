import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type { JobRecord } from '../extraction/types';
import type { MatchResult } from '../matching/matcher';
import { createLogger } from '../logger';

const log = createLogger('DB');

const IN_MEMORY = ':memory:';

export interface SeenJobRow {
  key: string;
  source: string;
  title: string;
  company: string;
  link: string;
  score: number;
  first_seen_at: string;
}

export interface LedgerStats {
  total: number;
  lastSeenAt: string | null;
}

let db: Database.Database | null = null;

function connection(): Database.Database {
  if (!db) throw new Error('Database not initialized. Call initDatabase() first.');
  return db;
}

/** Identity of a posting across runs. */
export function seenKey(record: JobRecord): string {
  return `${record.source}|${record.link}|${record.title}`;
}

export function initDatabase(dbPath: string): void {
  if (db) db.close();

  if (dbPath === IN_MEMORY) {
    db = new Database(IN_MEMORY);
  } else {
    const resolved = path.resolve(process.cwd(), dbPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    db = new Database(resolved);
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS seen_jobs (
      key TEXT PRIMARY KEY,
      source TEXT NOT NULL,
      title TEXT NOT NULL,
      company TEXT,
      link TEXT NOT NULL,
      score REAL,
      first_seen_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS bot_chats (
      chat_id INTEGER PRIMARY KEY,
      active INTEGER DEFAULT 1,
      created_at TEXT DEFAULT (datetime('now'))
    );
  `);

  log.info(`Database initialized (${dbPath})`);
}

/**
 * Results never seen in an earlier run, in input order. They are recorded in
 * the same transaction, so a second call with the same input returns nothing.
 */
export function takeUnseen(results: readonly MatchResult[]): MatchResult[] {
  const conn = connection();
  const insert = conn.prepare<[string, string, string, string, string, number]>(
    'INSERT OR IGNORE INTO seen_jobs (key, source, title, company, link, score) VALUES (?, ?, ?, ?, ?, ?)'
  );

  const remember = conn.transaction((batch: readonly MatchResult[]) =>
    batch.filter(({ record: job, score }) =>
      insert.run(seenKey(job), job.source, job.title, job.company, job.link, score).changes > 0
    )
  );

  return remember(results);
}

export function getSeenJobs(): SeenJobRow[] {
  return connection()
    .prepare<[], SeenJobRow>('SELECT * FROM seen_jobs ORDER BY first_seen_at, rowid')
    .all();
}

export function getLedgerStats(): LedgerStats {
  const row = connection()
    .prepare<[], { cnt: number; last: string | null }>('SELECT COUNT(*) as cnt, MAX(first_seen_at) as last FROM seen_jobs')
    .get();
  return { total: row?.cnt ?? 0, lastSeenAt: row?.last ?? null };
}

export function registerChat(chatId: number): void {
  connection().prepare('INSERT OR REPLACE INTO bot_chats (chat_id, active) VALUES (?, 1)').run(chatId);
}

export function deactivateChat(chatId: number): void {
  connection().prepare('UPDATE bot_chats SET active = 0 WHERE chat_id = ?').run(chatId);
}

export function getActiveChats(): number[] {
  const rows = connection()
    .prepare<[], { chat_id: number }>('SELECT chat_id FROM bot_chats WHERE active = 1 ORDER BY chat_id')
    .all();
  return rows.map(r => r.chat_id);
}

export function isChatActive(chatId: number): boolean {
  const row = connection()
    .prepare<[number], { active: number }>('SELECT active FROM bot_chats WHERE chat_id = ?')
    .get(chatId);
  return row?.active === 1;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
