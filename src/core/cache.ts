import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { dirname, join } from 'node:path';
import { mkdirSync, unlinkSync } from 'node:fs';

/**
 * SQLite cache for SEC EDGAR responses.
 * Caches at the HTTP response level so a re-run does not re-fetch
 * filings it has already seen.
 *
 * Resilient to corruption: if the DB can't be opened, it's deleted
 * and recreated. The cache is non-critical; losing it just means
 * re-fetching from SEC.
 */

const MEM_CACHE_MAX = 100;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS http_cache (
    url_hash TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    response_body TEXT NOT NULL,
    fetched_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  )
`;

export interface CacheStats {
  entries: number;
  sizeBytes: number;
}

export function cachePathFor(cacheDir: string): string {
  return join(cacheDir, 'cache.db');
}

function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}

export class ResponseCache {
  private db: Database.Database | null = null;
  /** In-memory FIFO for hot-path hits within a session */
  private readonly memCache = new Map<string, { body: string; expiresAt: number }>();

  constructor(
    readonly dbPath: string,
    private readonly now: () => number = Date.now
  ) {}

  private getDb(): Database.Database {
    if (this.db) return this.db;

    mkdirSync(dirname(this.dbPath), { recursive: true });

    try {
      this.db = this.open();
    } catch {
      // DB corrupted: delete and recreate
      for (const suffix of ['', '-wal', '-shm']) {
        try { unlinkSync(this.dbPath + suffix); } catch { /* file may not exist */ }
      }
      this.db = this.open();
    }

    return this.db;
  }

  private open(): Database.Database {
    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 3000');
    db.exec(SCHEMA);
    return db;
  }

  /** Get cached response if still valid */
  get(url: string): string | null {
    const hash = hashUrl(url);
    const now = this.now();

    const mem = this.memCache.get(hash);
    if (mem && mem.expiresAt > now) return mem.body;

    const row = this.getDb().prepare(
      'SELECT response_body, expires_at FROM http_cache WHERE url_hash = ? AND expires_at > ?'
    ).get(hash, new Date(now).toISOString()) as { response_body: string; expires_at: string } | undefined;

    if (row) {
      this.setMem(hash, row.response_body, new Date(row.expires_at).getTime());
      return row.response_body;
    }

    return null;
  }

  /** Store response in cache */
  set(url: string, body: string, ttlHours: number = 24): void {
    const hash = hashUrl(url);
    const now = this.now();
    const expiresAt = now + ttlHours * 60 * 60 * 1000;

    this.setMem(hash, body, expiresAt);

    this.getDb().prepare(`
      INSERT OR REPLACE INTO http_cache (url_hash, url, response_body, fetched_at, expires_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(hash, url, body, new Date(now).toISOString(), new Date(expiresAt).toISOString());
  }

  private setMem(hash: string, body: string, expiresAt: number): void {
    if (this.memCache.size >= MEM_CACHE_MAX) {
      const firstKey = this.memCache.keys().next().value;
      if (firstKey) this.memCache.delete(firstKey);
    }
    this.memCache.set(hash, { body, expiresAt });
  }

  /** Remove every cached response */
  clear(): void {
    this.memCache.clear();
    this.getDb().exec('DELETE FROM http_cache');
  }

  stats(): CacheStats {
    const row = this.getDb().prepare(
      'SELECT COUNT(*) as count, COALESCE(SUM(LENGTH(response_body)), 0) as size FROM http_cache'
    ).get() as { count: number; size: number };
    return { entries: row.count, sizeBytes: row.size };
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
