// 数据库模块：管理 SQLite 连接、schema 初始化、feed 元数据与日志落库

import Database from "better-sqlite3";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { DATA_DIR } from "../config/paths.js";
import type { LogEntry } from "../logger/types.js";


let _db: Database.Database | null = null;


/** 获取（或初始化）全局数据库单例，数据库位于 .feedline/data/feedline.db */
export async function getDb(): Promise<Database.Database> {
  if (_db) return _db;
  await mkdir(DATA_DIR, { recursive: true });
  _db = openDb(join(DATA_DIR, "feedline.db"));
  return _db;
}


/** 打开指定路径（或 ":memory:"）的数据库并建表 */
export function openDb(path: string): Database.Database {
  const db = new Database(path);
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
  initSchema(db);
  return db;
}


/** 建表：feed_sources 自定义订阅源 + logs 日志表 */
function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS feed_sources (
      id              INTEGER PRIMARY KEY AUTOINCREMENT,
      name            TEXT NOT NULL,
      url             TEXT NOT NULL UNIQUE,
      icon_filename   TEXT,
      favicon_url     TEXT,
      created_at      INTEGER NOT NULL,
      last_fetched_at INTEGER NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_feed_sources_name ON feed_sources(name);
    CREATE TABLE IF NOT EXISTS logs (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      level      TEXT NOT NULL,
      category   TEXT NOT NULL,
      message    TEXT NOT NULL,
      payload    TEXT,
      source_url TEXT,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_logs_created ON logs(created_at);
  `);
}


/** 写入一条日志（供 logger 调用） */
export async function insertLog(entry: LogEntry): Promise<void> {
  const db = await getDb();
  db.prepare(`
    INSERT INTO logs (level, category, message, payload, source_url, created_at)
    VALUES (@level, @category, @message, @payload, @sourceUrl, @createdAt)
  `).run({
    level: entry.level,
    category: entry.category,
    message: entry.message,
    payload: entry.payload ? JSON.stringify(entry.payload) : null,
    sourceUrl: entry.source_url ?? null,
    createdAt: entry.created_at,
  });
}


/** 自定义订阅源 */
export interface FeedSource {
  id: number;
  name: string;
  url: string;
  iconFilename: string | null;
  faviconUrl: string | null;
  /** unix 秒 */
  createdAt: number;
  lastFetchedAt: number;
}


/** 数据库行结构（snake_case，与 FeedSource 区分） */
interface FeedSourceRow {
  id: number;
  name: string;
  url: string;
  icon_filename: string | null;
  favicon_url: string | null;
  created_at: number;
  last_fetched_at: number;
}


function toFeedSource(row: FeedSourceRow): FeedSource {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    iconFilename: row.icon_filename,
    faviconUrl: row.favicon_url,
    createdAt: row.created_at,
    lastFetchedAt: row.last_fetched_at,
  };
}


function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}


/** feed 元数据存储接口：编排层只依赖它，测试可替换为内存实现 */
export interface FeedSourceStore {
  getSourceByUrl(url: string): Promise<FeedSource | undefined>;
  getAllSources(): Promise<FeedSource[]>;
  updateFaviconUrl(url: string, faviconUrl: string | null): Promise<boolean>;
}


/** 订阅源管理（HTTP 层使用） */
export interface FeedSourceRepository extends FeedSourceStore {
  addSource(name: string, url: string, iconFilename?: string | null): Promise<boolean>;
  removeSource(url: string): Promise<boolean>;
  updateLastFetched(url: string): Promise<boolean>;
}


/** better-sqlite3 实现；db 可注入（测试用 ":memory:"），缺省使用全局单例 */
export class SqliteSourceStore implements FeedSourceRepository {
  constructor(private readonly db?: Database.Database) {}

  private async conn(): Promise<Database.Database> {
    return this.db ?? getDb();
  }

  /** 新增订阅源；url 已存在时返回 false */
  async addSource(name: string, url: string, iconFilename: string | null = null): Promise<boolean> {
    const db = await this.conn();
    const info = db.prepare(`
      INSERT OR IGNORE INTO feed_sources (name, url, icon_filename, created_at)
      VALUES (@name, @url, @iconFilename, @createdAt)
    `).run({ name, url, iconFilename, createdAt: nowSeconds() });
    return info.changes > 0;
  }

  async removeSource(url: string): Promise<boolean> {
    const db = await this.conn();
    return db.prepare("DELETE FROM feed_sources WHERE url = @url").run({ url }).changes > 0;
  }

  async getSourceByUrl(url: string): Promise<FeedSource | undefined> {
    const db = await this.conn();
    const row = db.prepare("SELECT * FROM feed_sources WHERE url = @url").get({ url }) as FeedSourceRow | undefined;
    return row ? toFeedSource(row) : undefined;
  }

  /** 全部订阅源，按创建时间升序 */
  async getAllSources(): Promise<FeedSource[]> {
    const db = await this.conn();
    const rows = db.prepare("SELECT * FROM feed_sources ORDER BY created_at ASC, id ASC").all() as FeedSourceRow[];
    return rows.map(toFeedSource);
  }

  async updateFaviconUrl(url: string, faviconUrl: string | null): Promise<boolean> {
    const db = await this.conn();
    return db.prepare("UPDATE feed_sources SET favicon_url = @faviconUrl WHERE url = @url").run({ url, faviconUrl }).changes > 0;
  }

  async updateLastFetched(url: string): Promise<boolean> {
    const db = await this.conn();
    return db.prepare("UPDATE feed_sources SET last_fetched_at = @now WHERE url = @url").run({ url, now: nowSeconds() }).changes > 0;
  }
}
