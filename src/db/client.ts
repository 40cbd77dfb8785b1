import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DB_FILE_NAME, DEFAULT_CONFIG } from "../shared/constants.js";
import type { AppConfig, StreamConfig, StreamRecord, StreamStatus } from "../shared/types.js";
import { CONFIG_KEYS } from "../config/settings.js";
import { DuplicateNameError, NotFoundError } from "../shared/errors.js";
import { initialStatus, type PutOptions, type StreamStore } from "../store/types.js";

interface StreamRow {
  seq: number;
  name: string;
  source_url: string;
  rtsp_port: number;
  running: number;
  reason: string;
  exit_code: number | null;
  last_checked_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ConfigRow {
  key: string;
  value: string;
}

export class DbClient implements StreamStore {
  readonly db: Database.Database;
  readonly dbPath: string;

  constructor(configDir: string) {
    fs.mkdirSync(configDir, { recursive: true });
    this.dbPath = path.join(configDir, DB_FILE_NAME);
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = FULL");
    this.migrate();
    this.seedDefaults();
  }

  close(): void {
    this.db.close();
  }

  /** Folds the WAL into the main file, e.g. before the file is copied. */
  checkpoint(): void {
    this.db.pragma("wal_checkpoint(TRUNCATE)");
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL
      );
    `);

    const currentVersion =
      this.db.prepare<[], { version: number | null }>("SELECT MAX(version) AS version FROM schema_migrations").get()
        ?.version ?? 0;

    if (currentVersion < 1) {
      const apply = this.db.transaction(() => {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS config (
            key TEXT PRIMARY KEY,
            value TEXT NOT NULL,
            updated_at TEXT NOT NULL
          );

          CREATE TABLE IF NOT EXISTS streams (
            seq INTEGER PRIMARY KEY AUTOINCREMENT,
            name TEXT NOT NULL UNIQUE,
            source_url TEXT NOT NULL,
            rtsp_port INTEGER NOT NULL,
            running INTEGER NOT NULL DEFAULT 0,
            reason TEXT NOT NULL,
            exit_code INTEGER,
            last_checked_at TEXT,
            created_at TEXT NOT NULL,
            updated_at TEXT NOT NULL
          );

          CREATE TABLE IF NOT EXISTS daemon_meta (
            key TEXT PRIMARY KEY,
            value TEXT NOT NULL,
            updated_at TEXT NOT NULL
          );
        `);

        this.db
          .prepare<[string]>("INSERT INTO schema_migrations(version, applied_at) VALUES(1, ?)")
          .run(new Date().toISOString());
      });
      apply();
    }
  }

  private seedDefaults(): void {
    const now = new Date().toISOString();
    const insertStmt = this.db.prepare<[string, string, string]>(
      "INSERT OR IGNORE INTO config(key, value, updated_at) VALUES(?, ?, ?)"
    );

    for (const key of CONFIG_KEYS) {
      insertStmt.run(key, String(DEFAULT_CONFIG[key]), now);
    }
  }

  listConfigRaw(): Partial<Record<keyof AppConfig, string>> {
    const rows = this.db.prepare<[], ConfigRow>("SELECT key, value FROM config").all();
    const result: Partial<Record<keyof AppConfig, string>> = {};
    for (const row of rows) {
      const key = CONFIG_KEYS.find((candidate) => candidate === row.key);
      if (key) {
        result[key] = row.value;
      }
    }
    return result;
  }

  getConfigValueRaw(key: keyof AppConfig): string {
    const row = this.db.prepare<[string], { value: string }>("SELECT value FROM config WHERE key = ?").get(key);
    if (!row) {
      throw new NotFoundError(`Config key ${key} not found`);
    }
    return row.value;
  }

  setConfigValueRaw(key: keyof AppConfig, value: string): void {
    this.db
      .prepare<[string, string, string]>(
        `INSERT INTO config(key, value, updated_at) VALUES(?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
      )
      .run(key, value, new Date().toISOString());
  }

  put(config: StreamConfig, options: PutOptions = {}): StreamRecord {
    const write = this.db.transaction(() => this.writeRecord(config, options));
    return write();
  }

  private writeRecord(config: StreamConfig, options: PutOptions): StreamRecord {
    const now = new Date().toISOString();

    if (options.replace && this.has(config.name)) {
      const status = options.status ?? this.get(config.name).status;
      this.db
        .prepare<[string, number, number, string, number | null, string | null, string, string]>(
          `UPDATE streams
           SET source_url = ?, rtsp_port = ?, running = ?, reason = ?, exit_code = ?, last_checked_at = ?, updated_at = ?
           WHERE name = ?`
        )
        .run(
          config.sourceUrl,
          config.rtspPort,
          status.running ? 1 : 0,
          status.reason,
          status.exitCode,
          status.lastCheckedAt,
          now,
          config.name
        );
      return this.get(config.name);
    }

    const status = options.status ?? initialStatus();
    try {
      this.db
        .prepare<[string, string, number, number, string, number | null, string | null, string, string]>(
          `INSERT INTO streams(name, source_url, rtsp_port, running, reason, exit_code, last_checked_at, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          config.name,
          config.sourceUrl,
          config.rtspPort,
          status.running ? 1 : 0,
          status.reason,
          status.exitCode,
          status.lastCheckedAt,
          now,
          now
        );
    } catch (error) {
      if (error instanceof Error && error.message.includes("UNIQUE constraint failed: streams.name")) {
        throw new DuplicateNameError(`Stream already exists: ${config.name}`);
      }
      throw error;
    }

    return this.get(config.name);
  }

  get(name: string): StreamRecord {
    const row = this.db.prepare<[string], StreamRow>("SELECT * FROM streams WHERE name = ?").get(name);
    if (!row) {
      throw new NotFoundError(`Stream not found: ${name}`);
    }
    return mapStreamRow(row);
  }

  has(name: string): boolean {
    return this.db.prepare<[string], { found: number }>("SELECT 1 AS found FROM streams WHERE name = ?").get(name) !== undefined;
  }

  list(): StreamRecord[] {
    const rows = this.db.prepare<[], StreamRow>("SELECT * FROM streams ORDER BY seq ASC").all();
    return rows.map(mapStreamRow);
  }

  delete(name: string): void {
    const result = this.db.prepare<[string]>("DELETE FROM streams WHERE name = ?").run(name);
    if (result.changes === 0) {
      throw new NotFoundError(`Stream not found: ${name}`);
    }
  }

  writeStatus(name: string, status: StreamStatus): boolean {
    const result = this.db
      .prepare<[number, string, number | null, string | null, string, string]>(
        `UPDATE streams
         SET running = ?, reason = ?, exit_code = ?, last_checked_at = ?, updated_at = ?
         WHERE name = ?`
      )
      .run(
        status.running ? 1 : 0,
        status.reason,
        status.exitCode,
        status.lastCheckedAt,
        new Date().toISOString(),
        name
      );
    return result.changes > 0;
  }

  upsertDaemonMeta(key: string, value: string): void {
    this.db
      .prepare<[string, string, string]>(
        `INSERT INTO daemon_meta(key, value, updated_at) VALUES(?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
      )
      .run(key, value, new Date().toISOString());
  }

  getDaemonMeta(key: string): string | null {
    const row = this.db.prepare<[string], { value: string }>("SELECT value FROM daemon_meta WHERE key = ?").get(key);
    return row?.value ?? null;
  }
}

function mapStreamRow(row: StreamRow): StreamRecord {
  return {
    config: {
      name: row.name,
      sourceUrl: row.source_url,
      rtspPort: row.rtsp_port
    },
    status: {
      running: row.running === 1,
      reason: row.reason,
      lastCheckedAt: row.last_checked_at,
      exitCode: row.exit_code
    },
    createdAt: row.created_at
  };
}
