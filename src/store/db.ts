import Database from "better-sqlite3";
import { join } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS memory_items (
  id          TEXT PRIMARY KEY,
  iin         TEXT NOT NULL,
  content     TEXT NOT NULL,
  type        TEXT NOT NULL,
  slots       TEXT NOT NULL DEFAULT '{}',
  status      TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active','inactive')),
  context     TEXT,
  tier        TEXT NOT NULL DEFAULT 'longterm',
  relevance   REAL NOT NULL DEFAULT 0.5,
  created_at  INTEGER NOT NULL,
  updated_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_memory_items_iin
  ON memory_items(iin, status, updated_at);

CREATE TABLE IF NOT EXISTS calendar_events (
  id          TEXT PRIMARY KEY,
  iin         TEXT NOT NULL,
  title       TEXT NOT NULL,
  starts_at   INTEGER NOT NULL,
  time        TEXT,
  description TEXT
);
CREATE INDEX IF NOT EXISTS idx_calendar_events_iin
  ON calendar_events(iin, starts_at);

CREATE TABLE IF NOT EXISTS session_messages (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  iin         TEXT NOT NULL,
  session_id  TEXT NOT NULL,
  role        TEXT NOT NULL CHECK(role IN ('user','assistant')),
  content     TEXT NOT NULL,
  timestamp   INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_session_messages_session
  ON session_messages(iin, session_id, timestamp);

CREATE TABLE IF NOT EXISTS daily_summaries (
  iin         TEXT NOT NULL,
  date        TEXT NOT NULL,
  content     TEXT NOT NULL,
  topics      TEXT NOT NULL DEFAULT '[]',
  PRIMARY KEY (iin, date)
);

CREATE TABLE IF NOT EXISTS stage_configs (
  name        TEXT PRIMARY KEY,
  payload     TEXT NOT NULL,
  updated_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS session_summary_cache (
  iin           TEXT NOT NULL,
  session_id    TEXT NOT NULL,
  summary       TEXT NOT NULL,
  message_count INTEGER NOT NULL,
  generated_at  INTEGER NOT NULL,
  PRIMARY KEY (iin, session_id)
);
`;

export const DB_FILENAME = "mempipe.db";

export class PipelineDB {
  private db: Database.Database;

  constructor(stateDir: string) {
    this.db = new Database(join(stateDir, DB_FILENAME));
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
