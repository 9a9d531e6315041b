import { randomUUID } from "node:crypto";
import type { PipelineDB } from "./db.js";
import { decodeJson, slotMapSchema, topicsSchema } from "./schemas.js";
import type {
  CalendarEvent,
  ChatMessage,
  ChatRole,
  DaySummary,
  MemoryRecord,
  MemoryStatus,
  SlotMap,
} from "./types.js";

export interface AddMemoryParams {
  iin: string;
  content: string;
  type: string;
  slots?: SlotMap;
  context?: string | null;
  tier?: string;
  relevance?: number;
  status?: MemoryStatus;
}

export interface AddEventParams {
  iin: string;
  title: string;
  startsAt: number;
  time?: string | null;
  description?: string | null;
}

export interface AppendMessageParams {
  iin: string;
  sessionId: string;
  role: ChatRole;
  content: string;
  timestamp?: number;
}

interface MemoryRow {
  id: string;
  iin: string;
  content: string;
  type: string;
  slots: string;
  status: MemoryStatus;
  context: string | null;
  tier: string;
  relevance: number;
  created_at: number;
  updated_at: number;
}

interface EventRow {
  id: string;
  iin: string;
  title: string;
  starts_at: number;
  time: string | null;
  description: string | null;
}

interface MessageRow {
  role: ChatRole;
  content: string;
  timestamp: number;
}

interface SummaryRow {
  date: string;
  content: string;
  topics: string;
}

/** Per-user collections read by the pipeline, all keyed by IIN. */
export class MemoryStore {
  private readonly db;

  constructor(pipelineDb: PipelineDB) {
    this.db = pipelineDb.raw();
  }

  // ── Memory items ──

  addMemory(params: AddMemoryParams): string {
    const id = randomUUID();
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO memory_items (id, iin, content, type, slots, status, context, tier, relevance, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        params.iin,
        params.content,
        params.type,
        JSON.stringify(params.slots ?? {}),
        params.status ?? "active",
        params.context ?? null,
        params.tier ?? "longterm",
        params.relevance ?? 0.5,
        now,
        now,
      );
    return id;
  }

  /** Active records for a user, most recently updated first. */
  listActiveMemories(iin: string, limit = 100): MemoryRecord[] {
    const rows = this.db
      .prepare<[string, number], MemoryRow>(
        `SELECT * FROM memory_items WHERE iin = ? AND status = 'active'
         ORDER BY updated_at DESC, rowid DESC LIMIT ?`,
      )
      .all(iin, limit);
    return rows.map(toMemory);
  }

  // ── Calendar ──

  addEvent(params: AddEventParams): string {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO calendar_events (id, iin, title, starts_at, time, description)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(id, params.iin, params.title, params.startsAt, params.time ?? null, params.description ?? null);
    return id;
  }

  /** Events starting within [from, to], earliest first. */
  listEventsBetween(iin: string, from: number, to: number, limit: number): CalendarEvent[] {
    const rows = this.db
      .prepare<[string, number, number, number], EventRow>(
        `SELECT * FROM calendar_events WHERE iin = ? AND starts_at >= ? AND starts_at <= ?
         ORDER BY starts_at ASC LIMIT ?`,
      )
      .all(iin, from, to, limit);
    return rows.map((r) => ({
      id: r.id,
      iin: r.iin,
      title: r.title,
      startsAt: r.starts_at,
      time: r.time,
      description: r.description,
    }));
  }

  // ── Session messages ──

  appendMessage(params: AppendMessageParams): void {
    this.db
      .prepare(
        `INSERT INTO session_messages (iin, session_id, role, content, timestamp)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(params.iin, params.sessionId, params.role, params.content, params.timestamp ?? Date.now());
  }

  /** The latest `limit` messages of a session in chronological order. */
  listRecentMessages(iin: string, sessionId: string, limit: number): ChatMessage[] {
    const rows = this.db
      .prepare<[string, string, number], MessageRow>(
        `SELECT role, content, timestamp FROM session_messages
         WHERE iin = ? AND session_id = ?
         ORDER BY timestamp DESC, id DESC LIMIT ?`,
      )
      .all(iin, sessionId, limit);
    return rows.reverse().map((r) => ({ role: r.role, content: r.content, timestamp: r.timestamp }));
  }

  countSessionMessages(iin: string, sessionId: string): number {
    const row = this.db
      .prepare<[string, string], { total: number }>(
        "SELECT COUNT(*) AS total FROM session_messages WHERE iin = ? AND session_id = ?",
      )
      .get(iin, sessionId);
    return row?.total ?? 0;
  }

  /** The first `limit` messages of a session in chronological order. */
  listFirstMessages(iin: string, sessionId: string, limit: number): ChatMessage[] {
    const rows = this.db
      .prepare<[string, string, number], MessageRow>(
        `SELECT role, content, timestamp FROM session_messages
         WHERE iin = ? AND session_id = ?
         ORDER BY timestamp ASC, id ASC LIMIT ?`,
      )
      .all(iin, sessionId, limit);
    return rows.map((r) => ({ role: r.role, content: r.content, timestamp: r.timestamp }));
  }

  // ── Daily summaries ──

  putDailySummary(iin: string, summary: DaySummary): void {
    this.db
      .prepare(
        `INSERT INTO daily_summaries (iin, date, content, topics) VALUES (?, ?, ?, ?)
         ON CONFLICT(iin, date) DO UPDATE SET content = excluded.content, topics = excluded.topics`,
      )
      .run(iin, summary.date, summary.content, JSON.stringify(summary.topics));
  }

  /** Summaries dated on or after `sinceDate` (YYYY-MM-DD), newest first. */
  listDailySummaries(iin: string, sinceDate: string): DaySummary[] {
    const rows = this.db
      .prepare<[string, string], SummaryRow>(
        `SELECT date, content, topics FROM daily_summaries
         WHERE iin = ? AND date >= ? ORDER BY date DESC`,
      )
      .all(iin, sinceDate);
    return rows.map((r) => ({
      date: r.date,
      content: r.content,
      topics: decodeJson(r.topics, topicsSchema, []),
    }));
  }
}

function toMemory(row: MemoryRow): MemoryRecord {
  return {
    id: row.id,
    iin: row.iin,
    content: row.content,
    type: row.type,
    slots: decodeJson(row.slots, slotMapSchema, {}),
    status: row.status,
    context: row.context,
    tier: row.tier,
    relevance: row.relevance,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
