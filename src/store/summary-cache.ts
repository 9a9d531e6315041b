import type { PipelineDB } from "./db.js";
import type { CachedSessionSummary } from "./types.js";

interface CacheRow {
  summary: string;
  message_count: number;
  generated_at: number;
}

/**
 * Session-summary cache keyed by (IIN, session). Last write wins; staleness
 * is judged by the reader against its own TTL.
 */
export class SessionSummaryCache {
  private readonly db;

  constructor(pipelineDb: PipelineDB) {
    this.db = pipelineDb.raw();
  }

  get(iin: string, sessionId: string): CachedSessionSummary | null {
    const row = this.db
      .prepare<[string, string], CacheRow>(
        "SELECT summary, message_count, generated_at FROM session_summary_cache WHERE iin = ? AND session_id = ?",
      )
      .get(iin, sessionId);
    if (!row) return null;
    return { summary: row.summary, messageCount: row.message_count, generatedAt: row.generated_at };
  }

  put(iin: string, sessionId: string, entry: CachedSessionSummary): void {
    this.db
      .prepare(
        `INSERT INTO session_summary_cache (iin, session_id, summary, message_count, generated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(iin, session_id) DO UPDATE SET
           summary = excluded.summary,
           message_count = excluded.message_count,
           generated_at = excluded.generated_at`,
      )
      .run(iin, sessionId, entry.summary, entry.messageCount, entry.generatedAt);
  }
}
