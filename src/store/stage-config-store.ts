import type { StageName } from "../config/types.js";
import type { StageConfigSource } from "../config/stages.js";
import type { PipelineDB } from "./db.js";

interface StageRow {
  payload: string;
  updated_at: number;
}

/** Raw stage documents. Validation happens in the config resolvers. */
export class StageConfigStore implements StageConfigSource {
  private readonly db;

  constructor(pipelineDb: PipelineDB) {
    this.db = pipelineDb.raw();
  }

  /** Parsed document, or undefined when none is stored. Corrupt JSON throws. */
  readStageConfig(name: StageName): unknown {
    const row = this.db
      .prepare<[string], StageRow>("SELECT payload, updated_at FROM stage_configs WHERE name = ?")
      .get(name);
    if (!row) return undefined;
    const payload: unknown = JSON.parse(row.payload);
    return payload;
  }

  writeStageConfig(name: StageName, payload: unknown): void {
    this.db
      .prepare(
        `INSERT INTO stage_configs (name, payload, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at`,
      )
      .run(name, JSON.stringify(payload), Date.now());
  }

  deleteStageConfig(name: StageName): boolean {
    return this.db.prepare("DELETE FROM stage_configs WHERE name = ?").run(name).changes > 0;
  }
}
