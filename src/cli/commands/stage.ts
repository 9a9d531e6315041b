import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig } from "../../config/loader.js";
import { ensureDir, getStateDir } from "../../config/paths.js";
import { isStageName, StageConfigResolver, validateStageConfig } from "../../config/stages.js";
import type { StageName } from "../../config/types.js";
import { createLogger } from "../../logging/logger.js";
import { PipelineDB } from "../../store/db.js";
import { StageConfigStore } from "../../store/stage-config-store.js";

function openStore(configPath: string | undefined): { db: PipelineDB; store: StageConfigStore } {
  const config = loadConfig(configPath);
  const db = new PipelineDB(ensureDir(config.storage.stateDir ?? getStateDir()));
  return { db, store: new StageConfigStore(db) };
}

abstract class StageCommand extends Command {
  config = Option.String("--config,-c", { required: false });
  stage = Option.String({ name: "stage" });

  protected stageName(): StageName | null {
    if (isStageName(this.stage)) return this.stage;
    this.context.stderr.write(`Unknown stage: ${this.stage} (expected conflict_check, clarification or context_injection)\n`);
    return null;
  }
}

export class StageShowCommand extends StageCommand {
  static override paths = [["stage", "show"]];

  static override usage = Command.Usage({
    description: "Print the effective settings of a stage, defaults included",
    examples: [["Show clarification settings", "mempipe stage show clarification"]],
  });

  async execute(): Promise<number | void> {
    const name = this.stageName();
    if (!name) return 1;

    const { db, store } = openStore(this.config);
    try {
      const resolver = new StageConfigResolver(store, createLogger({ level: "warn" }));
      const resolved =
        name === "conflict_check"
          ? resolver.conflictCheck()
          : name === "clarification"
            ? resolver.clarification()
            : resolver.context();
      this.context.stdout.write(JSON.stringify(resolved, null, 2) + "\n");
    } finally {
      db.close();
    }
  }
}

export class StageSetCommand extends StageCommand {
  static override paths = [["stage", "set"]];

  static override usage = Command.Usage({
    description: "Store a stage document from a JSON file",
    examples: [["Replace conflict check settings", "mempipe stage set conflict_check ./conflict.json"]],
  });

  file = Option.String({ name: "file" });

  async execute(): Promise<number | void> {
    const name = this.stageName();
    if (!name) return 1;

    let payload: unknown;
    try {
      payload = JSON.parse(readFileSync(this.file, "utf-8"));
    } catch (err) {
      this.context.stderr.write(
        `Cannot read ${this.file}: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    const check = validateStageConfig(name, payload);
    if (!check.ok) {
      this.context.stderr.write(`Stage document is INVALID:\n${check.issues.map((i) => `  ${i}`).join("\n")}\n`);
      return 1;
    }

    const { db, store } = openStore(this.config);
    try {
      store.writeStageConfig(name, payload);
    } finally {
      db.close();
    }
    this.context.stdout.write(`Stored ${name}\n`);
  }
}

export class StageResetCommand extends StageCommand {
  static override paths = [["stage", "reset"]];

  static override usage = Command.Usage({
    description: "Remove a stored stage document so defaults apply",
    examples: [["Reset context settings", "mempipe stage reset context_injection"]],
  });

  async execute(): Promise<number | void> {
    const name = this.stageName();
    if (!name) return 1;

    const { db, store } = openStore(this.config);
    try {
      const removed = store.deleteStageConfig(name);
      this.context.stdout.write(removed ? `Reset ${name}\n` : `${name} already uses defaults\n`);
    } finally {
      db.close();
    }
  }
}
