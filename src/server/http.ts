import { Hono } from "hono";
import type { Context } from "hono";
import { serve } from "@hono/node-server";
import type { ClarificationEngine } from "../clarification/engine.js";
import type { StageConfigResolver } from "../config/stages.js";
import { isStageName, validateStageConfig } from "../config/stages.js";
import type { ConflictChecker } from "../conflicts/checker.js";
import type { ContextPromptBuilder } from "../disclosure/prompt-builder.js";
import { MalformedInputError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { TurnPipeline } from "../pipeline/orchestrator.js";
import {
  parseClarifyRequest,
  parseConflictCheckRequest,
  parseContextRequest,
  parseDaySummaryRequest,
  parseTurnRequest,
} from "../pipeline/validate.js";
import type { MemoryStore } from "../store/memory-store.js";
import type { StageConfigStore } from "../store/stage-config-store.js";

export interface PipelineServerDeps {
  readonly logger: Logger;
  readonly conflicts: ConflictChecker;
  readonly clarification: ClarificationEngine;
  readonly prompts: ContextPromptBuilder;
  readonly pipeline: TurnPipeline;
  readonly stages: StageConfigResolver;
  readonly stageConfigs: StageConfigStore;
  readonly memoryStore: MemoryStore;
  readonly port?: number;
  readonly hostname?: string;
  readonly isHealthy?: () => boolean;
}

/** Undefined when the body is not JSON, so validation reports it. */
async function readBody(c: Context): Promise<unknown> {
  return c.req.json().catch(() => undefined);
}

export class PipelineServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly logger: Logger;
  private readonly port: number;
  private readonly hostname: string;

  constructor(private readonly deps: PipelineServerDeps) {
    this.logger = deps.logger;
    this.port = deps.port ?? 19890;
    this.hostname = deps.hostname ?? "127.0.0.1";
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    const { deps } = this;

    this.app.onError((err, c) => {
      if (err instanceof MalformedInputError) {
        return c.json({ error: "Invalid request", details: err.issues }, 400);
      }
      this.logger.error({ err, path: c.req.path }, "Request failed");
      return c.json({ error: "Internal server error" }, 500);
    });

    this.app.get("/health", (c) => {
      const healthy = deps.isHealthy?.() ?? true;
      return c.json({ status: healthy ? "ok" : "degraded" }, healthy ? 200 : 503);
    });

    this.app.post("/v1/conflicts/check", async (c) => {
      const body = parseConflictCheckRequest(await readBody(c));
      return c.json(await deps.conflicts.check(body));
    });

    this.app.post("/v1/clarify", async (c) => {
      const body = parseClarifyRequest(await readBody(c));
      return c.json(await deps.clarification.process(body));
    });

    this.app.post("/v1/context", async (c) => {
      const body = parseContextRequest(await readBody(c));
      return c.json(await deps.prompts.build(body));
    });

    this.app.post("/v1/turn", async (c) => {
      const body = parseTurnRequest(await readBody(c));
      return c.json(await deps.pipeline.run(body));
    });

    this.app.get("/v1/stages/:name", (c) => {
      const name = c.req.param("name");
      switch (name) {
        case "conflict_check":
          return c.json(deps.stages.conflictCheck());
        case "clarification":
          return c.json(deps.stages.clarification());
        case "context_injection":
          return c.json(deps.stages.context());
        default:
          return c.json({ error: `Unknown stage: ${name}` }, 404);
      }
    });

    this.app.put("/v1/stages/:name", async (c) => {
      const name = c.req.param("name");
      if (!isStageName(name)) {
        return c.json({ error: `Unknown stage: ${name}` }, 404);
      }
      const payload = await readBody(c);
      const check = validateStageConfig(name, payload);
      if (!check.ok) {
        return c.json({ error: "Invalid request", details: check.issues }, 400);
      }
      deps.stageConfigs.writeStageConfig(name, payload);
      this.logger.info({ stage: name }, "Stage config updated");
      return c.json({ ok: true });
    });

    this.app.post("/v1/summaries", async (c) => {
      const body = parseDaySummaryRequest(await readBody(c));
      deps.memoryStore.putDailySummary(body.iin, {
        date: body.date,
        content: body.content,
        topics: body.topics,
      });
      return c.json({ ok: true });
    });
  }

  async start(): Promise<void> {
    this.server = serve({ fetch: this.app.fetch, port: this.port, hostname: this.hostname });
    this.logger.info({ port: this.port, hostname: this.hostname }, "Pipeline server started");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
      this.logger.info("Pipeline server stopped");
    }
  }
}
