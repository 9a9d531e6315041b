import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { AppConfig } from "../config/types.js";
import { OpenAICompletion } from "../llm/openai.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { CredentialProvider, createSecretSource } from "../secrets/credentials.js";
import { PipelineServer } from "../server/http.js";
import { PipelineDB } from "../store/db.js";
import { createServices, type PipelineServices } from "./services.js";

export interface ServiceContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly db: PipelineDB;
  readonly services: PipelineServices;
  readonly server: PipelineServer;
  stop(): Promise<void>;
}

export async function startService(configPath?: string): Promise<ServiceContext> {
  const config = loadConfig(configPath);

  const logger = createLogger(config.logging);
  logger.info("Starting memory pipeline...");

  const stateDir = ensureDir(config.storage.stateDir ?? getStateDir());
  const db = new PipelineDB(stateDir);

  const credentials = new CredentialProvider(createSecretSource(config.secrets), logger);
  const completion = new OpenAICompletion(config.llm, credentials, logger.child({ component: "llm" }));

  const services = createServices(db, completion, logger);
  const server = new PipelineServer({
    ...services,
    logger,
    port: config.server.port,
    hostname: config.server.hostname,
    isHealthy: () => db.isOpen(),
  });
  await server.start();

  let stopping = false;
  const stop = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down...");
    await server.stop();
    db.close();
    logger.info("Shutdown complete");
  };

  const onSignal = (): void => {
    stop().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info({ stateDir }, "Memory pipeline started");
  return { config, logger, db, services, server, stop };
}
