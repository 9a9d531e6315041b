import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["MEMPIPE_STATE_DIR"] ?? join(homedir(), ".mempipe");
}

export function getConfigPath(): string {
  return process.env["MEMPIPE_CONFIG_PATH"] ?? "mempipe.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
