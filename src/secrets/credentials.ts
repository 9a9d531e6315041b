import { readFileSync } from "node:fs";
import { z } from "zod";
import type { SecretsConfig } from "../config/types.js";
import { CredentialUnavailableError } from "../errors.js";
import type { Logger } from "../logging/logger.js";

export interface SecretSource {
  /** Returns the secret value, or null when the source has no such name. */
  read(name: string): string | null;
}

/** `openai-api-key` is looked up as `OPENAI_API_KEY`. */
export function envVarName(secretName: string): string {
  return secretName.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

export class EnvSecretSource implements SecretSource {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  read(name: string): string | null {
    const value = this.env[envVarName(name)];
    return value !== undefined && value.length > 0 ? value : null;
  }
}

const secretFileSchema = z.record(z.string());

/** JSON object of name → value, re-read on every miss. */
export class FileSecretSource implements SecretSource {
  constructor(private readonly path: string) {}

  read(name: string): string | null {
    const raw: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
    const secrets = secretFileSchema.parse(raw);
    return secrets[name] ?? null;
  }
}

export function createSecretSource(config: SecretsConfig): SecretSource {
  if (config.source === "file" && config.file) {
    return new FileSecretSource(config.file);
  }
  return new EnvSecretSource();
}

/**
 * Fetch-by-name credentials with a per-name cache. Owned by the composition
 * root; call `invalidate` after rotating a secret.
 */
export class CredentialProvider {
  private readonly cache = new Map<string, string>();

  constructor(
    private readonly source: SecretSource,
    private readonly logger: Logger,
  ) {}

  get(name: string): string {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    let value: string | null;
    try {
      value = this.source.read(name);
    } catch (err) {
      this.logger.warn({ err, credential: name }, "Secret source read failed");
      throw new CredentialUnavailableError(name);
    }
    if (value === null) {
      throw new CredentialUnavailableError(name);
    }
    this.cache.set(name, value);
    return value;
  }

  invalidate(name?: string): void {
    if (name === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(name);
    }
  }
}
