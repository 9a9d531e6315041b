import { z } from "zod";
import type { AppConfig } from "./types.js";

const serverSchema = z.object({
  port: z.number().int().positive().default(19890),
  hostname: z.string().default("127.0.0.1"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const llmSchema = z.object({
  provider: z.literal("openai").default("openai"),
  model: z.string().min(1).default("gpt-4o-mini"),
  baseUrl: z.string().url().optional(),
  apiKeySecret: z.string().min(1).default("openai-api-key"),
  timeoutMs: z.number().int().positive().default(15_000),
});

const secretsSchema = z
  .object({
    source: z.enum(["env", "file"]).default("env"),
    file: z.string().optional(),
  })
  .refine((s) => s.source !== "file" || typeof s.file === "string", {
    message: "secrets.file is required when secrets.source is \"file\"",
    path: ["file"],
  });

const storageSchema = z.object({
  stateDir: z.string().optional(),
});

export const appConfigSchema = z.object({
  server: serverSchema.default({}),
  logging: loggingSchema.default({}),
  llm: llmSchema.default({}),
  secrets: secretsSchema.default({}),
  storage: storageSchema.default({}),
});

export function parseConfig(raw: unknown): AppConfig {
  return appConfigSchema.parse(raw);
}
