import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "share.yaml";

const serverSchema = z
  .object({
    host: z.string().min(1).default("0.0.0.0"),
    port: z.number().int().min(0).max(65535).default(8000),
    max_concurrent_uploads: z.number().int().min(1).default(4),
    log_requests: z.boolean().default(true),
  })
  .default({});

const storageSchema = z
  .object({
    shared_dir: z.string().min(1).default("./shared"),
    // 0 disables the per-file cap.
    max_file_size: z.number().int().min(0).default(0),
  })
  .default({});

const shutdownSchema = z
  .object({
    delay_ms: z.number().int().min(0).default(1000),
    drain_timeout_ms: z.number().int().min(0).default(5000),
  })
  .default({});

const browserSchema = z
  .object({
    open_delay_ms: z.number().int().min(0).default(1000),
  })
  .default({});

const configSchema = z.object({
  server: serverSchema,
  storage: storageSchema,
  shutdown: shutdownSchema,
  browser: browserSchema,
});

export type ServerConfig = z.infer<typeof serverSchema>;
export type StorageConfig = z.infer<typeof storageSchema>;
export type ShutdownConfig = z.infer<typeof shutdownSchema>;
export type BrowserConfig = z.infer<typeof browserSchema>;
export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Validates a parsed config document and fills in defaults. */
export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid config: ${problems.join("; ")}`);
  }
  return result.data;
}

/**
 * Loads the YAML config. An explicit path must exist; otherwise share.yaml in
 * the working directory is used when present, and defaults when not.
 */
export function loadConfig(configPath?: string): Config {
  const file = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(file)) {
    if (configPath !== undefined) {
      throw new ConfigError(`Config file not found: ${file}`);
    }
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read ${file}: ${reason}`);
  }
  return parseConfig(raw);
}
