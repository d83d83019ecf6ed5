import { readFileSync, existsSync } from "node:fs";
import { join, dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const ROOT_DIR = join(__dirname, "../../../..");
const DEFAULT_CONFIG_FILE = join(ROOT_DIR, "config/server.yaml");

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  /** SQLite file, or ":memory:" */
  databasePath: z.string().min(1),
  logLevel: LogLevelSchema,
  /** Largest accepted request body in bytes */
  bodyLimit: z.number().int().positive(),
  /** Upper bound applied to the `limit` query parameter of list endpoints */
  maxPageSize: z.number().int().positive(),
});

const FileConfigSchema = ServerConfigSchema.partial();

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

const DEFAULTS: ServerConfig = {
  host: "0.0.0.0",
  port: 8000,
  databasePath: join(ROOT_DIR, "data/hostwatch.db"),
  logLevel: "info",
  bodyLimit: 1024 * 1024,
  maxPageSize: 1000,
};

let cachedConfig: ServerConfig | null = null;

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Defaults, then config/server.yaml, then environment variables
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const configFile = env.CONFIG_FILE ? resolve(env.CONFIG_FILE) : DEFAULT_CONFIG_FILE;
  let fileConfig: Partial<ServerConfig> = {};

  if (existsSync(configFile)) {
    try {
      const content = readFileSync(configFile, "utf-8");
      fileConfig = FileConfigSchema.parse(yaml.load(content) ?? {});
    } catch (error) {
      console.warn(`Failed to load ${configFile}, using defaults:`, error);
    }
  }

  // Environment always takes precedence
  const envConfig = {
    host: env.HOST || undefined,
    port: envInt(env, "PORT"),
    databasePath: env.DATABASE_PATH || undefined,
    logLevel: env.LOG_LEVEL || undefined,
    bodyLimit: envInt(env, "BODY_LIMIT"),
    maxPageSize: envInt(env, "MAX_PAGE_SIZE"),
  };

  const merged = { ...DEFAULTS, ...fileConfig };
  for (const [key, value] of Object.entries(envConfig)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  const config = ServerConfigSchema.parse(merged);
  if (config.databasePath !== ":memory:") {
    // Relative paths are taken from the repository root
    config.databasePath = resolve(ROOT_DIR, config.databasePath);
  }
  return config;
}

/**
 * Get the server configuration
 */
export function getServerConfig(): ServerConfig {
  if (!cachedConfig) {
    cachedConfig = loadServerConfig();
  }
  return cachedConfig;
}
