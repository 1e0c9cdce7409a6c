// ============================================================================
// CONFIGURATION MANAGEMENT
// ============================================================================
// Handles loading, saving, and validating configuration from the ~/.dusk
// directory (or $DUSK_HOME when set).

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

import {
  DuskConfig,
  LLMConfig,
  SQLiteStorageConfig,
  DEFAULT_LLM_CONFIG,
  DEFAULT_SCHEDULER_CONFIG,
  DEFAULT_SERVER_CONFIG,
} from "../types/index.js";
import { isValidTimezone } from "../time/index.js";

// ---- Path Helpers ----

/**
 * Get the base configuration directory
 */
export function getConfigDir(): string {
  return process.env.DUSK_HOME || join(homedir(), ".dusk");
}

/**
 * Get the path to the config file
 */
export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

/**
 * Get the data directory path
 */
export function getDataDir(): string {
  return join(getConfigDir(), "data");
}

/**
 * Ensure the config directory structure exists
 */
export function ensureConfigDirectories(): void {
  for (const dir of [getConfigDir(), getDataDir()]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

// ---- Config Schema ----

const TimeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:MM");

const LLMConfigSchema = z.object({
  provider: z.enum(["bedrock", "openai", "local"]).default("bedrock"),
  bedrock: z
    .object({
      model: z.string().optional(),
      region: z.string().optional(),
    })
    .optional(),
  openai: z
    .object({
      baseUrl: z.string(),
      apiKey: z.string(),
      model: z.string(),
    })
    .optional(),
  local: z
    .object({
      baseUrl: z.string(),
      model: z.string(),
      apiKey: z.string().optional(),
    })
    .optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_LLM_CONFIG.timeoutMs),
});

export const ConfigSchema = z.object({
  llm: LLMConfigSchema.default(DEFAULT_LLM_CONFIG),
  storage: z
    .object({
      type: z.literal("sqlite"),
      path: z.string().min(1),
    })
    .optional(),
  scheduler: z
    .object({
      enabled: z.boolean().default(DEFAULT_SCHEDULER_CONFIG.enabled),
      digestTime: TimeOfDaySchema.default(DEFAULT_SCHEDULER_CONFIG.digestTime),
      timezone: z.string().refine(isValidTimezone, "Unknown timezone").default(DEFAULT_SCHEDULER_CONFIG.timezone),
      deadlineIntervalMinutes: z.number().int().positive().default(DEFAULT_SCHEDULER_CONFIG.deadlineIntervalMinutes),
      deadlineHorizonHours: z.number().positive().default(DEFAULT_SCHEDULER_CONFIG.deadlineHorizonHours),
      tickSeconds: z.number().int().positive().default(DEFAULT_SCHEDULER_CONFIG.tickSeconds),
    })
    .default(DEFAULT_SCHEDULER_CONFIG),
  server: z
    .object({
      host: z.string().default(DEFAULT_SERVER_CONFIG.host),
      port: z.number().int().min(1).max(65535).default(DEFAULT_SERVER_CONFIG.port),
    })
    .default(DEFAULT_SERVER_CONFIG),
  log: z
    .object({
      level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    })
    .default({ level: "info" }),
});

// ---- Config Loading ----

/**
 * Load configuration from config.json, creating a default one on first run.
 * Throws when the file exists but is not valid.
 */
export function loadConfig(): DuskConfig {
  ensureConfigDirectories();
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    const config = createDefaultConfig();
    saveConfig(config);
    console.log(`\x1b[33mCreated default config at ${configPath}\x1b[0m`);
    return config;
  }

  const raw = readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Config at ${configPath} is not valid JSON`, { cause: error });
  }
  return parseConfig(parsed);
}

/**
 * Validate a raw config object and fill in defaults
 */
export function parseConfig(raw: unknown): DuskConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Invalid config: ${issues.join("; ")}`);
  }

  const { llm, storage, scheduler, server, log } = result.data;
  return {
    llm,
    storage: storage ?? createSQLiteStorageConfig(),
    scheduler,
    server,
    log,
  };
}

/**
 * Save configuration to config.json
 */
export function saveConfig(config: DuskConfig): void {
  ensureConfigDirectories();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2));
}

// ---- Config Creation ----

/**
 * Create a default configuration
 */
export function createDefaultConfig(): DuskConfig {
  return {
    llm: { ...DEFAULT_LLM_CONFIG },
    storage: createSQLiteStorageConfig(),
    scheduler: { ...DEFAULT_SCHEDULER_CONFIG },
    server: { ...DEFAULT_SERVER_CONFIG },
    log: { level: "info" },
  };
}

/**
 * Create a SQLite storage config
 */
export function createSQLiteStorageConfig(path?: string): SQLiteStorageConfig {
  return {
    type: "sqlite",
    path: path || join(getDataDir(), "dusk.db"),
  };
}

/**
 * Update the LLM configuration
 */
export function updateLLMConfig(config: DuskConfig, llm: Partial<LLMConfig>): DuskConfig {
  return {
    ...config,
    llm: {
      ...config.llm,
      ...llm,
    },
  };
}

// ---- Display Helpers ----

/**
 * Get a human-readable description of the current config
 */
export function describeConfig(config: DuskConfig): string {
  const lines: string[] = [];

  lines.push(`LLM Provider: ${config.llm.provider}`);

  switch (config.llm.provider) {
    case "bedrock":
      lines.push(`  Model: ${config.llm.bedrock?.model || "default"}`);
      lines.push(`  Region: ${config.llm.bedrock?.region || "default"}`);
      break;
    case "openai":
      lines.push(`  Base URL: ${config.llm.openai?.baseUrl || "not set"}`);
      lines.push(`  Model: ${config.llm.openai?.model || "not set"}`);
      break;
    case "local":
      lines.push(`  Base URL: ${config.llm.local?.baseUrl || "not set"}`);
      lines.push(`  Model: ${config.llm.local?.model || "not set"}`);
      break;
  }
  lines.push(`  Timeout: ${config.llm.timeoutMs}ms`);

  lines.push(`Storage: ${config.storage.type}`);
  lines.push(`  Database: ${config.storage.path}`);

  lines.push(`Scheduler: ${config.scheduler.enabled ? "enabled" : "disabled"}`);
  lines.push(`  Digest: ${config.scheduler.digestTime} (${config.scheduler.timezone})`);
  lines.push(`  Deadline sweep: every ${config.scheduler.deadlineIntervalMinutes}min, ${config.scheduler.deadlineHorizonHours}h ahead`);

  lines.push(`Server: ${config.server.host}:${config.server.port}`);
  lines.push(`Log level: ${config.log.level}`);

  return lines.join("\n");
}
