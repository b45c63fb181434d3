/**
 * Engine Configuration
 *
 * Loads `cardwise.yaml` (or the file named by CARDWISE_CONFIG), validates it
 * and applies environment overrides. A missing file means defaults; a file
 * that fails validation stops startup with the list of bad fields.
 *
 * Example:
 * ```yaml
 * databasePath: ./data/cardwise.db
 * port: 3000
 * defaultDeckPrefs:
 *   new_per_day: 20
 *   rev_per_day: 200
 *   steps_min: [1, 10]
 * scheduling:
 *   leechThreshold: 6
 *   hardInterval: fixed-multiplier
 * ```
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { DeckPrefsSchema } from "@cardwise/shared";
import { DEFAULT_DECK_PREFS } from "./scheduling/scheduler";
import { DEFAULT_SCHEDULING_POLICY, type SchedulingPolicy } from "./scheduling/card-state-machine";
import { DEFAULT_LEARNING_JITTER_SECONDS } from "./scheduling/session-builder";
import { hostUtcOffsetMinutes, type StudyClock } from "./scheduling/study-day";
import { createLogger, type LogLevel } from "./logger";

const log = createLogger("EngineConfig");

/**
 * Default configuration file, relative to the working directory.
 */
export const CONFIG_FILE_NAME = "cardwise.yaml";

export const DEFAULT_DATABASE_PATH = "./data/cardwise.db";

// =============================================================================
// Schema
// =============================================================================

const SchedulingConfigSchema = z
  .object({
    maxIntervalDays: z.number().positive().default(DEFAULT_SCHEDULING_POLICY.maxIntervalDays),
    leechThreshold: z.number().int().min(1).default(DEFAULT_SCHEDULING_POLICY.leechThreshold),
    firstGraduationDays: z.number().positive().default(DEFAULT_SCHEDULING_POLICY.firstGraduationDays),
    graduationDays: z.number().positive().default(DEFAULT_SCHEDULING_POLICY.graduationDays),
    hardInterval: z
      .enum(["ease-adjusted", "fixed-multiplier"])
      .default(DEFAULT_SCHEDULING_POLICY.hardInterval),
    hardMultiplier: z.number().min(1).default(DEFAULT_SCHEDULING_POLICY.hardMultiplier),
    learningJitterSeconds: z.number().int().min(0).max(300).default(DEFAULT_LEARNING_JITTER_SECONDS),
    rolloverHour: z.number().int().min(0).max(23).default(4),
    utcOffsetMinutes: z.number().int().min(-840).max(840).optional(),
  })
  .strict();

export const EngineConfigSchema = z
  .object({
    databasePath: z.string().min(1).default(DEFAULT_DATABASE_PATH),
    port: z.number().int().min(1).max(65535).default(3000),
    host: z.string().min(1).default("0.0.0.0"),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
    corsOrigins: z.array(z.string()).default(["http://localhost:5173", "http://localhost:3000"]),
    defaultDeckPrefs: DeckPrefsSchema.default(DEFAULT_DECK_PREFS),
    scheduling: SchedulingConfigSchema.default({}),
  })
  .strict();

export type EngineConfigFile = z.input<typeof EngineConfigSchema>;

/**
 * Resolved configuration handed to the server and the scheduler.
 */
export interface EngineConfig {
  databasePath: string;
  port: number;
  host: string;
  logLevel?: LogLevel;
  corsOrigins: string[];
  defaultDeckPrefs: z.infer<typeof DeckPrefsSchema>;
  policy: SchedulingPolicy;
  clock: StudyClock;
  learningJitterSeconds: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Format a Zod validation error into a human-readable message.
 */
export function formatConfigError(source: string, error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `  - ${path}: ${issue.message}`;
  });
  return `Invalid configuration in ${source}:\n` + issues.join("\n");
}

/**
 * Validate raw configuration data and resolve it.
 * @throws ConfigError if validation fails
 */
export function parseEngineConfig(
  data: unknown,
  source = "configuration",
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const result = EngineConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new ConfigError(formatConfigError(source, result.error));
  }
  const parsed = result.data;
  const { scheduling } = parsed;

  const config: EngineConfig = {
    databasePath: parsed.databasePath,
    port: parsed.port,
    host: parsed.host,
    logLevel: parsed.logLevel,
    corsOrigins: parsed.corsOrigins,
    defaultDeckPrefs: parsed.defaultDeckPrefs,
    policy: {
      model: "closed-form",
      maxIntervalDays: scheduling.maxIntervalDays,
      leechThreshold: scheduling.leechThreshold,
      firstGraduationDays: scheduling.firstGraduationDays,
      graduationDays: scheduling.graduationDays,
      hardInterval: scheduling.hardInterval,
      hardMultiplier: scheduling.hardMultiplier,
    },
    clock: {
      rolloverHour: scheduling.rolloverHour,
      utcOffsetMinutes: scheduling.utcOffsetMinutes ?? hostUtcOffsetMinutes(),
    },
    learningJitterSeconds: scheduling.learningJitterSeconds,
  };

  return applyEnvOverrides(config, env);
}

/**
 * PORT, HOST, CARDWISE_DB and LOG_LEVEL win over the file.
 */
export function applyEnvOverrides(config: EngineConfig, env: NodeJS.ProcessEnv): EngineConfig {
  const next = { ...config };

  if (env.PORT) {
    const parsed = parseInt(env.PORT, 10);
    if (!isNaN(parsed) && parsed > 0 && parsed <= 65535) {
      next.port = parsed;
    } else {
      log.warn(`Invalid PORT "${env.PORT}", using ${config.port}`);
    }
  }

  if (env.HOST) {
    next.host = env.HOST;
  }

  if (env.CARDWISE_DB) {
    next.databasePath = env.CARDWISE_DB;
  }

  const level = env.LOG_LEVEL?.toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error" || level === "silent") {
    next.logLevel = level;
  }

  return next;
}

/**
 * Load configuration from a YAML file.
 *
 * @param configPath - Explicit path; defaults to CARDWISE_CONFIG or ./cardwise.yaml
 * @throws ConfigError when the file exists but is not valid
 */
export async function loadEngineConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<EngineConfig> {
  const path = resolve(configPath ?? env.CARDWISE_CONFIG ?? CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      log.debug(`No config file at ${path}, using defaults`);
      return parseEngineConfig({}, "defaults", env);
    }
    throw error;
  }

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${path}: ${message}`);
  }

  const config = parseEngineConfig(data, path, env);
  log.info(`Loaded configuration from ${path}`);
  return config;
}
