import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { DEFAULT_MODELS } from "../api/generator.js";
import { ValidationError, errnoCode, errorMessage } from "../errors.js";
import { WorkStageSchema } from "../validation/schemas.js";
import { formatIssues } from "../validation/structured-output.js";
import type { RunConfig } from "./types.js";

export const ProviderSchema = z.enum(["gemini", "anthropic", "openai"]);
const LogLevelSchema = z.enum(["silent", "info", "debug"]);

/** Persisted user defaults (`forgeline config`). */
export const CliConfigSchema = z
  .object({
    provider: ProviderSchema,
    model: z.string().min(1),
    outputDir: z.string().min(1),
    checkpointDir: z.string().min(1),
    iterationBudget: z.number().int().positive(),
    maxParallel: z.number().int().positive(),
    maxStageRetries: z.number().int().nonnegative(),
    enableReview: z.boolean(),
    enableTesting: z.boolean(),
    enableGit: z.boolean(),
    enableWebSearch: z.boolean(),
    logLevel: LogLevelSchema,
  })
  .partial();

export type CliConfig = z.infer<typeof CliConfigSchema>;
export type ConfigKey = keyof CliConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  "provider",
  "model",
  "outputDir",
  "checkpointDir",
  "iterationBudget",
  "maxParallel",
  "maxStageRetries",
  "enableReview",
  "enableTesting",
  "enableGit",
  "enableWebSearch",
  "logLevel",
];

const NUMERIC_KEYS = new Set<ConfigKey>(["iterationBudget", "maxParallel", "maxStageRetries"]);
const BOOLEAN_KEYS = new Set<ConfigKey>(["enableReview", "enableTesting", "enableGit", "enableWebSearch"]);

const RunConfigSchema = z.object({
  provider: ProviderSchema.default("gemini"),
  model: z.string().min(1).optional(),
  stageModels: z.record(WorkStageSchema, z.string().min(1)).default({}),
  outputDir: z.string().min(1).default("./generated_project"),
  checkpointDir: z.string().min(1).optional(),
  enableReview: z.boolean().default(true),
  enableTesting: z.boolean().default(true),
  enableGit: z.boolean().default(false),
  enableDocker: z.boolean().default(false),
  enableWebSearch: z.boolean().default(false),
  iterationBudget: z.number().int().positive().default(100),
  maxStageRetries: z.number().int().nonnegative().default(3),
  maxParallel: z.number().int().positive().default(1),
  generationTimeoutMs: z.number().int().positive().default(120_000),
  toolTimeoutMs: z.number().int().positive().default(30_000),
  serviceRetries: z.number().int().positive().default(3),
  serviceRetryDelayMs: z.number().int().nonnegative().default(1000),
  taskFailurePolicy: z.enum(["abort", "continue"]).default("abort"),
  maxFileBytes: z.number().int().positive().default(1024 * 1024),
  logLevel: LogLevelSchema.default("info"),
});

export type RunConfigOverrides = { [K in keyof RunConfig]?: RunConfig[K] | undefined };

/** Base directory for config and checkpoints. */
export function getForgelineHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.FORGELINE_HOME || path.join(os.homedir(), ".forgeline");
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getForgelineHome(env), "config.json");
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<CliConfig | null> {
  const file = getConfigPath(env);
  let data: string;
  try {
    data = await fs.readFile(file, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return null;
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (error) {
    throw new ValidationError([`(root): ${errorMessage(error)}`], `config ${file}`);
  }
  const parsed = CliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error), `config ${file}`);
  }
  return parsed.data;
}

export async function saveConfig(config: CliConfig, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const configPath = getConfigPath(env);
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + "\n");
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

/** Set `key` from its command-line spelling; numbers and booleans are coerced. */
export function applyConfigValue(config: CliConfig, key: ConfigKey, value: string): CliConfig {
  let coerced: string | number | boolean = value;
  if (NUMERIC_KEYS.has(key)) {
    coerced = /^-?\d+$/.test(value) ? Number(value) : value;
  } else if (BOOLEAN_KEYS.has(key) && (value === "true" || value === "false")) {
    coerced = value === "true";
  }

  const parsed = CliConfigSchema.safeParse({ ...config, [key]: coerced });
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error), `value for ${key}`);
  }
  return parsed.data;
}

/**
 * Merge file defaults and per-run overrides into the immutable RunConfig.
 * Overrides left undefined fall through to the file, then to built-in defaults.
 */
export function resolveRunConfig(
  fileConfig: CliConfig | null,
  overrides: RunConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const merged: Record<string, unknown> = { ...fileConfig, ...defined };
  // A saved model belongs to the saved provider.
  if (overrides.provider !== undefined && overrides.model === undefined && overrides.provider !== fileConfig?.provider) {
    delete merged.model;
  }
  const parsed = RunConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error), "configuration");
  }

  const config = parsed.data;
  return Object.freeze({
    ...config,
    model: config.model ?? DEFAULT_MODELS[config.provider],
    checkpointDir: config.checkpointDir ?? path.join(getForgelineHome(env), "checkpoints"),
    stageModels: Object.freeze(config.stageModels),
  });
}
