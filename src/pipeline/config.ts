import { config as loadEnv } from "dotenv";
import { randomUUID } from "node:crypto";
import { z } from "zod";

loadEnv();

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type EnvSource = Record<string, string | undefined>;

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((value) => value === "true" || value === "1" || value === "yes")
    .default(fallback ? "true" : "false");

export interface PipelineConfig {
  readonly maxRecords: number;
  readonly productionIntervalSec: number;
  readonly queueCapacity: number;
  readonly consumerPollTimeoutSec: number;
  readonly putTimeoutSec: number;
  readonly exportEnabled: boolean;
  readonly exportPath: string;
  readonly startupDelayMs: number;
  readonly monitorIntervalSec: number;
  readonly statusIntervalSec: number;
  readonly stopTimeoutSec: number;
  readonly drainTimeoutSec: number;
  readonly errorLogLimit: number;
  readonly generatorSeed?: number;
  readonly statusServerEnabled: boolean;
  readonly statusServerPort: number;
  readonly pipelineId: string;
  readonly logLevel: LogLevel;
  readonly nodeEnv: string;
  readonly warnings: readonly string[];
}

function readField<T>(
  source: EnvSource,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  warnings: string[],
): T {
  const raw = source[key];
  const value = raw === undefined || raw.trim().length === 0 ? undefined : raw.trim();
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const issues = parsed.error.issues.map((issue) => issue.message).join(", ");
  warnings.push(`${key} is invalid (${raw}): ${issues}. Falling back to default.`);
  return schema.parse(undefined);
}

/**
 * Builds a pipeline configuration from an env-shaped object. Invalid values
 * fall back to their defaults and are reported through `warnings`.
 */
export function loadConfig(source: EnvSource = process.env): PipelineConfig {
  const warnings: string[] = [];
  const read = <T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T =>
    readField(source, key, schema, warnings);

  return {
    maxRecords: read("MAX_RECORDS", z.coerce.number().int().min(1).default(100)),
    productionIntervalSec: read("PRODUCTION_INTERVAL_SEC", z.coerce.number().min(0).default(0.5)),
    queueCapacity: read("QUEUE_CAPACITY", z.coerce.number().int().min(1).default(50)),
    consumerPollTimeoutSec: read("CONSUMER_POLL_TIMEOUT_SEC", z.coerce.number().min(0).default(1)),
    putTimeoutSec: read("PUT_TIMEOUT_SEC", z.coerce.number().min(0).default(5)),
    exportEnabled: read("EXPORT_ENABLED", booleanFlag(true)),
    exportPath: read("EXPORT_PATH", z.string().min(1).default("pipeline_results.json")),
    startupDelayMs: read("STARTUP_DELAY_MS", z.coerce.number().int().min(0).default(100)),
    monitorIntervalSec: read("MONITOR_INTERVAL_SEC", z.coerce.number().positive().default(1)),
    statusIntervalSec: read("STATUS_INTERVAL_SEC", z.coerce.number().positive().default(10)),
    stopTimeoutSec: read("STOP_TIMEOUT_SEC", z.coerce.number().positive().default(5)),
    drainTimeoutSec: read("DRAIN_TIMEOUT_SEC", z.coerce.number().positive().default(30)),
    errorLogLimit: read("ERROR_LOG_LIMIT", z.coerce.number().int().min(5).default(1000)),
    generatorSeed: read("GENERATOR_SEED", z.coerce.number().int().optional()),
    statusServerEnabled: read("STATUS_SERVER_ENABLED", booleanFlag(false)),
    statusServerPort: read("STATUS_SERVER_PORT", z.coerce.number().int().min(1).max(65_535).default(9100)),
    pipelineId: read("PIPELINE_ID", z.string().min(1).optional()) ?? `pipeline-${randomUUID().slice(0, 8)}`,
    logLevel: read("LOG_LEVEL", z.enum(LOG_LEVELS).default("info")),
    nodeEnv: read("NODE_ENV", z.string().min(1).default("development")),
    warnings,
  };
}

export const config: PipelineConfig = loadConfig(process.env);
