import { z } from "zod";
import { ConfigError } from "./errors.js";
import { resolveCacheRoot } from "./platform.js";

export const DEFAULT_START_TIMEOUT_MS = 10_000;
export const DEFAULT_STOP_TIMEOUT_MS = 3_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export interface RuntimeConfig {
  driverPath?: string;
  cacheDir: string;
  headless: boolean;
  startTimeoutMs: number;
  stopTimeoutMs: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
}

const OptionalStringSchema = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const TimeoutSchema = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim().length === 0 ? undefined : value),
    z.coerce.number().int().positive().default(fallback)
  );

const BooleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === "") return false;
    if (value === "1" || value === "true" || value === "yes") return true;
    if (value === "0" || value === "false" || value === "no") return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean flag, got "${value}"` });
    return z.NEVER;
  });

const RuntimeEnvSchema = z.object({
  WHEELHOUSE_DRIVER_PATH: OptionalStringSchema,
  DRIVER_PATH: OptionalStringSchema,
  WHEELHOUSE_HEADLESS: BooleanFlagSchema,
  WHEELHOUSE_START_TIMEOUT_MS: TimeoutSchema(DEFAULT_START_TIMEOUT_MS),
  WHEELHOUSE_STOP_TIMEOUT_MS: TimeoutSchema(DEFAULT_STOP_TIMEOUT_MS),
  WHEELHOUSE_CONNECT_TIMEOUT_MS: TimeoutSchema(DEFAULT_CONNECT_TIMEOUT_MS),
  WHEELHOUSE_COMMAND_TIMEOUT_MS: TimeoutSchema(DEFAULT_COMMAND_TIMEOUT_MS),
});

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = RuntimeEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    driverPath: values.WHEELHOUSE_DRIVER_PATH ?? values.DRIVER_PATH,
    cacheDir: resolveCacheRoot(env),
    headless: values.WHEELHOUSE_HEADLESS,
    startTimeoutMs: values.WHEELHOUSE_START_TIMEOUT_MS,
    stopTimeoutMs: values.WHEELHOUSE_STOP_TIMEOUT_MS,
    connectTimeoutMs: values.WHEELHOUSE_CONNECT_TIMEOUT_MS,
    commandTimeoutMs: values.WHEELHOUSE_COMMAND_TIMEOUT_MS,
  };
}
