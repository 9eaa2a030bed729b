import pino from "pino";
import { z } from "zod";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export const LOG_FORMATS = ["pretty", "json"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

const LogLevelSchema = z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS));
const LogFormatSchema = z.string().trim().toLowerCase().pipe(z.enum(LOG_FORMATS));

const DEFAULT_LOG_CONFIG: ResolvedLogConfig = { level: "warn", format: "pretty" };

export function resolveLogConfig(env: NodeJS.ProcessEnv = process.env): ResolvedLogConfig {
  const level = LogLevelSchema.safeParse(env.WHEELHOUSE_LOG);
  const format = LogFormatSchema.safeParse(env.WHEELHOUSE_LOG_FORMAT);

  return {
    level: level.success ? level.data : DEFAULT_LOG_CONFIG.level,
    format: format.success ? format.data : DEFAULT_LOG_CONFIG.format,
  };
}

export function createRootLogger(env: NodeJS.ProcessEnv = process.env): pino.Logger {
  const config = resolveLogConfig(env);

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
            destination: 2,
          },
        }
      : undefined;

  return pino(
    {
      name: "wheelhouse",
      level: config.level,
      transport,
    },
    transport ? undefined : pino.destination(2)
  );
}

let sharedRootLogger: pino.Logger | null = null;

export function getDefaultLogger(): pino.Logger {
  if (!sharedRootLogger) {
    sharedRootLogger = createRootLogger();
  }
  return sharedRootLogger;
}

export function createChildLogger(parent: pino.Logger | undefined, module: string): pino.Logger {
  return (parent ?? getDefaultLogger()).child({ module });
}
