import { z } from "zod";

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

export type AppConfig = {
  port: number;
  host: string;
  appEnv: string;
  logLevel: LogLevel;
};

const DEFAULT_PORT = 8080;
const DEFAULT_HOST = "0.0.0.0";

const nonBlank = (raw: string | undefined): string | undefined =>
  raw && raw.trim().length > 0 ? raw.trim() : undefined;

export const parsePort = (raw: string | undefined): number => {
  const value = nonBlank(raw);
  if (!value) return DEFAULT_PORT;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0 || !Number.isInteger(n)) return DEFAULT_PORT;
  return n;
};

export const parseLogLevel = (raw: string | undefined): LogLevel => {
  const parsed = logLevelSchema.safeParse(nonBlank(raw)?.toLowerCase());
  return parsed.success ? parsed.data : "info";
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: parsePort(env.PORT),
  host: nonBlank(env.HOST) ?? DEFAULT_HOST,
  appEnv: nonBlank(env.APP_ENV) ?? "dev",
  logLevel: parseLogLevel(env.LOG_LEVEL),
});
