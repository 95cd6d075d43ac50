import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./lib/errors";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(7025),
  HOST: z.string().min(1).default("127.0.0.1"),
  ARCHIVE_DATA_ROOT: z.string().min(1).optional(),
  ARCHIVE_DATABASE_PATH: z.string().min(1).optional(),
  ARCHIVE_ENCRYPTION_KEY: z.string({ required_error: "is required" }).min(1, "must not be empty"),
  ARCHIVE_MAX_CONCURRENT_RUNS: z.coerce.number().int().positive().default(4),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

export interface AppConfig {
  host: string;
  port: number;
  dataRoot: string;
  databasePath: string;
  encryptionKey: string;
  maxConcurrentRuns: number;
  logLevel: (typeof LOG_LEVELS)[number];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`));
  }

  const values = parsed.data;
  const dataRoot = path.resolve(cwd, values.ARCHIVE_DATA_ROOT ?? "data");
  return {
    host: values.HOST,
    port: values.PORT,
    dataRoot,
    databasePath: values.ARCHIVE_DATABASE_PATH
      ? path.resolve(cwd, values.ARCHIVE_DATABASE_PATH)
      : path.join(dataRoot, "archive.sqlite"),
    encryptionKey: values.ARCHIVE_ENCRYPTION_KEY,
    maxConcurrentRuns: values.ARCHIVE_MAX_CONCURRENT_RUNS,
    logLevel: values.LOG_LEVEL
  };
}
