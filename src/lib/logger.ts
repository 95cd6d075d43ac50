import pino, { Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({
    name: "convo-archive",
    level,
    redact: ["credential", "api_key_value", "*.api_key_value"]
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
