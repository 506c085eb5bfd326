import { destination, pino, type LevelWithSilent, type Logger } from "pino";

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface CreateLoggerOptions {
  level?: LevelWithSilent;
  pretty?: boolean;
}

export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? "info";
}

// stdout carries the MCP stdio stream, so every log line goes to stderr.
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel(process.env.LOG_LEVEL);
  const pretty = options.pretty ?? (process.stderr.isTTY === true && level !== "silent");
  if (pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    });
  }
  return pino({ level }, destination(2));
}

export const logger = createLogger();

export type { Logger };
