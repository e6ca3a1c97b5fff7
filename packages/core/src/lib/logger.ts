import { Logger, type ILogObj } from "tslog";

export const LOG_LEVEL_NAMES = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export const LOG_LEVELS: Readonly<Record<LogLevelName, number>> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const envLevel = process.env.TRIE_PROOF_LOG_LEVEL ?? "";
const initialLevel: LogLevelName = isLogLevelName(envLevel) ? envLevel : "info";

export const logger: Logger<ILogObj> = new Logger<ILogObj>({
  name: "trie-proof",
  minLevel: LOG_LEVELS[initialLevel],
  type: "pretty",
});

// tslog copies settings into sub-loggers when they are created, so level
// changes have to be pushed to each of them.
const subLoggers = new Map<string, Logger<ILogObj>>();

export function getLogger(name: string): Logger<ILogObj> {
  const existing = subLoggers.get(name);
  if (existing) return existing;
  const child = logger.getSubLogger({ name });
  subLoggers.set(name, child);
  return child;
}

export function setLogLevel(level: LogLevelName): void {
  const minLevel = LOG_LEVELS[level];
  logger.settings.minLevel = minLevel;
  for (const child of subLoggers.values()) {
    child.settings.minLevel = minLevel;
  }
}

export function getLogLevel(): LogLevelName {
  const current = logger.settings.minLevel;
  return LOG_LEVEL_NAMES.find((name) => LOG_LEVELS[name] === current) ?? "info";
}
