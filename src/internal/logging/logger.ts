import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };

/** Environment variable holding the log level. */
export const LOG_LEVEL_ENV = "UTF8_TEXT_LOG_LEVEL";

const LEVELS: readonly LevelWithSilent[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

/**
 * Reads the log level from the environment. A library stays quiet unless
 * asked, so anything unset or unrecognised means `silent`.
 */
export function resolveLogLevel(
  raw: string | undefined = process.env[LOG_LEVEL_ENV],
): LevelWithSilent {
  const level = raw?.trim().toLowerCase();
  return level !== undefined && isLevel(level) ? level : "silent";
}

let rootLogger: Logger | undefined;

/** Root logger, created on first use and written synchronously to stderr. */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(
      {
        level: resolveLogLevel(),
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true }),
    );
  }
  return rootLogger;
}

/** Child logger tagged with the component that owns it. */
export function createLogger(component: string): Logger {
  return getRootLogger().child({ component });
}
