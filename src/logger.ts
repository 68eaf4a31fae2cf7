/**
 * Centralized Logger
 *
 * Provides a shared pino logger. On an interactive terminal logs go through
 * pino-pretty; otherwise they are written as JSON to stdout, or to LOG_FILE
 * when one is configured.
 */
import pino from "pino";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

/**
 * Pretty output is used on a TTY unless explicitly disabled
 */
function shouldPrettyPrint(): boolean {
  const envValue = process.env.LOG_PRETTY?.toLowerCase();
  if (envValue === "false") return false;
  return process.stdout.isTTY ?? false;
}

/**
 * Create the appropriate logger based on environment
 */
function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || "info";
  const logFile = process.env.LOG_FILE;

  if (logFile) {
    const logDir = dirname(logFile);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }

    return pino(
      { level },
      pino.destination({
        dest: logFile,
        sync: false,
      })
    );
  }

  if (shouldPrettyPrint()) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    });
  }

  return pino({ level });
}

export const logger = createLogger();

/**
 * Extract a loggable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
