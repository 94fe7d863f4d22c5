import { createLogger, format, transports, type Logger } from "winston";

/**
 * Build a console logger for ssa-js.
 *
 * @param level - winston level; defaults to the SSA_LOG_LEVEL environment
 *   variable. With neither set the logger is silent.
 */
export function createSsaLogger(level: string | undefined = process.env.SSA_LOG_LEVEL): Logger {
  return createLogger({
    level: level ?? "info",
    silent: level === undefined,
    format: format.combine(
      format.timestamp(),
      format.printf(({ timestamp, level: lvl, message }) => `${String(timestamp)} [ssa] ${lvl}: ${String(message)}`),
    ),
    transports: [new transports.Console()],
  });
}
