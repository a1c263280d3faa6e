/**
 * Module-scoped color-coded loggers.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import { type Logger, pino } from "pino";
import { getConfig } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  message: "\x1b[36m", // cyan
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @param module - The module name (must be one of the predefined modules)
 * @returns A pino logger instance configured for the module
 *
 * @example
 * const log = createLogger('message');
 * log.debug({ deviceType }, 'Message classified');
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];
  const config = getConfig();

  if (config.NODE_ENV === "development" && config.LOG_PRETTY) {
    // Pretty printing for development
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      base: { app: config.APP_NAME },
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname,app",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON otherwise
  return pino({
    name: module,
    level: config.LOG_LEVEL,
    base: { app: config.APP_NAME },
  });
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.warn(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
