/**
 * Module-scoped color-coded loggers.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import { type Logger, pino } from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Client facade
  kiosk: "\x1b[36m", // cyan

  // REST
  transport: "\x1b[32m", // green

  // MQTT
  mqtt: "\x1b[91m", // bright red
  events: "\x1b[95m", // bright magenta
} as const;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger('transport');
 * log.info({ command }, 'Sending command');
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];

  if (config.NODE_ENV === "development") {
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON everywhere else
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.debug({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.debug(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
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
