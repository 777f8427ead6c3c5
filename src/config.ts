/**
 * Typed configuration - process-wide defaults live in the environment,
 * parsed with Zod when the package is first imported.
 *
 * Covers:
 * - Runtime environment and log level
 * - Default REST request timeout
 * - Default MQTT reconnect interval
 *
 * Per-device settings (host, password, ...) are passed to the client
 * constructor and validated by the kiosk module.
 */
import { z } from "zod";

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // REST transport
  // ==========================================================================
  FULLY_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(10_000)
    .describe("Timeout for a single REST command (ms)"),

  // ==========================================================================
  // MQTT
  // ==========================================================================
  FULLY_MQTT_RECONNECT_INTERVAL_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(3_000)
    .describe("Delay between MQTT reconnect attempts (ms)"),
});

// Parse at import - fails immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  throw new Error("Invalid configuration");
}

export const config = parsed.data;

export type Config = z.infer<typeof ConfigSchema>;
