/**
 * Typed configuration - read from the environment, parsed with Zod.
 * The process exits immediately on invalid config - fail fast.
 *
 * The decoder itself takes no configuration; these settings only shape the
 * default loggers handed to it.
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

export const ConfigSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production")
    .describe("Runtime environment"),
  APP_NAME: z
    .string()
    .default("CurrentCostDecoder")
    .describe("Application name, attached to every log line"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info")
    .describe("Pino log level"),
  LOG_PRETTY: envBoolean(true).describe(
    "Use pino-pretty output (development only)",
  ),
});

export type Config = z.infer<typeof ConfigSchema>;

let cached: Config | undefined;

/**
 * Parse the environment on first use - exits immediately if invalid.
 * Nothing reads the environment merely by importing this package.
 */
export function getConfig(): Config {
  if (cached) {
    return cached;
  }

  const parsed = ConfigSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid configuration:");
    console.error(parsed.error.format());
    process.exit(1);
  }

  cached = parsed.data;
  return cached;
}
