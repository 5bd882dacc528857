/**
 * Environment-driven configuration loader.
 *
 * Reads:
 *   STATUSKIT_LOG_LEVEL        pino level or "silent" (default "info")
 *   STATUSKIT_FATAL_EXIT_CODE  1..255 (default 1)
 *   STATUSKIT_DEBUG_CHECKS     true | false | 1 | 0
 *                              (default: on unless NODE_ENV=production)
 *
 * Invalid input is reported as an INVALID_ARGUMENT status, never thrown.
 */

import { z } from "zod";
import type { StatuskitConfig } from "../types/config.js";
import type { AStatusOrElse } from "../types/status-or-else.js";
import { invalidArgumentError } from "../types/status.js";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((flag) => flag === "true" || flag === "1");

const envSchema = z.object({
  STATUSKIT_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  STATUSKIT_FATAL_EXIT_CODE: z.coerce.number().int().min(1).max(255).default(1),
  STATUSKIT_DEBUG_CHECKS: booleanFlag.optional(),
  NODE_ENV: z.string().optional(),
});

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

export function loadConfig(
  env: ConfigEnv = process.env,
): AStatusOrElse<StatuskitConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return {
      ok: false,
      error: invalidArgumentError(`Invalid configuration: ${detail}`),
    };
  }

  const data = parsed.data;
  return {
    ok: true,
    value: {
      logLevel: data.STATUSKIT_LOG_LEVEL,
      fatalExitCode: data.STATUSKIT_FATAL_EXIT_CODE,
      debugChecks: data.STATUSKIT_DEBUG_CHECKS ?? data.NODE_ENV !== "production",
    },
  };
}
