/**
 * Runtime configuration for statuskit.
 */

import type { LevelWithSilent } from "pino";

export interface StatuskitConfig {
  /** Minimum level written by the default pino sink. */
  readonly logLevel: LevelWithSilent;
  /** Exit code used when a fatal check terminates the process. */
  readonly fatalExitCode: number;
  /** Whether dcheck() evaluates its condition. */
  readonly debugChecks: boolean;
}

export const DEFAULT_CONFIG: StatuskitConfig = {
  logLevel: "info",
  fatalExitCode: 1,
  debugChecks: true,
};
