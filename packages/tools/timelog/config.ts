// Runtime configuration resolved from the environment

import { homedir } from "node:os";
import { join } from "node:path";

export const TIMESHEET_ENV = "JSON_TIMESHEET";
export const DEFAULT_TIMESHEET_FILE = "timesheet.json";

export interface TimelogConfig {
  readonly timesheetPath: string;
}

/**
 * Data file path: $JSON_TIMESHEET, else timesheet.json in the home directory.
 */
export function resolveConfig(
  env: Readonly<Record<string, string | undefined>>,
): TimelogConfig {
  const explicit = env[TIMESHEET_ENV];
  if (explicit) {
    return { timesheetPath: explicit };
  }
  const home = env.HOME || homedir();
  return { timesheetPath: join(home, DEFAULT_TIMESHEET_FILE) };
}
