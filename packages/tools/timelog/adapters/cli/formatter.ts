/**
 * CLI output formatters for timelog commands.
 *
 * All formatX() functions transform command output objects into human-readable strings.
 * These are pure functions with no side effects.
 */

import type { Entry } from "../../domain/entities/entry.ts";
import type { TlError } from "../../domain/entities/errors.ts";
import type { StatusOutput } from "../../domain/entities/outputs.ts";
import {
  formatTimestamp,
  parseTimestamp,
} from "../../domain/entities/timestamp.ts";

const PROJECT_WIDTH = 20;

export function formatEntry(entry: Entry): string {
  const start = formatTimestamp(parseTimestamp(entry.in));
  const end = entry.out === null
    ? "<- clocked in"
    : `- ${formatTimestamp(parseTimestamp(entry.out))}`;
  const lines = [`${entry.project.padEnd(PROJECT_WIDTH)}: ${start} ${end}`];
  if (entry.description) {
    lines.push(`└──${entry.description}`);
  }
  return lines.join("\n");
}

export function formatStatus(output: StatusOutput): string {
  return output.entries.map(formatEntry).join("\n");
}

export function formatError(error: TlError): string {
  return `error: ${error.code}\n${error.message}`;
}
