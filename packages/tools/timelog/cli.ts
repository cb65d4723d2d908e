#!/usr/bin/env tsx
import { Command, CommanderError, Option } from "commander";
import fse from "fs-extra";
import { fileURLToPath } from "node:url";
import { TlError } from "./domain/entities/errors.ts";
import { ClockInUseCase } from "./domain/use-cases/clock-in.ts";
import { ClockOutUseCase } from "./domain/use-cases/clock-out.ts";
import { DeleteLastUseCase } from "./domain/use-cases/delete-last.ts";
import { ExportTimesheetUseCase } from "./domain/use-cases/export-timesheet.ts";
import { StatusUseCase } from "./domain/use-cases/status.ts";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { JsonTimesheetRepository } from "./adapters/repositories/json-timesheet-repo.ts";
import { formatError, formatStatus } from "./adapters/cli/formatter.ts";
import { resolveConfig } from "./config.ts";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.1.0";

// ============================================================================
// Options
// ============================================================================

interface CliOptions {
  readonly clockIn?: boolean;
  readonly clockOut?: boolean;
  readonly export?: string;
  readonly deleteClockIn?: boolean;
  readonly startTime?: string;
  readonly endTime?: string;
  readonly json?: boolean;
}

// Attribute names of the command flags; at most one may be given
const COMMAND_FLAGS = ["clockIn", "clockOut", "export", "deleteClockIn"];

function commandFlag(flags: string, description: string): Option {
  const option = new Option(flags, description);
  return option.conflicts(
    COMMAND_FLAGS.filter((name) => name !== option.attributeName()),
  );
}

// ============================================================================
// Error handling
// ============================================================================

function handleError(e: unknown, json: boolean): void {
  if (e instanceof TlError) {
    if (json) {
      console.error(JSON.stringify(e.toJSON()));
    } else {
      console.error(formatError(e));
    }
    process.exitCode = 1;
    return;
  }
  throw e;
}

// ============================================================================
// Commands
// ============================================================================

async function run(
  project: string | undefined,
  description: string[],
  options: CliOptions,
): Promise<void> {
  const { timesheetPath } = resolveConfig(process.env);
  const timesheetRepo = new JsonTimesheetRepository(
    new NodeFileSystem(),
    timesheetPath,
  );
  const json = options.json ?? false;
  const target = project ?? null;

  try {
    if (options.export !== undefined) {
      const output = await new ExportTimesheetUseCase(timesheetRepo).execute({
        path: options.export,
        project: target,
        start: options.startTime,
        end: options.endTime,
      });
      if (json) console.log(JSON.stringify(output));
    } else if (options.clockIn) {
      const output = await new ClockInUseCase({ timesheetRepo }).execute({
        project: target,
        description,
        start: options.startTime,
      });
      if (json) console.log(JSON.stringify(output));
    } else if (options.clockOut) {
      const output = await new ClockOutUseCase({ timesheetRepo }).execute({
        project: target,
        description,
        start: options.startTime,
        end: options.endTime,
      });
      if (json) console.log(JSON.stringify(output));
    } else if (options.deleteClockIn) {
      const output = await new DeleteLastUseCase(timesheetRepo).execute({
        project: target,
      });
      if (json) console.log(JSON.stringify(output));
    } else {
      const output = await new StatusUseCase(timesheetRepo).execute({
        project: target,
        start: options.startTime,
        end: options.endTime,
      });
      console.log(json ? JSON.stringify(output) : formatStatus(output));
    }
  } catch (e) {
    handleError(e, json);
  }
}

// ============================================================================
// Main CLI
// ============================================================================

function createCli(): Command {
  return new Command()
    .name("tl")
    .version(VERSION)
    .description(
      "Timelog - Log working hours per project\n\n" +
        "Without a command flag, prints the latest entry of each project.\n" +
        `The timesheet lives in $JSON_TIMESHEET (default: ~/timesheet.json)`,
    )
    .argument("[project]", "project being worked on")
    .argument("[description...]", "description of tasks completed")
    .addOption(
      commandFlag("-i, --clock-in", "mark current time as clock start"),
    )
    .addOption(
      commandFlag("-o, --clock-out", "mark current time as clock end"),
    )
    .addOption(
      commandFlag("-e, --export <file>", "export timesheet data to file"),
    )
    .addOption(
      commandFlag(
        "-d, --delete-clock-in",
        "delete the most recent clock-in / hours",
      ),
    )
    .option("--start-time <time>", "specify a specific starting time")
    .option("--end-time <time>", "specify a specific ending time")
    .option("--json", "Output as JSON")
    .exitOverride()
    .action(run);
}

export async function main(args: string[]): Promise<void> {
  try {
    await createCli().parseAsync(args, { from: "user" });
  } catch (e) {
    // commander has already printed usage errors, help and version
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    throw e;
  }
}

// Run if executed directly
const entryPath = process.argv[1];
if (
  entryPath !== undefined &&
  fse.realpathSync(entryPath) === fileURLToPath(import.meta.url)
) {
  await main(process.argv.slice(2));
}
