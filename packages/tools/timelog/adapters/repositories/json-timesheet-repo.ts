/**
 * Adapter: JsonTimesheetRepository
 *
 * Implements the TimesheetRepository port using a single JSON file:
 * an array of { project, in, out, description } records, newest first.
 *
 * - A missing file loads as an empty timesheet (with a warning); it is
 *   created on the first save.
 * - Loaded records are validated against EntrySchema.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 *   - zod/mini for record validation
 */

import { z } from "zod/mini";
import type { Entry, Timesheet } from "../../domain/entities/entry.ts";
import { TlError } from "../../domain/entities/errors.ts";
import { isTimestamp } from "../../domain/entities/timestamp.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { TimesheetRepository } from "../../domain/ports/timesheet-repository.ts";

const TimestampSchema = z.string().check(
  z.refine(isTimestamp, "Invalid ISO 8601 timestamp"),
);

const EntrySchema = z.object({
  project: z.string().check(z.minLength(1)),
  in: TimestampSchema,
  out: z.nullable(TimestampSchema),
  description: z.optional(z.nullable(z.string())),
});

const TimesheetSchema = z.array(EntrySchema);

export class JsonTimesheetRepository implements TimesheetRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly timesheetPath: string,
    private readonly warn: (message: string) => void = console.error,
  ) {}

  async load(): Promise<Timesheet> {
    if (!(await this.fs.exists(this.timesheetPath))) {
      this.warn(
        `warning: '${this.timesheetPath}' not found, will create new file on data write`,
      );
      return [];
    }

    const content = await this.fs.readFile(this.timesheetPath);
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new TlError(
        "invalid_timesheet",
        `Invalid timesheet file ${this.timesheetPath}: not valid JSON`,
      );
    }

    const result = TimesheetSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue.path.length > 0
        ? issue.path.map(String).join(".")
        : "(root)";
      throw new TlError(
        "invalid_timesheet",
        `Invalid timesheet file ${this.timesheetPath}: ${where}: ${issue.message}`,
      );
    }

    return result.data.map((record): Entry => ({
      project: record.project,
      in: record.in,
      out: record.out,
      description: record.description ?? null,
    }));
  }

  async save(timesheet: Timesheet): Promise<void> {
    await this.exportTo(this.timesheetPath, timesheet);
  }

  async exportTo(path: string, timesheet: Timesheet): Promise<void> {
    await this.fs.writeFile(path, JSON.stringify(timesheet, null, 2));
  }
}
