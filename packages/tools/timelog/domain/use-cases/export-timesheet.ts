// ExportTimesheetUseCase - Write a filtered copy of the timesheet

import type { ExportOutput } from "../entities/outputs.ts";
import type { TimesheetRepository } from "../ports/timesheet-repository.ts";
import { type Clock, filterTimesheet } from "../entities/timesheet.ts";

export interface ExportTimesheetInput {
  readonly path: string;
  readonly project: string | null;
  readonly start?: string;
  readonly end?: string;
}

export class ExportTimesheetUseCase {
  constructor(
    private readonly timesheetRepo: TimesheetRepository,
    private readonly now?: Clock,
  ) {}

  async execute(input: ExportTimesheetInput): Promise<ExportOutput> {
    const timesheet = await this.timesheetRepo.load();
    const data = filterTimesheet(
      timesheet,
      input.project,
      input.start,
      input.end,
      this.now,
    );
    await this.timesheetRepo.exportTo(input.path, data);
    return { path: input.path, count: data.length };
  }
}
