// StatusUseCase - Most recent work per project

import type { StatusOutput } from "../entities/outputs.ts";
import type { TimesheetRepository } from "../ports/timesheet-repository.ts";
import { type Clock, selectStatus } from "../entities/timesheet.ts";

export interface StatusInput {
  readonly project: string | null;
  readonly start?: string;
  readonly end?: string;
}

export class StatusUseCase {
  constructor(
    private readonly timesheetRepo: TimesheetRepository,
    private readonly now?: Clock,
  ) {}

  async execute(input: StatusInput): Promise<StatusOutput> {
    const timesheet = await this.timesheetRepo.load();
    return {
      entries: selectStatus(
        timesheet,
        input.project,
        input.start,
        input.end,
        this.now,
      ),
    };
  }
}
