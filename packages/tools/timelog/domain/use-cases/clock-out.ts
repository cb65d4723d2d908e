// ClockOutUseCase - Close the open work session of a project

import type { ClockOutput } from "../entities/outputs.ts";
import type { TimesheetRepository } from "../ports/timesheet-repository.ts";
import { type Clock, clockOut } from "../entities/timesheet.ts";

export interface ClockOutInput {
  readonly project: string | null;
  readonly description?: readonly string[];
  readonly start?: string;
  readonly end?: string;
}

export interface ClockOutDeps {
  readonly timesheetRepo: TimesheetRepository;
  readonly now?: Clock;
}

export class ClockOutUseCase {
  constructor(private readonly deps: ClockOutDeps) {}

  async execute(input: ClockOutInput): Promise<ClockOutput> {
    const timesheet = await this.deps.timesheetRepo.load();
    const index = timesheet.findIndex((e) => e.project === input.project);
    const updated = clockOut(
      timesheet,
      input.project,
      input.description,
      input.start,
      input.end,
      this.deps.now,
    );
    await this.deps.timesheetRepo.save(updated);
    return { entry: updated[index] };
  }
}
