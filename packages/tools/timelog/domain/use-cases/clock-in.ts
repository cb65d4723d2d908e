// ClockInUseCase - Open a work session for a project

import type { ClockOutput } from "../entities/outputs.ts";
import type { TimesheetRepository } from "../ports/timesheet-repository.ts";
import { type Clock, clockIn } from "../entities/timesheet.ts";

export interface ClockInInput {
  readonly project: string | null;
  readonly description?: readonly string[];
  readonly start?: string;
}

export interface ClockInDeps {
  readonly timesheetRepo: TimesheetRepository;
  readonly now?: Clock;
}

export class ClockInUseCase {
  constructor(private readonly deps: ClockInDeps) {}

  async execute(input: ClockInInput): Promise<ClockOutput> {
    const timesheet = await this.deps.timesheetRepo.load();
    const updated = clockIn(
      timesheet,
      input.project,
      input.description,
      input.start,
      this.deps.now,
    );
    await this.deps.timesheetRepo.save(updated);
    return { entry: updated[0] };
  }
}
