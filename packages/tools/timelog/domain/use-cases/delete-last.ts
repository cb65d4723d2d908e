// DeleteLastUseCase - Remove the most recent entry

import type { DeleteOutput } from "../entities/outputs.ts";
import type { TimesheetRepository } from "../ports/timesheet-repository.ts";
import { removeLast } from "../entities/timesheet.ts";

export interface DeleteLastInput {
  readonly project: string | null;
}

export class DeleteLastUseCase {
  constructor(private readonly timesheetRepo: TimesheetRepository) {}

  async execute(input: DeleteLastInput): Promise<DeleteOutput> {
    const timesheet = await this.timesheetRepo.load();
    const updated = removeLast(timesheet, input.project);
    await this.timesheetRepo.save(updated);

    // removeLast drops at most one entry and keeps the others in order
    const removed = timesheet.find((e, i) => updated[i] !== e) ?? null;
    return { removed };
  }
}
