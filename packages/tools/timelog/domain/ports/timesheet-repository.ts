// Timesheet repository port - persistence interface for the entry list

import type { Timesheet } from "../entities/entry.ts";

/**
 * Repository for the timesheet, read and written as a whole.
 */
export interface TimesheetRepository {
  /** Load every entry. An absent store yields an empty timesheet. */
  load(): Promise<Timesheet>;

  /** Replace the stored timesheet. */
  save(timesheet: Timesheet): Promise<void>;

  /** Write entries to another file in the storage format. */
  exportTo(path: string, timesheet: Timesheet): Promise<void>;
}
