// Entry entity - one recorded work session

/**
 * Immutable timesheet entry.
 * `out` is null while the project is clocked in.
 */
export type Entry = {
  readonly project: string;
  readonly in: string; // ISO 8601
  readonly out: string | null; // ISO 8601
  readonly description: string | null;
};

/**
 * Ordered list of entries, newest first.
 */
export type Timesheet = readonly Entry[];

export function isClockedIn(entry: Entry): boolean {
  return entry.out === null;
}
