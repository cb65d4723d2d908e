// Timesheet engine - pure operations over the entry list

import { type Entry, isClockedIn, type Timesheet } from "./entry.ts";
import { TlError } from "./errors.ts";
import {
  formatTimestamp,
  parseTimestamp,
  toLocalISOString,
} from "./timestamp.ts";

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function requireProject(project: string | null | undefined): string {
  if (!project) {
    throw new TlError("validation_error", "No project name was given");
  }
  return project;
}

// Stored timestamps carry whole seconds
function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

function timeOf(value: string): number {
  return parseTimestamp(value).getTime();
}

function byStartTime(a: Entry, b: Entry): number {
  return timeOf(a.in) - timeOf(b.in);
}

/**
 * Open a work session for `project`.
 *
 * The new entry is prepended. Fails if the project's most recent entry is
 * still open.
 */
export function clockIn(
  timesheet: Timesheet,
  project: string | null | undefined,
  description: readonly string[] = [],
  start?: string,
  now: Clock = systemClock,
): Timesheet {
  const name = requireProject(project);

  const latest = timesheet.find((e) => e.project === name);
  if (latest && isClockedIn(latest)) {
    throw new TlError(
      "conflict",
      `Already clocked in for project '${name}' at '${
        formatTimestamp(parseTimestamp(latest.in))
      }'`,
    );
  }

  const entry: Entry = {
    project: name,
    in: toLocalISOString(start ? parseTimestamp(start, now()) : now()),
    out: null,
    description: description.length > 0 ? description.join(" ") : null,
  };
  return [entry, ...timesheet];
}

/**
 * Close the open work session for `project`.
 *
 * `start` overrides the recorded clock-in time, `end` defaults to now.
 * Both are kept to the second, so `out` is at least a second after `in`.
 * A description is required, either given here or recorded at clock-in.
 */
export function clockOut(
  timesheet: Timesheet,
  project: string | null | undefined,
  description: readonly string[] = [],
  start?: string,
  end?: string,
  now: Clock = systemClock,
): Timesheet {
  const name = requireProject(project);

  const index = timesheet.findIndex((e) => e.project === name);
  if (index === -1) {
    throw new TlError(
      "not_found",
      `Did not find a clock-in time for project '${name}'`,
    );
  }
  const entry = timesheet[index];
  if (!isClockedIn(entry)) {
    throw new TlError(
      "conflict",
      `No clock-in specified for project '${name}'`,
    );
  }

  const current = now();
  const st = truncateToSeconds(
    start ? parseTimestamp(start, current) : parseTimestamp(entry.in),
  );
  const et = truncateToSeconds(end ? parseTimestamp(end, current) : current);
  if (et.getTime() <= st.getTime()) {
    throw new TlError(
      "validation_error",
      "End time must be later than start time",
    );
  }

  const desc = description.join(" ").trim() || null;
  if (desc === null && entry.description === null) {
    throw new TlError(
      "validation_error",
      "Please specify a description of work completed",
    );
  }

  const closed: Entry = {
    ...entry,
    in: toLocalISOString(st),
    out: toLocalISOString(et),
    description: desc ?? entry.description,
  };
  return timesheet.map((e, i) => (i === index ? closed : e));
}

/**
 * Select entries by project and time window.
 *
 * With no filter the timesheet is returned as is. Otherwise the matching
 * entries come back in reverse order (oldest first for a newest-first
 * timesheet). Open entries never match an `end` filter.
 */
export function filterTimesheet(
  timesheet: Timesheet,
  project?: string | null,
  start?: string,
  end?: string,
  now: Clock = systemClock,
): Timesheet {
  if (!project && !start && !end) {
    return timesheet;
  }
  const current = now();
  const startTime = start ? parseTimestamp(start, current).getTime() : null;
  const endTime = end ? parseTimestamp(end, current).getTime() : null;

  const filtered: Entry[] = [];
  for (const e of timesheet) {
    if (project && e.project !== project) continue;
    if (startTime !== null && timeOf(e.in) < startTime) continue;
    if (endTime !== null && (e.out === null || timeOf(e.out) > endTime)) {
      continue;
    }
    filtered.unshift(e);
  }
  return filtered;
}

/**
 * Drop the most recent entry, or the most recent entry of `project`.
 *
 * Without a project the head goes, whatever project it belongs to.
 */
export function removeLast(
  timesheet: Timesheet,
  project?: string | null,
): Timesheet {
  if (project === undefined || project === null) {
    return timesheet.slice(1);
  }
  const index = timesheet.findIndex((e) => e.project === project);
  if (index === -1) {
    return timesheet;
  }
  return [...timesheet.slice(0, index), ...timesheet.slice(index + 1)];
}

/**
 * Entries to report in a status summary, ascending by clock-in time.
 *
 * - With `project`: every entry of that project (time filters unused).
 * - Without: the newest entry of each project that lies within the
 *   `start`/`end` window; open entries always satisfy `end`.
 */
export function selectStatus(
  timesheet: Timesheet,
  project?: string | null,
  start?: string,
  end?: string,
  now: Clock = systemClock,
): Entry[] {
  if (project) {
    const entries = timesheet.filter((e) => e.project === project);
    if (entries.length === 0) {
      throw new TlError(
        "not_found",
        `No data found for project '${project}'`,
      );
    }
    return entries.sort(byStartTime);
  }

  const current = now();
  const startTime = start ? parseTimestamp(start, current).getTime() : null;
  const endTime = end ? parseTimestamp(end, current).getTime() : null;

  const recents = new Map<string, Entry>();
  for (const e of timesheet) {
    if (recents.has(e.project)) continue;
    if (startTime !== null && timeOf(e.in) < startTime) continue;
    if (endTime !== null && e.out !== null && timeOf(e.out) > endTime) {
      continue;
    }
    recents.set(e.project, e);
  }
  if (recents.size === 0) {
    throw new TlError("not_found", "No timesheet data found");
  }
  return [...recents.values()].sort(byStartTime);
}
