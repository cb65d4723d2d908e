import assert from "node:assert/strict";
import { test } from "node:test";
import type { Entry, Timesheet } from "./entry.ts";
import {
  clockIn,
  clockOut,
  filterTimesheet,
  removeLast,
  selectStatus,
} from "./timesheet.ts";
import { toLocalISOString } from "./timestamp.ts";
import { TlError } from "./errors.ts";

function entry(
  project: string,
  start: string,
  end: string | null = null,
  description: string | null = null,
): Entry {
  return { project, in: start, out: end, description };
}

const at = (...parts: [number, number, number, number?, number?]) => () =>
  new Date(parts[0], parts[1], parts[2], parts[3] ?? 0, parts[4] ?? 0);

const END = "2024-01-01T12:00:00";

function isCode(code: TlError["code"]) {
  return (e: unknown) => e instanceof TlError && e.code === code;
}

// --- clockIn ---

test("clockIn - prepends an open entry with joined description", () => {
  const result = clockIn(
    [],
    "proj-a",
    ["start", "work"],
    undefined,
    at(2024, 0, 1, 9),
  );

  assert.equal(result.length, 1);
  assert.deepEqual(result[0], {
    project: "proj-a",
    in: toLocalISOString(new Date(2024, 0, 1, 9)),
    out: null,
    description: "start work",
  });
});

test("clockIn - stores null description when no words given", () => {
  const result = clockIn([], "proj-a", [], undefined, at(2024, 0, 1, 9));
  assert.equal(result[0].description, null);
});

test("clockIn - uses explicit start time", () => {
  const result = clockIn([], "proj-a", [], "2024-03-04T08:30:00");
  assert.equal(result[0].in, toLocalISOString(new Date(2024, 2, 4, 8, 30)));
});

test("clockIn - short start time falls on the clock's day", () => {
  const result = clockIn([], "proj-a", [], "T09:00", at(2024, 0, 1, 12));
  assert.equal(result[0].in, toLocalISOString(new Date(2024, 0, 1, 9)));
});

test("clockIn - rejects a second clock-in for the same project", () => {
  const timesheet = [entry("proj-a", "2024-01-01T09:00:00")];

  assert.throws(() => clockIn(timesheet, "proj-a"), {
    code: "conflict",
    message: "Already clocked in for project 'proj-a' at '2024-01-01 09:00:00'",
  });
});

test("clockIn - allows another project while one is open", () => {
  const timesheet = [entry("proj-a", "2024-01-01T09:00:00")];
  const result = clockIn(
    timesheet,
    "proj-b",
    [],
    undefined,
    at(2024, 0, 1, 10),
  );

  assert.equal(result.length, 2);
  assert.equal(result[0].project, "proj-b");
  assert.equal(result[1], timesheet[0]);
});

test("clockIn - allows a new session once the previous one is closed", () => {
  const timesheet = [
    entry("proj-a", "2024-01-01T09:00:00", "2024-01-01T12:00:00", "done"),
  ];
  const result = clockIn(timesheet, "proj-a", [], undefined, at(2024, 0, 2, 9));

  assert.equal(result.length, 2);
  assert.equal(result[0].out, null);
});

test("clockIn - requires a project name", () => {
  assert.throws(() => clockIn([], ""), isCode("validation_error"));
  assert.throws(() => clockIn([], null), isCode("validation_error"));
});

test("clockIn - fails on a malformed start time", () => {
  assert.throws(
    () => clockIn([], "proj-a", [], "not-a-date"),
    isCode("parse_error"),
  );
});

// --- clockOut ---

test("clockOut - closes the session opened by clockIn", () => {
  const opened = clockIn(
    [],
    "proj-a",
    ["start", "work"],
    undefined,
    at(2024, 0, 1, 9),
  );
  const result = clockOut(
    opened,
    "proj-a",
    ["finished"],
    undefined,
    "2024-01-01T12:00:00",
  );

  assert.deepEqual(result, [{
    project: "proj-a",
    in: toLocalISOString(new Date(2024, 0, 1, 9)),
    out: toLocalISOString(new Date(2024, 0, 1, 12)),
    description: "finished",
  }]);
});

test("clockOut - defaults end time to now", () => {
  const timesheet = [entry("proj-a", "2024-01-01T09:00:00", null, "work")];
  const result = clockOut(
    timesheet,
    "proj-a",
    [],
    undefined,
    undefined,
    at(2024, 0, 1, 17),
  );

  assert.equal(result[0].out, toLocalISOString(new Date(2024, 0, 1, 17)));
});

test("clockOut - keeps the stored description when none given", () => {
  const timesheet = [
    entry("proj-a", "2024-01-01T09:00:00", null, "start work"),
  ];
  const result = clockOut(timesheet, "proj-a", [], undefined, END);

  assert.equal(result[0].description, "start work");
});

test("clockOut - start time overrides the recorded clock-in", () => {
  const timesheet = [entry("proj-a", "2024-01-01T09:00:00", null, "work")];
  const result = clockOut(
    timesheet,
    "proj-a",
    [],
    "2024-01-01T10:00:00",
    "2024-01-01T12:00:00",
  );

  assert.equal(result[0].in, toLocalISOString(new Date(2024, 0, 1, 10)));
});

test("clockOut - only touches the matching entry", () => {
  const other = entry("proj-b", "2024-01-01T08:00:00", null, "other");
  const timesheet = [other, entry("proj-a", "2024-01-01T09:00:00", null, "x")];
  const result = clockOut(timesheet, "proj-a", [], undefined, END);

  assert.equal(result[0], other);
  assert.equal(timesheet[1].out, null);
  assert.notEqual(result[1].out, null);
});

test("clockOut - fails when the project was never clocked in", () => {
  assert.throws(() => clockOut([], "proj-a", ["x"]), {
    code: "not_found",
    message: "Did not find a clock-in time for project 'proj-a'",
  });
});

test("clockOut - fails when the latest entry is already closed", () => {
  const timesheet = [
    entry("proj-a", "2024-01-01T09:00:00", "2024-01-01T12:00:00", "done"),
  ];
  assert.throws(() => clockOut(timesheet, "proj-a", ["more"]), {
    code: "conflict",
    message: "No clock-in specified for project 'proj-a'",
  });
});

test("clockOut - rejects an end time not after the start time", () => {
  const timesheet = [entry("proj-a", "2024-01-01T09:00:00", null, "work")];

  assert.throws(
    () => clockOut(timesheet, "proj-a", [], undefined, "2024-01-01T09:00:00"),
    isCode("validation_error"),
  );
  assert.throws(
    () => clockOut(timesheet, "proj-a", [], undefined, "2024-01-01T08:00:00"),
    isCode("validation_error"),
  );
});

test("clockOut - rejects a clock-out within the clock-in second", () => {
  const opened = clockIn(
    [],
    "proj-a",
    ["work"],
    undefined,
    () => new Date(2024, 0, 1, 9, 0, 0, 100),
  );

  assert.throws(
    () =>
      clockOut(
        opened,
        "proj-a",
        ["done"],
        undefined,
        undefined,
        () => new Date(2024, 0, 1, 9, 0, 0, 900),
      ),
    {
      code: "validation_error",
      message: "End time must be later than start time",
    },
  );
});

test("clockOut - stores times to the second", () => {
  const opened = clockIn(
    [],
    "proj-a",
    ["work"],
    undefined,
    () => new Date(2024, 0, 1, 9, 0, 0, 400),
  );
  const result = clockOut(
    opened,
    "proj-a",
    ["done"],
    undefined,
    undefined,
    () => new Date(2024, 0, 1, 9, 0, 1, 200),
  );

  assert.equal(result[0].in, toLocalISOString(new Date(2024, 0, 1, 9)));
  assert.equal(
    result[0].out,
    toLocalISOString(new Date(2024, 0, 1, 9, 0, 1)),
  );
});

test("clockOut - short end time falls on the clock's day", () => {
  const timesheet = [entry("proj-a", "2024-01-01T09:00:00", null, "work")];
  const result = clockOut(
    timesheet,
    "proj-a",
    [],
    undefined,
    "T17:30",
    at(2024, 0, 1, 18),
  );

  assert.equal(result[0].out, toLocalISOString(new Date(2024, 0, 1, 17, 30)));
});

test("clockOut - requires a description from the call or the entry", () => {
  const timesheet = [entry("proj-a", "2024-01-01T09:00:00")];

  assert.throws(
    () => clockOut(timesheet, "proj-a", [], undefined, END),
    {
      code: "validation_error",
      message: "Please specify a description of work completed",
    },
  );
  assert.throws(
    () => clockOut(timesheet, "proj-a", ["  "], undefined, END),
    isCode("validation_error"),
  );
});

test("clockOut - requires a project name", () => {
  assert.throws(() => clockOut([], undefined), isCode("validation_error"));
});

// --- filterTimesheet ---

const sample: Timesheet = [
  entry("proj-a", "2024-01-03T09:00:00"),
  entry("proj-b", "2024-01-02T09:00:00", "2024-01-02T17:00:00", "b"),
  entry("proj-a", "2024-01-01T09:00:00", "2024-01-01T17:00:00", "a"),
];

test("filterTimesheet - returns input unchanged without filters", () => {
  assert.equal(filterTimesheet(sample), sample);
});

test("filterTimesheet - by project, in reverse order", () => {
  assert.deepEqual(filterTimesheet(sample, "proj-a"), [sample[2], sample[0]]);
});

test("filterTimesheet - by start time", () => {
  assert.deepEqual(
    filterTimesheet(sample, null, "2024-01-02T00:00:00"),
    [sample[1], sample[0]],
  );
});

test("filterTimesheet - short start time falls on the clock's day", () => {
  assert.deepEqual(
    filterTimesheet(sample, null, "T00:00", undefined, at(2024, 0, 2, 12)),
    [sample[1], sample[0]],
  );
});

test("filterTimesheet - end filter excludes open entries", () => {
  assert.deepEqual(
    filterTimesheet(sample, null, undefined, "2024-01-05T00:00:00"),
    [sample[2], sample[1]],
  );
});

test("filterTimesheet - combines project and window", () => {
  assert.deepEqual(
    filterTimesheet(
      sample,
      "proj-a",
      "2024-01-01T00:00:00",
      "2024-01-01T18:00:00",
    ),
    [sample[2]],
  );
});

// --- removeLast ---

test("removeLast - single entry without project leaves nothing", () => {
  assert.deepEqual(removeLast([entry("proj-a", "2024-01-01T09:00:00")]), []);
});

test("removeLast - drops the head whatever its project", () => {
  assert.deepEqual(removeLast(sample), [sample[1], sample[2]]);
});

test("removeLast - with project drops only its newest entry", () => {
  assert.deepEqual(removeLast(sample, "proj-a"), [sample[1], sample[2]]);
  assert.deepEqual(removeLast(sample, "proj-b"), [sample[0], sample[2]]);
});

test("removeLast - unknown project leaves timesheet unchanged", () => {
  assert.equal(removeLast(sample, "proj-z"), sample);
});

// --- selectStatus ---

test("selectStatus - project entries ascending by clock-in", () => {
  const open = entry("proj-a", "2024-01-03T09:00:00");
  const closed = entry("proj-a", "2024-01-01T09:00:00", "2024-01-01T17:00:00");

  assert.deepEqual(selectStatus([open, closed], "proj-a"), [closed, open]);
});

test("selectStatus - unknown project is not found", () => {
  assert.throws(() => selectStatus(sample, "proj-z"), {
    code: "not_found",
    message: "No data found for project 'proj-z'",
  });
});

test("selectStatus - empty timesheet is not found", () => {
  assert.throws(() => selectStatus([]), {
    code: "not_found",
    message: "No timesheet data found",
  });
});

test("selectStatus - newest entry per project", () => {
  assert.deepEqual(selectStatus(sample), [sample[1], sample[0]]);
});

test("selectStatus - end filter keeps open entries", () => {
  assert.deepEqual(
    selectStatus(sample, null, undefined, "2024-01-02T00:00:00"),
    [sample[0]],
  );
});

test("selectStatus - short end time falls on the clock's day", () => {
  assert.deepEqual(
    selectStatus(sample, null, undefined, "T00:00", at(2024, 0, 2, 12)),
    [sample[0]],
  );
});

test("selectStatus - falls back to an older entry inside the window", () => {
  const newer = entry("proj-c", "2024-01-05T09:00:00", "2024-01-05T17:00:00");
  const older = entry("proj-c", "2024-01-01T09:00:00", "2024-01-01T17:00:00");

  assert.deepEqual(
    selectStatus([newer, older], null, undefined, "2024-01-02T00:00:00"),
    [older],
  );
});

test("selectStatus - window excluding everything is not found", () => {
  assert.throws(
    () => selectStatus(sample, null, "2025-01-01T00:00:00"),
    isCode("not_found"),
  );
});
