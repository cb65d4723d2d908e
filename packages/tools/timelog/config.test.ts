import assert from "node:assert/strict";
import { homedir } from "node:os";
import { join } from "node:path";
import { test } from "node:test";
import { resolveConfig } from "./config.ts";

test("resolveConfig - JSON_TIMESHEET wins", () => {
  assert.deepEqual(
    resolveConfig({ JSON_TIMESHEET: "/data/hours.json", HOME: "/home/me" }),
    { timesheetPath: "/data/hours.json" },
  );
});

test("resolveConfig - defaults to timesheet.json in HOME", () => {
  assert.deepEqual(resolveConfig({ HOME: "/home/me" }), {
    timesheetPath: join("/home/me", "timesheet.json"),
  });
});

test("resolveConfig - empty JSON_TIMESHEET is ignored", () => {
  assert.deepEqual(resolveConfig({ JSON_TIMESHEET: "", HOME: "/home/me" }), {
    timesheetPath: join("/home/me", "timesheet.json"),
  });
});

test("resolveConfig - falls back to the OS home directory", () => {
  assert.deepEqual(resolveConfig({}), {
    timesheetPath: join(homedir(), "timesheet.json"),
  });
});
