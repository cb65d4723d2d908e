// Command output types - immutable result types for all timelog commands

import type { Entry } from "./entry.ts";

export type ClockOutput = {
  readonly entry: Entry;
};

export type DeleteOutput = {
  readonly removed: Entry | null;
};

export type ExportOutput = {
  readonly path: string;
  readonly count: number;
};

export type StatusOutput = {
  readonly entries: readonly Entry[];
};
