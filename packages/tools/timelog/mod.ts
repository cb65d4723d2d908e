// Main module exports for timelog

// ============================================================================
// Domain entities
// ============================================================================

export type { Entry, Timesheet } from "./domain/entities/entry.ts";
export { isClockedIn } from "./domain/entities/entry.ts";
export type { TlErrorCode } from "./domain/entities/errors.ts";
export { TlError } from "./domain/entities/errors.ts";
export type {
  ClockOutput,
  DeleteOutput,
  ExportOutput,
  StatusOutput,
} from "./domain/entities/outputs.ts";
export {
  formatTimestamp,
  isTimestamp,
  parseTimestamp,
  toLocalISOString,
} from "./domain/entities/timestamp.ts";
export type { Clock } from "./domain/entities/timesheet.ts";
export {
  clockIn,
  clockOut,
  filterTimesheet,
  removeLast,
  selectStatus,
} from "./domain/entities/timesheet.ts";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { FileSystem } from "./domain/ports/filesystem.ts";
export type { TimesheetRepository } from "./domain/ports/timesheet-repository.ts";

// ============================================================================
// Use cases
// ============================================================================

export { ClockInUseCase } from "./domain/use-cases/clock-in.ts";
export { ClockOutUseCase } from "./domain/use-cases/clock-out.ts";
export { DeleteLastUseCase } from "./domain/use-cases/delete-last.ts";
export { ExportTimesheetUseCase } from "./domain/use-cases/export-timesheet.ts";
export { StatusUseCase } from "./domain/use-cases/status.ts";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
export { JsonTimesheetRepository } from "./adapters/repositories/json-timesheet-repo.ts";
export { formatEntry, formatStatus } from "./adapters/cli/formatter.ts";

// ============================================================================
// Configuration & CLI
// ============================================================================

export type { TimelogConfig } from "./config.ts";
export { resolveConfig } from "./config.ts";
export { main } from "./cli.ts";
