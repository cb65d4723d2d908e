// Error types for timelog domain

export type TlErrorCode =
  | "validation_error"
  | "conflict"
  | "not_found"
  | "parse_error"
  | "invalid_timesheet"
  | "io_error";

export class TlError extends Error {
  constructor(
    public readonly code: TlErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TlError";
  }

  toJSON(): { error: string; code: TlErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}
