export type AttendanceErrorCode =
  | "VALIDATION_ERROR"
  | "ALREADY_CLOCKED_IN"
  | "NOT_CLOCKED_IN"
  | "STORE_ERROR";

export abstract class AttendanceError extends Error {
  abstract readonly code: AttendanceErrorCode;

  toJSON(): { code: AttendanceErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class ValidationError extends AttendanceError {
  readonly code = "VALIDATION_ERROR";
  readonly name = "ValidationError";

  constructor(
    readonly fields: string[],
    message = "Please enter both Matric No and Name",
  ) {
    super(message);
  }
}

export class AlreadyClockedInError extends AttendanceError {
  readonly code = "ALREADY_CLOCKED_IN";
  readonly name = "AlreadyClockedInError";

  constructor(readonly matricNo: string) {
    super(`${matricNo} is already clocked in. Please clock out first.`);
  }
}

export class NotClockedInError extends AttendanceError {
  readonly code = "NOT_CLOCKED_IN";
  readonly name = "NotClockedInError";

  constructor(readonly matricNo: string) {
    super(`${matricNo} has not clocked in yet.`);
  }
}

export class StoreError extends AttendanceError {
  readonly code = "STORE_ERROR";
  readonly name = "StoreError";

  constructor(cause: unknown, message = "Could not reach the attendance store.") {
    super(message, { cause });
  }
}
