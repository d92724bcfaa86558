import type { AttendanceResult } from "../Services/AttendanceService";
import { AttendanceAction, type Notice } from "../Types/types";
import { ValidationError } from "./AttendanceErrors";
import { DateUtils } from "./DateUtils";

export const invalidActionNotice: Notice = { kind: "error", text: "Error: Invalid action" };

/**
 * Message shown on the attendance page after a form submission.
 */
export function describeOutcome(action: AttendanceAction, result: AttendanceResult): Notice {
  if (!result.success) {
    if (result.error instanceof ValidationError) {
      return { kind: "error", text: result.error.message };
    }
    return { kind: "error", text: `Error: ${result.error.message}` };
  }

  const { record } = result;
  if (action === AttendanceAction.CLOCK_IN) {
    return {
      kind: "success",
      text: `Success: ${record.name} clocked in at ${DateUtils.formatTime12hr(record.clockIn)}`,
    };
  }

  return {
    kind: "success",
    text: `Success: ${record.name} clocked out at ${DateUtils.formatTime12hr(record.clockOut)}`,
  };
}
