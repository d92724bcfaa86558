import { AttendanceAction } from "../src/Types/types";
import {
  AlreadyClockedInError,
  NotClockedInError,
  StoreError,
  ValidationError,
  type AttendanceError,
} from "../src/Utils/AttendanceErrors";
import { describeOutcome } from "../src/Utils/Notices";

const record = {
  id: 7,
  matricNo: "A12345",
  name: "Jane",
  date: "2026-10-18",
  clockIn: "08:15:00",
  clockOut: "17:45:30",
};

describe("describeOutcome", () => {
  it("describes successful clock-ins and clock-outs with 12-hour times", () => {
    expect(describeOutcome(AttendanceAction.CLOCK_IN, { success: true, record })).toEqual({
      kind: "success",
      text: "Success: Jane clocked in at 08:15 AM",
    });
    expect(describeOutcome(AttendanceAction.CLOCK_OUT, { success: true, record })).toEqual({
      kind: "success",
      text: "Success: Jane clocked out at 05:45 PM",
    });
  });

  it.each<[AttendanceError, string]>([
    [new AlreadyClockedInError("A12345"), "Error: A12345 is already clocked in. Please clock out first."],
    [new NotClockedInError("A12345"), "Error: A12345 has not clocked in yet."],
    [new StoreError(new Error("timeout")), "Error: Could not reach the attendance store."],
    [new ValidationError(["name"]), "Please enter both Matric No and Name"],
  ])("describes %s", (error, text) => {
    expect(describeOutcome(AttendanceAction.CLOCK_IN, { success: false, error })).toEqual({
      kind: "error",
      text,
    });
  });
});
