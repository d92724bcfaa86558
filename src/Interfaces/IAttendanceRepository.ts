import type { AttendanceRecord, NewAttendanceRecord } from "../Types/types";

/**
 * Persistent row store for attendance records.
 * Implementations own every record; callers never hold on to rows between calls.
 */
export default interface IAttendanceRepository {
  /** Create the table and indexes if they are missing. */
  init(): Promise<void>;

  insert(record: NewAttendanceRecord): Promise<AttendanceRecord>;

  /** Most recently created record for the student whose clock_out is empty, or null. */
  findOpenByMatricNo(matricNo: string): Promise<AttendanceRecord | null>;

  setClockOut(id: number, clockOut: string): Promise<AttendanceRecord>;

  /** Every record, newest first (id descending). */
  listAll(): Promise<AttendanceRecord[]>;

  /** Date of the most recently created record, or null for an empty store. */
  latestDate(): Promise<string | null>;

  clear(): Promise<void>;

  close(): Promise<void>;
}
