import type IAttendanceRepository from "../Interfaces/IAttendanceRepository";
import type IClock from "../Interfaces/IClock";
import { systemClock } from "../Interfaces/IClock";
import { ClearMode, type AttendanceRecord } from "../Types/types";
import { trimmedIdentitySchema } from "../Types/zodSchema";
import {
  AlreadyClockedInError,
  NotClockedInError,
  StoreError,
  ValidationError,
  type AttendanceError,
} from "../Utils/AttendanceErrors";
import { DateUtils } from "../Utils/DateUtils";
import { KeyedLock } from "../Utils/KeyedLock";

export type AttendanceResult =
  | { success: true; record: AttendanceRecord }
  | { success: false; error: AttendanceError };

export interface AttendanceServiceOptions {
  clock?: IClock;
  clearMode?: ClearMode;
}

type Identity = { matricNo: string; name: string };

const failure = (error: AttendanceError): AttendanceResult => ({ success: false, error });

export class AttendanceService {
  private readonly clock: IClock;
  private readonly clearMode: ClearMode;
  private readonly lock = new KeyedLock();

  constructor(
    private readonly repository: IAttendanceRepository,
    options: AttendanceServiceOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.clearMode = options.clearMode ?? ClearMode.NEVER;
  }

  /**
   * Open a new session for the student.
   * Fails when the student already has a record without a clock-out time.
   */
  async clockIn(matricNo: string, name: string): Promise<AttendanceResult> {
    const identity = this.validate(matricNo, name);
    if (!identity.success) {
      return identity;
    }

    const student = identity.data;

    const task = async (): Promise<AttendanceResult> => {
      try {
        const now = this.clock.now();
        const today = DateUtils.formatDate(now);

        await this.clearBeforeClockIn(today);

        const openRecord = await this.repository.findOpenByMatricNo(student.matricNo);
        if (openRecord) {
          return failure(new AlreadyClockedInError(student.matricNo));
        }

        const record = await this.repository.insert({
          matricNo: student.matricNo,
          name: student.name,
          date: today,
          clockIn: DateUtils.formatTime(now),
        });

        return { success: true, record };
      } catch (error) {
        console.error(`❌ Clock-in for ${student.matricNo} failed:`, error);
        return failure(new StoreError(error));
      }
    };

    // A clear removes every student's rows, so it must not overlap any other operation
    return this.clearMode === ClearMode.NEVER
      ? this.lock.run(student.matricNo, task)
      : this.lock.runExclusive(task);
  }

  /**
   * Close the student's open session.
   * If more than one record is open, the most recently created one is closed.
   */
  async clockOut(matricNo: string, name: string): Promise<AttendanceResult> {
    const identity = this.validate(matricNo, name);
    if (!identity.success) {
      return identity;
    }

    const student = identity.data;

    return this.lock.run<AttendanceResult>(student.matricNo, async () => {
      try {
        const openRecord = await this.repository.findOpenByMatricNo(student.matricNo);
        if (!openRecord) {
          return failure(new NotClockedInError(student.matricNo));
        }

        const record = await this.repository.setClockOut(
          openRecord.id,
          DateUtils.formatTime(this.clock.now()),
        );

        return { success: true, record };
      } catch (error) {
        console.error(`❌ Clock-out for ${student.matricNo} failed:`, error);
        return failure(new StoreError(error));
      }
    });
  }

  async listRecords(): Promise<AttendanceRecord[]> {
    try {
      return await this.repository.listAll();
    } catch (error) {
      console.error("❌ Listing attendance records failed:", error);
      throw new StoreError(error);
    }
  }

  /**
   * Wipe the table for a visitor whose browser session is new.
   * Only applies in "always" mode.
   */
  async clearForNewVisitor(): Promise<boolean> {
    if (this.clearMode !== ClearMode.ALWAYS) {
      return false;
    }

    return this.lock.runExclusive(async () => {
      try {
        await this.repository.clear();
        console.log("🧹 Attendance records cleared for a new visitor");
        return true;
      } catch (error) {
        console.error("❌ Clearing attendance records failed:", error);
        throw new StoreError(error);
      }
    });
  }

  private async clearBeforeClockIn(today: string): Promise<void> {
    if (this.clearMode === ClearMode.ALWAYS) {
      await this.repository.clear();
      console.log("🧹 Attendance records cleared before clock-in");
      return;
    }

    if (this.clearMode === ClearMode.PER_DAY) {
      const lastDate = await this.repository.latestDate();
      if (lastDate !== null && lastDate !== today) {
        await this.repository.clear();
        console.log(`🧹 Attendance records from ${lastDate} cleared for ${today}`);
      }
    }
  }

  private validate(
    matricNo: string,
    name: string,
  ): { success: true; data: Identity } | { success: false; error: ValidationError } {
    const parsed = trimmedIdentitySchema.safeParse({ matricNo, name });
    if (parsed.success) {
      return { success: true, data: parsed.data };
    }

    const fields = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    return { success: false, error: new ValidationError(fields) };
  }
}

export default AttendanceService;
