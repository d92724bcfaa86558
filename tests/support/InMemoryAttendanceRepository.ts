import type IAttendanceRepository from "../../src/Interfaces/IAttendanceRepository";
import type { AttendanceRecord, NewAttendanceRecord } from "../../src/Types/types";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Array-backed store. Every call yields to the event loop once so that
 * interleaved service calls behave like they would against a real driver.
 */
export class InMemoryAttendanceRepository implements IAttendanceRepository {
  private records: AttendanceRecord[] = [];
  private nextId = 1;

  /** When set, every call rejects with this error. */
  failure: Error | null = null;

  async init(): Promise<void> {
    await this.enter();
  }

  async insert(record: NewAttendanceRecord): Promise<AttendanceRecord> {
    await this.enter();
    const created: AttendanceRecord = { ...record, id: this.nextId++, clockOut: null };
    this.records.push(created);
    return { ...created };
  }

  async findOpenByMatricNo(matricNo: string): Promise<AttendanceRecord | null> {
    await this.enter();
    const open = this.records
      .filter((record) => record.matricNo === matricNo && record.clockOut === null)
      .sort((a, b) => b.id - a.id);
    return open.length > 0 ? { ...open[0] } : null;
  }

  async setClockOut(id: number, clockOut: string): Promise<AttendanceRecord> {
    await this.enter();
    const record = this.records.find((candidate) => candidate.id === id);
    if (!record) {
      throw new Error(`Attendance record ${id} does not exist`);
    }
    record.clockOut = clockOut;
    return { ...record };
  }

  async listAll(): Promise<AttendanceRecord[]> {
    await this.enter();
    return [...this.records].sort((a, b) => b.id - a.id).map((record) => ({ ...record }));
  }

  async latestDate(): Promise<string | null> {
    const [latest] = await this.listAll();
    return latest ? latest.date : null;
  }

  async clear(): Promise<void> {
    await this.enter();
    this.records = [];
  }

  async close(): Promise<void> {}

  /** Insert a row as-is, bypassing the service rules. */
  seed(record: Omit<AttendanceRecord, "id">): AttendanceRecord {
    const created = { ...record, id: this.nextId++ };
    this.records.push(created);
    return { ...created };
  }

  private async enter(): Promise<void> {
    await tick();
    if (this.failure) {
      throw this.failure;
    }
  }
}

export default InMemoryAttendanceRepository;
