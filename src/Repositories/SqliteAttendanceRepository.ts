import { and, desc, eq, isNull } from "drizzle-orm";
import type IAttendanceRepository from "../Interfaces/IAttendanceRepository";
import type { SqliteClient } from "../Client/DrizzleClient";
import {
  attendance,
  createAttendanceIndexes,
  createAttendanceTable,
  createOpenSessionIndex,
} from "../Schema/SqliteSchema";
import type { AttendanceRecord, NewAttendanceRecord } from "../Types/types";

export class SqliteAttendanceRepository implements IAttendanceRepository {
  private readonly dbClient: SqliteClient["dbClient"];
  private readonly connection: SqliteClient["connection"];

  constructor(client: SqliteClient) {
    this.dbClient = client.dbClient;
    this.connection = client.connection;
  }

  async init(): Promise<void> {
    await this.dbClient.run(createAttendanceTable);
    for (const statement of createAttendanceIndexes) {
      await this.dbClient.run(statement);
    }

    try {
      await this.dbClient.run(createOpenSessionIndex);
    } catch (error) {
      console.error("⚠️ Open-session index not created, continuing without it:", error);
    }
  }

  async insert(record: NewAttendanceRecord): Promise<AttendanceRecord> {
    const created = await this.dbClient
      .insert(attendance)
      .values({ ...record, clockOut: null })
      .returning()
      .get();

    if (!created) {
      throw new Error(`Insert for ${record.matricNo} returned no row`);
    }

    return created;
  }

  async findOpenByMatricNo(matricNo: string): Promise<AttendanceRecord | null> {
    const record = await this.dbClient
      .select()
      .from(attendance)
      .where(and(eq(attendance.matricNo, matricNo), isNull(attendance.clockOut)))
      .orderBy(desc(attendance.id))
      .limit(1)
      .get();

    return record ?? null;
  }

  async setClockOut(id: number, clockOut: string): Promise<AttendanceRecord> {
    const updated = await this.dbClient
      .update(attendance)
      .set({ clockOut })
      .where(eq(attendance.id, id))
      .returning()
      .get();

    if (!updated) {
      throw new Error(`Attendance record ${id} does not exist`);
    }

    return updated;
  }

  async listAll(): Promise<AttendanceRecord[]> {
    return this.dbClient.select().from(attendance).orderBy(desc(attendance.id)).all();
  }

  async latestDate(): Promise<string | null> {
    const latest = await this.dbClient
      .select({ date: attendance.date })
      .from(attendance)
      .orderBy(desc(attendance.id))
      .limit(1)
      .get();

    return latest?.date ?? null;
  }

  async clear(): Promise<void> {
    await this.dbClient.delete(attendance).run();
  }

  async close(): Promise<void> {
    this.connection.close();
  }
}

export default SqliteAttendanceRepository;
