import { and, desc, eq, isNull } from "drizzle-orm";
import type IAttendanceRepository from "../Interfaces/IAttendanceRepository";
import type { PostgresClient } from "../Client/DrizzleClient";
import {
  attendance,
  createAttendanceIndexes,
  createAttendanceTable,
  createOpenSessionIndex,
} from "../Schema/DatabaseSchema";
import type { AttendanceRecord, NewAttendanceRecord } from "../Types/types";

export class PostgresAttendanceRepository implements IAttendanceRepository {
  private readonly dbClient: PostgresClient["dbClient"];
  private readonly connection: PostgresClient["connection"];

  constructor(client: PostgresClient) {
    this.dbClient = client.dbClient;
    this.connection = client.connection;
  }

  async init(): Promise<void> {
    await this.dbClient.execute(createAttendanceTable);
    for (const statement of createAttendanceIndexes) {
      await this.dbClient.execute(statement);
    }

    try {
      await this.dbClient.execute(createOpenSessionIndex);
    } catch (error) {
      console.error("⚠️ Open-session index not created, continuing without it:", error);
    }
  }

  async insert(record: NewAttendanceRecord): Promise<AttendanceRecord> {
    const [created] = await this.dbClient
      .insert(attendance)
      .values({ ...record, clockOut: null })
      .returning();

    if (!created) {
      throw new Error(`Insert for ${record.matricNo} returned no row`);
    }

    return created;
  }

  async findOpenByMatricNo(matricNo: string): Promise<AttendanceRecord | null> {
    const record = await this.dbClient.query.attendance.findFirst({
      where: and(eq(attendance.matricNo, matricNo), isNull(attendance.clockOut)),
      orderBy: [desc(attendance.id)],
    });

    return record ?? null;
  }

  async setClockOut(id: number, clockOut: string): Promise<AttendanceRecord> {
    const [updated] = await this.dbClient
      .update(attendance)
      .set({ clockOut })
      .where(eq(attendance.id, id))
      .returning();

    if (!updated) {
      throw new Error(`Attendance record ${id} does not exist`);
    }

    return updated;
  }

  async listAll(): Promise<AttendanceRecord[]> {
    return this.dbClient.query.attendance.findMany({
      orderBy: [desc(attendance.id)],
    });
  }

  async latestDate(): Promise<string | null> {
    const latest = await this.dbClient.query.attendance.findFirst({
      columns: { date: true },
      orderBy: [desc(attendance.id)],
    });

    return latest?.date ?? null;
  }

  async clear(): Promise<void> {
    await this.dbClient.delete(attendance);
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}

export default PostgresAttendanceRepository;
