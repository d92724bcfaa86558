import type IAttendanceRepository from "../Interfaces/IAttendanceRepository";
import type { AppConfig } from "../config";
import { createPostgresClient, createSqliteClient } from "../Client/DrizzleClient";
import { PostgresAttendanceRepository } from "./PostgresAttendanceRepository";
import { SqliteAttendanceRepository } from "./SqliteAttendanceRepository";

export { PostgresAttendanceRepository, SqliteAttendanceRepository };

/**
 * PostgreSQL when DATABASE_URL is set, otherwise the local SQLite file.
 */
export function createAttendanceRepository(
  config: Pick<AppConfig, "DATABASE_URL" | "SQLITE_PATH">,
): IAttendanceRepository {
  if (config.DATABASE_URL) {
    console.log("🐘 Using PostgreSQL attendance store");
    return new PostgresAttendanceRepository(createPostgresClient(config.DATABASE_URL));
  }

  console.log(`📁 Using SQLite attendance store at ${config.SQLITE_PATH}`);
  return new SqliteAttendanceRepository(createSqliteClient(config.SQLITE_PATH));
}
