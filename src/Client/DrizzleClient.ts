import { createClient } from "@libsql/client";
import postgres from "postgres";
import { drizzle as drizzleSqlite } from "drizzle-orm/libsql";
import { drizzle as drizzlePostgres } from "drizzle-orm/postgres-js";
import { attendance as sqliteAttendance } from "../Schema/SqliteSchema";
import { attendance as postgresAttendance } from "../Schema/DatabaseSchema";

/**
 * Local SQLite file, or ":memory:" for a throwaway database.
 */
export function createSqliteClient(filename: string) {
  const connection = createClient({ url: filename === ":memory:" ? filename : `file:${filename}` });
  const dbClient = drizzleSqlite(connection, { schema: { attendance: sqliteAttendance } });
  return { dbClient, connection };
}

export function createPostgresClient(url: string) {
  const connection = postgres(url, { max: 10 });
  const dbClient = drizzlePostgres(connection, { schema: { attendance: postgresAttendance } });
  return { dbClient, connection };
}

export type SqliteClient = ReturnType<typeof createSqliteClient>;
export type PostgresClient = ReturnType<typeof createPostgresClient>;
