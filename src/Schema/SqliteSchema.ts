import { sqliteTable, integer, text, uniqueIndex, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ========== Attendance (SQLite) ==========
export const attendance = sqliteTable(
  "attendance",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    matricNo: text("matric_no").notNull(),
    name: text("name").notNull(),
    date: text("date").notNull(),
    clockIn: text("clock_in").notNull(),
    clockOut: text("clock_out"),
  },
  (table) => [
    uniqueIndex("attendance_open_session_idx")
      .on(table.matricNo)
      .where(sql`${table.clockOut} IS NULL`),
    index("attendance_matric_no_idx").on(table.matricNo),
  ],
);

export const createAttendanceTable = sql`
  CREATE TABLE IF NOT EXISTS attendance (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    matric_no TEXT NOT NULL,
    name TEXT NOT NULL,
    date TEXT NOT NULL,
    clock_in TEXT NOT NULL,
    clock_out TEXT
  )
`;

export const createAttendanceIndexes = [
  sql`CREATE INDEX IF NOT EXISTS attendance_matric_no_idx ON attendance (matric_no)`,
];

// Fails on tables that already hold two open rows for one student
export const createOpenSessionIndex = sql`
  CREATE UNIQUE INDEX IF NOT EXISTS attendance_open_session_idx ON attendance (matric_no) WHERE clock_out IS NULL
`;
