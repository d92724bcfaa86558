import { pgTable, serial, text, uniqueIndex, index } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

// ========== Attendance (PostgreSQL) ==========
export const attendance = pgTable(
  "attendance",
  {
    id: serial("id").primaryKey(),
    matricNo: text("matric_no").notNull(),
    name: text("name").notNull(),
    // YYYY-MM-DD
    date: text("date").notNull(),
    // HH:mm:ss
    clockIn: text("clock_in").notNull(),
    // null while the student is still clocked in
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
    id SERIAL PRIMARY KEY,
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
