import * as z from "zod";
import { AttendanceAction, ClearMode } from "./types";

/* attendance schemas */

// Blank values pass here; AttendanceService rejects them
export const attendanceFormSchema = z.object({
  action: z.string().default(""),
  matric_no: z.string().default(""),
  name: z.string().default(""),
});

export const attendanceActionSchema = z.enum(AttendanceAction, {
  message: "Invalid action",
});

// JSON API
export const attendanceSubmissionSchema = z.object({
  matricNo: z.string({ message: "matricNo must be a string" }),
  name: z.string({ message: "name must be a string" }),
});

export const trimmedIdentitySchema = z.object({
  matricNo: z.string().trim().min(1, "Matric No is required"),
  name: z.string().trim().min(1, "Name is required"),
});

/* environment */

// A blank value in .env means "not set"
const optionalSetting = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: optionalSetting,
  SQLITE_PATH: optionalSetting.transform((value) => value ?? "attendance.db"),
  SESSION_SECRET: z
    .string()
    .min(32, "SESSION_SECRET must be at least 32 characters")
    .default("development-session-secret-change-me"),
  REDIS_URL: optionalSetting,
  // Anything other than a known mode means no clearing
  CLEAR_MODE: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(ClearMode))
    .catch(ClearMode.NEVER),
});

export type AppConfig = z.infer<typeof envSchema>;
