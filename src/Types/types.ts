import type { Session } from "hono-sessions";

export enum ClearMode {
  NEVER = "never",
  PER_DAY = "per_day",
  ALWAYS = "always",
}

export enum AttendanceAction {
  CLOCK_IN = "clock_in",
  CLOCK_OUT = "clock_out",
}

export type AttendanceRecord = {
  id: number;
  matricNo: string;
  name: string;
  date: string;
  clockIn: string;
  clockOut: string | null;
};

export type NewAttendanceRecord = Omit<AttendanceRecord, "id" | "clockOut">;

export type Notice = {
  kind: "success" | "error";
  text: string;
};

export type sessionData = {
  notice: Notice;
  seen: boolean;
};

export type HonoGenericContext = {
  Variables: { session: Session<sessionData>; session_key_rotation: boolean };
};
