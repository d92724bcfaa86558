import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import type IRouter from "../Interfaces/IRouter";
import type { AttendanceService } from "../Services/AttendanceService";
import type { HonoGenericContext } from "../Types/types";
import { attendanceSubmissionSchema } from "../Types/zodSchema";
import { StoreError, type AttendanceErrorCode } from "../Utils/AttendanceErrors";

const errorStatus = {
  VALIDATION_ERROR: 400,
  ALREADY_CLOCKED_IN: 409,
  NOT_CLOCKED_IN: 409,
  STORE_ERROR: 500,
} as const satisfies Record<AttendanceErrorCode, number>;

export default function attendanceRouter(service: AttendanceService): IRouter {
  const router = new Hono<HonoGenericContext>();

  /**
   * All attendance records, newest first
   * GET /api/attendance
   */
  router.get("/", async (c) => {
    try {
      const records = await service.listRecords();
      return c.json({ records, total: records.length });
    } catch (error) {
      console.error("Error listing attendance records:", error);
      const failure = error instanceof StoreError ? error : new StoreError(error);
      return c.json({ error: failure.toJSON() }, errorStatus[failure.code]);
    }
  });

  /**
   * Clock in
   * POST /api/attendance/clock-in
   */
  router.post("/clock-in", zValidator("json", attendanceSubmissionSchema), async (c) => {
    const { matricNo, name } = c.req.valid("json");
    const result = await service.clockIn(matricNo, name);

    if (!result.success) {
      return c.json({ error: result.error.toJSON() }, errorStatus[result.error.code]);
    }

    console.log(`✅ ${result.record.matricNo} clocked in at ${result.record.clockIn}`);
    return c.json({ record: result.record }, 201);
  });

  /**
   * Clock out
   * POST /api/attendance/clock-out
   */
  router.post("/clock-out", zValidator("json", attendanceSubmissionSchema), async (c) => {
    const { matricNo, name } = c.req.valid("json");
    const result = await service.clockOut(matricNo, name);

    if (!result.success) {
      return c.json({ error: result.error.toJSON() }, errorStatus[result.error.code]);
    }

    console.log(`✅ ${result.record.matricNo} clocked out at ${result.record.clockOut}`);
    return c.json({ record: result.record }, 200);
  });

  return { path: "/api/attendance", router };
}
