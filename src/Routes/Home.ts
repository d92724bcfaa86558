import { Hono } from "hono";
import type IRouter from "../Interfaces/IRouter";
import type { AttendanceService } from "../Services/AttendanceService";
import { AttendanceAction, type HonoGenericContext, type Notice } from "../Types/types";
import { attendanceActionSchema, attendanceFormSchema } from "../Types/zodSchema";
import { ValidationError } from "../Utils/AttendanceErrors";
import { describeOutcome, invalidActionNotice } from "../Utils/Notices";
import { PageTemplates } from "../Utils/PageTemplates";

export default function homeRouter(service: AttendanceService): IRouter {
  const router = new Hono<HonoGenericContext>();

  /**
   * Attendance page
   * GET /
   */
  router.get("/", async (c) => {
    const session = c.get("session");

    try {
      // A browser seen for the first time starts from an empty table in "always" mode
      if (!session.get("seen")) {
        await service.clearForNewVisitor();
        session.set("seen", true);
      }

      const notice = session.get("notice");
      const records = await service.listRecords();
      return c.html(PageTemplates.renderAttendancePage(records, notice ?? null));
    } catch (error) {
      console.error("Error loading attendance page:", error);
      const notice: Notice = { kind: "error", text: "Error: Could not load attendance records." };
      return c.html(PageTemplates.renderAttendancePage([], notice), 500);
    }
  });

  /**
   * Clock in or out from the form
   * POST /
   */
  router.post("/", async (c) => {
    const session = c.get("session");

    const form = attendanceFormSchema.safeParse(await c.req.parseBody());
    if (!form.success) {
      // e.g. a file uploaded in place of a text field
      session.flash("notice", {
        kind: "error",
        text: new ValidationError(["matricNo", "name"]).message,
      });
      return c.redirect("/", 303);
    }

    const { action, matric_no, name } = form.data;

    const parsedAction = attendanceActionSchema.safeParse(action);
    if (!parsedAction.success) {
      session.flash("notice", invalidActionNotice);
      return c.redirect("/", 303);
    }

    const result =
      parsedAction.data === AttendanceAction.CLOCK_IN
        ? await service.clockIn(matric_no, name)
        : await service.clockOut(matric_no, name);

    session.flash("notice", describeOutcome(parsedAction.data, result));
    return c.redirect("/", 303);
  });

  return { path: "/", router };
}
