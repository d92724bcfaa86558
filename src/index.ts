import { Hono } from "hono";
import { MemoryStore, sessionMiddleware, type Store } from "hono-sessions";
import type IRouter from "./Interfaces/IRouter";
import attendanceRouter from "./Routes/Attendance";
import homeRouter from "./Routes/Home";
import type { AttendanceService } from "./Services/AttendanceService";
import type { HonoGenericContext } from "./Types/types";
import { sessionConfig } from "./config";

export interface AppDependencies {
  service: AttendanceService;
  sessionStore?: Store;
  encryptionKey?: string;
}

export function createApp({ service, sessionStore, encryptionKey }: AppDependencies) {
  const app = new Hono<HonoGenericContext>();

  app.use("*", async (c, next) => {
    const start = Date.now();
    const api = c.req.path;

    await next();

    const duration = Date.now() - start;
    const responseTimestamp = new Date().toISOString();
    console.log(
      `[${responseTimestamp}] ${c.req.method} ${api}, Status: ${c.res.status}, Duration: ${duration}ms`,
    );
  });

  app.use(
    "*",
    sessionMiddleware({
      store: sessionStore ?? new MemoryStore(),
      encryptionKey,
      sessionCookieName: sessionConfig.cookieName,
      expireAfterSeconds: sessionConfig.ttl,
      cookieOptions: { maxAge: sessionConfig.ttl, httpOnly: true, sameSite: "Lax", path: "/" },
      autoExtendExpiration: true,
    }),
  );

  app.get("/health", (c) => c.json({ status: "ok" }));

  const routers: IRouter[] = [homeRouter(service), attendanceRouter(service)];
  for (const { path, router } of routers) {
    app.route(path, router);
  }

  app.onError((error, c) => {
    console.error(`❌ Unhandled error on ${c.req.method} ${c.req.path}:`, error);
    return c.json({ message: "Internal Server Error" }, 500);
  });

  return app;
}

export default createApp;
