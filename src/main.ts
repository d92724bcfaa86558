import "dotenv/config";
import { serve } from "@hono/node-server";
import { MemoryStore, type Store } from "hono-sessions";
import createRedisClient from "./Client/RedisClient";
import { RedisStoreAdapter } from "./Client/RedisSessionStore";
import { loadConfig, sessionConfig } from "./config";
import { createApp } from "./index";
import { createAttendanceRepository } from "./Repositories";
import { AttendanceService } from "./Services/AttendanceService";

async function main() {
  const config = loadConfig();

  const repository = createAttendanceRepository(config);
  await repository.init();

  const service = new AttendanceService(repository, { clearMode: config.CLEAR_MODE });

  const redisClient = config.REDIS_URL ? createRedisClient(config.REDIS_URL) : null;
  const sessionStore: Store = redisClient
    ? new RedisStoreAdapter({ client: redisClient, prefix: sessionConfig.prefix, ttl: sessionConfig.ttl })
    : new MemoryStore();

  const app = createApp({ service, sessionStore, encryptionKey: config.SESSION_SECRET });

  const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    console.log(`🚀 Server is ready on http://localhost:${info.port} (clear mode: ${config.CLEAR_MODE})`);
  });

  const shutdown = async (signal: string) => {
    console.log(`⚠️ ${signal} received, shutting down`);
    server.close();
    await repository.close();
    await redisClient?.quit();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        console.error("❌ Shutdown failed:", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error("❌ Startup failed:", error);
  process.exit(1);
});
