import Redis from "ioredis";

export function createRedisClient(url: string): Redis {
  const redisClient = new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redisClient.on("connect", () => {
    console.log("✅ Redis connected");
  });

  redisClient.on("error", (error) => {
    console.error("❌ Redis connection error:", error);
  });

  redisClient.on("close", () => {
    console.log("⚠️ Redis connection closed");
  });

  return redisClient;
}

export default createRedisClient;
