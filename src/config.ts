import { envSchema, type AppConfig } from "./Types/zodSchema";

export type { AppConfig };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return parsed.data;
}

export const sessionConfig = {
  cookieName: "attendance_session",
  prefix: "attendance-session:",
  ttl: 60 * 60 * 24, // 24 hours
};
