import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_REQUESTS: z.enum(["true", "false"]).default("true").transform(v => v === "true"),
});

export type AppConfig = {
  port: number;
  nodeEnv: "development" | "production" | "test";
  logRequests: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return {
    port: parsed.data.PORT,
    nodeEnv: parsed.data.NODE_ENV,
    logRequests: parsed.data.LOG_REQUESTS,
  };
}
