import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export const LOOPBACK_HOSTS = ["127.0.0.1", "localhost", "::1"] as const;

const EnvSchema = z.object({
  NUDGE_PORT: z.coerce.number().int().min(1).max(65535).default(9131),
  NUDGE_HOST: z.enum(LOOPBACK_HOSTS).default("127.0.0.1"),
  NUDGE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NUDGE_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(86_400_000).default(600_000),
  NUDGE_IDLE_CHECK_INTERVAL_MS: z.coerce.number().int().min(100).max(3_600_000).default(30_000),
  NUDGE_CLIENT_TIMEOUT_SECONDS: z.coerce.number().int().min(1).max(86_400).default(300),
  NUDGE_POLL_INTERVAL_MS: z.coerce.number().int().min(50).max(60_000).default(1_000),
});

export type NudgeEnv = z.infer<typeof EnvSchema>;

function validateIntervals(env: NudgeEnv): string[] {
  const errors: string[] = [];
  if (env.NUDGE_IDLE_CHECK_INTERVAL_MS > env.NUDGE_IDLE_TIMEOUT_MS) {
    errors.push("NUDGE_IDLE_CHECK_INTERVAL_MS must not exceed NUDGE_IDLE_TIMEOUT_MS");
  }
  return errors;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): NudgeEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid nudge env: ${message}`);
  }
  const env = parsed.data;
  const intervalIssues = validateIntervals(env);
  if (intervalIssues.length > 0) {
    throw new Error(`Invalid nudge env: ${intervalIssues.join("; ")}`);
  }
  return env;
}

export function describeEnvForLogs(env: NudgeEnv): Record<string, string | number> {
  return {
    NUDGE_HOST: env.NUDGE_HOST,
    NUDGE_PORT: env.NUDGE_PORT,
    NUDGE_LOG_LEVEL: env.NUDGE_LOG_LEVEL,
    NUDGE_IDLE_TIMEOUT_MS: env.NUDGE_IDLE_TIMEOUT_MS,
    NUDGE_IDLE_CHECK_INTERVAL_MS: env.NUDGE_IDLE_CHECK_INTERVAL_MS,
  };
}
