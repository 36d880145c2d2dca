import { z } from "zod";
import {
  CHANNELS_PER_ROUND,
  DEFAULT_FALLBACK_ALARM_RATIO,
} from "./constants.ts";

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Overrides the logger's minimum level (DEBUG in dev, INFO in production)
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR", "FATAL"]).optional(),

  // Default input paths for the CLI
  MARKET_DATA_CSV: z.string().optional(),
  MARKET_CHAT_CSV: z.string().optional(),

  CHANNELS_PER_ROUND: z.coerce
    .number()
    .int()
    .positive()
    .default(CHANNELS_PER_ROUND),

  FALLBACK_ALARM_RATIO: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_FALLBACK_ALARM_RATIO),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(
  source: Record<string, string | undefined> = process.env,
): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}
