import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DATABASE_URL: z.string().optional(),

  JOBS_ENABLED: flag.default("true"),
  METRICS_WINDOW_DAYS: z.coerce.number().int().positive().default(90),
  METRICS_INTERVAL_MINUTES: z.coerce.number().int().positive().default(60),
  ALERTS_INTERVAL_MINUTES: z.coerce.number().int().positive().default(15),
  ARCHIVE_INTERVAL_HOURS: z.coerce.number().int().positive().default(24),

  ALERT_UPCOMING_LOOKAHEAD_DAYS: z.coerce.number().int().nonnegative().default(7),
  ALERT_LOW_CASH_THRESHOLD: z.coerce.number().nonnegative().default(0),

  PREDICTION_RETENTION_DAYS: z.coerce.number().int().positive().default(365),
  LEDGER_REQUIRE_DEPLOYED_MODEL: flag.default("false"),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
