import { z } from "zod";
import { ConfigurationError } from "@/lib/cashflowModel/errors";

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const ServerEnvSchema = z.object({
  // Logging
  CASHFLOW_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),

  // IRR root finding
  CASHFLOW_IRR_MAX_ITERATIONS: z.coerce.number().int().positive().default(100),

  // NPV_search round-trip check
  CASHFLOW_NPV_SEARCH_TOLERANCE: z.coerce.number().positive().default(1e-6),

  // App
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export function serverEnv(source: Record<string, string | undefined> = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    // eslint-disable-next-line no-console
    console.error("❌ Invalid server env:", fieldErrors);
    throw new ConfigurationError("Invalid server environment variables (see logs).", Object.keys(fieldErrors));
  }
  return parsed.data;
}
