import { z } from "zod";
import { ValidationError } from "./errors";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.string().default("production"),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  RISK_TOP_N: z.coerce.number().int().nonnegative().default(5),
  CARRYOVER_THRESHOLD: z.coerce.number().int().positive().default(3),
});

export type PortfolioConfig = Readonly<{
  env: string;
  logLevel: LogLevel;
  topN: number;
  carryoverThreshold: number;
}>;

/**
 * Reads runtime settings from the environment. Library functions never call
 * this; hosts load it once and pass the values through.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PortfolioConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError("Invalid portfolio configuration", parsed.error.issues);
  }
  const { NODE_ENV, LOG_LEVEL, RISK_TOP_N, CARRYOVER_THRESHOLD } = parsed.data;
  return Object.freeze({
    env: NODE_ENV,
    logLevel: LOG_LEVEL ?? (NODE_ENV === "development" ? "debug" : "warn"),
    topN: RISK_TOP_N,
    carryoverThreshold: CARRYOVER_THRESHOLD,
  });
}
