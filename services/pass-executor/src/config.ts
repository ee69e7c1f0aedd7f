import { z } from "zod";
import { DEFAULT_GROUND_STATION_ID, DEFAULT_PASS_CYCLE_INTERVAL_MS } from "@groundtrack/shared";

const flagSchema = z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1");

export const executorEnvSchema = z.object({
  GROUND_STATION_ID: z.string().min(1).default(DEFAULT_GROUND_STATION_ID),
  PASS_CYCLE_INTERVAL_MS: z.coerce.number().int().min(10).default(DEFAULT_PASS_CYCLE_INTERVAL_MS),
  JOBS_FILE: z.string().min(1).optional(),
  TLE_VERIFY_CHECKSUMS: flagSchema.default("false"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface ExecutorConfig {
  stationId: string;
  cycleIntervalMs: number;
  jobsFile?: string;
  verifyChecksums: boolean;
  logLevel: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ExecutorConfig {
  const parsed = executorEnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, errors]) => `${key}: ${(errors ?? []).join(", ")}`)
      .join("; ");
    throw new Error(`Invalid configuration (${fields})`);
  }

  const { GROUND_STATION_ID, PASS_CYCLE_INTERVAL_MS, JOBS_FILE, TLE_VERIFY_CHECKSUMS, LOG_LEVEL } = parsed.data;
  return {
    stationId: GROUND_STATION_ID,
    cycleIntervalMs: PASS_CYCLE_INTERVAL_MS,
    jobsFile: JOBS_FILE,
    verifyChecksums: TLE_VERIFY_CHECKSUMS,
    logLevel: LOG_LEVEL,
  };
}
