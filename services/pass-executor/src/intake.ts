import { readFile } from "fs/promises";
import { Job, JobValidationError, parseJobSubmission } from "@groundtrack/shared";
import { ExecutorLogger } from "./logger";
import { JobRegistry } from "./registry";

export interface IntakeDeps {
  registry: JobRegistry;
  logger: ExecutorLogger;
  verifyChecksums: boolean;
}

/** Validate a submission payload and register the job it describes. */
export function submitJob(payload: unknown, { registry, logger, verifyChecksums }: IntakeDeps, now: Date): Job {
  try {
    const job = parseJobSubmission(payload, { verifyChecksums });
    registry.register(job, now);
    logger.info({ jobId: job.id.toString(), satelliteId: job.satelliteId }, "Job received");
    return job;
  } catch (err) {
    if (err instanceof JobValidationError) {
      logger.warn({ kind: err.kind, reason: err.message, details: err.details }, "Job rejected");
    }
    throw err;
  }
}

export async function loadJobsFile(path: string): Promise<unknown[]> {
  const data: unknown = JSON.parse(await readFile(path, "utf8"));
  if (!Array.isArray(data)) {
    throw new Error(`Jobs file ${path} must contain a JSON array`);
  }
  return data;
}
