import type { Job } from "@groundtrack/shared";
import { JobEntry, JobRegistry } from "./registry";

function overlaps(a: Job, b: Job): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}

/**
 * First other job holding the station (Scheduled or Started) whose window
 * overlaps `job`. Windows that only touch at an edge do not conflict.
 */
export function findConflict(job: Job, registry: JobRegistry): JobEntry | undefined {
  return registry
    .list(["Scheduled", "Started"])
    .find((entry) => entry.job.id !== job.id && overlaps(entry.job, job));
}
