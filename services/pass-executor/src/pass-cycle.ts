import { errorMessage } from "@groundtrack/shared";
import type { Job, JobState, LifecycleEvent } from "@groundtrack/shared";
import { PassHardware } from "./hardware";
import { ExecutorLogger } from "./logger";
import { Clock, JobRegistry } from "./registry";
import { findConflict } from "./reservations";

export interface PassCycleDeps {
  registry: JobRegistry;
  hardware: PassHardware;
  logger: ExecutorLogger;
}

export interface PassCycleSummary {
  scheduled: number;
  started: number;
  completed: number;
  failed: number;
}

function hardwareStep(
  step: "acquire" | "release",
  success: LifecycleEvent,
  { hardware, logger }: PassCycleDeps
): (job: Job) => Promise<LifecycleEvent> {
  return async (job) => {
    try {
      await hardware[step](job);
      return success;
    } catch (err) {
      logger.error({ err, jobId: job.id.toString() }, `Hardware ${step} failed`);
      return { type: "fail", cause: errorMessage(err) };
    }
  };
}

/**
 * Advance every pending job as far as the clock allows:
 * Received jobs are scheduled (or failed on a window conflict), Scheduled
 * jobs are acquired once their window opens, Started jobs are released once
 * it closes.
 */
export async function runPassCycle(deps: PassCycleDeps, clock: Clock): Promise<PassCycleSummary> {
  const { registry, logger } = deps;
  const summary: PassCycleSummary = { scheduled: 0, started: 0, completed: 0, failed: 0 };
  const count = (state: JobState) => {
    if (state.status === "Scheduled") summary.scheduled++;
    else if (state.status === "Started") summary.started++;
    else if (state.status === "Completed") summary.completed++;
    else if (state.status === "Error") summary.failed++;
  };

  const hardwareTasks: Promise<JobState>[] = [];

  for (const { job, state } of registry.pending()) {
    const now = clock();

    switch (state.status) {
      case "Received": {
        const conflict = findConflict(job, registry);
        count(
          registry.apply(
            job.id,
            conflict ? { type: "fail", cause: `Window conflicts with job ${conflict.job.id}` } : { type: "schedule" },
            now
          )
        );
        break;
      }
      case "Scheduled":
        if (now.getTime() >= job.end.getTime()) {
          count(registry.apply(job.id, { type: "fail", cause: "Pass window elapsed before acquisition" }, now));
        } else if (now.getTime() >= job.start.getTime()) {
          hardwareTasks.push(registry.applyAsync(job.id, hardwareStep("acquire", { type: "start" }, deps), clock));
        }
        break;
      case "Started":
        if (now.getTime() >= job.end.getTime()) {
          hardwareTasks.push(registry.applyAsync(job.id, hardwareStep("release", { type: "complete" }, deps), clock));
        }
        break;
      default:
        break;
    }
  }

  for (const result of await Promise.allSettled(hardwareTasks)) {
    if (result.status === "fulfilled") count(result.value);
    else logger.error({ err: result.reason }, "Pass transition failed");
  }

  if (summary.scheduled + summary.started + summary.completed + summary.failed > 0) {
    logger.info(summary, "Pass cycle advanced jobs");
  }
  return summary;
}
