import { LifecycleError } from "./errors";
import { Job, jobIdToJson } from "./job";

export const JOB_STATUSES = ["Received", "Scheduled", "Started", "Completed", "Error"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: readonly JobStatus[] = ["Completed", "Error"];

/** Runtime state of a job, held by the executing subsystem. */
export interface JobState {
  readonly status: JobStatus;
  readonly since: Date;
  /** Set when status is Error. */
  readonly cause?: string;
}

export type LifecycleEvent =
  | { type: "schedule" }
  | { type: "start" }
  | { type: "complete" }
  | { type: "fail"; cause: string };

export interface TransitionContext {
  job: Job;
  now: Date;
}

const EVENT_TARGET: Record<LifecycleEvent["type"], JobStatus> = {
  schedule: "Scheduled",
  start: "Started",
  complete: "Completed",
  fail: "Error",
};

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  Received: ["Scheduled", "Error"],
  Scheduled: ["Started", "Error"],
  Started: ["Completed", "Error"],
  Completed: [],
  Error: [],
};

export function initialState(now: Date): JobState {
  return Object.freeze({ status: "Received", since: now });
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Apply a lifecycle event. The returned state is new; `state` is untouched.
 */
export function transition(state: JobState, event: LifecycleEvent, { job, now }: TransitionContext): JobState {
  const target = EVENT_TARGET[event.type];

  if (isTerminal(state.status)) {
    throw new LifecycleError("TerminalState", `Job ${job.id} is already ${state.status}`);
  }
  if (!canTransition(state.status, target)) {
    throw new LifecycleError("IllegalTransition", `Job ${job.id} cannot move from ${state.status} to ${target}`);
  }

  switch (event.type) {
    case "start":
      if (now.getTime() < job.start.getTime()) {
        throw new LifecycleError("StartBeforeWindow", `Job ${job.id} window opens at ${job.start.toISOString()}`);
      }
      break;
    case "complete":
      if (now.getTime() < job.end.getTime()) {
        throw new LifecycleError("CompleteBeforeWindowEnd", `Job ${job.id} window closes at ${job.end.toISOString()}`);
      }
      break;
    case "fail":
      if (event.cause.trim() === "") {
        throw new LifecycleError("MissingCause", "An error transition needs a cause");
      }
      return Object.freeze({ status: target, since: now, cause: event.cause });
    case "schedule":
      break;
  }

  return Object.freeze({ status: target, since: now });
}

/** Published on every status change. */
export interface StatusEvent {
  readonly jobId: bigint;
  readonly status: JobStatus;
  readonly at: Date;
  readonly cause?: string;
}

export function toStatusEvent(jobId: bigint, state: JobState): StatusEvent {
  return Object.freeze({
    jobId,
    status: state.status,
    at: state.since,
    ...(state.cause !== undefined ? { cause: state.cause } : {}),
  });
}

export function serializeStatusEvent(event: StatusEvent) {
  return {
    job_id: jobIdToJson(event.jobId),
    status: event.status,
    at: event.at.toISOString(),
    ...(event.cause !== undefined ? { cause: event.cause } : {}),
  };
}
