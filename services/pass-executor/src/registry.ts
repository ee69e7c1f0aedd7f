import {
  initialState,
  isTerminal,
  Job,
  JobState,
  JobStatus,
  JobValidationError,
  LifecycleError,
  LifecycleEvent,
  toStatusEvent,
  transition,
} from "@groundtrack/shared";
import { StatusEventBus } from "./events";

export type Clock = () => Date;

export interface JobEntry {
  readonly job: Job;
  readonly state: JobState;
}

/**
 * Owns accepted jobs and their runtime state. Ids are never reused: a job
 * that reached Completed or Error stays registered for audit.
 */
export class JobRegistry {
  private readonly entries = new Map<bigint, JobEntry>();
  private readonly inFlight = new Set<bigint>();

  constructor(private readonly bus: StatusEventBus) {}

  register(job: Job, now: Date): JobEntry {
    if (this.entries.has(job.id)) {
      throw new JobValidationError("DuplicateId", `Job id ${job.id} is already registered`);
    }

    const entry: JobEntry = { job, state: initialState(now) };
    this.entries.set(job.id, entry);
    this.bus.publish(toStatusEvent(job.id, entry.state));
    return entry;
  }

  get(id: bigint): JobEntry | undefined {
    return this.entries.get(id);
  }

  statusOf(id: bigint): JobStatus | undefined {
    return this.entries.get(id)?.state.status;
  }

  /** Entries in registration order, optionally limited to some statuses. */
  list(statuses?: readonly JobStatus[]): JobEntry[] {
    const all = [...this.entries.values()];
    return statuses ? all.filter((e) => statuses.includes(e.state.status)) : all;
  }

  /** Non-terminal jobs with no transition underway. */
  pending(): JobEntry[] {
    return this.list().filter((e) => !isTerminal(e.state.status) && !this.inFlight.has(e.job.id));
  }

  isInFlight(id: bigint): boolean {
    return this.inFlight.has(id);
  }

  apply(id: bigint, event: LifecycleEvent, now: Date): JobState {
    this.require(id);
    if (this.inFlight.has(id)) {
      throw new LifecycleError("TransitionInProgress", `Job ${id} has a transition underway`);
    }
    return this.commit(id, event, now);
  }

  /**
   * Hold the job while `task` runs, then apply the event it resolves to.
   * Other transitions of the same job are rejected until it settles.
   */
  async applyAsync(id: bigint, task: (job: Job) => Promise<LifecycleEvent>, clock: Clock): Promise<JobState> {
    const entry = this.require(id);
    if (this.inFlight.has(id)) {
      throw new LifecycleError("TransitionInProgress", `Job ${id} has a transition underway`);
    }

    this.inFlight.add(id);
    try {
      const event = await task(entry.job);
      return this.commit(id, event, clock());
    } finally {
      this.inFlight.delete(id);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  private require(id: bigint): JobEntry {
    const entry = this.entries.get(id);
    if (!entry) throw new LifecycleError("UnknownJob", `Job ${id} is not registered`);
    return entry;
  }

  private commit(id: bigint, event: LifecycleEvent, now: Date): JobState {
    const { job, state } = this.require(id);
    const next = transition(state, event, { job, now });
    this.entries.set(id, { job, state: next });
    this.bus.publish(toStatusEvent(id, next));
    return next;
  }
}
