import { describe, it, expect, vi } from "vitest";
import { createJob, JobValidationError, LifecycleError, LifecycleEvent, StatusEvent } from "@groundtrack/shared";
import { StatusEventBus } from "../src/events";
import { JobRegistry } from "../src/registry";

const TLE = {
  tle0: "ISS (ZARYA)",
  tle1: "1 25544U 98067A   25235.75642456  .00011222  00000+0  20339-3 0  9993",
  tle2: "2 25544  51.6355 332.1708 0003307 260.2831  99.7785 15.50129787525648",
};

function makeJob(id: number) {
  return createJob({
    id,
    satelliteId: "ISS (ZARYA)",
    start: new Date("2025-09-19T12:00:00Z"),
    end: new Date("2025-09-19T12:15:00Z"),
    tle: TLE,
    rxFrequency: 145800000,
    txFrequency: 437500000,
  });
}

const NOW = new Date("2025-09-19T11:00:00Z");

function createRegistry() {
  const bus = new StatusEventBus();
  const events: StatusEvent[] = [];
  bus.subscribe((event) => events.push(event));
  return { registry: new JobRegistry(bus), events };
}

function errorKind(fn: () => unknown): string | undefined {
  try {
    fn();
    return undefined;
  } catch (err) {
    if (err instanceof JobValidationError || err instanceof LifecycleError) return err.kind;
    throw err;
  }
}

describe("JobRegistry", () => {
  it("registers a job as Received and publishes it", () => {
    const { registry, events } = createRegistry();
    const entry = registry.register(makeJob(1), NOW);

    expect(entry.state.status).toBe("Received");
    expect(registry.statusOf(1n)).toBe("Received");
    expect(events).toEqual([{ jobId: 1n, status: "Received", at: NOW }]);
  });

  it("rejects a duplicate id", () => {
    const { registry } = createRegistry();
    registry.register(makeJob(1), NOW);
    expect(errorKind(() => registry.register(makeJob(1), NOW))).toBe("DuplicateId");
    expect(registry.size).toBe(1);
  });

  it("keeps terminal jobs and their ids", () => {
    const { registry } = createRegistry();
    registry.register(makeJob(1), NOW);
    registry.apply(1n, { type: "fail", cause: "operator cancelled" }, NOW);

    expect(registry.get(1n)?.state).toEqual({ status: "Error", since: NOW, cause: "operator cancelled" });
    expect(errorKind(() => registry.register(makeJob(1), NOW))).toBe("DuplicateId");
  });

  it("publishes every transition", () => {
    const { registry, events } = createRegistry();
    registry.register(makeJob(1), NOW);
    registry.apply(1n, { type: "schedule" }, NOW);
    registry.apply(1n, { type: "start" }, new Date("2025-09-19T12:00:00Z"));

    expect(events.map((e) => e.status)).toEqual(["Received", "Scheduled", "Started"]);
  });

  it("rejects illegal transitions without changing state", () => {
    const { registry, events } = createRegistry();
    registry.register(makeJob(1), NOW);
    expect(errorKind(() => registry.apply(1n, { type: "complete" }, NOW))).toBe("IllegalTransition");
    expect(registry.statusOf(1n)).toBe("Received");
    expect(events).toHaveLength(1);
  });

  it("rejects unknown ids", () => {
    const { registry } = createRegistry();
    expect(errorKind(() => registry.apply(9n, { type: "schedule" }, NOW))).toBe("UnknownJob");
    expect(registry.statusOf(9n)).toBeUndefined();
  });

  it("lists entries in registration order by status", () => {
    const { registry } = createRegistry();
    registry.register(makeJob(3), NOW);
    registry.register(makeJob(1), NOW);
    registry.register(makeJob(2), NOW);
    registry.apply(1n, { type: "schedule" }, NOW);

    expect(registry.list().map((e) => e.job.id)).toEqual([3n, 1n, 2n]);
    expect(registry.list(["Received"]).map((e) => e.job.id)).toEqual([3n, 2n]);
    expect(registry.list(["Scheduled", "Started"]).map((e) => e.job.id)).toEqual([1n]);
  });
});

describe("JobRegistry.applyAsync", () => {
  it("holds the job until the task settles", async () => {
    const { registry } = createRegistry();
    registry.register(makeJob(1), NOW);

    let finish: () => void = () => undefined;
    const pending = registry.applyAsync(
      1n,
      () => new Promise<LifecycleEvent>((resolve) => {
        finish = () => resolve({ type: "schedule" });
      }),
      () => NOW
    );

    expect(registry.isInFlight(1n)).toBe(true);
    expect(registry.pending()).toEqual([]);
    expect(errorKind(() => registry.apply(1n, { type: "fail", cause: "x" }, NOW))).toBe("TransitionInProgress");
    await expect(registry.applyAsync(1n, async () => ({ type: "schedule" }), () => NOW)).rejects.toThrow(
      "Job 1 has a transition underway"
    );

    finish();
    const state = await pending;
    expect(state.status).toBe("Scheduled");
    expect(registry.isInFlight(1n)).toBe(false);
  });

  it("stamps the state with the clock after the task", async () => {
    const { registry } = createRegistry();
    registry.register(makeJob(1), NOW);
    const later = new Date("2025-09-19T11:30:00Z");
    const clock = vi.fn(() => later);

    const state = await registry.applyAsync(1n, async () => ({ type: "schedule" }), clock);
    expect(state.since).toBe(later);
    expect(clock).toHaveBeenCalledTimes(1);
  });

  it("releases the job when the task throws", async () => {
    const { registry } = createRegistry();
    registry.register(makeJob(1), NOW);

    await expect(
      registry.applyAsync(1n, async () => {
        throw new Error("driver crashed");
      }, () => NOW)
    ).rejects.toThrow("driver crashed");

    expect(registry.isInFlight(1n)).toBe(false);
    expect(registry.statusOf(1n)).toBe("Received");
  });
});

describe("StatusEventBus", () => {
  it("stops delivering after unsubscribe", () => {
    const bus = new StatusEventBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);
    const event: StatusEvent = { jobId: 1n, status: "Received", at: NOW };

    bus.publish(event);
    unsubscribe();
    bus.publish(event);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(event);
    expect(bus.listenerCount).toBe(0);
  });
});
