import { describe, it, expect } from "vitest";
import { createJob, createTelemetryMessage } from "@groundtrack/shared";
import { correlateTelemetry } from "../src/correlator";
import { StatusEventBus } from "../src/events";
import { JobRegistry } from "../src/registry";

const TLE = {
  tle0: "ISS (ZARYA)",
  tle1: "1 25544U 98067A   25235.75642456  .00011222  00000+0  20339-3 0  9993",
  tle2: "2 25544  51.6355 332.1708 0003307 260.2831  99.7785 15.50129787525648",
};

function makeJob(id: number, start: string, end: string) {
  return createJob({
    id,
    satelliteId: "ISS (ZARYA)",
    start: new Date(`2025-09-19T${start}:00Z`),
    end: new Date(`2025-09-19T${end}:00Z`),
    tle: TLE,
    rxFrequency: 145800000,
    txFrequency: 437500000,
  });
}

function message(station: string, time: string) {
  return createTelemetryMessage(station, new Date(`2025-09-19T${time}Z`), [1, 2, 3]);
}

function setup() {
  const registry = new JobRegistry(new StatusEventBus());
  const before = new Date("2025-09-19T11:00:00Z");
  registry.register(makeJob(1, "12:00", "12:15"), before);
  registry.register(makeJob(2, "13:00", "13:10"), before);
  registry.register(makeJob(3, "14:00", "14:10"), before);

  registry.apply(1n, { type: "schedule" }, before);
  registry.apply(1n, { type: "start" }, new Date("2025-09-19T12:00:00Z"));
  registry.apply(2n, { type: "schedule" }, before);
  registry.apply(2n, { type: "start" }, new Date("2025-09-19T13:00:00Z"));
  registry.apply(2n, { type: "complete" }, new Date("2025-09-19T13:10:00Z"));
  registry.apply(3n, { type: "schedule" }, before);
  return registry;
}

describe("correlateTelemetry", () => {
  it("matches a frame to the active pass", () => {
    expect(correlateTelemetry(message("station-1", "12:07:30"), setup(), "station-1")).toBe(1n);
  });

  it("matches a frame to a completed pass", () => {
    expect(correlateTelemetry(message("station-1", "13:10:00"), setup(), "station-1")).toBe(2n);
  });

  it("ignores jobs that never started", () => {
    expect(correlateTelemetry(message("station-1", "14:05:00"), setup(), "station-1")).toBeUndefined();
  });

  it("ignores frames outside every window", () => {
    expect(correlateTelemetry(message("station-1", "12:30:00"), setup(), "station-1")).toBeUndefined();
  });

  it("ignores frames from other stations", () => {
    expect(correlateTelemetry(message("station-2", "12:07:30"), setup(), "station-1")).toBeUndefined();
  });
});
