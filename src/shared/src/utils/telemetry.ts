import { randomUUID } from "crypto";
import { telemetryEnvelopeSchema, telemetryRecordSchema } from "../schemas/telemetry";
import { TelemetryValidationError } from "./errors";
import { Job } from "./job";

/** Transport envelope for one received frame. */
export interface TelemetryMessage {
  readonly groundStationId: string;
  readonly timestamp: Date;
  readonly payload: Uint8Array;
}

/** A decoded telemetry sample. */
export interface TelemetryRecord {
  readonly id: string;
  /** Epoch seconds. */
  readonly timestamp: number;
  readonly temperature: number;
  readonly voltage: number;
  readonly current: number;
  readonly batteryLevel: number;
}

export type TelemetryFields = Omit<TelemetryRecord, "id">;

/** Source of globally unique record ids. */
export type IdSource = () => string;

export const randomIdSource: IdSource = () => randomUUID();

export function createTelemetryMessage(
  groundStationId: string,
  timestamp: Date,
  payload: Uint8Array | readonly number[]
): TelemetryMessage {
  const at = timestamp.getTime();
  const bytes = Uint8Array.from(payload);
  return Object.freeze({
    groundStationId,
    get timestamp(): Date {
      return new Date(at);
    },
    get payload(): Uint8Array {
      return Uint8Array.from(bytes);
    },
  });
}

export function createTelemetryRecord(fields: TelemetryFields, idSource: IdSource = randomIdSource): TelemetryRecord {
  return telemetryRecordWithId(idSource(), fields);
}

/** Keep a caller-issued id, e.g. when replaying stored samples. */
export function telemetryRecordWithId(id: string, fields: TelemetryFields): TelemetryRecord {
  return Object.freeze({
    id,
    timestamp: fields.timestamp,
    temperature: fields.temperature,
    voltage: fields.voltage,
    current: fields.current,
    batteryLevel: fields.batteryLevel,
  });
}

export function parseTelemetryEnvelope(input: unknown): TelemetryMessage {
  const parsed = telemetryEnvelopeSchema.safeParse(input);
  if (!parsed.success) {
    throw new TelemetryValidationError("InvalidEnvelope", "Validation failed", parsed.error.flatten());
  }

  const { ground_station_id, timestamp, payload } = parsed.data;
  const bytes = typeof payload === "string" ? Buffer.from(payload, "base64") : payload;
  return createTelemetryMessage(ground_station_id, new Date(timestamp), bytes);
}

export function parseTelemetryRecord(input: unknown, idSource: IdSource = randomIdSource): TelemetryRecord {
  const parsed = telemetryRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new TelemetryValidationError("InvalidRecord", "Validation failed", parsed.error.flatten());
  }

  const { id, battery_level, ...rest } = parsed.data;
  const fields = { ...rest, batteryLevel: battery_level };
  return id === undefined ? createTelemetryRecord(fields, idSource) : telemetryRecordWithId(id, fields);
}

/** Envelope as published downstream; the inverse of `parseTelemetryEnvelope`. */
export function toTelemetryMessageJson(message: TelemetryMessage) {
  return {
    ground_station_id: message.groundStationId,
    timestamp: message.timestamp.toISOString(),
    payload: Array.from(message.payload),
  };
}

export function toTelemetryRecordJson(record: TelemetryRecord) {
  return {
    id: record.id,
    timestamp: record.timestamp,
    temperature: record.temperature,
    voltage: record.voltage,
    current: record.current,
    battery_level: record.batteryLevel,
  };
}

/** True when `timestamp` falls inside the job's [start, end] window. */
export function isWithinWindow(timestamp: Date, job: Job): boolean {
  const t = timestamp.getTime();
  return t >= job.start.getTime() && t <= job.end.getTime();
}
