import { jobSubmissionSchema } from "../schemas/job";
import { MAX_JOB_ID } from "./constants";
import { JobValidationError, Result, TleParseError } from "./errors";
import { TleData, TleParseOptions, tleFromLines } from "./tle";

/**
 * A scheduled tracking request for a single satellite pass.
 *
 * Jobs are frozen once created. A changed schedule is a new job with a new id;
 * runtime status is tracked outside the job (see `JobState`).
 */
export interface Job {
  readonly id: bigint;
  readonly satelliteId: string;
  /** Acquisition of signal (AOS), UTC. */
  readonly start: Date;
  /** Loss of signal (LOS), UTC. */
  readonly end: Date;
  readonly tle: TleData;
  /** Downlink frequency in Hz. */
  readonly rxFrequency: number;
  /** Uplink frequency in Hz. */
  readonly txFrequency: number;
  /** Raw bytes to transmit during the pass. Absent for receive-only jobs. */
  readonly uplink?: Uint8Array;
}

export interface JobInput {
  id: bigint | number;
  satelliteId: string;
  start: Date;
  end: Date;
  tle: { tle0: string; tle1: string; tle2: string };
  rxFrequency: number;
  txFrequency: number;
  uplink?: Uint8Array | readonly number[] | null;
}

function toJobId(id: bigint | number): bigint | undefined {
  if (typeof id === "number") {
    if (!Number.isSafeInteger(id)) return undefined;
    id = BigInt(id);
  }
  return id >= 0n && id <= MAX_JOB_ID ? id : undefined;
}

function isValidFrequency(hz: number): boolean {
  return Number.isFinite(hz) && hz > 0;
}

function toUplink(uplink: Uint8Array | readonly number[]): Uint8Array | undefined {
  if (uplink instanceof Uint8Array) return Uint8Array.from(uplink);
  if (!uplink.every((b) => Number.isInteger(b) && b >= 0 && b <= 255)) return undefined;
  return Uint8Array.from(uplink);
}

/**
 * Validate caller-supplied fields and build an immutable Job.
 * Checks run in a fixed order; the first failure is thrown.
 */
export function createJob(input: JobInput, options: TleParseOptions = {}): Job {
  const id = toJobId(input.id);
  if (id === undefined) {
    throw new JobValidationError("InvalidId", "Job id must be an unsigned 64-bit integer");
  }

  const start = input.start.getTime();
  const end = input.end.getTime();
  if (Number.isNaN(start) || Number.isNaN(end) || start >= end) {
    throw new JobValidationError("InvalidTimeWindow", "Job start must be before end");
  }

  if (!isValidFrequency(input.rxFrequency)) {
    throw new JobValidationError("InvalidRxFrequency", "rx_frequency must be a positive number of Hz");
  }
  if (!isValidFrequency(input.txFrequency)) {
    throw new JobValidationError("InvalidTxFrequency", "tx_frequency must be a positive number of Hz");
  }

  let tle: TleData;
  try {
    tle = tleFromLines(input.tle.tle0, input.tle.tle1, input.tle.tle2, options);
  } catch (err) {
    if (err instanceof TleParseError) {
      throw new JobValidationError("InvalidTle", err.message, { cause: err });
    }
    throw err;
  }

  let uplink: Uint8Array | undefined;
  if (input.uplink != null) {
    uplink = toUplink(input.uplink);
    if (uplink === undefined) {
      throw new JobValidationError("InvalidUplink", "uplink bytes must be integers 0-255");
    }
  }

  // Dates and bytes are handed out as copies so holders cannot alter the job
  const job = {
    id,
    satelliteId: input.satelliteId,
    get start(): Date {
      return new Date(start);
    },
    get end(): Date {
      return new Date(end);
    },
    tle,
    rxFrequency: input.rxFrequency,
    txFrequency: input.txFrequency,
  };
  if (uplink) {
    const bytes = uplink;
    Object.defineProperty(job, "uplink", { enumerable: true, get: () => Uint8Array.from(bytes) });
  }
  return Object.freeze(job);
}

export function safeCreateJob(input: JobInput, options: TleParseOptions = {}): Result<Job, JobValidationError> {
  try {
    return { success: true, data: createJob(input, options) };
  } catch (err) {
    if (err instanceof JobValidationError) return { success: false, error: err };
    throw err;
  }
}

/** Validate a JSON job submission payload and build the Job it describes. */
export function parseJobSubmission(payload: unknown, options: TleParseOptions = {}): Job {
  const parsed = jobSubmissionSchema.safeParse(payload);
  if (!parsed.success) {
    throw new JobValidationError("InvalidPayload", "Validation failed", {
      details: parsed.error.flatten(),
    });
  }

  const { id, satellite_id, start, end, tle, rx_frequency, tx_frequency, uplink } = parsed.data;
  return createJob(
    {
      id: typeof id === "string" ? BigInt(id) : id,
      satelliteId: satellite_id,
      start: new Date(start),
      end: new Date(end),
      tle,
      rxFrequency: rx_frequency,
      txFrequency: tx_frequency,
      uplink,
    },
    options
  );
}

export function isTransmitCapable(job: Job): boolean {
  return job.uplink !== undefined;
}

/** Job id as JSON: a number while it fits, a decimal string beyond 2^53. */
export function jobIdToJson(id: bigint): number | string {
  return id <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(id) : id.toString();
}

export function serializeJob(job: Job) {
  return {
    id: jobIdToJson(job.id),
    satellite_id: job.satelliteId,
    start: job.start.toISOString(),
    end: job.end.toISOString(),
    tle: { tle0: job.tle.tle0, tle1: job.tle.tle1, tle2: job.tle.tle2 },
    rx_frequency: job.rxFrequency,
    tx_frequency: job.txFrequency,
    ...(job.uplink ? { uplink: Array.from(job.uplink) } : {}),
  };
}
