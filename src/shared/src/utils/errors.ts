export type TleParseErrorKind =
  | "InsufficientLines"
  | "InvalidTle1Length"
  | "InvalidTle2Length"
  | "InvalidTle1Checksum"
  | "InvalidTle2Checksum";

export type JobValidationErrorKind =
  | "InvalidPayload"
  | "InvalidId"
  | "InvalidTimeWindow"
  | "InvalidRxFrequency"
  | "InvalidTxFrequency"
  | "InvalidTle"
  | "InvalidUplink"
  | "DuplicateId";

export type LifecycleErrorKind =
  | "UnknownJob"
  | "TerminalState"
  | "IllegalTransition"
  | "StartBeforeWindow"
  | "CompleteBeforeWindowEnd"
  | "MissingCause"
  | "TransitionInProgress";

export type TelemetryValidationErrorKind = "InvalidEnvelope" | "InvalidRecord";

const TLE_MESSAGES: Record<TleParseErrorKind, string> = {
  InsufficientLines: "TLE must contain 3 lines",
  InvalidTle1Length: "TLE line 1 must be exactly 69 characters",
  InvalidTle2Length: "TLE line 2 must be exactly 69 characters",
  InvalidTle1Checksum: "TLE line 1 checksum mismatch",
  InvalidTle2Checksum: "TLE line 2 checksum mismatch",
};

export class TleParseError extends Error {
  readonly kind: TleParseErrorKind;

  constructor(kind: TleParseErrorKind) {
    super(TLE_MESSAGES[kind]);
    this.name = "TleParseError";
    this.kind = kind;
  }
}

export class JobValidationError extends Error {
  readonly kind: JobValidationErrorKind;
  readonly details?: unknown;

  constructor(kind: JobValidationErrorKind, message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "JobValidationError";
    this.kind = kind;
    this.details = options?.details;
  }
}

export class LifecycleError extends Error {
  readonly kind: LifecycleErrorKind;

  constructor(kind: LifecycleErrorKind, message: string) {
    super(message);
    this.name = "LifecycleError";
    this.kind = kind;
  }
}

export class TelemetryValidationError extends Error {
  readonly kind: TelemetryValidationErrorKind;
  readonly details?: unknown;

  constructor(kind: TelemetryValidationErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = "TelemetryValidationError";
    this.kind = kind;
    this.details = details;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type Result<T, E extends Error> =
  | { success: true; data: T }
  | { success: false; error: E };
