export const TLE_LINE_LENGTH = 69;
export const TLE_MIN_LINES = 3;

export const MAX_JOB_ID = 2n ** 64n - 1n;

export const DEFAULT_GROUND_STATION_ID = "station-1";
export const DEFAULT_PASS_CYCLE_INTERVAL_MS = 1000;
