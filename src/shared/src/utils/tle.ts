import { TLE_LINE_LENGTH, TLE_MIN_LINES } from "./constants";
import { Result, TleParseError } from "./errors";

/**
 * Orbital elements for one satellite in NORAD two-line element format,
 * preceded by its name line.
 */
export interface TleData {
  readonly tle0: string;
  readonly tle1: string;
  readonly tle2: string;
}

export interface TleParseOptions {
  /** Enforce the mod-10 checksum digit in column 69 of each data line. */
  verifyChecksums?: boolean;
}

/**
 * NORAD checksum: sum of all digits in the first 68 columns, with each
 * minus sign counting as 1, modulo 10.
 */
export function computeTleChecksum(line: string): number {
  let sum = 0;
  for (const ch of line.slice(0, TLE_LINE_LENGTH - 1)) {
    if (ch >= "0" && ch <= "9") sum += ch.charCodeAt(0) - 48;
    else if (ch === "-") sum += 1;
  }
  return sum % 10;
}

/** Length in UTF-8 bytes; any non-ASCII character makes a line too long. */
function lineLength(line: string): number {
  return Buffer.byteLength(line, "utf8");
}

export function hasValidChecksum(line: string): boolean {
  return lineLength(line) === TLE_LINE_LENGTH && line.charAt(TLE_LINE_LENGTH - 1) === String(computeTleChecksum(line));
}

export function tleFromLines(
  tle0: string,
  tle1: string,
  tle2: string,
  options: TleParseOptions = {}
): TleData {
  const name = tle0.trim();
  const line1 = tle1.trim();
  const line2 = tle2.trim();

  if (lineLength(line1) !== TLE_LINE_LENGTH) throw new TleParseError("InvalidTle1Length");
  if (lineLength(line2) !== TLE_LINE_LENGTH) throw new TleParseError("InvalidTle2Length");

  if (options.verifyChecksums) {
    if (!hasValidChecksum(line1)) throw new TleParseError("InvalidTle1Checksum");
    if (!hasValidChecksum(line2)) throw new TleParseError("InvalidTle2Checksum");
  }

  return Object.freeze({ tle0: name, tle1: line1, tle2: line2 });
}

/**
 * Parse a three-line TLE block (name, line 1, line 2). Lines after the
 * third are ignored.
 */
export function parseTle(raw: string, options: TleParseOptions = {}): TleData {
  const lines = raw.split(/\r?\n/);
  // A trailing newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  if (lines.length < TLE_MIN_LINES) throw new TleParseError("InsufficientLines");

  const [tle0, tle1, tle2] = lines;
  return tleFromLines(tle0, tle1, tle2, options);
}

export function safeParseTle(raw: string, options: TleParseOptions = {}): Result<TleData, TleParseError> {
  try {
    return { success: true, data: parseTle(raw, options) };
  } catch (err) {
    if (err instanceof TleParseError) return { success: false, error: err };
    throw err;
  }
}
