import { isWithinWindow, TelemetryMessage } from "@groundtrack/shared";
import { JobRegistry } from "./registry";

/**
 * Id of the job whose pass produced `message`: a Started or Completed job
 * on this station whose window contains the message timestamp.
 */
export function correlateTelemetry(
  message: TelemetryMessage,
  registry: JobRegistry,
  stationId: string
): bigint | undefined {
  if (message.groundStationId !== stationId) return undefined;

  return registry
    .list(["Started", "Completed"])
    .find((entry) => isWithinWindow(message.timestamp, entry.job))?.job.id;
}
