import type { Job } from "@groundtrack/shared";
import type { ExecutorLogger } from "./logger";

/** Antenna and transceiver control for one pass. */
export interface PassHardware {
  /** Point the antenna and tune the transceiver at AOS. */
  acquire(job: Job): Promise<void>;
  /** Stow and release the station at LOS. */
  release(job: Job): Promise<void>;
}

/** Stand-in used when no hardware driver is attached; it only logs. */
export function createLoggingHardware(logger: ExecutorLogger): PassHardware {
  return {
    async acquire(job) {
      logger.info(
        {
          jobId: job.id.toString(),
          satelliteId: job.satelliteId,
          rxFrequency: job.rxFrequency,
          txFrequency: job.txFrequency,
          uplinkBytes: job.uplink?.length ?? 0,
        },
        "Acquiring satellite"
      );
    },
    async release(job) {
      logger.info({ jobId: job.id.toString(), satelliteId: job.satelliteId }, "Releasing station");
    },
  };
}
